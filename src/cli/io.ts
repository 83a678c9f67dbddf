/**
 * Output channels used by the commands. Reports go to `out`, messages to `err`.
 */
export interface CliIO {
  /** Write report text as-is to stdout */
  out(text: string): void;
  /** Write one message line to stderr */
  err(line: string): void;
}

export const processIO: CliIO = {
  out: (text) => {
    process.stdout.write(text);
  },
  err: (line) => {
    process.stderr.write(`${line}\n`);
  },
};
