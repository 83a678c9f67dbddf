/**
 * Runs the CLI program in-process with captured output
 */

import { createProgram } from '@/cli/program';

export interface CliRun {
  stdout: string;
  stderr: string[];
  exitCode: number | undefined;
}

export const FIXED_NOW = new Date('2026-01-15T10:00:00.000Z');

export async function runCli(args: string[], env: NodeJS.ProcessEnv = {}): Promise<CliRun> {
  const run: CliRun = { stdout: '', stderr: [], exitCode: undefined };
  const program = createProgram({
    io: {
      out: (text) => {
        run.stdout += text;
      },
      err: (line) => {
        run.stderr.push(line);
      },
    },
    env: { LOG_LEVEL: 'silent', ...env },
    setExitCode: (code) => {
      run.exitCode = code;
    },
    now: () => FIXED_NOW,
  });
  await program.parseAsync(args, { from: 'user' });
  return run;
}
