/**
 * Logger factory
 *
 * All logs go to stderr: stdout is reserved for the scan report so that
 * `skill-scan -o json > report.json` produces a clean document.
 */

import pino, { type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

export interface LoggerOptions {
  name?: string;
  level?: LevelWithSilent;
}

const LEVELS: readonly LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

export const DEFAULT_LOG_LEVEL: LevelWithSilent = 'warn';

export function isLogLevel(value: string): value is LevelWithSilent {
  return LEVELS.some((level) => level === value);
}

function resolveLevel(level?: LevelWithSilent): LevelWithSilent {
  if (level) return level;
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : DEFAULT_LOG_LEVEL;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {
      name: options.name ?? 'skill-scan',
      level: resolveLevel(options.level),
    },
    pino.destination({ dest: 2, sync: true }),
  );
}
