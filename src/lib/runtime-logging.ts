/**
 * Shared Runtime Logging - Harmonized command logging
 *
 * Gives every command the same "Starting"/"Completed"/"Failed" phrasing
 * with structured fields.
 */

import type { Logger } from 'pino';
import type { ErrorGuidance } from '@/types';

/**
 * Standard log message format constants for command execution
 */
export const LOG_FORMAT = {
  STARTING: 'Starting',
  COMPLETED: 'Completed',
  FAILED: 'Failed',
} as const;

/**
 * Log command start
 *
 * @example
 * ```typescript
 * logCommandStart('scan', { root: './src', rules: 12 }, logger);
 * // Logs: "Starting scan" with structured params
 * ```
 */
export function logCommandStart(
  command: string,
  params: Record<string, unknown>,
  logger: Logger,
): void {
  logger.info(params, `${LOG_FORMAT.STARTING} ${command}`);
}

/**
 * Log command completion, with duration when known
 */
export function logCommandComplete(
  command: string,
  result: Record<string, unknown>,
  logger: Logger,
  durationMs?: number,
): void {
  const logData = durationMs !== undefined ? { ...result, durationMs } : result;
  logger.info(logData, `${LOG_FORMAT.COMPLETED} ${command}`);
}

/**
 * Log command failure
 */
export function logCommandFailure(
  command: string,
  error: string | Error,
  logger: Logger,
  guidance?: ErrorGuidance,
): void {
  const errorMessage = typeof error === 'string' ? error : error.message;
  const logData = guidance?.code
    ? { code: guidance.code, ...guidance.details, error: errorMessage }
    : { error: errorMessage };
  logger.error(logData, `${LOG_FORMAT.FAILED} ${command}`);
}
