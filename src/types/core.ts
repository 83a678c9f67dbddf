/**
 * Result type for explicit error handling.
 *
 * Operations that can fail return a `Result<T>` instead of throwing, so the
 * caller decides whether a failure is fatal (bad root path, invalid rule pack)
 * or local to one file.
 */

import type { ScanErrorCode } from '@/lib/errors';

/**
 * Extra context attached to a failure for the CLI guidance output
 */
export interface ErrorGuidance {
  /** Error taxonomy code */
  code?: ScanErrorCode;
  message?: string;
  hint?: string;
  resolution?: string;
  details?: Record<string, unknown>;
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: string; guidance?: ErrorGuidance };

export const Success = <T>(value: T): Result<T> => ({ ok: true, value });

export const Failure = <T = never>(error: string, guidance?: ErrorGuidance): Result<T> =>
  guidance ? { ok: false, error, guidance } : { ok: false, error };
