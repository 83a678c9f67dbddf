/**
 * Configuration - environment variables validated with zod
 *
 * CLI options are merged on top of this by the commands.
 */

import { delimiter } from 'node:path';
import { z } from 'zod';
import { Failure, Success, Severity, type Result } from '@/types';
import { severityNameSchema } from '@/types/severity';
import { ScanErrorCode } from '@/lib/errors';
import { DEFAULT_LOG_LEVEL, isLogLevel } from '@/lib/logger';
import type { LevelWithSilent } from 'pino';
import {
  DEFAULT_CONCURRENCY,
  DEFAULT_EXCLUDED_DIRECTORIES,
  DEFAULT_EXTENSIONS,
  LIMITS,
} from './constants';

export interface ScanConfig {
  logLevel: LevelWithSilent;
  rulePaths: string[];
  failOn: Severity;
  concurrency: number;
  extensions: string[];
  excludedDirectories: string[];
}

/**
 * Split a comma-separated list, dropping blanks
 */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Normalize an extension filter entry to `.ext` in lower case
 */
export function normalizeExtension(extension: string): string {
  const lower = extension.trim().toLowerCase();
  return lower.startsWith('.') ? lower : `.${lower}`;
}

export const concurrencySchema = z.coerce
  .number()
  .int()
  .min(1)
  .max(LIMITS.maxConcurrency);

const logLevelSchema = z
  .string()
  .transform((value) => value.toLowerCase())
  .refine(isLogLevel, {
    message: 'Expected one of fatal, error, warn, info, debug, trace, silent',
  });

const listSchema = z.string().transform(parseList);

const environmentSchema = z.object({
  LOG_LEVEL: logLevelSchema.optional(),
  SKILL_SCAN_RULES_PATH: z.string().optional(),
  SKILL_SCAN_FAIL_ON: z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .pipe(severityNameSchema)
    .optional(),
  SKILL_SCAN_CONCURRENCY: concurrencySchema.optional(),
  SKILL_SCAN_EXTENSIONS: listSchema.optional(),
  SKILL_SCAN_EXCLUDE_DIRS: listSchema.optional(),
});

/**
 * Load configuration from the environment
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Result<ScanConfig> {
  const parsed = environmentSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    return Failure(`Invalid configuration: ${issues.join('; ')}`, {
      code: ScanErrorCode.INVALID_CONFIGURATION,
      hint: 'Check the SKILL_SCAN_* and LOG_LEVEL environment variables',
      details: { issues },
    });
  }

  const vars = parsed.data;
  const extensions = vars.SKILL_SCAN_EXTENSIONS?.length
    ? vars.SKILL_SCAN_EXTENSIONS
    : [...DEFAULT_EXTENSIONS];

  return Success({
    logLevel: vars.LOG_LEVEL ?? DEFAULT_LOG_LEVEL,
    rulePaths: (vars.SKILL_SCAN_RULES_PATH ?? '')
      .split(delimiter)
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0),
    failOn: vars.SKILL_SCAN_FAIL_ON ?? Severity.CRITICAL,
    concurrency: vars.SKILL_SCAN_CONCURRENCY ?? DEFAULT_CONCURRENCY,
    extensions: extensions.map(normalizeExtension),
    excludedDirectories: vars.SKILL_SCAN_EXCLUDE_DIRS?.length
      ? vars.SKILL_SCAN_EXCLUDE_DIRS
      : [...DEFAULT_EXCLUDED_DIRECTORIES],
  });
}
