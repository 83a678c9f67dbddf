/**
 * CLI option validation
 *
 * Runs before any skill is loaded or file is read: a bad flag stops the
 * command with a clear error.
 */

import { z } from 'zod';
import type { LevelWithSilent } from 'pino';
import { Failure, Success, parseSeverity, type Result, type Severity } from '@/types';
import { ScanErrorCode } from '@/lib/errors';
import { isLogLevel } from '@/lib/logger';
import { concurrencySchema, normalizeExtension, parseList, type ScanConfig } from '@/config';
import { outputFormatSchema, type OutputFormat } from '@/report/formatters';

/**
 * Options as commander hands them over
 */
export const rawOptionsSchema = z.object({
  path: z.string().default('.'),
  outputFormat: z.string().optional(),
  failOn: z.string().optional(),
  skill: z.array(z.string()).optional(),
  rules: z.array(z.string()).optional(),
  builtIn: z.boolean().default(true),
  concurrency: z.string().optional(),
  extensions: z.string().optional(),
  exclude: z.string().optional(),
  logLevel: z.string().optional(),
  output: z.string().optional(),
  category: z.string().optional(),
});

export interface ResolvedOptions {
  path: string;
  format: OutputFormat;
  failOn: Severity;
  skills: string[];
  rulePaths: string[];
  includeBuiltInSkills: boolean;
  concurrency: number;
  extensions: string[];
  excludedDirectories: string[];
  logLevel: LevelWithSilent;
  output?: string;
  category?: string;
}

const invalid = (error: string, hint: string): Result<ResolvedOptions> =>
  Failure(error, { code: ScanErrorCode.INVALID_CONFIGURATION, hint });

/**
 * Validate raw options and merge them over the environment configuration
 */
export function validateOptions(raw: unknown, config: ScanConfig): Result<ResolvedOptions> {
  const parsed = rawOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    return invalid(`Invalid options: ${issues.join('; ')}`, 'Run with --help for usage');
  }
  const options = parsed.data;

  const format = outputFormatSchema.safeParse(options.outputFormat ?? 'console');
  if (!format.success) {
    return Failure(`Unknown output format: ${options.outputFormat ?? ''}`, {
      code: ScanErrorCode.UNKNOWN_OUTPUT_FORMAT,
      details: { outputFormat: options.outputFormat },
    });
  }

  let failOn = config.failOn;
  if (options.failOn !== undefined) {
    const severity = parseSeverity(options.failOn);
    if (!severity) {
      return invalid(`Unknown severity: ${options.failOn}`, 'Use critical, high, medium or low');
    }
    failOn = severity;
  }

  let concurrency = config.concurrency;
  if (options.concurrency !== undefined) {
    const value = concurrencySchema.safeParse(options.concurrency);
    if (!value.success) {
      return invalid(`Invalid concurrency: ${options.concurrency}`, 'Use an integer from 1 to 64');
    }
    concurrency = value.data;
  }

  let logLevel = config.logLevel;
  if (options.logLevel !== undefined) {
    const level = options.logLevel.toLowerCase();
    if (!isLogLevel(level)) {
      return invalid(
        `Unknown log level: ${options.logLevel}`,
        'Use fatal, error, warn, info, debug, trace or silent',
      );
    }
    logLevel = level;
  }

  const extensions = options.extensions !== undefined ? parseList(options.extensions) : [];
  const excluded = options.exclude !== undefined ? parseList(options.exclude) : [];

  return Success({
    path: options.path,
    format: format.data,
    failOn,
    skills: options.skill ?? [],
    rulePaths: [...config.rulePaths, ...(options.rules ?? [])],
    includeBuiltInSkills: options.builtIn,
    concurrency,
    extensions: extensions.length > 0 ? extensions.map(normalizeExtension) : config.extensions,
    excludedDirectories: excluded.length > 0 ? excluded : config.excludedDirectories,
    logLevel,
    ...(options.output !== undefined && { output: options.output }),
    ...(options.category !== undefined && { category: options.category }),
  });
}
