/**
 * Application Constants and Defaults
 */

/**
 * Source file extensions scanned when none are configured
 */
export const DEFAULT_EXTENSIONS: readonly string[] = ['.cs'];

/**
 * Build-output and package-cache directories never descended into
 */
export const DEFAULT_EXCLUDED_DIRECTORIES: readonly string[] = ['bin', 'obj', 'packages'];

export const DEFAULT_CONCURRENCY = 4;

export const LIMITS = {
  /** Worker pool upper bound */
  maxConcurrency: 64,
  /** Description column width in `list` output */
  listDescriptionWidth: 50,
} as const;

/**
 * Category given to skill packs placed directly in a skills directory
 */
export const DEFAULT_SKILL_CATEGORY = 'general';

export const SKILL_FILE_EXTENSIONS: readonly string[] = ['.yaml', '.yml', '.json'];

/**
 * Rule ids the engine reserves for its own diagnostics
 */
export const DIAGNOSTIC_RULES = {
  FILE_READ_FAILURE: 'SCAN001',
  RULE_FAILURE: 'SCAN002',
} as const;
