/**
 * Error taxonomy and error helpers
 */

export const ScanErrorCode = {
  PATH_NOT_FOUND: 'PathNotFound',
  FILE_READ_FAILURE: 'FileReadFailure',
  UNKNOWN_OUTPUT_FORMAT: 'UnknownOutputFormat',
  INVALID_CONFIGURATION: 'InvalidConfiguration',
  INVALID_RULE_PACK: 'InvalidRulePack',
  DUPLICATE_RULE: 'DuplicateRule',
  DUPLICATE_SKILL: 'DuplicateSkill',
  SKILL_NOT_FOUND: 'SkillNotFound',
} as const;
export type ScanErrorCode = (typeof ScanErrorCode)[keyof typeof ScanErrorCode];

/**
 * Extract a readable message from anything thrown
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (
    error &&
    typeof error === 'object' &&
    'message' in error &&
    typeof error.message === 'string'
  ) {
    return error.message;
  }
  return String(error);
}

/**
 * Node.js system error code (ENOENT, EACCES, ...) if present
 */
export function extractErrorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
