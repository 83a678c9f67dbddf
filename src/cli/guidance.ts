/**
 * Contextual guidance module for CLI error handling
 * Prints troubleshooting steps matching the error code of a failure
 */

import type { ErrorGuidance } from '@/types';
import { ScanErrorCode } from '@/lib/errors';
import type { CliIO } from './io';

interface GuidanceMessage {
  title: string;
  steps: string[];
}

/**
 * Guidance messages organized by error code
 */
const GUIDANCE_MESSAGES: Partial<Record<ScanErrorCode, GuidanceMessage>> = {
  [ScanErrorCode.PATH_NOT_FOUND]: {
    title: '💡 Scan root issue:',
    steps: [
      'Pass an existing project directory: --path <dir>',
      'Relative paths are resolved from the current directory',
    ],
  },
  [ScanErrorCode.UNKNOWN_OUTPUT_FORMAT]: {
    title: '💡 Output format issue:',
    steps: ['Use one of: --output-format console | json | markdown'],
  },
  [ScanErrorCode.INVALID_CONFIGURATION]: {
    title: '💡 Configuration issue:',
    steps: [
      'Severities: critical, high, medium, low',
      'Concurrency: an integer from 1 to 64',
      'Log levels: fatal, error, warn, info, debug, trace, silent',
    ],
  },
  [ScanErrorCode.INVALID_RULE_PACK]: {
    title: '💡 Skill pack issue:',
    steps: [
      'Skill packs live in <dir>/<category>/<skill>.yaml',
      'Each pack needs a description and at least one rule',
      'Rules need id, name, severity, message and a valid pattern',
    ],
  },
  [ScanErrorCode.DUPLICATE_RULE]: {
    title: '💡 Rule id conflict:',
    steps: ['Rename one of the rules; SCAN001 and SCAN002 are reserved'],
  },
  [ScanErrorCode.DUPLICATE_SKILL]: {
    title: '💡 Skill name conflict:',
    steps: ['Rename one of the packs or set a distinct "name" field'],
  },
  [ScanErrorCode.SKILL_NOT_FOUND]: {
    title: '💡 Unknown skill:',
    steps: ['List available skills: skill-scan list'],
  },
};

/**
 * Print an error with guidance for its error code
 */
export function provideContextualGuidance(
  error: string,
  guidance: ErrorGuidance | undefined,
  io: CliIO,
): void {
  io.err(`❌ Error: ${error}`);
  if (guidance?.message) io.err(`   ${guidance.message}`);
  if (guidance?.hint) io.err(`   ${guidance.hint}`);
  if (guidance?.resolution) io.err(`   ${guidance.resolution}`);

  const message = guidance?.code ? GUIDANCE_MESSAGES[guidance.code] : undefined;
  if (message) {
    io.err(`\n${message.title}`);
    message.steps.forEach((step) => io.err(`  • ${step}`));
  }
}
