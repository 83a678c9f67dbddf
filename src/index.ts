/**
 * skill-scan public API
 *
 * @example
 * ```typescript
 * import { executeScan, formatReport, computeExitCode, OutputFormat } from 'skill-scan';
 *
 * const outcome = await executeScan({ path: './src' });
 * if (outcome.ok) {
 *   console.log(formatReport(outcome.value.result, OutputFormat.MARKDOWN));
 *   process.exitCode = computeExitCode(outcome.value.result);
 * }
 * ```
 */

export type { Result, ErrorGuidance } from './types';
export {
  Success,
  Failure,
  Severity,
  SEVERITY_ORDER,
  parseSeverity,
  compareSeverity,
} from './types';
export { ScanErrorCode } from './lib/errors';

export type { Finding, RuleCheck, RuleDefinition, SeveritySummary } from './rules/types';
export { createFinding } from './rules/finding';
export { createRuleRegistry, type RuleRegistry } from './rules/registry';

export { enumerateSourceFiles, resolveScanRoot } from './scanner/enumerator';
export { runScan, summarizeFindings, type ScanOptions, type ScanResult } from './scanner/engine';

export type { SkillPack, LoadSkillPacksOptions } from './skills/types';
export type { PatternRule } from './skills/schemas';
export { loadSkillPacks, findSkill, getBuiltInSkillsPath } from './skills/loader';
export { compilePatternRule, compileSkillRules } from './skills/compile';

export {
  OutputFormat,
  formatReport,
  computeExitCode,
  toJsonReport,
  type JsonReport,
} from './report/formatters';
export { buildSkillReport, type SkillReport } from './report/skill-report';

export { executeScan, selectSkills, type ScanRequest, type ScanOutcome } from './app';
export { loadConfig, type ScanConfig } from './config';
export { createProgram } from './cli/program';
