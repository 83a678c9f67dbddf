/**
 * Application entry point
 *
 * Composes skill loading, rule registration and the scan into one call used
 * by the scan, check and report commands.
 */

import type { Logger } from 'pino';
import { createLogger } from '@/lib/logger';
import { ScanErrorCode } from '@/lib/errors';
import { logCommandFailure } from '@/lib/runtime-logging';
import { Failure, Success, type Result } from '@/types';
import { createRuleRegistry } from '@/rules/registry';
import { runScan, type ScanResult } from '@/scanner/engine';
import { compileSkillRules } from '@/skills/compile';
import { findSkill, loadSkillPacks } from '@/skills/loader';
import type { SkillPack } from '@/skills/types';

export interface ScanRequest {
  path: string;
  /** Restrict to these skills; all loaded skills when empty */
  skills?: readonly string[];
  /** Extra skill directories */
  rulePaths?: readonly string[];
  includeBuiltInSkills?: boolean;
  extensions?: readonly string[];
  excludedDirectories?: readonly string[];
  concurrency?: number;
}

export interface ScanOutcome {
  result: ScanResult;
  /** Skills whose rules took part in the scan */
  packs: SkillPack[];
}

/**
 * Pick the requested skills, or all of them
 */
export function selectSkills(
  packs: readonly SkillPack[],
  names: readonly string[] = [],
): Result<SkillPack[]> {
  if (names.length === 0) return Success([...packs]);

  const selected: SkillPack[] = [];
  for (const name of names) {
    const pack = findSkill(packs, name);
    if (!pack) {
      return Failure(`Skill '${name}' not found`, {
        code: ScanErrorCode.SKILL_NOT_FOUND,
        hint: 'Run `skill-scan list` to see the available skills',
        details: { skill: name, available: packs.map((p) => p.name) },
      });
    }
    if (!selected.includes(pack)) selected.push(pack);
  }
  return Success(selected);
}

/**
 * Load skills, register their rules and scan the requested path
 */
export async function executeScan(
  request: ScanRequest,
  logger: Logger = createLogger({ name: 'skill-scan' }),
): Promise<Result<ScanOutcome>> {
  const loaded = loadSkillPacks({
    logger,
    ...(request.rulePaths && { directories: request.rulePaths }),
    ...(request.includeBuiltInSkills !== undefined && {
      includeBuiltIn: request.includeBuiltInSkills,
    }),
  });
  if (!loaded.ok) {
    logCommandFailure('skill loading', loaded.error, logger, loaded.guidance);
    return loaded;
  }

  const selected = selectSkills(loaded.value, request.skills);
  if (!selected.ok) {
    logCommandFailure('skill selection', selected.error, logger, selected.guidance);
    return selected;
  }

  const registry = createRuleRegistry();
  for (const pack of selected.value) {
    const registered = registry.registerAll(compileSkillRules(pack));
    if (!registered.ok) {
      logCommandFailure('rule registration', registered.error, logger, registered.guidance);
      return registered;
    }
  }

  const scanned = await runScan({
    root: request.path,
    rules: registry.list(),
    ...(request.extensions && { extensions: request.extensions }),
    ...(request.excludedDirectories && { excludedDirectories: request.excludedDirectories }),
    ...(request.concurrency !== undefined && { concurrency: request.concurrency }),
    logger,
  });
  if (!scanned.ok) {
    logCommandFailure('scan', scanned.error, logger, scanned.guidance);
    return scanned;
  }

  return Success({ result: scanned.value, packs: selected.value });
}
