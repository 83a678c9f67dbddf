/**
 * Per-skill analysis report, as produced by the `report` command
 */

import type { ScanOutcome } from '@/app';
import type { Finding } from '@/rules/types';

export interface SkillCheckResult {
  skill: string;
  category: string;
  issues: Finding[];
}

export interface SkillReport {
  generatedAt: string;
  projectPath: string;
  results: SkillCheckResult[];
  /** Scanner diagnostics (unreadable files, failing rules) */
  diagnostics: Finding[];
  summary: {
    totalSkillsChecked: number;
    totalIssues: number;
    criticalIssues: number;
    highIssues: number;
  };
}

/**
 * Group a scan's findings by the skill owning each rule
 */
export function buildSkillReport(outcome: ScanOutcome, generatedAt: Date): SkillReport {
  const { result, packs } = outcome;

  const skillByRule = new Map<string, string>();
  for (const pack of packs) {
    for (const rule of pack.rules) {
      skillByRule.set(rule.id, pack.name);
    }
  }

  const issuesBySkill = new Map<string, Finding[]>(packs.map((pack) => [pack.name, []]));
  const diagnostics: Finding[] = [];
  for (const finding of result.findings) {
    const skill = skillByRule.get(finding.ruleId);
    const bucket = skill !== undefined ? issuesBySkill.get(skill) : undefined;
    if (bucket) {
      bucket.push({ ...finding });
    } else {
      diagnostics.push({ ...finding });
    }
  }

  return {
    generatedAt: generatedAt.toISOString(),
    projectPath: result.root,
    results: packs.map((pack) => ({
      skill: pack.name,
      category: pack.category,
      issues: issuesBySkill.get(pack.name) ?? [],
    })),
    diagnostics,
    summary: {
      totalSkillsChecked: packs.length,
      totalIssues: result.summary.total,
      criticalIssues: result.summary.critical,
      highIssues: result.summary.high,
    },
  };
}
