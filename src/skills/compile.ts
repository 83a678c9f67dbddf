/**
 * Turns skill pack pattern rules into registered rule checks
 */

import { createFinding, createLineLocator, lineAt } from '@/rules/finding';
import type { Finding, RuleCheck, RuleDefinition } from '@/rules/types';
import type { Severity } from '@/types';
import type { PatternRule } from './schemas';
import type { SkillPack } from './types';

const LINE_BREAK = /\r?\n/;

function lineCheck(rule: PatternRule, severity: Severity): RuleCheck {
  const pattern = new RegExp(rule.pattern, rule.flags);
  return (file, content) => {
    const findings: Finding[] = [];
    content.split(LINE_BREAK).forEach((text, index) => {
      if (pattern.test(text)) {
        findings.push(createFinding(file, index + 1, rule.id, rule.message, severity));
      }
    });
    return findings;
  };
}

function contentCheck(rule: PatternRule, severity: Severity): RuleCheck {
  const flags = `${rule.flags ?? ''}g`;
  return (file, content) => {
    // Fresh instance per call: global regexes carry lastIndex
    const pattern = new RegExp(rule.pattern, flags);
    const locate = createLineLocator(content);
    const findings: Finding[] = [];
    let match: RegExpExecArray | null;
    while ((match = pattern.exec(content)) !== null) {
      const line = locate(match.index);
      findings.push(createFinding(file, line, rule.id, rule.message, severity));
      if (match[0].length === 0) pattern.lastIndex++;
    }
    return findings;
  };
}

function absentCheck(rule: PatternRule, severity: Severity): RuleCheck {
  const pattern = new RegExp(rule.pattern, rule.flags);
  const when = rule.when !== undefined ? new RegExp(rule.when, rule.flags) : undefined;
  return (file, content) => {
    if (pattern.test(content)) return [];
    if (!when) return [createFinding(file, 1, rule.id, rule.message, severity)];

    const anchor = when.exec(content);
    if (!anchor) return [];
    return [createFinding(file, lineAt(content, anchor.index), rule.id, rule.message, severity)];
  };
}

function buildCheck(rule: PatternRule): RuleCheck {
  switch (rule.mode) {
    case 'line':
      return lineCheck(rule, rule.severity);
    case 'content':
      return contentCheck(rule, rule.severity);
    case 'absent':
      return absentCheck(rule, rule.severity);
  }
}

/**
 * Compile one pattern rule
 */
export function compilePatternRule(rule: PatternRule, skill?: string): RuleDefinition {
  return {
    id: rule.id,
    name: rule.name,
    severity: rule.severity,
    ...(rule.description !== undefined && { description: rule.description }),
    ...(skill !== undefined && { skill }),
    ...(rule.fix !== undefined && { fix: rule.fix }),
    check: buildCheck(rule),
  };
}

/**
 * Compile every rule of a skill pack
 */
export function compileSkillRules(pack: SkillPack): RuleDefinition[] {
  return pack.rules.map((rule) => compilePatternRule(rule, pack.name));
}
