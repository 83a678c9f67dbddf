/**
 * info command - details of one skill
 */

import { Command } from 'commander';
import { ScanErrorCode } from '@/lib/errors';
import { findSkill, loadSkillPacks } from '@/skills/loader';
import type { SkillPack } from '@/skills/types';
import {
  addSkillSourceOptions,
  prepareCommand,
  reportFailure,
  type CommandContext,
} from './shared';

export function formatSkillInfo(pack: SkillPack): string {
  const lines = [
    `Skill: ${pack.name}`,
    '',
    `Description: ${pack.description}`,
    `Version: ${pack.version}`,
    `Priority: ${pack.priority}`,
    `Category: ${pack.category}`,
  ];
  if (pack.categories.length > 0) lines.push(`Categories: ${pack.categories.join(', ')}`);
  if (pack.relatedSkills.length > 0) lines.push(`Related skills: ${pack.relatedSkills.join(', ')}`);
  lines.push(`Source: ${pack.source}`);

  if (pack.useWhen.length > 0) {
    lines.push('', 'Use when:', ...pack.useWhen.map((hint) => `  • ${hint}`));
  }

  lines.push('', 'Rules:');
  for (const rule of pack.rules) {
    lines.push(`  • ${rule.id} [${rule.severity}] ${rule.name}`);
    if (rule.fix) lines.push(`      Fix: ${rule.fix}`);
  }

  return `${lines.join('\n')}\n`;
}

export function runInfoCommand(skill: string, raw: unknown, context: CommandContext): void {
  const prepared = prepareCommand('info', raw, context);
  if (!prepared) return;
  const { options, logger } = prepared;

  const loaded = loadSkillPacks({
    directories: options.rulePaths,
    includeBuiltIn: options.includeBuiltInSkills,
    logger,
  });
  if (!loaded.ok) {
    reportFailure(context, loaded.error, loaded.guidance);
    return;
  }

  const pack = findSkill(loaded.value, skill);
  if (!pack) {
    reportFailure(context, `Skill '${skill}' not found`, {
      code: ScanErrorCode.SKILL_NOT_FOUND,
    });
    return;
  }

  context.io.out(formatSkillInfo(pack));
  context.setExitCode(0);
}

export function createInfoCommand(context: CommandContext): Command {
  return addSkillSourceOptions(
    new Command('info').description('Show details about a skill').argument('<skill>', 'skill name'),
  ).action((skill: string, options: unknown) => {
    runInfoCommand(skill, options, context);
  });
}
