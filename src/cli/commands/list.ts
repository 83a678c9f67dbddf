/**
 * list command - table of the available skills
 */

import { Command } from 'commander';
import { LIMITS } from '@/config/constants';
import { loadSkillPacks } from '@/skills/loader';
import type { SkillPack } from '@/skills/types';
import {
  addSkillSourceOptions,
  prepareCommand,
  reportFailure,
  truncate,
  type CommandContext,
} from './shared';

const HEADERS = ['Category', 'Skill', 'Priority', 'Description'] as const;

/**
 * Render skills as an aligned text table
 */
export function formatSkillTable(packs: readonly SkillPack[]): string {
  if (packs.length === 0) return 'No skills found.\n';

  const rows = packs.map((pack) => [
    pack.category,
    pack.name,
    pack.priority,
    truncate(pack.description, LIMITS.listDescriptionWidth),
  ]);
  const widths = HEADERS.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => (row[column] ?? '').length)),
  );

  const render = (cells: readonly string[]): string =>
    cells
      .map((cell, column) =>
        column === cells.length - 1 ? cell : cell.padEnd(widths[column] ?? cell.length),
      )
      .join('  ');

  const separator = widths.map((width) => '-'.repeat(width));
  return `${[render(HEADERS), render(separator), ...rows.map(render)].join('\n')}\n`;
}

export function runListCommand(raw: unknown, context: CommandContext): void {
  const prepared = prepareCommand('list', raw, context);
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

  const category = options.category?.toLowerCase();
  const packs = category
    ? loaded.value.filter((pack) => pack.category.toLowerCase() === category)
    : loaded.value;

  context.io.out(formatSkillTable(packs));
  context.setExitCode(0);
}

export function createListCommand(context: CommandContext): Command {
  return addSkillSourceOptions(
    new Command('list')
      .description('List available skills')
      .option('--category <name>', 'only show skills in this category'),
  ).action((options: unknown) => {
    runListCommand(options, context);
  });
}
