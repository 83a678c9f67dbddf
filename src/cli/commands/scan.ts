/**
 * scan and check commands
 */

import { Command } from 'commander';
import { executeScan } from '@/app';
import { computeExitCode, formatReport } from '@/report/formatters';
import { addScanOptions, prepareCommand, reportFailure, type CommandContext } from './shared';

/**
 * Scan with the selected skills (all when none are named) and print the report
 */
export async function runScanCommand(
  command: string,
  raw: unknown,
  context: CommandContext,
  skills?: readonly string[],
): Promise<void> {
  const prepared = prepareCommand(command, raw, context);
  if (!prepared) return;
  const { options, logger } = prepared;

  const outcome = await executeScan(
    {
      path: options.path,
      skills: skills ?? options.skills,
      rulePaths: options.rulePaths,
      includeBuiltInSkills: options.includeBuiltInSkills,
      extensions: options.extensions,
      excludedDirectories: options.excludedDirectories,
      concurrency: options.concurrency,
    },
    logger,
  );
  if (!outcome.ok) {
    reportFailure(context, outcome.error, outcome.guidance);
    return;
  }

  context.io.out(formatReport(outcome.value.result, options.format));
  context.setExitCode(computeExitCode(outcome.value.result, options.failOn));
}

export function createScanCommand(context: CommandContext): Command {
  return addScanOptions(
    new Command('scan')
      .description('Scan a project with every loaded skill')
      .requiredOption('-p, --path <dir>', 'root of the source tree to scan')
      .option('--skill <name...>', 'only run these skills'),
  ).action(async (options: unknown) => {
    await runScanCommand('scan', options, context);
  });
}

export function createCheckCommand(context: CommandContext): Command {
  return addScanOptions(
    new Command('check')
      .description('Run a single skill against a project')
      .argument('<skill>', 'skill name to check')
      .option('-p, --path <dir>', 'path to the project', '.'),
  ).action(async (skill: string, options: unknown) => {
    await runScanCommand('check', options, context, [skill]);
  });
}
