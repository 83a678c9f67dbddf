/**
 * report command - every skill, grouped JSON report
 */

import { writeFile } from 'node:fs/promises';
import { Command } from 'commander';
import { executeScan } from '@/app';
import { extractErrorMessage } from '@/lib/errors';
import { computeExitCode } from '@/report/formatters';
import { buildSkillReport } from '@/report/skill-report';
import {
  addTreeOptions,
  failCommand,
  prepareCommand,
  reportFailure,
  type CommandContext,
} from './shared';

export async function runReportCommand(raw: unknown, context: CommandContext): Promise<void> {
  const prepared = prepareCommand('report', raw, context);
  if (!prepared) return;
  const { options, logger } = prepared;

  const outcome = await executeScan(
    {
      path: options.path,
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

  const report = buildSkillReport(outcome.value, context.now());
  const json = `${JSON.stringify(report, null, 2)}\n`;

  if (options.output !== undefined) {
    try {
      await writeFile(options.output, json, 'utf-8');
    } catch (error) {
      const reason = extractErrorMessage(error);
      failCommand(context, logger, 'report', `Failed to write report: ${reason}`, {
        details: { output: options.output },
      });
      return;
    }
    context.io.err(`✅ Report saved to ${options.output}`);
  } else {
    context.io.out(json);
  }

  context.io.err('');
  context.io.err(`Skills Checked: ${report.summary.totalSkillsChecked}`);
  context.io.err(`Total Issues: ${report.summary.totalIssues}`);
  context.io.err(`Critical Issues: ${report.summary.criticalIssues}`);
  context.io.err(`High Issues: ${report.summary.highIssues}`);

  context.setExitCode(computeExitCode(outcome.value.result, options.failOn));
}

export function createReportCommand(context: CommandContext): Command {
  return addTreeOptions(
    new Command('report')
      .description('Generate a JSON report covering every skill')
      .option('-p, --path <dir>', 'path to the project', '.')
      .option('--output <file>', 'write the report to a file instead of stdout'),
  ).action(async (options: unknown) => {
    await runReportCommand(options, context);
  });
}
