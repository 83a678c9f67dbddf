/**
 * skill-scan command-line program
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { Command } from 'commander';
import { z } from 'zod';
import { createCheckCommand, createScanCommand } from './commands/scan';
import { createReportCommand } from './commands/report';
import { createListCommand } from './commands/list';
import { createInfoCommand } from './commands/info';
import type { CommandContext } from './commands/shared';
import { processIO } from './io';

// src/cli and dist/cli both sit two levels below the package root
const PACKAGE_JSON_PATH = join(__dirname, '..', '..', 'package.json');

const packageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  try {
    const raw: unknown = JSON.parse(readFileSync(PACKAGE_JSON_PATH, 'utf-8'));
    const parsed = packageJsonSchema.safeParse(raw);
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

export function createProgram(overrides: Partial<CommandContext> = {}): Command {
  const context: CommandContext = {
    io: overrides.io ?? processIO,
    env: overrides.env ?? process.env,
    setExitCode:
      overrides.setExitCode ??
      ((code) => {
        process.exitCode = code;
      }),
    now: overrides.now ?? (() => new Date()),
  };

  return new Command()
    .name('skill-scan')
    .description('Scan C# / ASP.NET Core sources against best-practice skill packs')
    .version(readVersion())
    .addCommand(createScanCommand(context), { isDefault: true })
    .addCommand(createCheckCommand(context))
    .addCommand(createReportCommand(context))
    .addCommand(createListCommand(context))
    .addCommand(createInfoCommand(context))
    .addHelpText(
      'after',
      `

Examples:
  $ skill-scan --path ./src                           Scan with every skill, console report
  $ skill-scan scan -p ./src -o json > report.json    JSON report on stdout
  $ skill-scan scan -p ./src --fail-on high           Exit 1 on High findings too
  $ skill-scan check async-practices --path ./src     Run one skill
  $ skill-scan report --path . --output report.json   Per-skill JSON report
  $ skill-scan list --category security               List skills in a category
  $ skill-scan info secrets-and-cors                  Show a skill and its rules

Environment Variables:
  LOG_LEVEL                 Logging level (default: warn); logs go to stderr
  SKILL_SCAN_RULES_PATH     Extra skill directories, path-delimiter separated
  SKILL_SCAN_FAIL_ON        Exit-code severity threshold (default: critical)
  SKILL_SCAN_CONCURRENCY    Files evaluated in parallel (default: 4)
  SKILL_SCAN_EXTENSIONS     Comma-separated extensions (default: .cs)
  SKILL_SCAN_EXCLUDE_DIRS   Comma-separated excluded directories (default: bin,obj,packages)

Exit status: 0 when no finding reaches the fail-on severity, 1 otherwise or on error.
`,
    );
}
