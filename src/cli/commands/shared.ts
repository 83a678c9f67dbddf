/**
 * Plumbing shared by the commands: configuration, option validation,
 * logger creation and failure reporting.
 */

import type { Command } from 'commander';
import type { Logger } from 'pino';
import { loadConfig } from '@/config';
import { createLogger, isLogLevel } from '@/lib/logger';
import { logCommandFailure } from '@/lib/runtime-logging';
import type { ErrorGuidance } from '@/types';
import { provideContextualGuidance } from '../guidance';
import type { CliIO } from '../io';
import { validateOptions, type ResolvedOptions } from '../validation';

export interface CommandContext {
  io: CliIO;
  env: NodeJS.ProcessEnv;
  /** Receives the command's exit status */
  setExitCode: (code: number) => void;
  /** Clock for report timestamps */
  now: () => Date;
}

export interface PreparedCommand {
  options: ResolvedOptions;
  logger: Logger;
}

/**
 * Print a failure already logged elsewhere and set exit status 1
 */
export function reportFailure(
  context: CommandContext,
  error: string,
  guidance?: ErrorGuidance,
): void {
  provideContextualGuidance(error, guidance, context.io);
  context.setExitCode(1);
}

/**
 * Log and print a fatal failure, then set exit status 1
 */
export function failCommand(
  context: CommandContext,
  logger: Logger,
  command: string,
  error: string,
  guidance?: ErrorGuidance,
): void {
  logCommandFailure(command, error, logger, guidance);
  reportFailure(context, error, guidance);
}

/**
 * Resolve configuration and options for a command.
 * Returns undefined after reporting when either is invalid.
 */
export function prepareCommand(
  command: string,
  raw: unknown,
  context: CommandContext,
): PreparedCommand | undefined {
  const config = loadConfig(context.env);
  if (!config.ok) {
    const envLevel = context.env.LOG_LEVEL?.toLowerCase();
    const logger = createLogger({
      name: 'cli',
      level: envLevel !== undefined && isLogLevel(envLevel) ? envLevel : undefined,
    });
    failCommand(context, logger, command, config.error, config.guidance);
    return undefined;
  }

  const options = validateOptions(raw, config.value);
  if (!options.ok) {
    failCommand(
      context,
      createLogger({ name: 'cli', level: config.value.logLevel }),
      command,
      options.error,
      options.guidance,
    );
    return undefined;
  }

  return {
    options: options.value,
    logger: createLogger({ name: 'cli', level: options.value.logLevel }),
  };
}

export function truncate(value: string, maxLength: number): string {
  if (value.length <= maxLength) return value;
  return `${value.slice(0, maxLength - 3)}...`;
}

/**
 * Options every command takes
 */
export function addSkillSourceOptions(command: Command): Command {
  return command
    .option('--rules <dir...>', 'extra skill pack directories')
    .option('--no-built-in', 'skip the packaged skills')
    .option('--log-level <level>', 'logging level: fatal, error, warn, info, debug, trace, silent');
}

/**
 * Options of the commands that scan a tree
 */
export function addTreeOptions(command: Command): Command {
  return addSkillSourceOptions(command)
    .option(
      '--fail-on <severity>',
      'lowest severity that makes the exit status 1 (default: critical)',
    )
    .option('--concurrency <n>', 'files evaluated in parallel (default: 4)')
    .option('--extensions <list>', 'comma-separated file extensions (default: .cs)')
    .option(
      '--exclude <list>',
      'comma-separated directory names to skip (default: bin,obj,packages)',
    );
}

/**
 * Tree options plus the report format
 */
export function addScanOptions(command: Command): Command {
  return addTreeOptions(command).option(
    '-o, --output-format <format>',
    'report format: console, json, markdown',
    'console',
  );
}
