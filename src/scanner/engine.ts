/**
 * Rule Engine
 *
 * Runs every registered rule exactly once against every enumerated file.
 * Files are shared between a small pool of workers pulling from the lazy
 * enumerator; each worker collects findings locally and the coordinator
 * merges and sorts them, so the result does not depend on completion order.
 *
 * Per-file problems never abort the scan: an unreadable file or a throwing
 * rule becomes a Low diagnostic finding.
 */

import { promises as fs } from 'node:fs';
import { TextDecoder } from 'node:util';
import type { Logger } from 'pino';
import { Severity, Success, type Result } from '@/types';
import { createLogger } from '@/lib/logger';
import { extractErrorCode, extractErrorMessage, ScanErrorCode } from '@/lib/errors';
import { logCommandComplete, logCommandStart } from '@/lib/runtime-logging';
import { DEFAULT_CONCURRENCY, DIAGNOSTIC_RULES, LIMITS } from '@/config/constants';
import { compareFindings, createFinding } from '@/rules/finding';
import type { Finding, RuleDefinition, SeveritySummary } from '@/rules/types';
import { enumerateSourceFiles, resolveScanRoot, toReportPath } from './enumerator';

export interface ScanOptions {
  root: string;
  rules: readonly RuleDefinition[];
  extensions?: readonly string[];
  excludedDirectories?: readonly string[];
  /** Number of files evaluated at once (default 4, 1 = sequential) */
  concurrency?: number;
  logger?: Logger;
  /** File reader, replaceable in tests */
  readFile?: (file: string) => Promise<string>;
}

export interface ScanResult {
  /** Absolute scan root */
  root: string;
  filesScanned: number;
  rulesApplied: number;
  /** Sorted by file, line, rule id, message */
  findings: readonly Finding[];
  summary: SeveritySummary;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

async function readUtf8(file: string): Promise<string> {
  const bytes = await fs.readFile(file);
  try {
    return utf8.decode(bytes);
  } catch {
    throw new Error('content is not valid UTF-8');
  }
}

/**
 * Count findings per severity
 */
export function summarizeFindings(findings: readonly Finding[]): SeveritySummary {
  const summary: SeveritySummary = { critical: 0, high: 0, medium: 0, low: 0, total: 0 };
  for (const finding of findings) {
    switch (finding.severity) {
      case Severity.CRITICAL:
        summary.critical++;
        break;
      case Severity.HIGH:
        summary.high++;
        break;
      case Severity.MEDIUM:
        summary.medium++;
        break;
      case Severity.LOW:
        summary.low++;
        break;
    }
    summary.total++;
  }
  return summary;
}

function diagnostic(file: string, ruleId: string, message: string): Finding {
  return createFinding(file, 1, ruleId, message, Severity.LOW);
}

async function evaluateFile(
  root: string,
  file: string,
  rules: readonly RuleDefinition[],
  readFile: (file: string) => Promise<string>,
  logger: Logger,
): Promise<Finding[]> {
  const reportPath = toReportPath(root, file);

  let content: string;
  try {
    content = await readFile(file);
  } catch (error) {
    const reason = extractErrorMessage(error);
    logger.warn(
      {
        code: ScanErrorCode.FILE_READ_FAILURE,
        file: reportPath,
        systemCode: extractErrorCode(error),
        error: reason,
      },
      'Skipping unreadable file',
    );
    return [
      diagnostic(
        reportPath,
        DIAGNOSTIC_RULES.FILE_READ_FAILURE,
        `File could not be read: ${reason}`,
      ),
    ];
  }

  if (content.includes('\u0000')) {
    logger.warn(
      { code: ScanErrorCode.FILE_READ_FAILURE, file: reportPath },
      'Skipping binary file',
    );
    return [
      diagnostic(
        reportPath,
        DIAGNOSTIC_RULES.FILE_READ_FAILURE,
        'File could not be read: content is not text',
      ),
    ];
  }

  const text = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
  const findings: Finding[] = [];
  for (const rule of rules) {
    try {
      // Not spread: a rule may return more findings than a call takes arguments
      for (const finding of rule.check(reportPath, text)) findings.push(finding);
    } catch (error) {
      const reason = extractErrorMessage(error);
      logger.warn({ file: reportPath, ruleId: rule.id, error: reason }, 'Rule check failed');
      findings.push(
        diagnostic(reportPath, DIAGNOSTIC_RULES.RULE_FAILURE, `Rule ${rule.id} failed: ${reason}`),
      );
    }
  }
  return findings;
}

/**
 * Scan a source tree. Fails only when the root path is missing.
 */
export async function runScan(options: ScanOptions): Promise<Result<ScanResult>> {
  const logger = options.logger ?? createLogger({ name: 'scanner' });
  const startTime = Date.now();

  const rootResult = await resolveScanRoot(options.root);
  if (!rootResult.ok) return rootResult;
  const root = rootResult.value;

  const concurrency = Math.min(
    Math.max(1, Math.floor(options.concurrency ?? DEFAULT_CONCURRENCY)),
    LIMITS.maxConcurrency,
  );
  const readFile = options.readFile ?? readUtf8;
  const { rules } = options;

  logCommandStart('scan', { root, rules: rules.length, concurrency }, logger);

  const files = enumerateSourceFiles(root, {
    ...(options.extensions && { extensions: options.extensions }),
    ...(options.excludedDirectories && { excludedDirectories: options.excludedDirectories }),
    logger,
  });

  let filesScanned = 0;
  // Async generator next() calls queue, so no file is handed to two workers
  const worker = async (): Promise<Finding[][]> => {
    const local: Finding[][] = [];
    for (;;) {
      const next = await files.next();
      if (next.done) return local;
      filesScanned++;
      local.push(await evaluateFile(root, next.value, rules, readFile, logger));
    }
  };

  const perWorker = await Promise.all(Array.from({ length: concurrency }, () => worker()));
  const findings = perWorker.flat(2).sort(compareFindings);
  const summary = summarizeFindings(findings);

  logCommandComplete(
    'scan',
    { root, filesScanned, findings: summary.total, critical: summary.critical },
    logger,
    Date.now() - startTime,
  );

  return Success({
    root,
    filesScanned,
    rulesApplied: rules.length,
    findings,
    summary,
  });
}
