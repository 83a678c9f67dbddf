/**
 * Report Formatters
 *
 * Render a finished ScanResult as console text, JSON or Markdown and decide
 * the process exit status.
 *
 * @example
 * ```typescript
 * const scanned = await runScan({ root: './src', rules });
 * if (scanned.ok) {
 *   process.stdout.write(formatReport(scanned.value, OutputFormat.MARKDOWN));
 *   process.exitCode = computeExitCode(scanned.value, Severity.HIGH);
 * }
 * ```
 */

import { z } from 'zod';
import { SEVERITY_ORDER, SEVERITY_RANK, Severity } from '@/types';
import type { ScanResult } from '@/scanner/engine';
import type { Finding, SeveritySummary } from '@/rules/types';

export const OutputFormat = {
  CONSOLE: 'console',
  JSON: 'json',
  MARKDOWN: 'markdown',
} as const;
export type OutputFormat = (typeof OutputFormat)[keyof typeof OutputFormat];

export const outputFormatSchema = z.enum([
  OutputFormat.CONSOLE,
  OutputFormat.JSON,
  OutputFormat.MARKDOWN,
]);

/**
 * JSON report document
 */
export interface JsonReport {
  root: string;
  summary: SeveritySummary;
  issues: Finding[];
}

const NO_ISSUES = 'No issues found.';

function countFor(summary: SeveritySummary, severity: Severity): number {
  switch (severity) {
    case Severity.CRITICAL:
      return summary.critical;
    case Severity.HIGH:
      return summary.high;
    case Severity.MEDIUM:
      return summary.medium;
    case Severity.LOW:
      return summary.low;
  }
}

// ===== INDIVIDUAL FORMATTERS =====

function formatConsole(result: ScanResult): string {
  const lines: string[] = ['Scan Results', '============', ''];

  for (const severity of SEVERITY_ORDER) {
    lines.push(`${severity}: ${countFor(result.summary, severity)}`);
  }
  lines.push(`Total: ${result.summary.total}`, '');

  if (result.findings.length === 0) {
    lines.push(NO_ISSUES);
  } else {
    for (const finding of result.findings) {
      const location = `${finding.file}:${finding.line}`;
      lines.push(`[${finding.severity}] ${finding.ruleId} ${location} - ${finding.message}`);
    }
  }

  return `${lines.join('\n')}\n`;
}

export function toJsonReport(result: ScanResult): JsonReport {
  return {
    root: result.root,
    summary: { ...result.summary },
    issues: result.findings.map((finding) => ({ ...finding })),
  };
}

function formatJson(result: ScanResult): string {
  return `${JSON.stringify(toJsonReport(result), null, 2)}\n`;
}

function formatMarkdown(result: ScanResult): string {
  const lines: string[] = ['# Scan Report', '', `Scanned \`${result.root}\``, ''];

  lines.push('| Severity | Count |', '|----------|-------|');
  for (const severity of SEVERITY_ORDER) {
    lines.push(`| ${severity} | ${countFor(result.summary, severity)} |`);
  }
  lines.push(`| **Total** | **${result.summary.total}** |`, '', '## Issues', '');

  if (result.findings.length === 0) {
    lines.push(NO_ISSUES, '');
  }

  for (const finding of result.findings) {
    lines.push(
      `### [${finding.severity}] ${finding.ruleId}: ${finding.message}`,
      '',
      `- **File:** \`${finding.file}\``,
      `- **Line:** ${finding.line}`,
      '',
    );
  }

  return lines.join('\n');
}

/**
 * Render a scan result in the requested format
 */
export function formatReport(result: ScanResult, format: OutputFormat): string {
  switch (format) {
    case OutputFormat.CONSOLE:
      return formatConsole(result);
    case OutputFormat.JSON:
      return formatJson(result);
    case OutputFormat.MARKDOWN:
      return formatMarkdown(result);
  }
}

/**
 * 1 when any finding is at or above `failOn`, otherwise 0
 */
export function computeExitCode(result: ScanResult, failOn: Severity = Severity.CRITICAL): 0 | 1 {
  const threshold = SEVERITY_RANK[failOn];
  return result.findings.some((finding) => SEVERITY_RANK[finding.severity] >= threshold) ? 1 : 0;
}
