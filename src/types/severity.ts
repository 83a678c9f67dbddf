/**
 * Severity model shared by rules, findings and reports
 */

import { z } from 'zod';

export const Severity = {
  CRITICAL: 'Critical',
  HIGH: 'High',
  MEDIUM: 'Medium',
  LOW: 'Low',
} as const;
export type Severity = (typeof Severity)[keyof typeof Severity];

/**
 * Severities from most to least severe. Report sections follow this order.
 */
export const SEVERITY_ORDER: readonly Severity[] = [
  Severity.CRITICAL,
  Severity.HIGH,
  Severity.MEDIUM,
  Severity.LOW,
];

export const SEVERITY_RANK: Readonly<Record<Severity, number>> = {
  [Severity.CRITICAL]: 4,
  [Severity.HIGH]: 3,
  [Severity.MEDIUM]: 2,
  [Severity.LOW]: 1,
};

const SEVERITY_BY_NAME = {
  critical: Severity.CRITICAL,
  high: Severity.HIGH,
  medium: Severity.MEDIUM,
  low: Severity.LOW,
} as const satisfies Record<string, Severity>;

export type SeverityName = keyof typeof SEVERITY_BY_NAME;

/**
 * Lower-case severity as written in skill packs, flags and environment,
 * mapped onto the closed Severity set.
 */
export const severityNameSchema = z
  .enum(['critical', 'high', 'medium', 'low'])
  .transform((name): Severity => SEVERITY_BY_NAME[name]);

/**
 * Parse a severity name case-insensitively
 */
export function parseSeverity(value: string): Severity | undefined {
  const parsed = severityNameSchema.safeParse(value.trim().toLowerCase());
  return parsed.success ? parsed.data : undefined;
}

/**
 * Compare two severities, most severe first
 */
export function compareSeverity(a: Severity, b: Severity): number {
  return SEVERITY_RANK[b] - SEVERITY_RANK[a];
}
