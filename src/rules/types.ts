/**
 * Rule and finding types
 */

import type { Severity } from '@/types';

/**
 * One detected issue. Frozen on creation.
 */
export interface Finding {
  /** Path relative to the scan root, `/`-separated */
  readonly file: string;
  /** 1-based line; rules without line tracking report 1 */
  readonly line: number;
  readonly ruleId: string;
  readonly message: string;
  readonly severity: Severity;
}

/**
 * A pure check from one file's text to zero or more findings.
 * Must not depend on other rules or on evaluation order.
 */
export type RuleCheck = (file: string, content: string) => readonly Finding[];

export interface RuleDefinition {
  id: string;
  name: string;
  severity: Severity;
  description?: string;
  /** Skill pack the rule was loaded from */
  skill?: string;
  /** Suggested remediation */
  fix?: string;
  check: RuleCheck;
}

export interface SeveritySummary {
  critical: number;
  high: number;
  medium: number;
  low: number;
  total: number;
}
