/**
 * Rule registry
 *
 * Rules are added by registration; the engine iterates whatever is registered.
 * Ids are unique per registry and the engine's diagnostic ids are reserved.
 */

import { Failure, Success, type Result } from '@/types';
import { ScanErrorCode } from '@/lib/errors';
import { DIAGNOSTIC_RULES } from '@/config/constants';
import type { RuleDefinition } from './types';

const RESERVED_IDS: ReadonlySet<string> = new Set(Object.values(DIAGNOSTIC_RULES));

export interface RuleRegistry {
  register(rule: RuleDefinition): Result<void>;
  registerAll(rules: readonly RuleDefinition[]): Result<void>;
  get(id: string): RuleDefinition | undefined;
  list(): readonly RuleDefinition[];
  readonly size: number;
}

export function createRuleRegistry(): RuleRegistry {
  const rules = new Map<string, RuleDefinition>();

  const register = (rule: RuleDefinition): Result<void> => {
    if (RESERVED_IDS.has(rule.id)) {
      return Failure(`Rule id ${rule.id} is reserved for scanner diagnostics`, {
        code: ScanErrorCode.DUPLICATE_RULE,
        details: { ruleId: rule.id, skill: rule.skill },
      });
    }

    const existing = rules.get(rule.id);
    if (existing) {
      const owners = [existing.skill, rule.skill].filter((skill) => skill !== undefined);
      return Failure(
        `Duplicate rule id ${rule.id}${owners.length > 0 ? ` (skills: ${owners.join(', ')})` : ''}`,
        {
          code: ScanErrorCode.DUPLICATE_RULE,
          hint: 'Rule ids must be unique across every loaded skill pack',
          details: { ruleId: rule.id, skills: owners },
        },
      );
    }

    rules.set(rule.id, rule);
    return Success(undefined);
  };

  return {
    register,
    registerAll(list) {
      for (const rule of list) {
        const result = register(rule);
        if (!result.ok) return result;
      }
      return Success(undefined);
    },
    get: (id) => rules.get(id),
    list: () => Array.from(rules.values()),
    get size() {
      return rules.size;
    },
  };
}
