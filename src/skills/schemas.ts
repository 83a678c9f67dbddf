/**
 * Zod schemas for skill pack files
 */

import { z } from 'zod';
import { severityNameSchema } from '@/types/severity';
import { extractErrorMessage } from '@/lib/errors';

export const RuleModeSchema = z.enum(['line', 'content', 'absent']);

const regexFlagsSchema = z
  .string()
  .regex(/^[imsu]*$/, 'Only the i, m, s and u flags are supported');

export const PatternRuleSchema = z
  .object({
    id: z
      .string()
      .regex(/^[A-Z][A-Z0-9_-]*$/, 'Rule ids are upper-case letters, digits, "-" and "_"'),
    name: z.string().min(1),
    description: z.string().optional(),
    severity: severityNameSchema,
    message: z.string().min(1),
    pattern: z.string().min(1),
    flags: regexFlagsSchema.optional(),
    mode: RuleModeSchema.default('line'),
    when: z.string().min(1).optional(),
    fix: z.string().optional(),
  })
  .superRefine((rule, ctx) => {
    const patterns: Array<['pattern' | 'when', string | undefined]> = [
      ['pattern', rule.pattern],
      ['when', rule.when],
    ];
    for (const [field, source] of patterns) {
      if (source === undefined) continue;
      try {
        new RegExp(source, rule.flags);
      } catch (error) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [field],
          message: `Invalid regular expression: ${extractErrorMessage(error)}`,
        });
      }
    }
    if (rule.when !== undefined && rule.mode !== 'absent') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['when'],
        message: '"when" only applies to rules in absent mode',
      });
    }
  });
export type PatternRule = z.infer<typeof PatternRuleSchema>;

export const SKILL_NAME_PATTERN = /^[a-z0-9][a-z0-9-]*$/;
export const SKILL_NAME_MESSAGE = 'Skill names are lower-case kebab-case';

export const SkillPackSchema = z.object({
  name: z
    .string()
    .regex(SKILL_NAME_PATTERN, SKILL_NAME_MESSAGE)
    .optional(),
  description: z.string().min(1),
  version: z.string().default('1.0.0'),
  priority: severityNameSchema.default('medium'),
  categories: z.array(z.string()).default([]),
  use_when: z.array(z.string()).default([]),
  related_skills: z.array(z.string()).default([]),
  rules: z.array(PatternRuleSchema).min(1),
});
