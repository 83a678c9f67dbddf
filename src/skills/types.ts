import type { Logger } from 'pino';
import type { Severity } from '@/types';
import type { PatternRule } from './schemas';

export interface SkillPack {
  name: string;
  description: string;
  version: string;
  priority: Severity;
  categories: string[];
  useWhen: string[];
  relatedSkills: string[];
  /** Directory the pack file sits in, or `general` at the top level */
  category: string;
  /** Absolute path of the pack file */
  source: string;
  rules: PatternRule[];
}

export interface LoadSkillPacksOptions {
  /** Extra skill directories, loaded after the built-in one */
  directories?: readonly string[];
  /** Load the packaged `skills/` directory (default: true) */
  includeBuiltIn?: boolean;
  logger?: Logger;
}
