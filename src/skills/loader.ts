/**
 * Skill Pack Loader
 *
 * Discovers skill pack files laid out as `<dir>/<category>/<skill>.yaml`
 * and validates them. Any invalid pack fails the whole load.
 */

import { existsSync, readdirSync, readFileSync, statSync, type Dirent } from 'node:fs';
import { basename, extname, join, resolve } from 'node:path';
import yaml from 'js-yaml';
import type { Logger } from 'pino';
import { z } from 'zod';
import { createLogger } from '@/lib/logger';
import { extractErrorMessage, ScanErrorCode } from '@/lib/errors';
import { Failure, Success, type Result } from '@/types';
import { DEFAULT_SKILL_CATEGORY, SKILL_FILE_EXTENSIONS } from '@/config/constants';
import { SKILL_NAME_MESSAGE, SKILL_NAME_PATTERN, SkillPackSchema } from './schemas';
import type { LoadSkillPacksOptions, SkillPack } from './types';

const logger = createLogger({ name: 'skill-loader' });

// Same depth from src/skills and dist/skills
const BUILT_IN_SKILLS_PATH = resolve(__dirname, '..', '..', 'skills');

interface SkillFileRef {
  path: string;
  category: string;
}

/**
 * Path of the packaged skills directory
 */
export function getBuiltInSkillsPath(): string {
  return BUILT_IN_SKILLS_PATH;
}

const isSkillFile = (file: string): boolean =>
  SKILL_FILE_EXTENSIONS.includes(extname(file).toLowerCase());

const isDirectory = (path: string): boolean => {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
};

function readEntries(directory: string): Result<Dirent[]> {
  try {
    return Success(readdirSync(directory, { withFileTypes: true }).sort(byName));
  } catch (error) {
    return Failure(`Cannot read skill directory ${directory}: ${extractErrorMessage(error)}`, {
      code: ScanErrorCode.INVALID_RULE_PACK,
      hint: 'Check the permissions of the skill directory',
      details: { directory },
    });
  }
}

/**
 * Find skill pack files one category level deep, in name order
 */
export function discoverSkillFiles(directory: string): Result<SkillFileRef[]> {
  if (!isDirectory(directory)) {
    return Success([]);
  }

  const entries = readEntries(directory);
  if (!entries.ok) return entries;

  const refs: SkillFileRef[] = [];
  for (const entry of entries.value) {
    const entryPath = resolve(join(directory, entry.name));
    if (entry.isFile() && isSkillFile(entry.name)) {
      refs.push({ path: entryPath, category: DEFAULT_SKILL_CATEGORY });
    } else if (entry.isDirectory()) {
      const children = readEntries(entryPath);
      if (!children.ok) return children;
      for (const child of children.value) {
        if (child.isFile() && isSkillFile(child.name)) {
          refs.push({ path: resolve(join(entryPath, child.name)), category: entry.name });
        }
      }
    }
  }
  return Success(refs);
}

function byName(a: { name: string }, b: { name: string }): number {
  if (a.name === b.name) return 0;
  return a.name < b.name ? -1 : 1;
}

/**
 * Format Zod errors for messages and logs
 */
function formatZodErrors(errors: z.ZodIssue[]): string[] {
  return errors.map((e) => `${e.path.length > 0 ? e.path.join('.') : '(root)'}: ${e.message}`);
}

function parseSkillFile(path: string, content: string): unknown {
  return extname(path).toLowerCase() === '.json' ? JSON.parse(content) : yaml.load(content);
}

/**
 * Load and validate a single skill pack file
 */
export function loadSkillPackFile(
  path: string,
  category: string,
  log: Logger = logger,
): Result<SkillPack> {
  let data: unknown;
  try {
    data = parseSkillFile(path, readFileSync(path, 'utf-8'));
  } catch (error) {
    return Failure(`Failed to read skill pack ${path}: ${extractErrorMessage(error)}`, {
      code: ScanErrorCode.INVALID_RULE_PACK,
      details: { pack: path },
    });
  }

  const parsed = SkillPackSchema.safeParse(data);
  if (!parsed.success) {
    const issues = formatZodErrors(parsed.error.issues.slice(0, 5));
    log.warn(
      { pack: path, errors: issues, totalErrors: parsed.error.issues.length },
      'Skill pack validation failed',
    );
    return Failure(`Invalid skill pack ${path}: ${issues.join('; ')}`, {
      code: ScanErrorCode.INVALID_RULE_PACK,
      hint: 'Fix the listed fields in the skill pack file',
      details: { pack: path, issues },
    });
  }

  const pack = parsed.data;
  const name = pack.name ?? basename(path, extname(path)).toLowerCase();
  if (!SKILL_NAME_PATTERN.test(name)) {
    return Failure(`Invalid skill pack ${path}: name: ${SKILL_NAME_MESSAGE} (got "${name}")`, {
      code: ScanErrorCode.INVALID_RULE_PACK,
      hint: 'Rename the file or set "name" in the skill pack',
      details: { pack: path, name },
    });
  }

  return Success({
    name,
    description: pack.description,
    version: pack.version,
    priority: pack.priority,
    categories: pack.categories,
    useWhen: pack.use_when,
    relatedSkills: pack.related_skills,
    category,
    source: path,
    rules: pack.rules,
  });
}

/**
 * Load the built-in skills and any extra skill directories
 */
export function loadSkillPacks(options: LoadSkillPacksOptions = {}): Result<SkillPack[]> {
  const log = options.logger ?? logger;
  const directories = [
    ...(options.includeBuiltIn === false ? [] : [BUILT_IN_SKILLS_PATH]),
    ...(options.directories ?? []).map((dir) => resolve(dir)),
  ];

  const packs: SkillPack[] = [];
  const seen = new Map<string, string>();

  for (const directory of directories) {
    if (!existsSync(directory)) {
      return Failure(`Skill directory not found: ${directory}`, {
        code: ScanErrorCode.INVALID_RULE_PACK,
        hint: 'Check the --rules option and SKILL_SCAN_RULES_PATH',
        details: { directory },
      });
    }

    const files = discoverSkillFiles(directory);
    if (!files.ok) return files;
    log.debug({ directory, count: files.value.length }, 'Discovered skill packs');

    for (const file of files.value) {
      const loaded = loadSkillPackFile(file.path, file.category, log);
      if (!loaded.ok) return loaded;

      const key = loaded.value.name.toLowerCase();
      const previous = seen.get(key);
      if (previous) {
        return Failure(`Duplicate skill name ${loaded.value.name}`, {
          code: ScanErrorCode.DUPLICATE_SKILL,
          hint: 'Skill names must be unique across all skill directories',
          details: { skill: loaded.value.name, packs: [previous, file.path] },
        });
      }
      seen.set(key, file.path);
      packs.push(loaded.value);
    }
  }

  log.info(
    {
      directories,
      skills: packs.length,
      rules: packs.reduce((count, pack) => count + pack.rules.length, 0),
    },
    'Skill packs loaded',
  );
  return Success(packs);
}

/**
 * Case-insensitive skill lookup
 */
export function findSkill(packs: readonly SkillPack[], name: string): SkillPack | undefined {
  const wanted = name.trim().toLowerCase();
  return packs.find((pack) => pack.name.toLowerCase() === wanted);
}
