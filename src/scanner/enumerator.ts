/**
 * File Enumerator
 *
 * Lazily walks a source tree, yielding files that match the extension filter
 * and pruning excluded directories (build output, package caches) at any depth.
 */

import { promises as fs, type Dirent } from 'node:fs';
import path from 'node:path';
import type { Logger } from 'pino';
import { Failure, Success, type Result } from '@/types';
import { extractErrorMessage, ScanErrorCode } from '@/lib/errors';
import { DEFAULT_EXCLUDED_DIRECTORIES, DEFAULT_EXTENSIONS } from '@/config/constants';

export interface EnumerateOptions {
  /** Extensions including the dot, matched case-insensitively */
  extensions?: readonly string[];
  /** Directory names never descended into, matched case-insensitively */
  excludedDirectories?: readonly string[];
  logger?: Logger;
}

/**
 * Resolve the scan root to an absolute, existing directory
 */
export async function resolveScanRoot(root: string): Promise<Result<string>> {
  const absolute = path.resolve(root);
  try {
    const stats = await fs.stat(absolute);
    if (!stats.isDirectory()) {
      return Failure(`Path is not a directory: ${absolute}`, {
        code: ScanErrorCode.PATH_NOT_FOUND,
        resolution: 'Pass the project directory to --path',
        details: { path: absolute },
      });
    }
    return Success(absolute);
  } catch (error) {
    return Failure(`Path not found: ${absolute}`, {
      code: ScanErrorCode.PATH_NOT_FOUND,
      message: extractErrorMessage(error),
      resolution: 'Check the --path value points at an existing directory',
      details: { path: absolute },
    });
  }
}

/**
 * Yield absolute paths of candidate source files under `root`.
 * Entries are visited in name order; symbolic links are not followed.
 */
export async function* enumerateSourceFiles(
  root: string,
  options: EnumerateOptions = {},
): AsyncGenerator<string> {
  const extensions = new Set(
    (options.extensions ?? DEFAULT_EXTENSIONS).map((ext) => ext.toLowerCase()),
  );
  const excluded = new Set(
    (options.excludedDirectories ?? DEFAULT_EXCLUDED_DIRECTORIES).map((dir) => dir.toLowerCase()),
  );

  const pending: string[] = [path.resolve(root)];
  while (pending.length > 0) {
    const directory = pending.shift();
    if (directory === undefined) break;

    let entries: Dirent[];
    try {
      entries = await fs.readdir(directory, { withFileTypes: true });
    } catch (error) {
      options.logger?.warn(
        { directory, error: extractErrorMessage(error) },
        'Skipping unreadable directory',
      );
      continue;
    }

    entries.sort((a, b) => (a.name === b.name ? 0 : a.name < b.name ? -1 : 1));
    const subdirectories: string[] = [];

    for (const entry of entries) {
      const entryPath = path.join(directory, entry.name);
      if (entry.isDirectory()) {
        if (!excluded.has(entry.name.toLowerCase())) {
          subdirectories.push(entryPath);
        }
      } else if (entry.isFile() && extensions.has(path.extname(entry.name).toLowerCase())) {
        yield entryPath;
      }
    }

    // Depth-first, keeping name order among siblings
    pending.unshift(...subdirectories);
  }
}

/**
 * Path relative to the scan root with `/` separators, as shown in reports
 */
export function toReportPath(root: string, file: string): string {
  return path.relative(root, file).split(path.sep).join('/');
}
