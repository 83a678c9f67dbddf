/**
 * Temporary directories for tests that touch the filesystem
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import tmp, { type DirResult } from 'tmp';

export function createTestTempDir(prefix = 'skill-scan-'): {
  dir: DirResult;
  cleanup: () => Promise<void>;
} {
  const dir = tmp.dirSync({ prefix, unsafeCleanup: true });
  return {
    dir,
    cleanup: async () => {
      dir.removeCallback();
    },
  };
}

/**
 * Write files given as relative path -> content under `root`
 */
export function writeTree(root: string, files: Record<string, string>): void {
  for (const [relative, content] of Object.entries(files)) {
    const target = join(root, relative);
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, content, 'utf-8');
  }
}
