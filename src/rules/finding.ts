import type { Severity } from '@/types';
import type { Finding } from './types';

export function createFinding(
  file: string,
  line: number,
  ruleId: string,
  message: string,
  severity: Severity,
): Finding {
  return Object.freeze({
    file,
    line: Number.isInteger(line) && line > 0 ? line : 1,
    ruleId,
    message,
    severity,
  });
}

/**
 * Deterministic report order: file, line, rule id, message
 */
export function compareFindings(a: Finding, b: Finding): number {
  return (
    compareText(a.file, b.file) ||
    a.line - b.line ||
    compareText(a.ruleId, b.ruleId) ||
    compareText(a.message, b.message)
  );
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * 1-based line number of a character offset
 */
export function lineAt(content: string, index: number): number {
  return createLineLocator(content)(index);
}

/**
 * Line lookup for a sequence of offsets into the same content. Offsets given
 * in ascending order are resolved in one pass over the content; a smaller
 * offset restarts counting from the top.
 */
export function createLineLocator(content: string): (index: number) => number {
  let offset = 0;
  let line = 1;
  return (index) => {
    if (index < offset) {
      offset = 0;
      line = 1;
    }
    const end = Math.min(index, content.length);
    for (; offset < end; offset++) {
      if (content.charCodeAt(offset) === 10) line++;
    }
    return line;
  };
}
