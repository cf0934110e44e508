import { paint, type Role } from '../colors.js';

export const IN_SYNC_MESSAGE = '✓ No pending changes - everything is in sync';

/**
 * One `chezmoi status` line: two status columns, a space, the target path
 */
export interface StatusEntry {
  /** Difference between last written state and actual state */
  sourceCode: string;
  /** Difference between actual state and target state */
  targetCode: string;
  path: string;
}

export function parseStatusLine(line: string): StatusEntry | null {
  if (line.length < 4 || line[2] !== ' ') {
    return null;
  }
  return { sourceCode: line[0], targetCode: line[1], path: line.slice(3) };
}

export function parseStatus(text: string): StatusEntry[] {
  const entries: StatusEntry[] = [];
  for (const line of text.split('\n')) {
    const entry = parseStatusLine(line.trimEnd());
    if (entry) entries.push(entry);
  }
  return entries;
}

const CODE_ROLES: Record<string, Role> = {
  A: 'added',
  M: 'modified',
  D: 'removed',
  R: 'renamed',
};

function colorCode(code: string): string {
  return paint(CODE_ROLES[code] ?? 'unchanged', code);
}

/**
 * Display lines for status text. Unparseable lines are passed through.
 */
export function formatStatus(text: string): string[] {
  if (text.trim() === '') {
    return [paint('passed', IN_SYNC_MESSAGE)];
  }
  return text
    .replace(/\n+$/, '')
    .split('\n')
    .map((line) => {
      const entry = parseStatusLine(line.trimEnd());
      if (!entry) return line;
      return `${colorCode(entry.sourceCode)}${colorCode(entry.targetCode)} ${entry.path}`;
    });
}
