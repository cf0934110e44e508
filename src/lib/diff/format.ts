import { dim, paint } from '../colors.js';
import type { DiffSummary } from './types.js';

export const NO_CHANGES_MESSAGE = 'No changes detected.\n\nAll files are in sync with the target state.';

export function colorizeDiffLine(line: string): string {
  if (
    line.startsWith('diff --git') ||
    line.startsWith('+++') ||
    line.startsWith('---') ||
    line.startsWith('index ')
  ) {
    return paint('fileHeader', line);
  }
  if (line.startsWith('@@')) return paint('hunk', line);
  if (line.startsWith('+')) return paint('added', line);
  if (line.startsWith('-')) return paint('removed', line);
  return line;
}

/**
 * Diff text coloured line by line, or the in-sync message when empty
 */
export function renderDiff(text: string): string {
  if (text.trim() === '') {
    return dim(NO_CHANGES_MESSAGE);
  }
  return text.replace(/\n$/, '').split('\n').map(colorizeDiffLine).join('\n');
}

function signed(n: number): string {
  return n > 0 ? `+${n}` : String(n);
}

/**
 * e.g. "2 files changed, +10 -3 (net +7)"
 */
export function formatSummary(summary: DiffSummary): string {
  const count = summary.files.length;
  const noun = count === 1 ? 'file' : 'files';
  return `${count} ${noun} changed, ${paint('added', `+${summary.additions}`)} ${paint('removed', `-${summary.deletions}`)} (net ${signed(summary.net)})`;
}
