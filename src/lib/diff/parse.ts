import type { DiffSummary } from './types.js';

const DIFF_HEADER = /^diff --git a\/(.+?) b\/(.+)$/;

/**
 * Summarise unified diff text.
 *
 * Heuristic: counts `+`/`-` lines outside the `+++`/`---` file headers and
 * takes file names from `diff --git` lines. Binary and rename headers get
 * no special handling.
 */
export function parseDiff(text: string): DiffSummary {
  const files: string[] = [];
  let additions = 0;
  let deletions = 0;

  for (const line of text.split('\n')) {
    const header = DIFF_HEADER.exec(line);
    if (header) {
      files.push(header[2]);
    } else if (line.startsWith('+') && !line.startsWith('+++')) {
      additions++;
    } else if (line.startsWith('-') && !line.startsWith('---')) {
      deletions++;
    }
  }

  return { files, additions, deletions, net: additions - deletions };
}

export function isEmptyDiff(text: string): boolean {
  return text.trim() === '';
}
