/**
 * Types for diff presentation
 */

export interface DiffSummary {
  /** Changed files (the `b/` side of each `diff --git` header), in order */
  files: string[];
  additions: number;
  deletions: number;
  /** additions - deletions */
  net: number;
}

export type DiffStatus = 'idle' | 'loading' | 'loaded' | 'applying' | 'error';

export type ApplyResult =
  | { kind: 'nothing-to-apply' }
  | { kind: 'applied'; output: string }
  | { kind: 'failed'; error: Error };

export type ExportResult = { ok: true; path: string } | { ok: false; error: Error };
