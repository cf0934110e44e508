/**
 * Argument vectors for chezmoi subcommands.
 *
 * Layout is always `<subcommand> [flags...] [targets...]`; the executable
 * itself is prepended by the runner.
 */

import type { AddOptions, ApplyOptions } from './types.js';

/** Boolean add options in the order their flags are emitted */
const ADD_FLAG_ORDER = [
  'template',
  'encrypt',
  'exact',
  'executable',
  'private',
  'readonly',
] as const;

const ADD_TRAILING_FLAG_ORDER = ['autotemplate', 'follow', 'create', 'prompt'] as const;

export function buildAddArgs(targets: string[], options: AddOptions = {}): string[] {
  const args = ['add'];
  for (const name of ADD_FLAG_ORDER) {
    if (options[name]) args.push(`--${name}`);
  }
  if (options.recursive === false) {
    args.push('--recursive=false');
  }
  for (const name of ADD_TRAILING_FLAG_ORDER) {
    if (options[name]) args.push(`--${name}`);
  }
  return [...args, ...targets];
}

/**
 * Also deletes the destination files. The child has no terminal, so
 * `--force` skips chezmoi's own confirmation; czm confirms first.
 */
export function buildRemoveArgs(targets: string[]): string[] {
  return ['remove', '--force', ...targets];
}

export function buildDiffArgs(target?: string): string[] {
  return target ? ['diff', target] : ['diff'];
}

export function buildApplyArgs(options: ApplyOptions = {}): string[] {
  const args = ['apply'];
  if (options.dryRun) args.push('--dry-run');
  if (options.verbose) args.push('--verbose');
  return [...args, ...(options.targets ?? [])];
}

export function buildStatusArgs(targets: string[] = []): string[] {
  return ['status', ...targets];
}

export function buildSourcePathArgs(target?: string): string[] {
  return target ? ['source-path', target] : ['source-path'];
}

export function buildTargetPathArgs(sourcePath: string): string[] {
  return ['target-path', sourcePath];
}

export function buildUpdateArgs(apply: boolean = true): string[] {
  return apply ? ['update'] : ['update', '--no-apply'];
}

export function buildInitArgs(repo?: string): string[] {
  return repo ? ['init', repo] : ['init'];
}

export const VERSION_ARGS = ['--version'];
export const MANAGED_ARGS = ['managed'];
export const DATA_ARGS = ['data', '--format', 'json'];
export const DOCTOR_ARGS = ['doctor'];
export const VERIFY_ARGS = ['verify'];
