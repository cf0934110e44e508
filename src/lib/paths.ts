/**
 * Path helpers shared by the adapter, config and screens
 */

import fs from 'fs';
import os from 'os';
import path from 'path';

/**
 * Expand a leading `~` or `~/` to the home directory
 */
export function expandHome(p: string, homeDir: string = os.homedir()): string {
  if (p === '~') {
    return homeDir;
  }
  if (p.startsWith('~/') || p.startsWith(`~${path.sep}`)) {
    return path.join(homeDir, p.slice(2));
  }
  return p;
}

/**
 * Absolute, symlink-resolved form of a path.
 *
 * Paths that do not exist yet are resolved through their longest existing
 * ancestor, with the missing tail appended unchanged. Errors other than
 * ENOENT/ENOTDIR (permission problems, symlink loops) are thrown.
 */
export function canonicalPath(
  p: string,
  options: { homeDir?: string; baseDir?: string } = {}
): string {
  const expanded = expandHome(p, options.homeDir);
  const absolute = path.resolve(options.baseDir ?? process.cwd(), expanded);

  const missing: string[] = [];
  let current = absolute;

  while (true) {
    try {
      const real = fs.realpathSync.native(current);
      return missing.length > 0 ? path.join(real, ...missing.reverse()) : real;
    } catch (error) {
      if (!isMissingPathError(error)) {
        throw error;
      }
      const parent = path.dirname(current);
      if (parent === current) {
        return absolute;
      }
      missing.push(path.basename(current));
      current = parent;
    }
  }
}

function isMissingPathError(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) {
    return false;
  }
  return error.code === 'ENOENT' || error.code === 'ENOTDIR';
}

export type PathKind = 'file' | 'directory' | 'symlink' | 'other';

/**
 * Kind of an existing path, or null when it does not exist
 */
export function describePath(p: string, homeDir?: string): PathKind | null {
  try {
    const stats = fs.lstatSync(expandHome(p, homeDir));
    if (stats.isSymbolicLink()) return 'symlink';
    if (stats.isFile()) return 'file';
    if (stats.isDirectory()) return 'directory';
    return 'other';
  } catch {
    return null;
  }
}

export type PathCheck = { ok: true; kind: PathKind } | { ok: false; message: string };

/**
 * Check a path typed by the user before handing it to chezmoi
 */
export function checkAddablePath(p: string, homeDir?: string): PathCheck {
  if (!p.trim()) {
    return { ok: false, message: 'Path cannot be empty' };
  }
  const kind = describePath(p.trim(), homeDir);
  if (kind === null) {
    return { ok: false, message: 'File does not exist' };
  }
  if (kind === 'other') {
    return { ok: false, message: 'Path is not a file, directory or symlink' };
  }
  return { ok: true, kind };
}
