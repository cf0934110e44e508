import fs from 'fs';
import path from 'path';
import { logger } from '../logger.js';
import type { ExportResult } from './types.js';

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Local time as YYYYMMDD_HHMMSS
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

export function patchFileName(prefix: string, date: Date): string {
  return `${prefix}_${formatTimestamp(date)}.patch`;
}

export interface ExportOptions {
  directory: string;
  prefix: string;
  now?: Date;
}

/**
 * Write diff text verbatim to `<prefix>_<timestamp>.patch`.
 * Failures are returned, not thrown.
 */
export function exportDiff(text: string, options: ExportOptions): ExportResult {
  const target = path.join(options.directory, patchFileName(options.prefix, options.now ?? new Date()));
  try {
    fs.writeFileSync(target, text, 'utf8');
    logger.info(`Exported diff to ${target}`);
    return { ok: true, path: target };
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    logger.warn(`Failed to export diff to ${target}: ${error.message}`);
    return { ok: false, error };
  }
}
