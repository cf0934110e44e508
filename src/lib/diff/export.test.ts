import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { exportDiff, formatTimestamp, patchFileName } from './export.js';

describe('diff export', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'czm-export-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('formats local timestamps as YYYYMMDD_HHMMSS', () => {
    expect(formatTimestamp(new Date(2024, 0, 5, 9, 3, 7))).toBe('20240105_090307');
  });

  it('builds patch file names', () => {
    expect(patchFileName('chezmoi_diff', new Date(2024, 11, 31, 23, 59, 58))).toBe(
      'chezmoi_diff_20241231_235958.patch'
    );
  });

  it('writes the diff text verbatim', () => {
    const text = 'diff --git a/.bashrc b/.bashrc\n+export A=1\n';
    const result = exportDiff(text, {
      directory: tempDir,
      prefix: 'chezmoi_diff',
      now: new Date(2024, 5, 1, 12, 0, 0),
    });

    const expectedPath = path.join(tempDir, 'chezmoi_diff_20240601_120000.patch');
    expect(result).toEqual({ ok: true, path: expectedPath });
    expect(fs.readFileSync(expectedPath, 'utf8')).toBe(text);
  });

  it('reports write failures without throwing', () => {
    const result = exportDiff('x', {
      directory: path.join(tempDir, 'missing', 'dir'),
      prefix: 'p',
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toContain('ENOENT');
    }
  });
});
