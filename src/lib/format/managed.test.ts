import { describe, it, expect, beforeEach } from 'vitest';
import { formatManagedFiles, managedTitle } from './managed.js';
import { setColorEnabled } from '../colors.js';

describe('managed files formatting', () => {
  beforeEach(() => {
    setColorEnabled(false);
  });

  it('shows an empty title when nothing is managed', () => {
    expect(formatManagedFiles([])).toEqual(['Managed Files - No files managed']);
  });

  it('counts files in the title', () => {
    expect(managedTitle(1)).toBe('Managed Files - 1 file');
    expect(managedTitle(3)).toBe('Managed Files - 3 files');
  });

  it('numbers files from 1', () => {
    expect(formatManagedFiles(['.bashrc', '.zshrc'])).toEqual([
      'Managed Files - 2 files',
      '',
      '  #  File Path',
      '  ─  ─────────',
      '  1  .bashrc',
      '  2  .zshrc',
    ]);
  });
});
