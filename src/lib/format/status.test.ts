import { describe, it, expect, afterEach } from 'vitest';
import { formatStatus, parseStatus, parseStatusLine } from './status.js';
import { setColorEnabled } from '../colors.js';

describe('status formatting', () => {
  afterEach(() => {
    setColorEnabled(false);
  });

  describe('parseStatusLine', () => {
    it('splits the two code columns from the path', () => {
      expect(parseStatusLine(' M .bashrc')).toEqual({
        sourceCode: ' ',
        targetCode: 'M',
        path: '.bashrc',
      });
      expect(parseStatusLine('A  .config/git/config')).toEqual({
        sourceCode: 'A',
        targetCode: ' ',
        path: '.config/git/config',
      });
    });

    it('rejects lines that do not match the layout', () => {
      expect(parseStatusLine('')).toBeNull();
      expect(parseStatusLine('MM')).toBeNull();
      expect(parseStatusLine('oops no')).toBeNull();
    });
  });

  it('parses every status line', () => {
    expect(parseStatus(' M .bashrc\nDA .zshrc\n\n')).toEqual([
      { sourceCode: ' ', targetCode: 'M', path: '.bashrc' },
      { sourceCode: 'D', targetCode: 'A', path: '.zshrc' },
    ]);
  });

  describe('formatStatus', () => {
    it('shows the in-sync message for empty output', () => {
      setColorEnabled(false);
      expect(formatStatus('\n')).toEqual(['✓ No pending changes - everything is in sync']);
    });

    it('colours codes per kind', () => {
      setColorEnabled(true);
      expect(formatStatus(' M .bashrc\nR  run_once.sh\n')).toEqual([
        '\x1b[2m \x1b[0m\x1b[33mM\x1b[0m .bashrc',
        '\x1b[35mR\x1b[0m\x1b[2m \x1b[0m run_once.sh',
      ]);
    });

    it('passes unparseable lines through', () => {
      setColorEnabled(false);
      expect(formatStatus('warning: something\n')).toEqual(['warning: something']);
    });
  });
});
