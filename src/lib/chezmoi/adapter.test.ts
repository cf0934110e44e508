import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { ChezmoiAdapter } from './adapter.js';
import type { CommandResult, CommandRunner } from './types.js';
import {
  ChezmoiCommandError,
  ChezmoiNotFoundError,
  ChezmoiTimeoutError,
} from '../errors.js';

const SETTINGS = {
  executable: 'chezmoi',
  commandTimeoutMs: 30000,
  probeTimeoutMs: 5000,
  destDir: '/home/tester',
};

function result(stdout: string, exitCode = 0, stderr = ''): CommandResult {
  return { stdout, stderr, exitCode };
}

describe('ChezmoiAdapter', () => {
  let runner: Mock<CommandRunner>;
  let adapter: ChezmoiAdapter;

  beforeEach(() => {
    runner = vi.fn<CommandRunner>();
    adapter = new ChezmoiAdapter(SETTINGS, runner);
  });

  describe('checkInstalled', () => {
    it('returns true when --version exits 0', async () => {
      runner.mockResolvedValue(result('chezmoi version v2.40.0\n'));

      expect(await adapter.checkInstalled()).toBe(true);
      expect(runner).toHaveBeenCalledWith('chezmoi', ['--version'], { timeoutMs: 5000 });
    });

    it('returns false when the executable is missing', async () => {
      runner.mockRejectedValue(new ChezmoiNotFoundError('chezmoi'));
      expect(await adapter.checkInstalled()).toBe(false);
    });

    it('returns false on a non-zero exit', async () => {
      runner.mockResolvedValue(result('', 1));
      expect(await adapter.checkInstalled()).toBe(false);
    });
  });

  describe('getVersion', () => {
    it('returns trimmed stdout', async () => {
      runner.mockResolvedValue(result('chezmoi version v2.40.0\n'));
      expect(await adapter.getVersion()).toBe('chezmoi version v2.40.0');
    });

    it('propagates NotFound', async () => {
      runner.mockRejectedValue(new ChezmoiNotFoundError('chezmoi'));
      await expect(adapter.getVersion()).rejects.toBeInstanceOf(ChezmoiNotFoundError);
    });
  });

  describe('add', () => {
    it('passes flags and targets with the command timeout', async () => {
      runner.mockResolvedValue(result(''));

      await adapter.add('~/.bashrc', { template: true, private: true });

      expect(runner).toHaveBeenCalledWith(
        'chezmoi',
        ['add', '--template', '--private', '~/.bashrc'],
        { timeoutMs: 30000 }
      );
    });

    it('raises a command error carrying stderr and exit code', async () => {
      runner.mockResolvedValue(result('', 1, 'chezmoi: .bashrc: already in source state\n'));

      const error = await adapter.add('~/.bashrc').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ChezmoiCommandError);
      expect(error).toMatchObject({
        exitCode: 1,
        stderr: 'chezmoi: .bashrc: already in source state\n',
        command: 'chezmoi add ~/.bashrc',
      });
    });

    it('propagates timeouts', async () => {
      runner.mockRejectedValue(new ChezmoiTimeoutError({ command: 'chezmoi add x', timeoutMs: 30000 }));
      await expect(adapter.add('x')).rejects.toBeInstanceOf(ChezmoiTimeoutError);
    });
  });

  describe('remove', () => {
    it('raises on non-zero exit', async () => {
      runner.mockResolvedValue(result('', 1, 'not in source state'));
      await expect(adapter.remove(['~/.vimrc'])).rejects.toBeInstanceOf(ChezmoiCommandError);
      expect(runner.mock.calls[0][1]).toEqual(['remove', '--force', '~/.vimrc']);
    });
  });

  describe('diff', () => {
    it('returns partial stdout on non-zero exit', async () => {
      runner.mockResolvedValue(result('diff --git a/.x b/.x\n', 1, 'error'));
      expect(await adapter.diff()).toBe('diff --git a/.x b/.x\n');
    });

    it('passes a single target', async () => {
      runner.mockResolvedValue(result(''));
      await adapter.diff('/home/tester/.bashrc');
      expect(runner.mock.calls[0][1]).toEqual(['diff', '/home/tester/.bashrc']);
    });
  });

  describe('apply', () => {
    it('builds dry-run and verbose flags', async () => {
      runner.mockResolvedValue(result('ok'));
      await adapter.apply({ dryRun: true, verbose: true });
      expect(runner.mock.calls[0][1]).toEqual(['apply', '--dry-run', '--verbose']);
    });

    it('raises on non-zero exit', async () => {
      runner.mockResolvedValue(result('', 1, 'permission denied'));
      await expect(adapter.apply()).rejects.toThrow('permission denied');
    });
  });

  describe('listManaged', () => {
    it('strips lines and drops blanks in order', async () => {
      runner.mockResolvedValue(result('.bashrc\n  .config/nvim/init.lua  \n\n.zshrc\n'));
      expect(await adapter.listManaged()).toEqual(['.bashrc', '.config/nvim/init.lua', '.zshrc']);
    });

    it('raises on non-zero exit', async () => {
      runner.mockResolvedValue(result('', 1, 'no source directory'));
      await expect(adapter.listManaged()).rejects.toBeInstanceOf(ChezmoiCommandError);
    });
  });

  describe('getStatus', () => {
    it('returns raw status text', async () => {
      runner.mockResolvedValue(result(' M .bashrc\n'));
      expect(await adapter.getStatus()).toBe(' M .bashrc\n');
    });

    it('returns an empty string on failure', async () => {
      runner.mockResolvedValue(result(' M .bashrc\n', 1, 'bad'));
      expect(await adapter.getStatus()).toBe('');
    });
  });

  describe('getTemplateData', () => {
    it('parses a JSON mapping', async () => {
      runner.mockResolvedValue(result('{"chezmoi":{"os":"linux"},"email":"me@example.com"}'));
      expect(await adapter.getTemplateData()).toEqual({
        chezmoi: { os: 'linux' },
        email: 'me@example.com',
      });
      expect(runner.mock.calls[0][1]).toEqual(['data', '--format', 'json']);
    });

    it('returns {} for malformed JSON', async () => {
      runner.mockResolvedValue(result('{not json'));
      expect(await adapter.getTemplateData()).toEqual({});
    });

    it('returns {} for non-mapping JSON', async () => {
      runner.mockResolvedValueOnce(result('[1, 2, 3]'));
      runner.mockResolvedValueOnce(result('"linux"'));
      expect(await adapter.getTemplateData()).toEqual({});
      expect(await adapter.getTemplateData()).toEqual({});
    });

    it('returns {} for empty output or failure', async () => {
      runner.mockResolvedValueOnce(result(''));
      runner.mockResolvedValueOnce(result('{"a":1}', 1));
      expect(await adapter.getTemplateData()).toEqual({});
      expect(await adapter.getTemplateData()).toEqual({});
    });
  });

  describe('paths', () => {
    it('returns the trimmed source path', async () => {
      runner.mockResolvedValue(result('/home/tester/.local/share/chezmoi\n'));
      expect(await adapter.getSourcePath()).toBe('/home/tester/.local/share/chezmoi');
    });

    it('returns the trimmed target path', async () => {
      runner.mockResolvedValue(result('/home/tester/.bashrc\n'));
      expect(await adapter.getTargetPath('/src/dot_bashrc')).toBe('/home/tester/.bashrc');
      expect(runner.mock.calls[0][1]).toEqual(['target-path', '/src/dot_bashrc']);
    });

    it('raises when source-path fails', async () => {
      runner.mockResolvedValue(result('', 1, 'not managed'));
      await expect(adapter.getSourcePath('~/.nope')).rejects.toBeInstanceOf(ChezmoiCommandError);
    });
  });

  describe('runDiagnostics', () => {
    it('returns output even on non-zero exit', async () => {
      runner.mockResolvedValue(result('RESULT CHECK\nok version\nerror config-file\n', 1));
      expect(await adapter.runDiagnostics()).toBe('RESULT CHECK\nok version\nerror config-file\n');
    });

    it('never raises', async () => {
      runner.mockRejectedValue(new ChezmoiNotFoundError('chezmoi'));
      expect(await adapter.runDiagnostics()).toBe('');
    });
  });

  describe('verify', () => {
    it('returns stdout when ok', async () => {
      runner.mockResolvedValue(result('  \n', 0, 'ignored'));
      expect(await adapter.verify()).toEqual({ ok: true, output: '' });
    });

    it('returns stderr when not ok', async () => {
      runner.mockResolvedValue(result('', 1, ' mismatch \n'));
      expect(await adapter.verify()).toEqual({ ok: false, output: 'mismatch' });
    });
  });

  describe('update and init', () => {
    it('passes --no-apply and tolerates failure', async () => {
      runner.mockResolvedValue(result('Already up to date.\n', 1, 'warning'));
      expect(await adapter.update(false)).toBe('Already up to date.\n');
      expect(runner.mock.calls[0][1]).toEqual(['update', '--no-apply']);
    });

    it('raises when init fails', async () => {
      runner.mockResolvedValue(result('', 1, 'repository not found'));
      await expect(adapter.init('user/dotfiles')).rejects.toThrow('repository not found');
      expect(runner.mock.calls[0][1]).toEqual(['init', 'user/dotfiles']);
    });
  });

  describe('isManaged', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'czm-managed-'));
      fs.writeFileSync(path.join(tempDir, '.bashrc'), 'export A=1\n');
      adapter = new ChezmoiAdapter({ ...SETTINGS, destDir: tempDir }, runner);
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('matches an absolute candidate against a home-relative entry', async () => {
      runner.mockResolvedValue(result('.bashrc\n.zshrc\n'));
      expect(await adapter.isManaged(path.join(tempDir, '.bashrc'))).toBe(true);
    });

    it('expands a home-relative candidate', async () => {
      const savedHome = process.env.HOME;
      process.env.HOME = tempDir;
      try {
        runner.mockResolvedValue(result('.bashrc\n'));
        expect(await adapter.isManaged('~/.bashrc')).toBe(true);
        expect(await adapter.isManaged('~/.zshrc')).toBe(false);
      } finally {
        if (savedHome === undefined) {
          delete process.env.HOME;
        } else {
          process.env.HOME = savedHome;
        }
      }
    });

    it('matches through symlinks', async () => {
      fs.symlinkSync(path.join(tempDir, '.bashrc'), path.join(tempDir, 'link'));
      runner.mockResolvedValue(result('.bashrc\n'));
      expect(await adapter.isManaged(path.join(tempDir, 'link'))).toBe(true);
    });

    it('matches entries that do not exist on disk yet', async () => {
      runner.mockResolvedValue(result('.zshrc\n'));
      expect(await adapter.isManaged(path.join(tempDir, '.zshrc'))).toBe(true);
    });

    it('returns false for unmanaged paths', async () => {
      runner.mockResolvedValue(result('.zshrc\n'));
      expect(await adapter.isManaged(path.join(tempDir, '.bashrc'))).toBe(false);
    });

    it('returns false when listing fails', async () => {
      runner.mockResolvedValue(result('', 1, 'boom'));
      expect(await adapter.isManaged(path.join(tempDir, '.bashrc'))).toBe(false);
    });

    it('returns false when chezmoi is missing', async () => {
      runner.mockRejectedValue(new ChezmoiNotFoundError('chezmoi'));
      expect(await adapter.isManaged(path.join(tempDir, '.bashrc'))).toBe(false);
    });
  });

  it('describes command lines for previews', () => {
    expect(adapter.describe(['add', '--template', '~/.bashrc'])).toBe(
      'chezmoi add --template ~/.bashrc'
    );
  });
});
