import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../lib/prompts.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../lib/prompts.js')>()),
  promptChoice: vi.fn(),
  pressEnterToContinue: vi.fn(),
}));

import { showMainMenu, showWelcome } from './interactive-menu.js';
import { promptChoice } from '../../lib/prompts.js';
import { setColorEnabled } from '../../lib/colors.js';
import { ChezmoiNotFoundError, UserCancelledError } from '../../lib/errors.js';
import { createFakeContext, failed, invokedArgs, ok, type Replies } from './test-support.js';

const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
vi.spyOn(console, 'error').mockImplementation(() => {});

const INSTALLED: Replies = {
  '--version': ok('chezmoi version v2.52.1\n'),
  managed: ok('.bashrc\n.zshrc\n'),
  'source-path': ok('/home/tester/.local/share/chezmoi\n'),
};

function choose(...answers: string[]): void {
  for (const answer of answers) {
    vi.mocked(promptChoice).mockResolvedValueOnce(answer);
  }
}

describe('interactive menu', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    setColorEnabled(false);
  });

  describe('showWelcome', () => {
    it('shows the version and quick status', async () => {
      const { ctx } = createFakeContext(INSTALLED);

      expect(await showWelcome(ctx)).toBe(true);
      expect(logSpy).toHaveBeenCalledWith('  chezmoi version v2.52.1');
      expect(logSpy).toHaveBeenCalledWith('  Managed files: 2');
      expect(logSpy).toHaveBeenCalledWith('  Source: /home/tester/.local/share/chezmoi');
    });

    it('shows the install hint when chezmoi is missing', async () => {
      const { ctx } = createFakeContext({ '--version': new ChezmoiNotFoundError('chezmoi') });

      expect(await showWelcome(ctx)).toBe(false);
      expect(logSpy).toHaveBeenCalledWith('[ERROR] chezmoi is not installed or not in PATH');
      expect(logSpy).toHaveBeenCalledWith('  Install it from https://www.chezmoi.io/install/');
    });

    it('suggests init when there is no source directory', async () => {
      const { ctx } = createFakeContext({
        ...INSTALLED,
        'source-path': failed('chezmoi: source directory does not exist'),
      });

      expect(await showWelcome(ctx)).toBe(true);
      expect(logSpy).toHaveBeenCalledWith(
        '  Quick status unavailable; run `chezmoi init` to set up a source directory.'
      );
    });
  });

  describe('showMainMenu', () => {
    it('does not show the menu without chezmoi', async () => {
      const { ctx } = createFakeContext({ '--version': new ChezmoiNotFoundError('chezmoi') });

      await showMainMenu(ctx);

      expect(promptChoice).not.toHaveBeenCalled();
    });

    it('runs the chosen screen and returns to the menu', async () => {
      const { ctx, runner } = createFakeContext({ ...INSTALLED, status: ok(' M .bashrc\n') });
      choose('status', 'exit');

      await showMainMenu(ctx);

      expect(promptChoice).toHaveBeenCalledTimes(2);
      expect(invokedArgs(runner)).toContainEqual(['status']);
      expect(logSpy).toHaveBeenCalledWith(' M .bashrc');
    });

    it('returns to the menu when a screen is cancelled', async () => {
      const { ctx } = createFakeContext(INSTALLED);
      choose('add');
      vi.mocked(promptChoice).mockRejectedValueOnce(new UserCancelledError());
      choose('exit');

      await showMainMenu(ctx);

      expect(promptChoice).toHaveBeenCalledTimes(3);
    });

    it('exits when the main prompt is cancelled', async () => {
      const { ctx } = createFakeContext(INSTALLED);
      vi.mocked(promptChoice).mockRejectedValueOnce(new UserCancelledError());

      await expect(showMainMenu(ctx)).resolves.toBeUndefined();
      expect(promptChoice).toHaveBeenCalledTimes(1);
    });
  });
});
