import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('./context.js', () => ({
  createAppContext: vi.fn(),
}));

vi.mock('../../lib/prompts.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../lib/prompts.js')>()),
  promptConfirm: vi.fn(),
}));

import { removeCommand } from './remove.js';
import { createAppContext } from './context.js';
import { promptConfirm } from '../../lib/prompts.js';
import { setColorEnabled } from '../../lib/colors.js';
import { createFakeContext, failed, invokedArgs, ok, type Replies } from './test-support.js';

const mockExit = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

describe('removeCommand', () => {
  function setup(replies: Replies) {
    const fake = createFakeContext(replies);
    vi.mocked(createAppContext).mockReturnValue(fake.ctx);
    return fake;
  }

  beforeEach(() => {
    vi.clearAllMocks();
    setColorEnabled(false);
  });

  it('removes after confirmation', async () => {
    const { runner } = setup({ remove: ok('') });
    vi.mocked(promptConfirm).mockResolvedValue(true);

    await removeCommand.handler({ paths: ['/home/tester/.vimrc'] } as never);

    expect(promptConfirm).toHaveBeenCalledWith(
      'Remove /home/tester/.vimrc from chezmoi and delete it from disk?'
    );
    expect(invokedArgs(runner)).toEqual([['remove', '--force', '/home/tester/.vimrc']]);
    expect(logSpy).toHaveBeenCalledWith('[OK] File removed successfully!');
  });

  it('shows the command before asking', async () => {
    setup({});
    vi.mocked(promptConfirm).mockResolvedValue(false);

    await removeCommand.handler({ paths: ['/home/tester/.vimrc'] } as never);

    expect(logSpy).toHaveBeenCalledWith('chezmoi remove --force /home/tester/.vimrc');
  });

  it('does nothing when the prompt is declined', async () => {
    const { runner } = setup({});
    vi.mocked(promptConfirm).mockResolvedValue(false);

    await removeCommand.handler({ paths: ['/home/tester/.vimrc'] } as never);

    expect(runner).not.toHaveBeenCalled();
    expect(logSpy).toHaveBeenCalledWith('Nothing removed.');
  });

  it('warns that several files are deleted from disk', async () => {
    setup({});
    vi.mocked(promptConfirm).mockResolvedValue(false);

    await removeCommand.handler({
      paths: ['/home/tester/.vimrc', '/home/tester/.tmux.conf'],
    } as never);

    expect(promptConfirm).toHaveBeenCalledWith(
      'Remove 2 files from chezmoi and delete them from disk?'
    );
  });

  it('skips the prompt with --yes and removes every path', async () => {
    const { runner } = setup({ remove: ok('') });

    await removeCommand.handler({
      paths: ['/home/tester/.vimrc', '/home/tester/.tmux.conf'],
      yes: true,
    } as never);

    expect(promptConfirm).not.toHaveBeenCalled();
    expect(invokedArgs(runner)).toEqual([
      ['remove', '--force', '/home/tester/.vimrc', '/home/tester/.tmux.conf'],
    ]);
    expect(logSpy).toHaveBeenCalledWith('[OK] Removed 2 files');
  });

  it('reports a file that is not managed', async () => {
    setup({ remove: failed('chezmoi: /home/tester/.vimrc: not managed\n') });

    await removeCommand.handler({ paths: ['/home/tester/.vimrc'], yes: true } as never);

    expect(errorSpy).toHaveBeenCalledWith('[ERROR] chezmoi: /home/tester/.vimrc: not managed');
    expect(errorSpy).toHaveBeenCalledWith('  Hint: Add the file first with `czm add <file>`.');
    expect(mockExit).toHaveBeenCalledWith(1);
  });
});
