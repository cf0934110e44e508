import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('./context.js', () => ({
  createAppContext: vi.fn(),
}));

import { sourcePathCommand } from './source-path.js';
import { targetPathCommand } from './target-path.js';
import { createAppContext } from './context.js';
import { createFakeContext, failed, invokedArgs, ok, type Replies } from './test-support.js';

const mockExit = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
vi.spyOn(console, 'error').mockImplementation(() => {});

const SOURCE_DIR = '/home/tester/.local/share/chezmoi';

describe('path commands', () => {
  function setup(replies: Replies) {
    const fake = createFakeContext(replies);
    vi.mocked(createAppContext).mockReturnValue(fake.ctx);
    return fake;
  }

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('source-path prints the source directory without a target', async () => {
    const { runner } = setup({ 'source-path': ok(`${SOURCE_DIR}\n`) });

    await sourcePathCommand.handler({} as never);

    expect(invokedArgs(runner)).toEqual([['source-path']]);
    expect(logSpy).toHaveBeenCalledWith(SOURCE_DIR);
  });

  it('source-path resolves one target', async () => {
    const { runner } = setup({ 'source-path': ok(`${SOURCE_DIR}/dot_bashrc\n`) });

    await sourcePathCommand.handler({ target: '/home/tester/.bashrc' } as never);

    expect(invokedArgs(runner)).toEqual([['source-path', '/home/tester/.bashrc']]);
    expect(logSpy).toHaveBeenCalledWith(`${SOURCE_DIR}/dot_bashrc`);
  });

  it('source-path exits 1 for an unmanaged target', async () => {
    setup({ 'source-path': failed('chezmoi: /home/tester/.nope: not managed') });

    await sourcePathCommand.handler({ target: '/home/tester/.nope' } as never);

    expect(mockExit).toHaveBeenCalledWith(1);
  });

  it('target-path maps a source file back to its destination', async () => {
    const { runner } = setup({ 'target-path': ok('/home/tester/.bashrc\n') });

    await targetPathCommand.handler({ source: `${SOURCE_DIR}/dot_bashrc` } as never);

    expect(invokedArgs(runner)).toEqual([['target-path', `${SOURCE_DIR}/dot_bashrc`]]);
    expect(logSpy).toHaveBeenCalledWith('/home/tester/.bashrc');
  });
});
