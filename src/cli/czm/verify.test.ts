import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('./context.js', () => ({
  createAppContext: vi.fn(),
}));

import { verifyCommand } from './verify.js';
import { createAppContext } from './context.js';
import { setColorEnabled } from '../../lib/colors.js';
import { createFakeContext, failed, ok } from './test-support.js';

const mockExit = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

describe('verifyCommand', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    setColorEnabled(false);
  });

  it('exits 0 when in sync', async () => {
    vi.mocked(createAppContext).mockReturnValue(createFakeContext({ verify: ok('') }).ctx);

    await verifyCommand.handler({} as never);

    expect(logSpy).toHaveBeenCalledWith('[OK] Destination matches the target state');
    expect(mockExit).not.toHaveBeenCalled();
  });

  it('exits 1 and shows chezmoi output when out of sync', async () => {
    vi.mocked(createAppContext).mockReturnValue(
      createFakeContext({ verify: failed('chezmoi: .bashrc: differs\n') }).ctx
    );

    await verifyCommand.handler({} as never);

    expect(logSpy).toHaveBeenCalledWith('[WARN] Destination differs from the target state');
    expect(logSpy).toHaveBeenCalledWith('chezmoi: .bashrc: differs');
    expect(mockExit).toHaveBeenCalledWith(1);
  });
});
