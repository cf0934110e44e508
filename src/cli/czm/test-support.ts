/**
 * In-process chezmoi stand-in for command and screen tests
 */

import { vi, type Mock } from 'vitest';
import { ChezmoiAdapter, type CommandResult, type CommandRunner } from '../../lib/chezmoi/index.js';
import { getDefaultConfig } from '../../lib/config.js';
import type { AppContext } from './context.js';

/** Replies keyed by the first chezmoi argument ('diff', 'managed', '--version', ...) */
export type Replies = Record<string, CommandResult | Error>;

export function ok(stdout: string = ''): CommandResult {
  return { stdout, stderr: '', exitCode: 0 };
}

export function failed(stderr: string, exitCode: number = 1): CommandResult {
  return { stdout: '', stderr, exitCode };
}

export interface FakeContext {
  ctx: AppContext;
  runner: Mock<CommandRunner>;
}

export function createFakeContext(
  replies: Replies = {},
  dirs: { destDir?: string; exportDir?: string } = {}
): FakeContext {
  const runner = vi.fn<CommandRunner>(async (_executable, args) => {
    const reply = replies[args[0] ?? ''] ?? ok();
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  });

  const config = getDefaultConfig('/home/tester');
  config.destDir = dirs.destDir ?? config.destDir;
  config.exportDir = dirs.exportDir ?? config.exportDir;

  const adapter = new ChezmoiAdapter(
    {
      executable: config.executable,
      commandTimeoutMs: config.commandTimeoutMs,
      probeTimeoutMs: config.probeTimeoutMs,
      destDir: config.destDir,
    },
    runner
  );

  return { ctx: { config, adapter, configWarnings: [] }, runner };
}

/**
 * Argument lists the runner was called with, in order
 */
export function invokedArgs(runner: Mock<CommandRunner>): string[][] {
  return runner.mock.calls.map((call) => call[1]);
}
