import { spawn } from 'child_process';
import { ChezmoiNotFoundError, ChezmoiTimeoutError } from '../errors.js';
import type { CommandResult, CommandRunner, RunOptions } from './types.js';

function isMissingExecutable(error: Error): boolean {
  return 'code' in error && error.code === 'ENOENT';
}

/**
 * Spawn the executable without a shell and capture its output as UTF-8.
 *
 * The child is killed when the timeout expires and the call rejects with
 * ChezmoiTimeoutError. A missing executable rejects with
 * ChezmoiNotFoundError.
 */
export const runCommand: CommandRunner = (
  executable: string,
  args: string[],
  options: RunOptions
): Promise<CommandResult> =>
  new Promise((resolve, reject) => {
    const command = [executable, ...args].join(' ');
    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let settled = false;

    const child = spawn(executable, args, {
      cwd: options.cwd,
      shell: false,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill('SIGKILL');
    }, options.timeoutMs);

    child.stdout?.setEncoding('utf8');
    child.stderr?.setEncoding('utf8');

    child.stdout?.on('data', (chunk: string) => {
      stdout += chunk;
    });

    child.stderr?.on('data', (chunk: string) => {
      stderr += chunk;
    });

    child.on('error', (error) => {
      clearTimeout(timer);
      if (settled) return;
      settled = true;
      if (isMissingExecutable(error)) {
        reject(new ChezmoiNotFoundError(executable));
      } else {
        reject(error);
      }
    });

    child.on('close', (code) => {
      clearTimeout(timer);
      if (settled) return;
      settled = true;
      if (timedOut) {
        reject(new ChezmoiTimeoutError({ command, timeoutMs: options.timeoutMs }));
        return;
      }
      resolve({ stdout, stderr, exitCode: code ?? 1 });
    });
  });
