/**
 * Operation outcomes and the per-operation policy that interprets them.
 *
 * Every invocation produces exactly one Outcome. Whether a failed outcome
 * raises is decided here, once, instead of in each adapter method.
 */

import { ChezmoiCommandError } from '../errors.js';
import type { CommandResult } from './types.js';

export type Outcome =
  | { kind: 'ok'; stdout: string }
  | { kind: 'empty' }
  | { kind: 'failed'; error: ChezmoiCommandError; stdout: string };

/**
 * - strict: failure raises ChezmoiCommandError
 * - keep-output: failure returns whatever stdout was produced
 * - discard-output: failure returns ''
 */
export type OutcomePolicy = 'strict' | 'keep-output' | 'discard-output';

export type Operation =
  | 'version'
  | 'add'
  | 'remove'
  | 'diff'
  | 'apply'
  | 'managed'
  | 'status'
  | 'data'
  | 'source-path'
  | 'target-path'
  | 'doctor'
  | 'update'
  | 'init';

export const OPERATION_POLICIES: Record<Operation, OutcomePolicy> = {
  version: 'strict',
  add: 'strict',
  remove: 'strict',
  diff: 'keep-output',
  apply: 'strict',
  managed: 'strict',
  status: 'discard-output',
  data: 'discard-output',
  'source-path': 'strict',
  'target-path': 'strict',
  doctor: 'keep-output',
  update: 'keep-output',
  init: 'strict',
};

export function toOutcome(result: CommandResult, command: string): Outcome {
  if (result.exitCode !== 0) {
    const stderr = result.stderr.trim();
    return {
      kind: 'failed',
      stdout: result.stdout,
      error: new ChezmoiCommandError(
        stderr || `${command} exited with code ${result.exitCode}`,
        { command, exitCode: result.exitCode, stderr: result.stderr }
      ),
    };
  }
  if (result.stdout.trim() === '') {
    return { kind: 'empty' };
  }
  return { kind: 'ok', stdout: result.stdout };
}

/**
 * Reduce an outcome to stdout text under the given policy
 */
export function interpretOutcome(outcome: Outcome, policy: OutcomePolicy): string {
  switch (outcome.kind) {
    case 'ok':
      return outcome.stdout;
    case 'empty':
      return '';
    case 'failed':
      if (policy === 'strict') {
        throw outcome.error;
      }
      return policy === 'keep-output' ? outcome.stdout : '';
  }
}
