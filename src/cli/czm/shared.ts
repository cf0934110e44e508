/**
 * Helpers shared by the subcommand handlers
 */

import * as path from 'path';
import {
  createErrorResult,
  createErrorResultFromError,
  getErrorSuggestion,
  type ErrorCode,
} from '../../lib/json-output.js';
import { logger } from '../../lib/logger.js';
import { expandHome } from '../../lib/paths.js';
import { emitJson, errorToDisplay, printError } from '../../lib/ui/index.js';

/**
 * Report a caught error as a JSON envelope or on stderr, then exit 1
 */
export function failWithError(command: string, error: unknown, json: boolean = false): void {
  logger.debug(`${command} failed:`, error);
  if (json) {
    emitJson(createErrorResultFromError(command, error));
  } else {
    printError(errorToDisplay(error));
  }
  process.exit(1);
}

/**
 * Report a usage problem detected before chezmoi runs, then exit 1
 */
export function failWithCode(
  command: string,
  code: ErrorCode,
  message: string,
  options: { json?: boolean; detail?: string; details?: Record<string, unknown> } = {}
): void {
  const hint = getErrorSuggestion(code);
  if (options.json) {
    emitJson(createErrorResult(command, code, message, options.details));
  } else {
    printError({ title: message, detail: options.detail, hint });
  }
  process.exit(1);
}

/**
 * Absolute form of a path argument; `~` expands, relative paths resolve
 * against the working directory
 */
export function resolveTarget(target: string): string {
  return path.resolve(expandHome(target.trim()));
}

/**
 * `chezmoi remove` deletes the destination file along with its source state
 */
export function removeConfirmation(targets: readonly string[]): string {
  if (targets.length === 1) {
    return `Remove ${targets[0]} from chezmoi and delete it from disk?`;
  }
  return `Remove ${targets.length} files from chezmoi and delete them from disk?`;
}
