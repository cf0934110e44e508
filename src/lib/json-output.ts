/**
 * JSON output for scripted use (`--json`)
 *
 * Every subcommand that supports `--json` prints exactly one envelope
 * built here, on success and on failure.
 */

import { getHintForStderr } from './error-hints.js';
import {
  isChezmoiCommandError,
  isChezmoiNotFoundError,
  isChezmoiTimeoutError,
  isUserCancelledError,
} from './errors.js';

/**
 * Standard error codes for programmatic handling
 */
export enum ErrorCode {
  CHEZMOI_NOT_FOUND = 'CHEZMOI_NOT_FOUND',
  COMMAND_FAILED = 'COMMAND_FAILED',
  TIMEOUT = 'TIMEOUT',
  USER_CANCELLED = 'USER_CANCELLED',
  PATH_NOT_FOUND = 'PATH_NOT_FOUND',
  ALREADY_MANAGED = 'ALREADY_MANAGED',
  EXPORT_FAILED = 'EXPORT_FAILED',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

export interface ErrorInfo {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * JSON envelope printed by every `--json` subcommand
 */
export interface JsonEnvelope<T = Record<string, unknown>> {
  success: boolean;
  command: string;
  timestamp: string;
  data?: T;
  error?: ErrorInfo;
  /** Problems that did not prevent success */
  warnings?: string[];
}

// ============================================================================
// Per-command payloads
// ============================================================================

export interface ManagedResultData {
  files: string[];
  count: number;
}

export interface DiffResultData {
  target: string | null;
  files: string[];
  additions: number;
  deletions: number;
  net: number;
  /** Raw diff text, omitted with --stats */
  diff?: string;
  exportedTo?: string;
}

export interface DataResultData {
  data: Record<string, unknown>;
}

// ============================================================================
// Factory functions
// ============================================================================

export function createSuccessResult<T>(
  command: string,
  data: T,
  warnings?: string[]
): JsonEnvelope<T> {
  return {
    success: true,
    command,
    timestamp: new Date().toISOString(),
    data,
    warnings: warnings?.length ? warnings : undefined,
  };
}

export function createErrorResult(
  command: string,
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): JsonEnvelope<never> {
  return {
    success: false,
    command,
    timestamp: new Date().toISOString(),
    error: {
      code,
      message,
      details,
    },
  };
}

/**
 * Envelope for a caught error, with code and details derived from it
 */
export function createErrorResultFromError(command: string, error: unknown): JsonEnvelope<never> {
  const message = error instanceof Error ? error.message : String(error);
  let details: Record<string, unknown> | undefined;
  if (isChezmoiCommandError(error)) {
    details = { command: error.command, exitCode: error.exitCode, stderr: error.stderr };
  } else if (isChezmoiTimeoutError(error)) {
    details = { command: error.command, timeoutMs: error.timeoutMs };
  } else if (isChezmoiNotFoundError(error)) {
    details = { executable: error.executable };
  }
  return createErrorResult(command, getErrorCodeFromError(error), message, details);
}

export function formatJsonResult<T>(result: JsonEnvelope<T>): string {
  return JSON.stringify(result, null, 2);
}

/**
 * Map an error to its ErrorCode
 */
export function getErrorCodeFromError(error: unknown): ErrorCode {
  if (isChezmoiNotFoundError(error)) return ErrorCode.CHEZMOI_NOT_FOUND;
  if (isChezmoiTimeoutError(error)) return ErrorCode.TIMEOUT;
  if (isChezmoiCommandError(error)) return ErrorCode.COMMAND_FAILED;
  if (isUserCancelledError(error)) return ErrorCode.USER_CANCELLED;
  return ErrorCode.UNKNOWN_ERROR;
}

const SUGGESTIONS: Partial<Record<ErrorCode, string>> = {
  [ErrorCode.CHEZMOI_NOT_FOUND]:
    'Install chezmoi (https://www.chezmoi.io/install/) or set CZM_CHEZMOI to its path.',
  [ErrorCode.TIMEOUT]: 'Increase commandTimeoutMs in the config file, or retry.',
  [ErrorCode.PATH_NOT_FOUND]: 'Check that the path is correct.',
  [ErrorCode.ALREADY_MANAGED]: 'Use `chezmoi edit <file>` to change a managed file.',
  [ErrorCode.EXPORT_FAILED]: 'Check that exportDir exists and is writable.',
};

/**
 * Generic suggestion for an error code
 */
export function getErrorSuggestion(code: ErrorCode): string | undefined {
  return SUGGESTIONS[code];
}

/**
 * Best suggestion for a specific error: a stderr-based hint for command
 * failures, otherwise the generic one for its code
 */
export function getSuggestionForError(error: unknown): string | undefined {
  if (isChezmoiCommandError(error)) {
    const hint = getHintForStderr(`${error.stderr}\n${error.message}`);
    if (hint) return hint;
  }
  return getErrorSuggestion(getErrorCodeFromError(error));
}
