/**
 * Custom error classes for chezmoi-manager
 *
 * These provide structured error handling with specific error types
 * that can be caught and handled differently based on the error kind.
 */

/**
 * Base error class for all chezmoi-manager errors
 */
export class ChezmoiManagerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ChezmoiManagerError';
    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Error thrown when the chezmoi executable cannot be found
 */
export class ChezmoiNotFoundError extends ChezmoiManagerError {
  public readonly executable: string;

  constructor(executable: string) {
    super(`${executable} is not installed or not in PATH`);
    this.name = 'ChezmoiNotFoundError';
    this.executable = executable;
  }
}

/**
 * Error thrown when a chezmoi command exits non-zero on a strict operation
 */
export class ChezmoiCommandError extends ChezmoiManagerError {
  public readonly command: string;
  public readonly exitCode: number;
  public readonly stderr: string;

  constructor(message: string, options: { command: string; exitCode: number; stderr: string }) {
    super(message);
    this.name = 'ChezmoiCommandError';
    this.command = options.command;
    this.exitCode = options.exitCode;
    this.stderr = options.stderr;
  }
}

/**
 * Error thrown when a chezmoi command exceeds its timeout
 */
export class ChezmoiTimeoutError extends ChezmoiManagerError {
  public readonly command: string;
  public readonly timeoutMs: number;

  constructor(options: { command: string; timeoutMs: number }) {
    super(`Command timed out after ${options.timeoutMs}ms: ${options.command}`);
    this.name = 'ChezmoiTimeoutError';
    this.command = options.command;
    this.timeoutMs = options.timeoutMs;
  }
}

/**
 * Error thrown when user cancels an operation
 */
export class UserCancelledError extends ChezmoiManagerError {
  constructor(message: string = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancelledError';
  }
}

/**
 * Type guard to check if error is a ChezmoiManagerError
 */
export function isChezmoiManagerError(error: unknown): error is ChezmoiManagerError {
  return error instanceof ChezmoiManagerError;
}

export function isChezmoiNotFoundError(error: unknown): error is ChezmoiNotFoundError {
  return error instanceof ChezmoiNotFoundError;
}

export function isChezmoiCommandError(error: unknown): error is ChezmoiCommandError {
  return error instanceof ChezmoiCommandError;
}

export function isChezmoiTimeoutError(error: unknown): error is ChezmoiTimeoutError {
  return error instanceof ChezmoiTimeoutError;
}

export function isUserCancelledError(error: unknown): error is UserCancelledError {
  return error instanceof UserCancelledError;
}

