/**
 * Centralized constants and defaults for chezmoi-manager
 */

import os from 'os';
import path from 'path';

export const APP_NAME = 'Chezmoi Manager';

/**
 * Directory name used under the XDG config/state homes
 */
export const APP_DIR_NAME = 'chezmoi-manager';

/**
 * Default executable name, looked up on PATH
 */
export const DEFAULT_EXECUTABLE = 'chezmoi';

/**
 * Environment variable that overrides the executable path
 */
export const EXECUTABLE_ENV_VAR = 'CZM_CHEZMOI';

/**
 * Timeout for mutating and query operations (add, diff, apply, ...)
 */
export const DEFAULT_COMMAND_TIMEOUT_MS = 30_000;

/**
 * Timeout for version/installation probes
 */
export const DEFAULT_PROBE_TIMEOUT_MS = 5_000;

/**
 * Filename prefix for exported diff patches: <prefix>_<YYYYMMDD_HHMMSS>.patch
 */
export const DEFAULT_PATCH_PREFIX = 'chezmoi_diff';

export const INSTALL_URL = 'https://www.chezmoi.io/install/';

/**
 * Dotfiles offered as quick picks on the add screen
 */
export const COMMON_DOTFILES = [
  '~/.bashrc',
  '~/.zshrc',
  '~/.vimrc',
  '~/.gitconfig',
  '~/.ssh/config',
  '~/.tmux.conf',
  '~/.config/nvim/init.vim',
  '~/.config/fish/config.fish',
];

export const CONFIG_FILE_NAME = 'config.json';

/**
 * Log level names accepted by CZM_LOG_LEVEL and config.logging.level
 */
export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug', 'trace'] as const;
export type LogLevelName = (typeof LOG_LEVELS)[number];

export const LOG_LEVEL_ENV_VAR = 'CZM_LOG_LEVEL';

/**
 * Audit log rotation: rotate above this size, keep this many files
 */
export const MAX_LOG_FILE_SIZE = 1024 * 1024;
export const MAX_LOG_FILES = 3;

/**
 * Maximum displayed length of a template data string value
 */
export const MAX_DATA_VALUE_LENGTH = 50;

/**
 * $XDG_CONFIG_HOME/chezmoi-manager, falling back to ~/.config/chezmoi-manager
 */
export function getConfigDir(): string {
  const base = process.env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
  return path.join(base, APP_DIR_NAME);
}

/**
 * $XDG_STATE_HOME/chezmoi-manager, falling back to ~/.local/state/chezmoi-manager
 */
export function getStateDir(): string {
  const base = process.env.XDG_STATE_HOME || path.join(os.homedir(), '.local', 'state');
  return path.join(base, APP_DIR_NAME);
}
