import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  CONFIG_FILE_NAME,
  COMMON_DOTFILES,
  DEFAULT_COMMAND_TIMEOUT_MS,
  DEFAULT_EXECUTABLE,
  DEFAULT_PATCH_PREFIX,
  DEFAULT_PROBE_TIMEOUT_MS,
  EXECUTABLE_ENV_VAR,
  getConfigDir,
  type LogLevelName,
} from './constants.js';
import { validateConfig, type ValidationError } from './config-validation.js';
import { expandHome } from './paths.js';

/**
 * Configuration for chezmoi-manager
 */
export interface ManagerConfig {
  /**
   * chezmoi executable name or path (default: "chezmoi")
   */
  executable?: string;

  /**
   * Timeout for add/remove/diff/apply/... invocations
   */
  commandTimeoutMs?: number;

  /**
   * Timeout for version/installation checks
   */
  probeTimeoutMs?: number;

  /**
   * chezmoi destination directory; relative managed paths resolve against it.
   * Default: home directory
   */
  destDir?: string;

  /**
   * Where exported diff patches are written. Default: home directory
   */
  exportDir?: string;

  /**
   * Exported patch filename prefix
   */
  patchPrefix?: string;

  /**
   * Quick picks on the add screen
   */
  commonDotfiles?: string[];

  logging?: {
    level?: LogLevelName;
  };
}

export interface ResolvedConfig {
  executable: string;
  commandTimeoutMs: number;
  probeTimeoutMs: number;
  destDir: string;
  exportDir: string;
  patchPrefix: string;
  commonDotfiles: string[];
  logging: {
    level?: LogLevelName;
  };
}

export interface LoadedConfig {
  config: ResolvedConfig;
  /** Config file that was read, or null when none exists */
  source: string | null;
  /** Problems found while reading; the defaults apply to the affected fields */
  warnings: ValidationError[];
}

/**
 * Get default configuration values
 */
export function getDefaultConfig(homeDir: string = os.homedir()): ResolvedConfig {
  return {
    executable: DEFAULT_EXECUTABLE,
    commandTimeoutMs: DEFAULT_COMMAND_TIMEOUT_MS,
    probeTimeoutMs: DEFAULT_PROBE_TIMEOUT_MS,
    destDir: homeDir,
    exportDir: homeDir,
    patchPrefix: DEFAULT_PATCH_PREFIX,
    commonDotfiles: [...COMMON_DOTFILES],
    logging: {},
  };
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), CONFIG_FILE_NAME);
}

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
}

/**
 * Load configuration from the config file and environment.
 * Merges with defaults; file values take precedence, then the env override
 * for the executable.
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const homeDir = options.homeDir ?? os.homedir();
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? getConfigPath();
  const defaults = getDefaultConfig(homeDir);
  const warnings: ValidationError[] = [];

  let fileConfig: ManagerConfig = {};
  let source: string | null = null;

  if (fs.existsSync(configPath)) {
    source = configPath;
    try {
      const raw: unknown = JSON.parse(fs.readFileSync(configPath, 'utf8'));
      const result = validateConfig(raw);
      fileConfig = result.config;
      warnings.push(...result.errors);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      warnings.push({ path: '', message: `Failed to parse ${configPath}: ${message}` });
    }
  }

  const merged: ResolvedConfig = {
    ...defaults,
    ...fileConfig,
    logging: { ...defaults.logging, ...fileConfig.logging },
  };

  const envExecutable = env[EXECUTABLE_ENV_VAR];
  if (envExecutable && envExecutable.trim()) {
    merged.executable = envExecutable.trim();
  }

  merged.destDir = path.resolve(expandHome(merged.destDir, homeDir));
  merged.exportDir = path.resolve(expandHome(merged.exportDir, homeDir));

  return { config: merged, source, warnings };
}
