/**
 * Config Validation Module
 *
 * Validates the config file contents field by field. Valid fields are
 * copied into a typed config; invalid ones are reported and left out so
 * the defaults apply.
 */

import { LOG_LEVELS, type LogLevelName } from './constants.js';
import type { ManagerConfig } from './config.js';

/**
 * Validation error with path and message
 */
export interface ValidationError {
  path: string;
  message: string;
}

export interface ValidationResult {
  config: ManagerConfig;
  errors: ValidationError[];
}

const KNOWN_TOP_LEVEL_KEYS = [
  '$schema',
  'executable',
  'commandTimeoutMs',
  'probeTimeoutMs',
  'destDir',
  'exportDir',
  'patchPrefix',
  'commonDotfiles',
  'logging',
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isLogLevelName(value: unknown): value is LogLevelName {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

/**
 * Patch prefixes end up in a filename, so path separators are rejected
 */
function isSafePrefix(value: string): boolean {
  return !/[\\/]/.test(value);
}

/**
 * Validate parsed config file contents
 */
export function validateConfig(raw: unknown): ValidationResult {
  const errors: ValidationError[] = [];
  const config: ManagerConfig = {};

  if (!isRecord(raw)) {
    return {
      config,
      errors: [{ path: '', message: 'Config must be a JSON object' }],
    };
  }

  for (const key of Object.keys(raw)) {
    if (!KNOWN_TOP_LEVEL_KEYS.includes(key)) {
      errors.push({ path: key, message: 'Unknown config key' });
    }
  }

  if (raw.executable !== undefined) {
    if (isNonEmptyString(raw.executable)) {
      config.executable = raw.executable;
    } else {
      errors.push({ path: 'executable', message: 'Must be a non-empty string' });
    }
  }

  for (const key of ['commandTimeoutMs', 'probeTimeoutMs'] as const) {
    const value = raw[key];
    if (value === undefined) continue;
    if (isPositiveInteger(value)) {
      config[key] = value;
    } else {
      errors.push({ path: key, message: 'Must be a positive integer (milliseconds)' });
    }
  }

  for (const key of ['destDir', 'exportDir'] as const) {
    const value = raw[key];
    if (value === undefined) continue;
    if (isNonEmptyString(value)) {
      config[key] = value;
    } else {
      errors.push({ path: key, message: 'Must be a non-empty path' });
    }
  }

  if (raw.patchPrefix !== undefined) {
    if (isNonEmptyString(raw.patchPrefix) && isSafePrefix(raw.patchPrefix)) {
      config.patchPrefix = raw.patchPrefix;
    } else {
      errors.push({
        path: 'patchPrefix',
        message: 'Must be a non-empty string without path separators',
      });
    }
  }

  if (raw.commonDotfiles !== undefined) {
    const list = raw.commonDotfiles;
    if (Array.isArray(list) && list.every(isNonEmptyString)) {
      config.commonDotfiles = [...list];
    } else {
      errors.push({ path: 'commonDotfiles', message: 'Must be an array of paths' });
    }
  }

  if (raw.logging !== undefined) {
    if (!isRecord(raw.logging)) {
      errors.push({ path: 'logging', message: 'Must be an object' });
    } else if (raw.logging.level !== undefined) {
      if (isLogLevelName(raw.logging.level)) {
        config.logging = { level: raw.logging.level };
      } else {
        errors.push({
          path: 'logging.level',
          message: `Must be one of: ${LOG_LEVELS.join(', ')}`,
        });
      }
    }
  }

  return { config, errors };
}

/**
 * One line per error, "path: message" (or just the message for the root)
 */
export function formatValidationErrors(errors: ValidationError[]): string[] {
  return errors.map((e) => (e.path ? `${e.path}: ${e.message}` : e.message));
}
