/**
 * Tests for config validation module
 */

import { describe, it, expect } from 'vitest';
import { validateConfig, formatValidationErrors } from './config-validation.js';

describe('validateConfig', () => {
  it('accepts an empty config', () => {
    const result = validateConfig({});
    expect(result.config).toEqual({});
    expect(result.errors).toHaveLength(0);
  });

  it('copies every valid field', () => {
    const result = validateConfig({
      $schema: './schema.json',
      executable: '/usr/local/bin/chezmoi',
      commandTimeoutMs: 60000,
      probeTimeoutMs: 2000,
      destDir: '~/dest',
      exportDir: '~/patches',
      patchPrefix: 'dots',
      commonDotfiles: ['~/.profile'],
      logging: { level: 'debug' },
    });

    expect(result.errors).toEqual([]);
    expect(result.config).toEqual({
      executable: '/usr/local/bin/chezmoi',
      commandTimeoutMs: 60000,
      probeTimeoutMs: 2000,
      destDir: '~/dest',
      exportDir: '~/patches',
      patchPrefix: 'dots',
      commonDotfiles: ['~/.profile'],
      logging: { level: 'debug' },
    });
  });

  it('rejects non-object configs', () => {
    expect(validateConfig('nope').errors).toEqual([
      { path: '', message: 'Config must be a JSON object' },
    ]);
    expect(validateConfig(null).errors).toHaveLength(1);
    expect(validateConfig([1, 2]).errors).toHaveLength(1);
  });

  it('reports unknown keys', () => {
    const result = validateConfig({ colour: 'blue' });
    expect(result.errors).toEqual([{ path: 'colour', message: 'Unknown config key' }]);
  });

  it('drops invalid timeouts', () => {
    const result = validateConfig({ commandTimeoutMs: -5, probeTimeoutMs: 1.5 });
    expect(result.config).toEqual({});
    expect(result.errors.map((e) => e.path)).toEqual(['commandTimeoutMs', 'probeTimeoutMs']);
  });

  it('rejects patch prefixes containing path separators', () => {
    const result = validateConfig({ patchPrefix: '../escape' });
    expect(result.config.patchPrefix).toBeUndefined();
    expect(result.errors[0].path).toBe('patchPrefix');
  });

  it('rejects common dotfile lists with non-strings', () => {
    const result = validateConfig({ commonDotfiles: ['~/.zshrc', 42] });
    expect(result.config.commonDotfiles).toBeUndefined();
    expect(result.errors[0].path).toBe('commonDotfiles');
  });

  it('rejects unknown log levels', () => {
    const result = validateConfig({ logging: { level: 'loud' } });
    expect(result.config.logging).toBeUndefined();
    expect(result.errors).toEqual([
      {
        path: 'logging.level',
        message: 'Must be one of: silent, error, warn, info, debug, trace',
      },
    ]);
  });

  it('keeps valid fields next to invalid ones', () => {
    const result = validateConfig({ executable: '', patchPrefix: 'ok' });
    expect(result.config).toEqual({ patchPrefix: 'ok' });
    expect(result.errors).toEqual([{ path: 'executable', message: 'Must be a non-empty string' }]);
  });
});

describe('formatValidationErrors', () => {
  it('prefixes messages with their path', () => {
    expect(
      formatValidationErrors([
        { path: '', message: 'Config must be a JSON object' },
        { path: 'executable', message: 'Must be a non-empty string' },
      ])
    ).toEqual(['Config must be a JSON object', 'executable: Must be a non-empty string']);
  });
});
