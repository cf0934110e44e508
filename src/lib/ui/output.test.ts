import { describe, it, expect, vi, afterEach, beforeEach } from 'vitest';
import { setJsonMode, isJsonMode, print, printErr, printLines, emitJson } from './output.js';
import { createSuccessResult } from '../json-output.js';

describe('ui/output', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    setJsonMode(false);
    vi.restoreAllMocks();
  });

  it('starts in text mode', () => {
    expect(isJsonMode()).toBe(false);
  });

  it('prints lines and errors in text mode', () => {
    print('Managed Files', '(3)');
    printErr('chezmoi: exit status 1');
    printLines([' M .bashrc', 'A  .zshrc']);

    expect(logSpy.mock.calls).toEqual([['Managed Files', '(3)'], [' M .bashrc'], ['A  .zshrc']]);
    expect(errorSpy.mock.calls).toEqual([['chezmoi: exit status 1']]);
  });

  it('drops everything but the envelope in JSON mode', () => {
    setJsonMode(true);
    print('hidden');
    printErr('hidden');
    printLines(['hidden']);
    const envelope = createSuccessResult('managed', { files: [], count: 0 });
    emitJson(envelope);

    expect(errorSpy).not.toHaveBeenCalled();
    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(logSpy.mock.calls[0][0]))).toEqual(envelope);
  });

  it('resumes text output when JSON mode is turned off', () => {
    setJsonMode(true);
    print('suppressed');
    setJsonMode(false);
    print('visible');
    expect(logSpy.mock.calls).toEqual([['visible']]);
  });
});
