/**
 * Where human-readable and machine-readable output go.
 *
 * `--json` flips the process into JSON mode: everything printed through
 * here is dropped, and the single envelope from emitJson() is the only
 * thing on stdout.
 */

import { formatJsonResult, type JsonEnvelope } from '../json-output.js';

let jsonMode = false;

export function setJsonMode(enabled: boolean): void {
  jsonMode = enabled;
}

export function isJsonMode(): boolean {
  return jsonMode;
}

export function print(...args: unknown[]): void {
  if (jsonMode) return;
  console.log(...args);
}

/** stderr counterpart of print() */
export function printErr(...args: unknown[]): void {
  if (jsonMode) return;
  console.error(...args);
}

export function printLines(lines: readonly string[]): void {
  lines.forEach((line) => print(line));
}

/**
 * Write a JSON envelope to stdout. Not gated by JSON mode.
 */
export function emitJson<T>(envelope: JsonEnvelope<T>): void {
  console.log(formatJsonResult(envelope));
}
