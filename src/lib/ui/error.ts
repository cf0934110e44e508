/**
 * Error reporting on stderr, in one shape for every screen and subcommand:
 *
 * ```
 * ✗ {title}
 *   {detail}
 *   Hint: {hint}
 * ```
 */

import { dim, error as errorTone } from '../colors.js';
import { isChezmoiCommandError } from '../errors.js';
import { getSuggestionForError } from '../json-output.js';
import { printErr } from './output.js';

export interface ErrorDisplayOptions {
  title: string;
  detail?: string;
  hint?: string;
}

export function printError({ title, detail, hint }: ErrorDisplayOptions): void {
  printErr(errorTone(title));
  detail?.split('\n').forEach((line) => printErr(`  ${line}`));
  if (hint) printErr(`  ${dim(`Hint: ${hint}`)}`);
}

/**
 * What to show for a caught error. chezmoi's stderr becomes the detail
 * unless it only repeats the message; with an explicit title the message
 * moves into the detail as well.
 */
export function errorToDisplay(err: unknown, title?: string): ErrorDisplayOptions {
  const message = err instanceof Error ? err.message : String(err);
  const stderr = isChezmoiCommandError(err) ? err.stderr.trim() : '';
  const extra = stderr !== '' && stderr !== message ? stderr : undefined;
  const hint = getSuggestionForError(err);

  if (title === undefined) {
    return { title: message, detail: extra, hint };
  }
  return { title, detail: extra ? `${message}\n${extra}` : message, hint };
}
