/**
 * Shared pieces of the interactive screens
 */

import { isUserCancelledError } from '../../../lib/errors.js';
import { logger } from '../../../lib/logger.js';
import { errorToDisplay, printError, printHeader } from '../../../lib/ui/index.js';
import type { AppContext } from '../context.js';

/**
 * Result from an interactive flow
 */
export interface FlowResult {
  /** Whether the flow completed (vs cancelled) */
  completed: boolean;
  /** Whether to return to main menu */
  returnToMenu: boolean;
}

export const CANCELLED: FlowResult = { completed: false, returnToMenu: true };

export const COMPLETED_RETURN: FlowResult = { completed: true, returnToMenu: true };

export type ScreenContext = Pick<AppContext, 'adapter' | 'config'>;

export type Screen = (ctx: ScreenContext) => Promise<FlowResult>;

/**
 * Run a screen body under a header. Cancellation returns to the menu;
 * other errors are shown and the flow counts as completed.
 */
export async function runFlow(title: string, body: () => Promise<FlowResult>): Promise<FlowResult> {
  printHeader(title);
  try {
    return await body();
  } catch (error) {
    if (isUserCancelledError(error)) {
      return CANCELLED;
    }
    logger.debug(`${title} failed:`, error);
    printError(errorToDisplay(error));
    return COMPLETED_RETURN;
  }
}
