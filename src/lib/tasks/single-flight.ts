/**
 * A slot that runs one task at a time per owner.
 *
 * Starting a new task supersedes the previous one: its result is still
 * awaited but reported as stale, so callers only apply the latest.
 */

import { logger } from '../logger.js';

export type FlightResult<T> = { stale: false; value: T } | { stale: true };

export class SingleFlight {
  private generation = 0;

  async run<T>(task: () => Promise<T>): Promise<FlightResult<T>> {
    const ticket = ++this.generation;
    try {
      const value = await task();
      return ticket === this.generation ? { stale: false, value } : { stale: true };
    } catch (error) {
      if (ticket !== this.generation) {
        logger.debug('Superseded task failed:', error);
        return { stale: true };
      }
      throw error;
    }
  }

  /**
   * Mark every running task stale without starting a new one
   */
  invalidate(): void {
    this.generation++;
  }
}
