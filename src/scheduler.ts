/**
 * Timed waits and the periodic cycle scheduler.
 */

import { setTimeout as delay } from 'node:timers/promises';

/**
 * Abortable timed wait. Rejects with the signal's reason when aborted.
 */
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleeper = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * Check whether an error came from aborting a signal.
 */
export function isAbortError(error: unknown, signal?: AbortSignal): boolean {
  if (signal?.aborted && error === signal.reason) {
    return true;
  }
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Runs a task, waits a fixed interval, and repeats until cancelled.
 *
 * @example
 * ```typescript
 * const controller = new AbortController();
 * const scheduler = new PeriodicScheduler(60000);
 * await scheduler.run(() => loop.runCycle(controller.signal), controller.signal);
 * ```
 */
export class PeriodicScheduler {
  constructor(
    readonly intervalMs: number,
    private readonly sleeper: Sleeper = sleep
  ) {}

  /**
   * Resolves once the signal aborts. Errors from the task propagate.
   */
  async run(task: () => Promise<void>, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await task();
      if (signal.aborted) {
        break;
      }

      try {
        await this.sleeper(this.intervalMs, signal);
      } catch (error) {
        if (isAbortError(error, signal)) {
          break;
        }
        throw error;
      }
    }
  }
}
