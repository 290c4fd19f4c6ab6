/**
 * Polling combinator behind every bounded wait in the library.
 */

import { WAIT_DEFAULTS } from '../constants';

export type Condition = () => boolean | Promise<boolean>;

export interface PollOptions {
  /** Total time budget; 0 means a single check */
  timeoutMs: number;
  /** Sleep between two checks (default: 100) */
  intervalMs?: number;
  /** Aborting rejects the wait with the signal's reason */
  signal?: AbortSignal;
}

/**
 * Sleep for a specified duration
 */
export async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Evaluates `condition` until it holds or the deadline passes.
 *
 * Resolves to false on timeout. Errors thrown by the condition are not caught.
 * The last sleep is shortened so the wait never runs past its deadline by more
 * than one condition evaluation.
 */
export async function pollUntil(
  condition: Condition,
  options: PollOptions,
): Promise<boolean> {
  const intervalMs = Math.max(1, options.intervalMs ?? WAIT_DEFAULTS.POLL_INTERVAL_MS);
  const deadline = Date.now() + Math.max(0, options.timeoutMs);

  for (;;) {
    options.signal?.throwIfAborted();

    if (await condition()) {
      return true;
    }

    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      return false;
    }

    await sleep(Math.min(intervalMs, remaining));
  }
}

export function secondsToMs(seconds: number): number {
  return Math.max(0, seconds) * 1000;
}
