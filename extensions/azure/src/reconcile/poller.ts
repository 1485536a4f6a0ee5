/**
 * Poller.
 *
 * Refresh-test-sleep loop bounded by a deadline and an optional attempt
 * budget. There is no other cancellation channel.
 */

import { PollTimeoutError } from "../errors.js";
import type { PollOptions } from "./types.js";

/** Floor for the sleep between two refreshes. */
export const MIN_POLL_INTERVAL_MS = 100;

export const DEFAULT_POLL_INTERVAL_MS = 5_000;

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Refresh until `isDone` holds for the returned state.
 *
 * @returns the first state accepted by `isDone`
 * @throws PollTimeoutError carrying the last state seen, once the attempt
 *   budget or the deadline is exhausted
 */
export async function pollUntil<S>(
  refresh: () => Promise<S>,
  isDone: (state: S) => boolean,
  options: PollOptions<S>,
): Promise<S> {
  const now = options.now ?? Date.now;
  const sleep = options.sleep ?? defaultSleep;
  const intervalMs = Math.max(MIN_POLL_INTERVAL_MS, options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS);
  const maxAttempts = options.maxAttempts ?? Number.POSITIVE_INFINITY;
  const startedAt = now();
  const deadline = startedAt + Math.max(0, options.timeoutMs);

  for (let attempt = 1; ; attempt++) {
    const state = await refresh();
    options.onPoll?.(state, attempt);
    if (isDone(state)) return state;

    if (attempt >= maxAttempts || now() >= deadline) {
      throw new PollTimeoutError(state, attempt, now() - startedAt);
    }
    await sleep(intervalMs);
  }
}
