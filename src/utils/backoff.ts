import { setTimeout as delay } from 'node:timers/promises';

/** Waits `ms`, rejecting early if the signal aborts. */
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleeper = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export interface BackoffPolicy {
  multiplier: number;
  /** Upper bound of a single wait, in time units. */
  max: number;
}

export const DEFAULT_BACKOFF: BackoffPolicy = { multiplier: 1, max: 60 };

/**
 * Randomized exponential backoff ("full jitter"): a wait drawn uniformly
 * from [0, min(max, multiplier * 2^(attempt - 1))] time units.
 */
export function randomExponentialBackoff(
  attempt: number,
  policy: BackoffPolicy = DEFAULT_BACKOFF,
  random: () => number = Math.random,
): number {
  const ceiling = Math.min(policy.max, policy.multiplier * 2 ** Math.max(0, attempt - 1));
  return random() * ceiling;
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}
