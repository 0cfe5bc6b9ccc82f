/**
 * Bounded polling combinator
 *
 * Shared by every wait of a deployment: ACM validation records, certificate
 * issuance, stack convergence and in-flight stack operations.
 */

import { systemClock, throwIfAborted, type Clock } from './clock.js';

/**
 * What a single probe observed
 */
export type PollOutcome<T> = { done: true; value: T } | { done: false; status?: string };

export interface PollOptions {
  /** Delay between probes in milliseconds */
  intervalMs: number;

  /** Give up after this many probes */
  maxAttempts?: number;

  /** Give up once this much wall-clock time has passed */
  timeoutMs?: number;

  clock?: Clock;

  signal?: AbortSignal;

  /** Called after every probe that did not finish */
  onPending?: (status: string | undefined, attempt: number, elapsedMs: number) => void;
}

/**
 * Raised when a poll runs out of attempts or time
 */
export class PollTimeoutError extends Error {
  readonly attempts: number;
  readonly elapsedMs: number;
  readonly lastStatus?: string;

  constructor(attempts: number, elapsedMs: number, lastStatus?: string) {
    super(`Gave up after ${attempts} attempts (${elapsedMs}ms, last status: ${lastStatus ?? 'unknown'})`);
    this.name = 'PollTimeoutError';
    this.attempts = attempts;
    this.elapsedMs = elapsedMs;
    this.lastStatus = lastStatus;
  }
}

export const done = <T>(value: T): PollOutcome<T> => ({ done: true, value });

export const pending = <T>(status?: string): PollOutcome<T> => ({ done: false, status });

/**
 * Run `probe` until it reports done, sleeping `intervalMs` between attempts.
 *
 * At least one of `maxAttempts` / `timeoutMs` must be given. The final sleep is
 * shortened so the poll never overshoots `timeoutMs`.
 *
 * @throws PollTimeoutError when the bound is exhausted
 * @throws UserAbortedError when the signal fires
 */
export async function pollUntil<T>(
  probe: (attempt: number) => Promise<PollOutcome<T>>,
  options: PollOptions
): Promise<T> {
  const { intervalMs, maxAttempts, timeoutMs, clock = systemClock, signal, onPending } = options;

  if (maxAttempts === undefined && timeoutMs === undefined) {
    throw new Error('pollUntil requires maxAttempts or timeoutMs');
  }
  if (intervalMs <= 0) {
    throw new Error('pollUntil requires a positive intervalMs');
  }

  const startedAt = clock.now();
  let attempt = 0;

  while (true) {
    throwIfAborted(signal);
    attempt++;

    const outcome = await probe(attempt);
    if (outcome.done) {
      return outcome.value;
    }

    const elapsedMs = clock.now() - startedAt;
    const outOfAttempts = maxAttempts !== undefined && attempt >= maxAttempts;
    const outOfTime = timeoutMs !== undefined && elapsedMs >= timeoutMs;

    if (outOfAttempts || outOfTime) {
      throw new PollTimeoutError(attempt, elapsedMs, outcome.status);
    }

    onPending?.(outcome.status, attempt, elapsedMs);

    const delay = timeoutMs === undefined ? intervalMs : Math.min(intervalMs, timeoutMs - elapsedMs);
    await clock.sleep(delay, signal);
  }
}
