/**
 * Time source used by every wait in a run
 */

import { UserAbortedError } from '../errors.js';

export interface Clock {
  /** Milliseconds since epoch */
  now(): number;

  /** Resolve after `ms`, reject with UserAbortedError when the signal fires */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

/**
 * Throw UserAbortedError if the run was interrupted
 */
export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new UserAbortedError();
  }
}

export const systemClock: Clock = {
  now: () => Date.now(),

  sleep: (ms, signal) =>
    new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new UserAbortedError());
        return;
      }

      const onAbort = () => {
        clearTimeout(timer);
        reject(new UserAbortedError());
      };

      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);

      signal?.addEventListener('abort', onAbort, { once: true });
    }),
};
