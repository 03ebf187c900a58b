/**
 * @wirebound/core - Sleep & Time Sources
 */

import type { IAsyncSleep, ITimeSource } from '../../application/ports/runtime';

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error('Aborted');
}

/**
 * Timer-based sleep. Aborting the signal clears the timer and rejects.
 */
export class DefaultSleep implements IAsyncSleep {
  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(abortReason(signal));
        return;
      }

      const onAbort = (): void => {
        clearTimeout(timeout);
        if (signal) reject(abortReason(signal));
      };
      const timeout = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}

/**
 * System clock.
 */
export class SystemTimeSource implements ITimeSource {
  now(): Date {
    return new Date();
  }
}

/**
 * Clock frozen at a fixed instant. Used for reproducible signatures.
 */
export class StaticTimeSource implements ITimeSource {
  constructor(private readonly instant: Date) {}

  now(): Date {
    return new Date(this.instant.getTime());
  }
}
