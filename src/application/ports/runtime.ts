/**
 * @wirebound/core - Time & Sleep Ports
 *
 * Injected so tests can control time without real timers.
 */

/**
 * Asynchronous sleep used for retry backoff.
 */
export interface IAsyncSleep {
  /**
   * Resolve after `ms`. Rejects when `signal` aborts first.
   */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

/**
 * Wall-clock source used for signing and deadlines.
 */
export interface ITimeSource {
  now(): Date;
}
