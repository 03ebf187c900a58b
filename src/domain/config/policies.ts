/**
 * @wirebound/core - Retry & Timeout Configuration
 *
 * Plain, immutable values. The strategies that act on them live in
 * `infrastructure/resilience`.
 */

import { ConfigurationError } from '../exceptions/exceptions';

/**
 * Retry mode.
 */
export type RetryMode = 'standard' | 'disabled';

/**
 * Retry configuration options.
 *
 * @example
 * ```typescript
 * const options: RetryConfigOptions = {
 *   maxAttempts: 5,
 *   initialBackoffMs: 200,
 *   maxBackoffMs: 5000,
 * };
 * ```
 */
export interface RetryConfigOptions {
  /**
   * Maximum number of attempts (including the initial attempt).
   * @defaultValue 3
   */
  maxAttempts?: number;

  /**
   * Base delay of the first retry in milliseconds.
   * @defaultValue 1000
   */
  initialBackoffMs?: number;

  /**
   * Upper bound of any single backoff in milliseconds.
   * @defaultValue 20000
   */
  maxBackoffMs?: number;
}

export class RetryConfig {
  private constructor(
    readonly mode: RetryMode,
    readonly maxAttempts: number,
    readonly initialBackoffMs: number,
    readonly maxBackoffMs: number,
  ) {
    Object.freeze(this);
  }

  static standard(options: RetryConfigOptions = {}): RetryConfig {
    const maxAttempts = options.maxAttempts ?? 3;
    const initialBackoffMs = options.initialBackoffMs ?? 1000;
    const maxBackoffMs = options.maxBackoffMs ?? 20000;

    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new ConfigurationError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
    }
    if (initialBackoffMs < 0 || maxBackoffMs < 0) {
      throw new ConfigurationError('Backoff durations must not be negative');
    }

    return new RetryConfig('standard', maxAttempts, initialBackoffMs, maxBackoffMs);
  }

  static disabled(): RetryConfig {
    return new RetryConfig('disabled', 1, 0, 0);
  }

  withMaxAttempts(maxAttempts: number): RetryConfig {
    return RetryConfig.standard({ ...this.options(), maxAttempts });
  }

  withInitialBackoffMs(initialBackoffMs: number): RetryConfig {
    return RetryConfig.standard({ ...this.options(), initialBackoffMs });
  }

  withMaxBackoffMs(maxBackoffMs: number): RetryConfig {
    return RetryConfig.standard({ ...this.options(), maxBackoffMs });
  }

  hasRetry(): boolean {
    return this.maxAttempts > 1;
  }

  private options(): RetryConfigOptions {
    return {
      maxAttempts: this.maxAttempts,
      initialBackoffMs: this.initialBackoffMs,
      maxBackoffMs: this.maxBackoffMs,
    };
  }
}

/**
 * Timeout configuration options.
 */
export interface TimeoutConfigOptions {
  /** Bound on all attempts plus backoff */
  operationTimeoutMs?: number;

  /** Bound on each single attempt */
  attemptTimeoutMs?: number;
}

export class TimeoutConfig {
  private constructor(
    readonly operationTimeoutMs: number | undefined,
    readonly attemptTimeoutMs: number | undefined,
  ) {
    Object.freeze(this);
  }

  static of(options: TimeoutConfigOptions): TimeoutConfig {
    for (const [name, value] of Object.entries(options)) {
      if (value !== undefined && (typeof value !== 'number' || !(value > 0))) {
        throw new ConfigurationError(`${name} must be a positive number of milliseconds`);
      }
    }
    return new TimeoutConfig(options.operationTimeoutMs, options.attemptTimeoutMs);
  }

  static none(): TimeoutConfig {
    return new TimeoutConfig(undefined, undefined);
  }

  hasTimeouts(): boolean {
    return this.operationTimeoutMs !== undefined || this.attemptTimeoutMs !== undefined;
  }
}
