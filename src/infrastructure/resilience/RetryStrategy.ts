/**
 * @wirebound/core - Retry Strategies
 *
 * @module infrastructure/resilience/RetryStrategy
 */

import { DispatchFailure, TimeoutError } from '../../domain/exceptions/exceptions';
import type { RetryConfig } from '../../domain/config/policies';
import type { ClassifiedError, IRetryStrategy, RetryDecision } from './IRetryStrategy';
import { TokenBucket } from './TokenBucket';

/**
 * Standard strategy options.
 */
export interface StandardRetryStrategyOptions {
  /** Shared retry budget; one per client by default */
  tokenBucket?: TokenBucket;

  /**
   * Random source in [0, 1) used for jitter.
   * @defaultValue Math.random
   */
  random?: () => number;
}

/**
 * Exponential backoff with full jitter and a shared retry budget.
 *
 * ```
 * delay(n) = random() × min(maxBackoffMs, initialBackoffMs × 2^(n-1))
 * ```
 *
 * A `retry-after` hint from the service replaces the computed delay,
 * still capped at `maxBackoffMs`.
 *
 * @example
 * ```typescript
 * const strategy = new StandardRetryStrategy({ random: () => 0.5 });
 * const decision = strategy.decide(2, classified, RetryConfig.standard({ initialBackoffMs: 100 }));
 * // { retry: true, delayMs: 100, retryCost: 5 }
 * ```
 */
export class StandardRetryStrategy implements IRetryStrategy {
  readonly name = 'StandardRetryStrategy';
  private readonly tokenBucket: TokenBucket;
  private readonly random: () => number;

  constructor(options: StandardRetryStrategyOptions = {}) {
    this.tokenBucket = options.tokenBucket ?? new TokenBucket();
    this.random = options.random ?? Math.random;
  }

  decide(attempt: number, classified: ClassifiedError, config: RetryConfig): RetryDecision {
    const { classification, error } = classified;

    if (config.mode === 'disabled') {
      return { retry: false, reason: 'Retries are disabled' };
    }
    if (classification.action === 'forbid') {
      return { retry: false, reason: classification.reason };
    }
    if (classification.action === 'none') {
      return { retry: false, reason: 'Error is not retryable' };
    }
    if (attempt >= config.maxAttempts) {
      return { retry: false, reason: `Maximum attempts (${config.maxAttempts}) reached` };
    }

    const isTimeout =
      error instanceof TimeoutError || (error instanceof DispatchFailure && error.kind === 'timeout');
    const retryCost = isTimeout ? this.tokenBucket.timeoutRetryCost : this.tokenBucket.retryCost;
    if (!this.tokenBucket.tryAcquire(retryCost)) {
      return { retry: false, reason: 'Retry quota exceeded' };
    }

    const delayMs =
      classification.retryAfterMs !== undefined
        ? Math.min(classification.retryAfterMs, config.maxBackoffMs)
        : this.backoff(attempt, config);

    return { retry: true, delayMs, retryCost };
  }

  recordSuccess(retryCost: number): void {
    if (retryCost > 0) {
      this.tokenBucket.release(retryCost);
    }
  }

  releaseRetry(retryCost: number): void {
    this.tokenBucket.release(retryCost);
  }

  private backoff(attempt: number, config: RetryConfig): number {
    const exponential = config.initialBackoffMs * Math.pow(2, attempt - 1);
    return Math.floor(this.random() * Math.min(config.maxBackoffMs, exponential));
  }
}

/**
 * Never retries.
 */
export class NeverRetryStrategy implements IRetryStrategy {
  readonly name = 'NeverRetryStrategy';

  decide(): RetryDecision {
    return { retry: false, reason: 'Retries are disabled' };
  }
}
