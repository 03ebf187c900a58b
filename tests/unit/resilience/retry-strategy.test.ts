/**
 * @fileoverview Unit tests for the standard retry strategy and its token
 * bucket
 */

import {
  DispatchFailure,
  NeverRetryStrategy,
  RetryConfig,
  ServiceError,
  StandardRetryStrategy,
  TimeoutError,
  TokenBucket,
} from '../../../src';
import type { ClassifiedError, RetryClassification, SdkError } from '../../../src';

const serverError: RetryClassification = { action: 'retry', kind: 'server' };

function classified(
  classification: RetryClassification = serverError,
  error: SdkError = new ServiceError({ code: 'InternalFailure' }),
): ClassifiedError {
  return { error, classification };
}

describe('StandardRetryStrategy', () => {
  const config = RetryConfig.standard({ initialBackoffMs: 100, maxBackoffMs: 1000 });

  // ============================================================================
  // TEST GROUP 1: Decisions
  // ============================================================================

  describe('Decisions', () => {
    it('should retry retryable errors until max attempts', () => {
      const strategy = new StandardRetryStrategy({ random: () => 0.5 });

      expect(strategy.decide(1, classified(), config)).toEqual({ retry: true, delayMs: 50, retryCost: 5 });
      expect(strategy.decide(2, classified(), config)).toEqual({ retry: true, delayMs: 100, retryCost: 5 });
      expect(strategy.decide(3, classified(), config)).toEqual({
        retry: false,
        reason: 'Maximum attempts (3) reached',
      });
    });

    it('should not retry unclassified errors', () => {
      const strategy = new StandardRetryStrategy();

      expect(strategy.decide(1, classified({ action: 'none' }), config)).toEqual({
        retry: false,
        reason: 'Error is not retryable',
      });
    });

    it('should honor a classifier forbidding the retry', () => {
      const strategy = new StandardRetryStrategy();

      expect(
        strategy.decide(1, classified({ action: 'forbid', reason: 'Dispatch was cancelled by the caller' }), config),
      ).toEqual({ retry: false, reason: 'Dispatch was cancelled by the caller' });
    });

    it('should not retry when retries are disabled', () => {
      expect(new StandardRetryStrategy().decide(1, classified(), RetryConfig.disabled())).toEqual({
        retry: false,
        reason: 'Retries are disabled',
      });
      expect(new NeverRetryStrategy().decide()).toEqual({ retry: false, reason: 'Retries are disabled' });
    });
  });

  // ============================================================================
  // TEST GROUP 2: Backoff
  // ============================================================================

  describe('Backoff', () => {
    it('should cap exponential backoff at the maximum', () => {
      const strategy = new StandardRetryStrategy({ random: () => 0.999 });
      const many = config.withMaxAttempts(10);

      expect(strategy.decide(5, classified(), many)).toEqual({ retry: true, delayMs: 999, retryCost: 5 });
    });

    it('should use the server hint in place of the computed delay', () => {
      const strategy = new StandardRetryStrategy({ random: () => 0.5 });
      const throttled = classified({ action: 'retry', kind: 'throttling', retryAfterMs: 200 });

      expect(strategy.decide(1, throttled, config)).toEqual({ retry: true, delayMs: 200, retryCost: 5 });
    });

    it('should cap the server hint at the maximum backoff', () => {
      const strategy = new StandardRetryStrategy({ random: () => 0.5 });
      const throttled = classified({ action: 'retry', kind: 'throttling', retryAfterMs: 60_000 });

      expect(strategy.decide(1, throttled, config)).toEqual({ retry: true, delayMs: 1000, retryCost: 5 });
    });
  });

  // ============================================================================
  // TEST GROUP 3: Retry Budget
  // ============================================================================

  describe('Retry Budget', () => {
    it('should charge timeouts more than other failures', () => {
      const tokenBucket = new TokenBucket();
      const strategy = new StandardRetryStrategy({ tokenBucket, random: () => 0 });
      const transient: RetryClassification = { action: 'retry', kind: 'transient' };

      strategy.decide(1, classified(transient, new TimeoutError('attempt', 100)), config);
      strategy.decide(1, classified(transient, new DispatchFailure('timed out', 'timeout')), config);
      strategy.decide(1, classified(transient, new DispatchFailure('reset', 'io')), config);

      expect(tokenBucket.available).toBe(500 - 10 - 10 - 5);
    });

    it('should stop retrying when the budget runs out', () => {
      const strategy = new StandardRetryStrategy({ tokenBucket: new TokenBucket({ capacity: 7 }) });

      expect(strategy.decide(1, classified(), config).retry).toBe(true);
      expect(strategy.decide(1, classified(), config)).toEqual({ retry: false, reason: 'Retry quota exceeded' });
    });

    it('should refill the budget on success', () => {
      const tokenBucket = new TokenBucket({ capacity: 10 });
      const strategy = new StandardRetryStrategy({ tokenBucket });

      strategy.decide(1, classified(), config);
      strategy.decide(1, classified(), config);
      expect(tokenBucket.available).toBe(0);

      strategy.recordSuccess(5);
      expect(tokenBucket.available).toBe(5);
    });

    it('should return the cost of an abandoned retry', () => {
      const tokenBucket = new TokenBucket();
      const strategy = new StandardRetryStrategy({ tokenBucket });

      const decision = strategy.decide(1, classified(), config);
      expect(tokenBucket.available).toBe(495);

      if (decision.retry) {
        strategy.releaseRetry(decision.retryCost);
      }
      expect(tokenBucket.available).toBe(500);
    });
  });
});

describe('TokenBucket', () => {
  it('should take nothing when too few tokens remain', () => {
    const bucket = new TokenBucket({ capacity: 8, retryCost: 5 });

    expect(bucket.tryAcquire(bucket.retryCost)).toBe(true);
    expect(bucket.tryAcquire(bucket.retryCost)).toBe(false);
    expect(bucket.available).toBe(3);
  });

  it('should never exceed capacity', () => {
    const bucket = new TokenBucket({ capacity: 20 });

    bucket.release(15);

    expect(bucket.available).toBe(20);
  });
});
