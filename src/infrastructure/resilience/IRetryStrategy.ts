/**
 * @wirebound/core - Retry Strategy Interface
 *
 * Retrying is split into two steps:
 *
 * ```
 * SdkError ──► IRetryClassifier[] ──► RetryClassification
 *                                            │
 *              RetryConfig ──► IRetryStrategy.decide ──► RetryDecision
 * ```
 *
 * Classifiers only say *what kind* of failure happened. The strategy owns
 * attempt limits, backoff and the shared retry budget.
 *
 * @module infrastructure/resilience/IRetryStrategy
 */

import type { SdkError } from '../../domain/exceptions/exceptions';
import type { RetryConfig } from '../../domain/config/policies';

/**
 * Kind of retryable failure.
 */
export type ErrorKind = 'transient' | 'throttling' | 'server' | 'client';

/**
 * Result of running classifiers over an error.
 *
 * @example
 * ```typescript
 * const classification: RetryClassification = {
 *   action: 'retry',
 *   kind: 'throttling',
 *   retryAfterMs: 2000,
 * };
 * ```
 */
export type RetryClassification =
  | { action: 'none' }
  | { action: 'retry'; kind: ErrorKind; retryAfterMs?: number }
  | { action: 'forbid'; reason: string };

/**
 * An error together with its classification.
 */
export interface ClassifiedError {
  error: SdkError;
  classification: RetryClassification;
}

/**
 * Inspects a failed attempt.
 *
 * @remarks
 * Classifiers run in registration order. A classifier returning
 * `{ action: 'none' }` leaves the previous result in place; any other
 * result replaces it.
 */
export interface IRetryClassifier {
  readonly name: string;

  classify(error: SdkError): RetryClassification;
}

/**
 * Outcome of a retry decision.
 */
export type RetryDecision =
  | {
      retry: true;
      delayMs: number;

      /** Budget taken from the retry token bucket */
      retryCost: number;
    }
  | { retry: false; reason: string };

/**
 * Decides whether, and when, a failed attempt is retried.
 *
 * @example
 * ```typescript
 * const decision = strategy.decide(1, classified, RetryConfig.standard());
 * if (decision.retry) {
 *   await sleep.sleep(decision.delayMs, signal);
 * }
 * ```
 */
export interface IRetryStrategy {
  readonly name: string;

  /**
   * @param attempt - Number of the attempt that just failed (1-indexed)
   */
  decide(attempt: number, classified: ClassifiedError, config: RetryConfig): RetryDecision;

  /**
   * Called once when an orchestration succeeds.
   *
   * @param retryCost - Cost of the last granted retry, 0 when none was granted
   */
  recordSuccess?(retryCost: number): void;

  /**
   * Called when a granted retry is abandoned before its attempt starts.
   */
  releaseRetry?(retryCost: number): void;
}

/**
 * Run classifiers in order over an error.
 */
export function classifyRetry(
  error: SdkError,
  classifiers: readonly IRetryClassifier[],
): RetryClassification {
  let result: RetryClassification = { action: 'none' };
  for (const classifier of classifiers) {
    const next = classifier.classify(error);
    if (next.action !== 'none') {
      result = next;
    }
  }
  return result;
}
