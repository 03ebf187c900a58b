/**
 * @wirebound/core - Resilience Module
 *
 * Retry classification, retry strategies, sleep and time sources
 */

export type {
  ErrorKind,
  RetryClassification,
  ClassifiedError,
  IRetryClassifier,
  RetryDecision,
  IRetryStrategy,
} from './IRetryStrategy';
export { classifyRetry } from './IRetryStrategy';

export {
  THROTTLING_ERROR_CODES,
  TRANSIENT_ERROR_CODES,
  RETRYABLE_STATUS_CODES,
  parseRetryAfter,
  errorCodeOf,
  transientErrorClassifier,
  httpStatusClassifier,
  errorCodeClassifier,
  defaultRetryClassifiers,
  isRetryableError,
} from './classifiers';

export {
  TokenBucket,
  DEFAULT_BUCKET_CAPACITY,
  DEFAULT_RETRY_COST,
  DEFAULT_TIMEOUT_RETRY_COST,
} from './TokenBucket';
export type { TokenBucketOptions } from './TokenBucket';

export { StandardRetryStrategy, NeverRetryStrategy } from './RetryStrategy';
export type { StandardRetryStrategyOptions } from './RetryStrategy';

export { DefaultSleep, SystemTimeSource, StaticTimeSource } from './sleep';
