/**
 * @wirebound/core - Retry Classifiers
 *
 * Default classification of failed attempts by transport kind, timeout
 * scope, status code, error code and throttling hints.
 */

import {
  DispatchFailure,
  ResponseError,
  SdkError,
  ServiceError,
  ThrottlingError,
  TimeoutError,
  extractErrorMetadata,
} from '../../domain/exceptions/exceptions';
import { HttpStatus } from '../platform/types';
import type { HttpResponse } from '../platform/types';
import { classifyRetry } from './IRetryStrategy';
import type { IRetryClassifier, RetryClassification } from './IRetryStrategy';

/**
 * Error codes services use to ask clients to slow down.
 */
export const THROTTLING_ERROR_CODES: ReadonlySet<string> = new Set([
  'Throttling',
  'ThrottlingException',
  'ThrottledException',
  'RequestThrottledException',
  'TooManyRequestsException',
  'ProvisionedThroughputExceededException',
  'TransactionInProgressException',
  'RequestLimitExceeded',
  'BandwidthLimitExceeded',
  'LimitExceededException',
  'RequestThrottled',
  'SlowDown',
  'PriorRequestNotComplete',
  'EC2ThrottledException',
]);

/**
 * Error codes for failures that are safe to retry as-is.
 */
export const TRANSIENT_ERROR_CODES: ReadonlySet<string> = new Set([
  'RequestTimeout',
  'RequestTimeoutException',
  'InternalError',
]);

/**
 * Status codes retried as server errors.
 */
export const RETRYABLE_STATUS_CODES: ReadonlySet<number> = new Set<number>([
  HttpStatus.INTERNAL_SERVER_ERROR,
  HttpStatus.BAD_GATEWAY,
  HttpStatus.SERVICE_UNAVAILABLE,
  HttpStatus.GATEWAY_TIMEOUT,
]);

const NO_ACTION: RetryClassification = { action: 'none' };

/**
 * Parse a `retry-after` header value (seconds or HTTP date) into
 * milliseconds from `now`.
 */
export function parseRetryAfter(value: string | undefined, now: number = Date.now()): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  if (!Number.isNaN(seconds)) {
    return seconds >= 0 ? seconds * 1000 : undefined;
  }
  const date = Date.parse(value);
  if (!Number.isNaN(date)) {
    const diff = date - now;
    return diff > 0 ? diff : undefined;
  }
  return undefined;
}

function retryAfterOf(response: HttpResponse | undefined): number | undefined {
  return parseRetryAfter(response?.headers['retry-after']);
}

/**
 * Code reported by a response error, falling back to the modeled error.
 */
export function errorCodeOf(error: SdkError): string | undefined {
  if (!(error instanceof ResponseError)) {
    return undefined;
  }
  if (error.code) {
    return error.code;
  }
  if (error instanceof ServiceError) {
    return extractErrorMetadata(error.error).code;
  }
  if (error instanceof ThrottlingError) {
    return extractErrorMetadata(error.serviceError).code;
  }
  return undefined;
}

/**
 * Connection failures and attempt timeouts.
 */
export const transientErrorClassifier: IRetryClassifier = {
  name: 'TransientErrors',
  classify(error) {
    if (error instanceof DispatchFailure) {
      switch (error.kind) {
        case 'io':
        case 'timeout':
          return { action: 'retry', kind: 'transient' };
        case 'user':
          return { action: 'forbid', reason: 'Dispatch was cancelled by the caller' };
        default:
          return NO_ACTION;
      }
    }
    if (error instanceof TimeoutError) {
      return error.scope === 'attempt'
        ? { action: 'retry', kind: 'transient' }
        : { action: 'forbid', reason: 'Operation timeout expired' };
    }
    return NO_ACTION;
  },
};

/**
 * 500, 502, 503 and 504 responses.
 */
export const httpStatusClassifier: IRetryClassifier = {
  name: 'HttpStatusCode',
  classify(error) {
    if (error instanceof ResponseError && error.statusCode !== undefined) {
      if (RETRYABLE_STATUS_CODES.has(error.statusCode)) {
        return { action: 'retry', kind: 'server' };
      }
    }
    return NO_ACTION;
  },
};

/**
 * Throttling signals: {@link ThrottlingError}, status 429, throttling or
 * transient error codes (also on 200 responses).
 */
export const errorCodeClassifier: IRetryClassifier = {
  name: 'ErrorCode',
  classify(error) {
    if (!(error instanceof ResponseError)) {
      return NO_ACTION;
    }

    if (error instanceof ThrottlingError) {
      return {
        action: 'retry',
        kind: 'throttling',
        retryAfterMs: error.retryAfterMs ?? retryAfterOf(error.rawResponse),
      };
    }

    const code = errorCodeOf(error);
    if (error.statusCode === HttpStatus.TOO_MANY_REQUESTS || (code && THROTTLING_ERROR_CODES.has(code))) {
      return { action: 'retry', kind: 'throttling', retryAfterMs: retryAfterOf(error.rawResponse) };
    }
    if (code && TRANSIENT_ERROR_CODES.has(code)) {
      return { action: 'retry', kind: 'transient' };
    }
    return NO_ACTION;
  },
};

/**
 * Default classifiers, in order.
 */
export function defaultRetryClassifiers(): IRetryClassifier[] {
  return [transientErrorClassifier, httpStatusClassifier, errorCodeClassifier];
}

/**
 * Whether `error` would be retried, ignoring attempt limits and budget.
 */
export function isRetryableError(
  error: SdkError,
  classifiers: readonly IRetryClassifier[] = defaultRetryClassifiers(),
): boolean {
  return classifyRetry(error, classifiers).action === 'retry';
}
