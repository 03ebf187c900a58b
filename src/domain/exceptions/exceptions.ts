/**
 * @wirebound/core - Error Taxonomy
 *
 * Every failure surfaced by the runtime is an {@link SdkError}. Errors raised
 * during an orchestration carry the {@link Phase} at which they happened and,
 * when a response was received, the raw response for introspection.
 *
 * ```
 * SdkError
 * ├── ConfigurationError          (client construction)
 * ├── AuthSchemeResolutionError   (no scheme could be used)
 * ├── IdentityResolutionError     (one identity resolver failed)
 * ├── SigningError
 * ├── ConstructionFailure         (before dispatch)
 * ├── DispatchFailure             (transport)
 * ├── ResponseError               (after dispatch)
 * │   ├── ServiceError<E>         (modeled operation error)
 * │   └── ThrottlingError
 * └── TimeoutError
 * ```
 */

import { Phase, phaseStage } from '../orchestration/phase';
import type { HttpResponse } from '../../infrastructure/platform/types';

/**
 * Options shared by all runtime errors.
 */
export interface SdkErrorOptions {
  /** Phase at which the error happened */
  phase?: Phase;

  /** Raw response, when one was received */
  rawResponse?: HttpResponse;

  /** Underlying error */
  cause?: unknown;
}

/**
 * Base runtime error
 */
export class SdkError extends Error {
  readonly phase: Phase | undefined;
  readonly rawResponse: HttpResponse | undefined;

  constructor(message: string, options: SdkErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'SdkError';
    this.phase = options.phase;
    this.rawResponse = options.rawResponse;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A mandatory component or capability is missing. Raised at client
 * construction, never per request.
 */
export class ConfigurationError extends SdkError {
  constructor(
    message: string,
    public readonly missing: string[] = [],
    options: SdkErrorOptions = {},
  ) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * An identity resolver failed. Non-fatal: the next candidate scheme is tried.
 */
export class IdentityResolutionError extends SdkError {
  constructor(
    message: string,
    public readonly schemeId?: string,
    options: SdkErrorOptions = {},
  ) {
    super(message, { phase: Phase.ResolveIdentity, ...options });
    this.name = 'IdentityResolutionError';
  }
}

/**
 * One failed candidate during auth scheme selection.
 */
export interface AuthSchemeAttempt {
  schemeId: string;
  reason: Error;
}

/**
 * No eligible auth scheme could produce an identity.
 */
export class AuthSchemeResolutionError extends SdkError {
  constructor(
    message: string,
    public readonly candidates: readonly string[],
    public readonly attempts: readonly AuthSchemeAttempt[] = [],
  ) {
    super(message, { phase: Phase.ResolveIdentity });
    this.name = 'AuthSchemeResolutionError';
  }
}

/**
 * The signer could not sign the request.
 */
export class SigningError extends SdkError {
  constructor(message: string, options: SdkErrorOptions = {}) {
    super(message, { phase: Phase.Sign, ...options });
    this.name = 'SigningError';
  }
}

/**
 * The request could not be built (invalid input, interceptor failure before
 * dispatch).
 */
export class ConstructionFailure extends SdkError {
  constructor(message: string, options: SdkErrorOptions = {}) {
    super(message, options);
    this.name = 'ConstructionFailure';
  }
}

/**
 * Transport failure classification.
 */
export type DispatchFailureKind = 'io' | 'timeout' | 'user' | 'other';

/**
 * The transport could not complete the exchange.
 */
export class DispatchFailure extends SdkError {
  constructor(
    message: string,
    public readonly kind: DispatchFailureKind = 'io',
    options: SdkErrorOptions = {},
  ) {
    super(message, { phase: Phase.Dispatch, ...options });
    this.name = 'DispatchFailure';
  }
}

/**
 * A response was received but is malformed or signals an error.
 */
export class ResponseError extends SdkError {
  constructor(
    message: string,
    options: SdkErrorOptions & { code?: string } = {},
  ) {
    super(message, options);
    this.name = 'ResponseError';
    this.code = options.code;
  }

  /** Error code reported by the service, when known */
  readonly code: string | undefined;

  get statusCode(): number | undefined {
    return this.rawResponse?.status;
  }
}

/**
 * The operation's deserializer produced a modeled error.
 *
 * @template E - Modeled error type of the operation
 */
export class ServiceError<E = unknown> extends ResponseError {
  constructor(
    public readonly error: E,
    options: SdkErrorOptions & { code?: string } = {},
  ) {
    super(errorMessage(error, options.code), options);
    this.name = 'ServiceError';
  }
}

/**
 * The service asked the client to slow down. Retryable.
 */
export class ThrottlingError extends ResponseError {
  constructor(
    message: string,
    options: SdkErrorOptions & {
      code?: string;
      retryAfterMs?: number;
      serviceError?: unknown;
    } = {},
  ) {
    super(message, options);
    this.name = 'ThrottlingError';
    this.retryAfterMs = options.retryAfterMs;
    this.serviceError = options.serviceError;
  }

  /** Server-provided delay hint */
  readonly retryAfterMs: number | undefined;

  /** Modeled error, when the throttling response was deserialized */
  readonly serviceError: unknown;
}

/**
 * Timeout scope that expired.
 */
export type TimeoutScope = 'attempt' | 'operation';

/**
 * A deadline expired.
 */
export class TimeoutError extends SdkError {
  constructor(
    public readonly scope: TimeoutScope,
    public readonly timeoutMs: number,
    options: SdkErrorOptions = {},
  ) {
    super(`${scope === 'operation' ? 'Operation' : 'Attempt'} timed out after ${timeoutMs}ms`, options);
    this.name = 'TimeoutError';
  }
}

// ==================== Helpers ====================

/**
 * Code and message a modeled error reports, if any.
 */
export interface ErrorMetadata {
  code?: string;
  message?: string;
}

function stringField(value: object, ...names: string[]): string | undefined {
  for (const name of names) {
    const field: unknown = Reflect.get(value, name);
    if (typeof field === 'string' && field.length > 0) {
      return field;
    }
  }
  return undefined;
}

/**
 * Extract `code`/`message` from a modeled error of unknown shape.
 */
export function extractErrorMetadata(error: unknown): ErrorMetadata {
  if (typeof error !== 'object' || error === null) {
    return {};
  }
  return {
    code: stringField(error, 'code', 'Code', '__type', 'errorCode'),
    message: stringField(error, 'message', 'Message'),
  };
}

function errorMessage(error: unknown, code: string | undefined): string {
  const metadata = extractErrorMetadata(error);
  const resolvedCode = code ?? metadata.code ?? 'Unknown';
  return metadata.message ? `${resolvedCode}: ${metadata.message}` : `Service returned error ${resolvedCode}`;
}

function describe(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Wrap an arbitrary failure into the error type matching the phase.
 *
 * @remarks
 * Errors that are already {@link SdkError}s pass through unchanged.
 */
export function toSdkError(error: unknown, phase: Phase, rawResponse?: HttpResponse): SdkError {
  if (error instanceof SdkError) {
    return error;
  }

  const message = `${phase} failed: ${describe(error)}`;
  switch (phaseStage(phase)) {
    case 'transmit':
      return new DispatchFailure(message, 'other', { cause: error });
    case 'afterTransmit':
      return new ResponseError(message, { phase, rawResponse, cause: error });
    default:
      return new ConstructionFailure(message, { phase, cause: error });
  }
}
