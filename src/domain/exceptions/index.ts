/**
 * @wirebound/core - Exception Module
 *
 * Runtime error taxonomy and classification helpers
 */

export {
  SdkError,
  ConfigurationError,
  IdentityResolutionError,
  AuthSchemeResolutionError,
  SigningError,
  ConstructionFailure,
  DispatchFailure,
  ResponseError,
  ServiceError,
  ThrottlingError,
  TimeoutError,
  extractErrorMetadata,
  toSdkError,
} from './exceptions';

export type {
  SdkErrorOptions,
  AuthSchemeAttempt,
  DispatchFailureKind,
  TimeoutScope,
  ErrorMetadata,
} from './exceptions';
