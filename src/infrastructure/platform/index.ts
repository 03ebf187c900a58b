/**
 * @wirebound/core - Platform Module
 *
 * Request/response shapes and built-in interceptors
 */

// Types
export {
  HttpStatus,
  HttpResponseBuilder,
  response,
  isStreamingBody,
  bodyBytes,
  bodyText,
  normalizeHeaders,
  createRequest,
  cloneRequest,
} from './types';

export type { HttpHeaders, HttpBody, HttpRequest, HttpResponse } from './types';

// Interceptors
export {
  InterceptorBase,
  InvocationIdInterceptor,
  RequestAttemptsInterceptor,
  LoggingInterceptor,
  INVOCATION_ID_HEADER,
  REQUEST_ATTEMPT_HEADER,
  REDACTED,
} from './interceptors';

export type { LoggingInterceptorOptions } from './interceptors';
