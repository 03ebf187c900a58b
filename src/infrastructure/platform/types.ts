/**
 * @wirebound/core - Platform Types
 *
 * Transport-neutral request and response shapes exchanged between the
 * orchestrator, signers, interceptors and transports.
 */

/**
 * HTTP status codes the runtime inspects.
 */
export enum HttpStatus {
  // 2xx Success
  OK = 200,
  CREATED = 201,
  ACCEPTED = 202,
  NO_CONTENT = 204,

  // 4xx Client Errors
  BAD_REQUEST = 400,
  UNAUTHORIZED = 401,
  FORBIDDEN = 403,
  NOT_FOUND = 404,
  REQUEST_TIMEOUT = 408,
  CONFLICT = 409,
  UNPROCESSABLE_ENTITY = 422,
  TOO_MANY_REQUESTS = 429,

  // 5xx Server Errors
  INTERNAL_SERVER_ERROR = 500,
  NOT_IMPLEMENTED = 501,
  BAD_GATEWAY = 502,
  SERVICE_UNAVAILABLE = 503,
  GATEWAY_TIMEOUT = 504,
}

/**
 * Header map. Names are always stored lower-cased.
 */
export type HttpHeaders = Record<string, string>;

/**
 * Request body. Async iterables are streamed and can be read only once.
 */
export type HttpBody = Uint8Array | string | AsyncIterable<Uint8Array>;

/**
 * Outgoing request.
 */
export interface HttpRequest {
  /** HTTP method */
  method: string;

  /** Absolute URL once the endpoint has been applied, otherwise a path with optional query */
  uri: string;

  /** Request headers (lower-case names) */
  headers: HttpHeaders;

  /** Request body */
  body: HttpBody;
}

/**
 * Incoming response.
 */
export interface HttpResponse {
  /** Response status code */
  status: number;

  /** Response headers (lower-case names) */
  headers: HttpHeaders;

  /** Fully buffered response body */
  body: Uint8Array;
}

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * Whether a body is a one-shot stream.
 */
export function isStreamingBody(body: HttpBody): body is AsyncIterable<Uint8Array> {
  return typeof body !== 'string' && !(body instanceof Uint8Array);
}

/**
 * Bytes of a buffered body, or `undefined` for a stream.
 */
export function bodyBytes(body: HttpBody): Uint8Array | undefined {
  if (typeof body === 'string') return encoder.encode(body);
  if (body instanceof Uint8Array) return body;
  return undefined;
}

/**
 * Decode a response body as UTF-8.
 */
export function bodyText(body: Uint8Array): string {
  return decoder.decode(body);
}

/**
 * Lower-case every header name.
 */
export function normalizeHeaders(headers: Record<string, string | undefined>): HttpHeaders {
  const normalized: HttpHeaders = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value !== undefined) {
      normalized[name.toLowerCase()] = value;
    }
  }
  return normalized;
}

/**
 * Create a request with normalized headers and an empty body by default.
 */
export function createRequest(init: {
  method?: string;
  uri: string;
  headers?: Record<string, string | undefined>;
  body?: HttpBody;
}): HttpRequest {
  return {
    method: init.method ?? 'POST',
    uri: init.uri,
    headers: normalizeHeaders(init.headers ?? {}),
    body: init.body ?? new Uint8Array(0),
  };
}

/**
 * Copy a request for a new attempt.
 *
 * @remarks
 * Headers are copied; the body is shared, since a buffered body is never
 * modified and a stream cannot be duplicated.
 */
export function cloneRequest(request: HttpRequest): HttpRequest {
  return {
    method: request.method,
    uri: request.uri,
    headers: { ...request.headers },
    body: request.body,
  };
}

/**
 * Fluent builder for {@link HttpResponse}, mostly used by test transports.
 *
 * @example
 * ```typescript
 * const response = new HttpResponseBuilder()
 *   .status(HttpStatus.TOO_MANY_REQUESTS)
 *   .header('Retry-After', '2')
 *   .json({ code: 'Throttling' })
 *   .build();
 * ```
 */
export class HttpResponseBuilder {
  private response: HttpResponse;

  constructor() {
    this.response = {
      status: HttpStatus.OK,
      headers: {},
      body: new Uint8Array(0),
    };
  }

  /**
   * Set status code
   */
  status(code: number): this {
    this.response.status = code;
    return this;
  }

  /**
   * Set OK status (200)
   */
  ok(): this {
    return this.status(HttpStatus.OK);
  }

  /**
   * Set Internal Server Error status (500)
   */
  internalServerError(): this {
    return this.status(HttpStatus.INTERNAL_SERVER_ERROR);
  }

  /**
   * Set Too Many Requests status (429)
   */
  tooManyRequests(): this {
    return this.status(HttpStatus.TOO_MANY_REQUESTS);
  }

  /**
   * Set a header
   */
  header(name: string, value: string): this {
    this.response.headers[name.toLowerCase()] = value;
    return this;
  }

  /**
   * Set a raw text body
   */
  text(body: string): this {
    this.response.body = encoder.encode(body);
    return this;
  }

  /**
   * Set a JSON body and content type
   */
  json(body: unknown): this {
    this.header('content-type', 'application/json');
    return this.text(JSON.stringify(body));
  }

  /**
   * Build the response
   */
  build(): HttpResponse {
    return {
      status: this.response.status,
      headers: { ...this.response.headers },
      body: this.response.body,
    };
  }
}

/**
 * Create a response builder
 */
export function response(): HttpResponseBuilder {
  return new HttpResponseBuilder();
}
