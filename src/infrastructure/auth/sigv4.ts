/**
 * @fileoverview SigV4 Request Signer
 *
 * @packageDocumentation
 * @module @wirebound/core/infrastructure/auth
 *
 * HMAC-SHA256 signature over a canonical form of the request:
 *
 * ```
 * canonical request        string to sign                   Authorization
 * ─────────────────        ──────────────                   ─────────────
 * METHOD                   AWS4-HMAC-SHA256                 AWS4-HMAC-SHA256
 * /canonical/path     ──►  20240101T000000Z           ──►   Credential=AKID/scope,
 * a=1&b=2                  20240101/region/svc/aws4_request SignedHeaders=host;x-amz-date,
 * host:example.com         sha256(canonical request)        Signature=…
 * x-amz-date:…
 *
 * host;x-amz-date
 * payload hash
 * ```
 *
 * Signing only adds headers. The body is never read twice or modified.
 */

import { createHash, createHmac } from 'crypto';
import { SigningError } from '../../domain/exceptions/exceptions';
import { isCredentials } from '../../domain/auth/IIdentity';
import type { Identity } from '../../domain/auth/IIdentity';
import { defaultSigningOptions } from '../../domain/auth/IAuthScheme';
import type {
  AuthSchemeOption,
  ISigner,
  SigningContext,
  SigningOptions,
} from '../../domain/auth/IAuthScheme';
import {
  SigningNameKey,
  SigningOptionsKey,
  SigningRegionKey,
} from '../../domain/config/keys';
import { bodyBytes, isStreamingBody, normalizeHeaders } from '../platform/types';
import type { HttpHeaders, HttpRequest } from '../platform/types';

export const ALGORITHM = 'AWS4-HMAC-SHA256';
export const UNSIGNED_PAYLOAD = 'UNSIGNED-PAYLOAD';
export const EMPTY_SHA256 = 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855';

/** Headers that are never part of the signature */
const UNSIGNED_HEADERS: ReadonlySet<string> = new Set([
  'authorization',
  'user-agent',
  'x-amzn-trace-id',
  'expect',
  'transfer-encoding',
  'connection',
]);

// ==================== Encoding ====================

export function sha256Hex(data: Uint8Array | string): string {
  return createHash('sha256').update(data).digest('hex');
}

function hmac(key: Uint8Array | string, data: string): Buffer {
  return createHmac('sha256', key).update(data).digest();
}

/**
 * Percent-encode everything except unreserved characters.
 */
export function uriEncode(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch (error) {
    if (error instanceof URIError) {
      return value;
    }
    throw error;
  }
}

/**
 * `YYYYMMDDTHHMMSSZ`
 */
export function formatAmzDate(time: Date): string {
  return time.toISOString().replace(/[-:]/g, '').replace(/\.\d{3}/, '');
}

// ==================== URI ====================

interface ParsedUri {
  authority: string | undefined;
  path: string;
  query: string;
}

const URI_PATTERN = /^(?:[a-zA-Z][a-zA-Z0-9+.-]*:\/\/([^/?#]*))?([^?#]*)(?:\?([^#]*))?/;

function parseUri(uri: string): ParsedUri {
  const match = URI_PATTERN.exec(uri);
  return {
    authority: match?.[1],
    path: match?.[2] ?? '',
    query: match?.[3] ?? '',
  };
}

function removeDotSegments(segments: string[]): string[] {
  const output: string[] = [];
  for (const segment of segments) {
    if (segment === '.') continue;
    if (segment === '..') {
      output.pop();
      continue;
    }
    output.push(segment);
  }
  return output;
}

/**
 * Canonical path of a request.
 */
export function canonicalUri(path: string, options: SigningOptions): string {
  if (path === '' || path === '/') {
    return '/';
  }

  let segments = path.split('/').slice(1);
  if (options.normalizeUriPath) {
    segments = removeDotSegments(segments);
  }

  const encoded = segments.map((segment) => (options.doubleUriEncode ? uriEncode(segment) : segment));
  return `/${encoded.join('/')}`;
}

/**
 * Canonical query string: pairs encoded and sorted by name, then value.
 */
export function canonicalQuery(query: string): string {
  if (!query) {
    return '';
  }

  const pairs = query
    .split('&')
    .filter((part) => part.length > 0)
    .map((part) => {
      const separator = part.indexOf('=');
      const name = separator === -1 ? part : part.slice(0, separator);
      const value = separator === -1 ? '' : part.slice(separator + 1);
      return [uriEncode(safeDecode(name)), uriEncode(safeDecode(value))] as const;
    });

  pairs.sort(([nameA, valueA], [nameB, valueB]) => {
    if (nameA !== nameB) return nameA < nameB ? -1 : 1;
    if (valueA === valueB) return 0;
    return valueA < valueB ? -1 : 1;
  });

  return pairs.map(([name, value]) => `${name}=${value}`).join('&');
}

// ==================== Canonical request ====================

/**
 * Pieces of a canonical request.
 */
export interface CanonicalRequest {
  canonicalRequest: string;
  signedHeaders: string;
}

/**
 * Build the canonical request for already-prepared headers.
 */
export function createCanonicalRequest(
  request: HttpRequest,
  headers: HttpHeaders,
  payloadHash: string,
  options: SigningOptions,
): CanonicalRequest {
  const { path, query } = parseUri(request.uri);

  const values = new Map<string, string[]>();
  for (const [rawName, value] of Object.entries(headers)) {
    const name = rawName.toLowerCase();
    if (UNSIGNED_HEADERS.has(name)) {
      continue;
    }
    values.set(name, [...(values.get(name) ?? []), value.trim().replace(/\s+/g, ' ')]);
  }
  const names = [...values.keys()].sort();

  const canonicalHeaders = names.map((name) => `${name}:${(values.get(name) ?? []).join(',')}\n`).join('');
  const signedHeaders = names.join(';');

  const canonicalRequest = [
    request.method.toUpperCase(),
    canonicalUri(path, options),
    canonicalQuery(query),
    canonicalHeaders,
    signedHeaders,
    payloadHash,
  ].join('\n');

  return { canonicalRequest, signedHeaders };
}

/**
 * Hash of the payload, honoring the payload override.
 *
 * @throws {SigningError} For a streaming body without an override
 */
export function payloadHash(request: HttpRequest, options: SigningOptions): string {
  const override = options.payloadOverride;
  if (override) {
    switch (override.type) {
      case 'unsignedPayload':
        return UNSIGNED_PAYLOAD;
      case 'bytes':
        return sha256Hex(override.bytes);
      case 'precomputed':
        return override.sha256;
    }
  }

  if (isStreamingBody(request.body)) {
    throw new SigningError('A streaming body cannot be signed without a payload override');
  }
  const bytes = bodyBytes(request.body);
  return bytes && bytes.length > 0 ? sha256Hex(bytes) : EMPTY_SHA256;
}

/**
 * Derive the signing key for a day, region and service.
 */
export function deriveSigningKey(
  secretAccessKey: string,
  dateStamp: string,
  region: string,
  service: string,
): Buffer {
  const dateKey = hmac(`AWS4${secretAccessKey}`, dateStamp);
  const regionKey = hmac(dateKey, region);
  const serviceKey = hmac(regionKey, service);
  return hmac(serviceKey, 'aws4_request');
}

// ==================== Signer ====================

/**
 * SigV4Signer - deterministic request signer
 *
 * Reads `signingName`, `signingRegion` and `signingOptions` from the auth
 * scheme option.
 *
 * @example
 * ```typescript
 * const signed = new SigV4Signer().sign(request, credentials, option, {
 *   signingTime: new Date('2024-01-01T00:00:00Z'),
 *   config,
 * });
 * signed.headers.authorization;
 * // 'AWS4-HMAC-SHA256 Credential=AKID/20240101/eu-west-1/inventory/aws4_request, ...'
 * ```
 */
export class SigV4Signer implements ISigner {
  sign(
    request: HttpRequest,
    identity: Identity,
    option: AuthSchemeOption,
    context: SigningContext,
  ): HttpRequest {
    const credentials = identity.data;
    if (!isCredentials(credentials)) {
      throw new SigningError('SigV4 signing requires access key credentials');
    }

    const service = option.properties.get(SigningNameKey);
    const region = option.properties.get(SigningRegionKey);
    if (!service) {
      throw new SigningError('SigV4 signing requires a signing name');
    }
    if (!region) {
      throw new SigningError('SigV4 signing requires a signing region');
    }
    const options = option.properties.get(SigningOptionsKey) ?? defaultSigningOptions();

    const amzDate = formatAmzDate(context.signingTime);
    const dateStamp = amzDate.slice(0, 8);
    const hash = payloadHash(request, options);

    const headers = normalizeHeaders(request.headers);
    const { authority } = parseUri(request.uri);
    if (headers.host === undefined && authority) {
      headers.host = authority;
    }
    headers['x-amz-date'] = amzDate;
    if (credentials.sessionToken) {
      headers['x-amz-security-token'] = credentials.sessionToken;
    }
    if (options.contentSha256Header) {
      headers['x-amz-content-sha256'] = hash;
    }

    const { canonicalRequest, signedHeaders } = createCanonicalRequest(request, headers, hash, options);
    const scope = `${dateStamp}/${region}/${service}/aws4_request`;
    const stringToSign = [ALGORITHM, amzDate, scope, sha256Hex(canonicalRequest)].join('\n');

    const signingKey = deriveSigningKey(credentials.secretAccessKey, dateStamp, region, service);
    const signature = createHmac('sha256', signingKey).update(stringToSign).digest('hex');

    headers.authorization =
      `${ALGORITHM} Credential=${credentials.accessKeyId}/${scope}, ` +
      `SignedHeaders=${signedHeaders}, Signature=${signature}`;

    return {
      method: request.method,
      uri: request.uri,
      headers,
      body: request.body,
    };
  }
}
