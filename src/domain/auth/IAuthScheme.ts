/**
 * @fileoverview Auth Scheme Contracts
 *
 * @packageDocumentation
 * @module @wirebound/core/domain/auth
 *
 * An auth scheme pairs a way of obtaining an identity with a way of
 * applying it to a request:
 *
 * ```
 * AuthSchemeOption ──► IAuthScheme ──► IIdentityResolver ──► Identity
 *                            │                                   │
 *                            └──────────► ISigner ◄──────────────┘
 *                                            │
 *                                            ▼
 *                                     signed HttpRequest
 * ```
 */

import type { ConfigBag, ConfigLayer } from '../config/ConfigBag';
import type { HttpRequest } from '../../infrastructure/platform/types';
import type { Identity, IIdentityResolver } from './IIdentity';

/**
 * Ids of the schemes shipped with the runtime.
 */
export const AuthSchemeId = {
  SigV4: 'sigv4',
  HttpBearer: 'httpBearerAuth',
  HttpApiKey: 'httpApiKeyAuth',
  NoAuth: 'noAuth',
} as const;

/**
 * Replaces the hashed payload when signing.
 */
export type PayloadOverride =
  | { type: 'unsignedPayload' }
  | { type: 'bytes'; bytes: Uint8Array }
  | { type: 'precomputed'; sha256: string };

/**
 * Flags controlling request signing.
 */
export interface SigningOptions {
  /** Percent-encode the canonical path a second time */
  doubleUriEncode: boolean;

  /** Add the `x-amz-content-sha256` header */
  contentSha256Header: boolean;

  /** Remove `.` and `..` segments from the canonical path */
  normalizeUriPath: boolean;

  payloadOverride?: PayloadOverride;
}

export function defaultSigningOptions(): SigningOptions {
  return {
    doubleUriEncode: true,
    contentSha256Header: false,
    normalizeUriPath: true,
  };
}

/**
 * How an operation's payload enters the signature.
 */
export type PayloadSigning = 'signed' | 'unsigned' | 'streaming';

/**
 * Apply an operation's payload requirement on top of signing options:
 * - unsigned: `UNSIGNED-PAYLOAD` and double URI encoding
 * - streaming: the payload is signed as empty bytes
 */
export function withPayloadSigning(base: SigningOptions, payload: PayloadSigning | undefined): SigningOptions {
  switch (payload) {
    case 'unsigned':
      return { ...base, payloadOverride: { type: 'unsignedPayload' }, doubleUriEncode: true };
    case 'streaming':
      return { ...base, payloadOverride: { type: 'bytes', bytes: new Uint8Array(0) } };
    default:
      return { ...base };
  }
}

/**
 * Where an API key is placed on the request.
 */
export interface ApiKeyPlacement {
  location: 'header' | 'query';
  name: string;

  /** Header value prefix, e.g. `ApiKey` */
  scheme?: string;
}

/**
 * One candidate scheme for an operation, with the properties its signer
 * reads (signing name, region, options, key placement).
 */
export interface AuthSchemeOption {
  readonly schemeId: string;
  readonly properties: ConfigLayer;
}

/**
 * Values handed to a signer for one attempt.
 */
export interface SigningContext {
  /** Time the signature is computed for */
  signingTime: Date;

  config: ConfigBag;
}

/**
 * Applies an identity to a request.
 *
 * @remarks
 * Implementations are pure: the same request, identity, option and signing
 * time always produce the same result. The body is never altered; only
 * headers and query parameters are added.
 */
export interface ISigner {
  /**
   * @throws {SigningError} When the identity or request cannot be signed
   */
  sign(
    request: HttpRequest,
    identity: Identity,
    option: AuthSchemeOption,
    context: SigningContext,
  ): HttpRequest;
}

/**
 * Lookup of identity resolvers by scheme id.
 */
export interface IdentityResolverLookup {
  identityResolver(schemeId: string): IIdentityResolver | undefined;
}

/**
 * An authentication scheme.
 */
export interface IAuthScheme {
  readonly schemeId: string;

  readonly signer: ISigner;

  /**
   * Identity resolver this scheme uses, taken from the registered ones.
   */
  identityResolver(lookup: IdentityResolverLookup): IIdentityResolver | undefined;

  /**
   * Properties of the option built for this scheme. Empty when omitted.
   */
  optionProperties?(config: ConfigBag): ConfigLayer;
}
