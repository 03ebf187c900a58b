/**
 * @wirebound/core - Identity Contracts
 *
 * An identity is the credential material a signer needs. Identities are
 * produced by resolvers, owned by the identity cache, and only borrowed by
 * the sign step of a single attempt.
 */

import type { ConfigBag } from '../config/ConfigBag';

/**
 * Resolved identity with optional expiry.
 *
 * @template T - Credential payload type
 */
export interface Identity<T = unknown> {
  readonly data: T;
  readonly expiration?: Date;
}

/**
 * Access-key style credentials used by request signing.
 */
export interface Credentials {
  readonly accessKeyId: string;
  readonly secretAccessKey: string;
  readonly sessionToken?: string;
  readonly accountId?: string;
}

/**
 * Bearer token.
 */
export interface Token {
  readonly token: string;
}

/**
 * API key.
 */
export interface ApiKey {
  readonly key: string;
}

/**
 * Identity used by unauthenticated operations.
 */
export interface Anonymous {
  readonly anonymous: true;
}

/**
 * Resolves identities for one auth scheme. May suspend (network, process).
 *
 * @template T - Credential payload type
 *
 * @example
 * ```typescript
 * const resolver: IIdentityResolver<Token> = {
 *   async resolveIdentity() {
 *     const { token, expiresAt } = await tokenService.fetch();
 *     return identity({ token }, expiresAt);
 *   },
 * };
 * ```
 */
export interface IIdentityResolver<T = unknown> {
  /**
   * Produce an identity.
   *
   * @throws {IdentityResolutionError} When no identity can be produced
   */
  resolveIdentity(config: ConfigBag): Promise<Identity<T>>;

  /**
   * Whether results may be shared through the identity cache.
   * @defaultValue true
   */
  readonly cacheable?: boolean;
}

/**
 * Build an identity value.
 */
export function identity<T>(data: T, expiration?: Date): Identity<T> {
  return expiration ? { data, expiration } : { data };
}

/**
 * Whether an identity has expired, or will within `bufferMs`.
 */
export function isExpired(value: Identity, now: Date, bufferMs: number = 0): boolean {
  if (!value.expiration) {
    return false;
  }
  return value.expiration.getTime() - bufferMs <= now.getTime();
}

// ==================== Type Guards ====================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function isCredentials(value: unknown): value is Credentials {
  return (
    isRecord(value) &&
    typeof value.accessKeyId === 'string' &&
    typeof value.secretAccessKey === 'string'
  );
}

export function isToken(value: unknown): value is Token {
  return isRecord(value) && typeof value.token === 'string';
}

export function isApiKey(value: unknown): value is ApiKey {
  return isRecord(value) && typeof value.key === 'string';
}
