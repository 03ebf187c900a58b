/**
 * @wirebound/core - Static Identity Resolvers
 */

import { identity } from '../../domain/auth/IIdentity';
import type {
  Anonymous,
  ApiKey,
  Credentials,
  Identity,
  IIdentityResolver,
  Token,
} from '../../domain/auth/IIdentity';

/**
 * Always returns the same identity.
 */
export class StaticIdentityResolver<T> implements IIdentityResolver<T> {
  private readonly value: Identity<T>;

  constructor(data: T, expiration?: Date) {
    this.value = identity(data, expiration);
  }

  async resolveIdentity(): Promise<Identity<T>> {
    return this.value;
  }
}

export function staticCredentials(credentials: Credentials, expiration?: Date): IIdentityResolver<Credentials> {
  return new StaticIdentityResolver(credentials, expiration);
}

export function staticToken(token: string, expiration?: Date): IIdentityResolver<Token> {
  return new StaticIdentityResolver({ token }, expiration);
}

export function staticApiKey(key: string): IIdentityResolver<ApiKey> {
  return new StaticIdentityResolver({ key });
}

/**
 * Resolver of the anonymous identity. Never cached.
 */
export class AnonymousIdentityResolver implements IIdentityResolver<Anonymous> {
  readonly cacheable = false;

  async resolveIdentity(): Promise<Identity<Anonymous>> {
    return identity<Anonymous>({ anonymous: true });
  }
}
