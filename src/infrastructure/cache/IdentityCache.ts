/**
 * @wirebound/core - Identity Cache
 *
 * Shared, lazily populated cache of resolved identities. The cache is the
 * only mutable state shared between concurrent orchestrations.
 */

import type { ConfigBag } from '../../domain/config/ConfigBag';
import type { Identity, IIdentityResolver } from '../../domain/auth/IIdentity';
import type { ITimeSource } from '../../application/ports/runtime';
import { SystemTimeSource } from '../resilience/sleep';
import { CacheManager } from './CacheManager';

export const DEFAULT_BUFFER_TIME_MS = 10_000;
export const DEFAULT_EXPIRATION_MS = 15 * 60 * 1000;

export interface IdentityCacheOptions {
  /**
   * Identities this close to expiry are reloaded.
   * @defaultValue 10000
   */
  bufferTimeMs?: number;

  /**
   * Lifetime of identities that carry no expiration.
   * @defaultValue 900000
   */
  defaultExpirationMs?: number;

  /**
   * Maximum number of cached identities.
   * @defaultValue 64
   */
  capacity?: number;

  timeSource?: ITimeSource;
}

/**
 * Identity cache contract used by the orchestrator.
 */
export interface IIdentityCache {
  /**
   * Return the cached identity under `key` or load it.
   */
  resolve(key: string, loader: () => Promise<Identity>): Promise<Identity>;

  /**
   * Resolve through a resolver, keyed by the resolver instance.
   */
  resolveIdentity(resolver: IIdentityResolver, config: ConfigBag): Promise<Identity>;

  invalidate(key: string): void;
}

const partitions = new WeakMap<object, string>();
let nextPartition = 0;

/**
 * Stable cache key of a resolver instance.
 */
export function cachePartition(resolver: object): string {
  let partition = partitions.get(resolver);
  if (partition === undefined) {
    partition = `identity-resolver-${++nextPartition}`;
    partitions.set(resolver, partition);
  }
  return partition;
}

/**
 * Lazy identity cache.
 *
 * @example
 * ```typescript
 * const cache = new IdentityCache({ bufferTimeMs: 5000 });
 * const identity = await cache.resolveIdentity(tokenResolver, config);
 * ```
 */
export class IdentityCache implements IIdentityCache {
  readonly bufferTimeMs: number;
  readonly defaultExpirationMs: number;
  private readonly timeSource: ITimeSource;
  private readonly cache: CacheManager<string, Identity>;

  constructor(options: IdentityCacheOptions = {}) {
    this.bufferTimeMs = options.bufferTimeMs ?? DEFAULT_BUFFER_TIME_MS;
    this.defaultExpirationMs = options.defaultExpirationMs ?? DEFAULT_EXPIRATION_MS;
    this.timeSource = options.timeSource ?? new SystemTimeSource();
    this.cache = new CacheManager(options.capacity ?? 64, () => this.timeSource.now().getTime());
  }

  resolve(key: string, loader: () => Promise<Identity>): Promise<Identity> {
    return this.cache.getOrSet(key, loader, (value) => this.ttlOf(value));
  }

  resolveIdentity(resolver: IIdentityResolver, config: ConfigBag): Promise<Identity> {
    if (resolver.cacheable === false) {
      return resolver.resolveIdentity(config);
    }
    return this.resolve(cachePartition(resolver), () => resolver.resolveIdentity(config));
  }

  invalidate(key: string): void {
    this.cache.delete(key);
  }

  get size(): number {
    return this.cache.size;
  }

  private ttlOf(value: Identity): number {
    if (!value.expiration) {
      return this.defaultExpirationMs;
    }
    return value.expiration.getTime() - this.bufferTimeMs - this.timeSource.now().getTime();
  }
}

/**
 * Pass-through cache: every call loads.
 */
export class NoIdentityCache implements IIdentityCache {
  resolve(_key: string, loader: () => Promise<Identity>): Promise<Identity> {
    return loader();
  }

  resolveIdentity(resolver: IIdentityResolver, config: ConfigBag): Promise<Identity> {
    return resolver.resolveIdentity(config);
  }

  invalidate(): void {
    // nothing cached
  }
}
