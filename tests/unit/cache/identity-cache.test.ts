/**
 * @fileoverview Unit tests for the identity cache and the LRU cache behind it
 */

import {
  CacheManager,
  ConfigBag,
  IdentityCache,
  cachePartition,
  identity,
} from '../../../src';
import type { Identity, IIdentityResolver, ITimeSource, Token } from '../../../src';

const START = Date.parse('2024-01-15T12:00:00Z');

class ManualClock implements ITimeSource {
  constructor(public epochMs: number = START) {}

  now(): Date {
    return new Date(this.epochMs);
  }

  advance(ms: number): void {
    this.epochMs += ms;
  }
}

function countingResolver(expiration?: Date): { resolver: IIdentityResolver<Token>; calls: () => number } {
  let count = 0;
  const resolver: IIdentityResolver<Token> = {
    resolveIdentity: async () => {
      count++;
      return identity({ token: `token-${count}` }, expiration);
    },
  };
  return { resolver, calls: () => count };
}

describe('IdentityCache', () => {
  const config = ConfigBag.empty();
  let clock: ManualClock;
  let cache: IdentityCache;

  beforeEach(() => {
    clock = new ManualClock();
    cache = new IdentityCache({ timeSource: clock });
  });

  it('should load once and reuse the identity', async () => {
    const { resolver, calls } = countingResolver();

    const first = await cache.resolveIdentity(resolver, config);
    const second = await cache.resolveIdentity(resolver, config);

    expect(calls()).toBe(1);
    expect(second).toBe(first);
  });

  it('should share one load between concurrent callers', async () => {
    const { resolver, calls } = countingResolver();

    const [a, b] = await Promise.all([
      cache.resolveIdentity(resolver, config),
      cache.resolveIdentity(resolver, config),
    ]);

    expect(calls()).toBe(1);
    expect(a.data).toEqual({ token: 'token-1' });
    expect(b).toBe(a);
  });

  it('should reload identities within the buffer of their expiration', async () => {
    const { resolver, calls } = countingResolver(new Date(START + 60_000));

    await cache.resolveIdentity(resolver, config);
    clock.advance(49_999);
    await cache.resolveIdentity(resolver, config);
    expect(calls()).toBe(1);

    clock.advance(1);
    const reloaded = await cache.resolveIdentity(resolver, config);
    expect(calls()).toBe(2);
    expect(reloaded.data).toEqual({ token: 'token-2' });
  });

  it('should keep identities without expiration for the default lifetime', async () => {
    const { resolver, calls } = countingResolver();

    await cache.resolveIdentity(resolver, config);
    clock.advance(15 * 60 * 1000 - 1);
    await cache.resolveIdentity(resolver, config);
    clock.advance(1);
    await cache.resolveIdentity(resolver, config);

    expect(calls()).toBe(2);
  });

  it('should bypass the cache for non-cacheable resolvers', async () => {
    const resolveIdentity = jest.fn(async (): Promise<Identity> => identity({ anonymous: true }));
    const resolver: IIdentityResolver = { cacheable: false, resolveIdentity };

    await cache.resolveIdentity(resolver, config);
    await cache.resolveIdentity(resolver, config);

    expect(resolveIdentity).toHaveBeenCalledTimes(2);
    expect(cache.size).toBe(0);
  });

  it('should not cache failed loads', async () => {
    let attempts = 0;
    const resolver: IIdentityResolver<Token> = {
      resolveIdentity: async () => {
        attempts++;
        if (attempts === 1) {
          throw new Error('service unavailable');
        }
        return identity({ token: 'test-token' });
      },
    };

    await expect(cache.resolveIdentity(resolver, config)).rejects.toThrow('service unavailable');
    const result = await cache.resolveIdentity(resolver, config);

    expect(result.data).toEqual({ token: 'test-token' });
    expect(attempts).toBe(2);
  });

  it('should keep resolvers apart and allow invalidation', async () => {
    const first = countingResolver();
    const second = countingResolver();

    await cache.resolveIdentity(first.resolver, config);
    await cache.resolveIdentity(second.resolver, config);
    cache.invalidate(cachePartition(first.resolver));
    await cache.resolveIdentity(first.resolver, config);
    await cache.resolveIdentity(second.resolver, config);

    expect(first.calls()).toBe(2);
    expect(second.calls()).toBe(1);
    expect(cachePartition(first.resolver)).toBe(cachePartition(first.resolver));
    expect(cachePartition(first.resolver)).not.toBe(cachePartition(second.resolver));
  });
});

describe('CacheManager', () => {
  it('should evict the least recently used entry', () => {
    const cache = new CacheManager<string, number>(2);
    cache.set('a', 1);
    cache.set('b', 2);
    cache.get('a');
    cache.set('c', 3);

    expect(cache.keys()).toEqual(['a', 'c']);
    expect(cache.has('b')).toBe(false);
  });

  it('should expire entries by TTL', () => {
    let now = 1000;
    const cache = new CacheManager<string, string>(10, () => now);
    cache.set('short', 'x', 100);
    cache.set('forever', 'y');

    now = 1100;

    expect(cache.get('short')).toBeUndefined();
    expect(cache.get('forever')).toBe('y');
  });

  it('should prune expired entries', () => {
    let now = 0;
    const cache = new CacheManager<string, number>(10, () => now);
    cache.set('a', 1, 10);
    cache.set('b', 2, 20);
    cache.set('c', 3);

    now = 15;

    expect(cache.prune()).toBe(1);
    expect(cache.keys()).toEqual(['b', 'c']);
  });

  it('should track hits and misses', async () => {
    const cache = new CacheManager<string, number>(4);
    await cache.getOrSet('a', () => 1);
    await cache.getOrSet('a', () => 2);

    expect(cache.stats()).toEqual({
      hits: 1,
      misses: 1,
      size: 1,
      capacity: 4,
      hitRate: 0.5,
      inFlight: 0,
    });
  });
});
