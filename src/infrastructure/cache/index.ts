/**
 * @wirebound/core - Cache Module
 */

export { CacheManager } from './CacheManager';
export type { CacheStats, CacheTtl } from './CacheManager';

export {
  IdentityCache,
  NoIdentityCache,
  cachePartition,
  DEFAULT_BUFFER_TIME_MS,
  DEFAULT_EXPIRATION_MS,
} from './IdentityCache';
export type { IdentityCacheOptions, IIdentityCache } from './IdentityCache';
