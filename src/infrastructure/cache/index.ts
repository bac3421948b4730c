/**
 * @squadline/runtime - Cache Module
 *
 * Expiring caches for tenant data
 */

export { TTLCache, CacheEntry } from './TTLCache';
export {
  TenantCacheManager,
  TENANT_CACHE_TTLS,
  tenantCacheKey,
} from './TenantCacheManager';
export { CacheSweepService, DEFAULT_SWEEP_INTERVAL_MS } from './CacheSweepService';

export type { CacheStats, TTLCacheOptions } from './TTLCache';
export type {
  TenantCacheKind,
  TenantCacheValue,
  TenantCacheManagerOptions,
} from './TenantCacheManager';
export type { Sweepable } from './CacheSweepService';
