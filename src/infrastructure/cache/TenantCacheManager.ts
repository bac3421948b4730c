/**
 * @squadline/runtime - Tenant Cache Manager
 *
 * Typed facade over one `TTLCache` for the per-tenant hot data: team
 * configuration, player list and invite link.
 */

import type { InviteLink, PlayerSummary, TenantConfig } from '../../domain/tenancy';
import { silentLogger, type ILogger } from '../../application/host/host';
import { TTLCache, type CacheStats } from './TTLCache';

/**
 * Kinds of tenant data held in the cache
 */
export type TenantCacheKind = 'tenant_config' | 'player_list' | 'invite_link';

/**
 * Values are stored tagged with their kind so reads narrow without casts
 */
export type TenantCacheValue =
  | { kind: 'tenant_config'; value: TenantConfig }
  | { kind: 'player_list'; value: PlayerSummary[] }
  | { kind: 'invite_link'; value: InviteLink };

/**
 * Default TTL per kind, in milliseconds
 */
export const TENANT_CACHE_TTLS: Readonly<Record<TenantCacheKind, number>> = {
  tenant_config: 10 * 60 * 1000,
  player_list: 5 * 60 * 1000,
  invite_link: 60 * 60 * 1000,
};

const KINDS: readonly TenantCacheKind[] = ['tenant_config', 'player_list', 'invite_link'];

/**
 * Build the namespaced key, e.g. `player_list:TEAMA`
 */
export function tenantCacheKey(kind: TenantCacheKind, id: string): string {
  return `${kind}:${id}`;
}

export interface TenantCacheManagerOptions {
  /** Underlying cache; one is created when omitted */
  cache?: TTLCache<TenantCacheValue>;
  /** Per-kind TTL overrides */
  ttls?: Partial<Record<TenantCacheKind, number>>;
  logger?: ILogger;
}

/**
 * TenantCacheManager
 *
 * @example
 * ```typescript
 * const tenantCache = new TenantCacheManager();
 *
 * const config = await tenantCache.getOrLoadTenantConfig('TEAMA', () =>
 *   teamRepository.getConfig('TEAMA'),
 * );
 *
 * // After an admin edits the team
 * await tenantCache.invalidateTenant('TEAMA');
 * ```
 */
export class TenantCacheManager {
  readonly cache: TTLCache<TenantCacheValue>;
  private readonly ttls: Record<TenantCacheKind, number>;
  private readonly logger: ILogger;

  constructor(options: TenantCacheManagerOptions = {}) {
    this.cache = options.cache ?? new TTLCache<TenantCacheValue>();
    this.ttls = { ...TENANT_CACHE_TTLS, ...options.ttls };
    this.logger = options.logger ?? silentLogger;
  }

  async getTenantConfig(teamId: string): Promise<TenantConfig | undefined> {
    const cached = await this.read('tenant_config', teamId);
    return cached?.kind === 'tenant_config' ? cached.value : undefined;
  }

  async setTenantConfig(teamId: string, config: TenantConfig, ttlMs?: number): Promise<void> {
    await this.write({ kind: 'tenant_config', value: config }, teamId, ttlMs);
  }

  /**
   * Cached config, or the loader's result cached for next time.
   * A loader returning `undefined` (unknown team) is not cached.
   */
  async getOrLoadTenantConfig(
    teamId: string,
    loader: () => Promise<TenantConfig | undefined>,
  ): Promise<TenantConfig | undefined> {
    const cached = await this.getTenantConfig(teamId);
    if (cached) return cached;

    const loaded = await loader();
    if (loaded) {
      await this.setTenantConfig(teamId, loaded);
    }
    return loaded;
  }

  async getPlayerList(teamId: string): Promise<PlayerSummary[] | undefined> {
    const cached = await this.read('player_list', teamId);
    return cached?.kind === 'player_list' ? cached.value : undefined;
  }

  async setPlayerList(teamId: string, players: PlayerSummary[], ttlMs?: number): Promise<void> {
    await this.write({ kind: 'player_list', value: players }, teamId, ttlMs);
  }

  async getInviteLink(teamId: string): Promise<InviteLink | undefined> {
    const cached = await this.read('invite_link', teamId);
    return cached?.kind === 'invite_link' ? cached.value : undefined;
  }

  async setInviteLink(teamId: string, link: InviteLink, ttlMs?: number): Promise<void> {
    await this.write({ kind: 'invite_link', value: link }, teamId, ttlMs);
  }

  /**
   * Drop every cached entry of a tenant
   *
   * @returns number of entries removed
   */
  async invalidateTenant(teamId: string): Promise<number> {
    let removed = 0;
    for (const kind of KINDS) {
      if (await this.cache.delete(tenantCacheKey(kind, teamId))) removed++;
    }
    this.logger.info(`Invalidated ${removed} cache entries for team ${teamId}`);
    return removed;
  }

  async getStats(): Promise<CacheStats> {
    return this.cache.getStats();
  }

  private async read(kind: TenantCacheKind, id: string): Promise<TenantCacheValue | undefined> {
    const key = tenantCacheKey(kind, id);
    const cached = await this.cache.get(key);
    this.logger.debug(`Cache ${cached ? 'HIT' : 'MISS'}: ${key}`);
    return cached;
  }

  private async write(entry: TenantCacheValue, id: string, ttlMs?: number): Promise<void> {
    const key = tenantCacheKey(entry.kind, id);
    await this.cache.set(key, entry, ttlMs ?? this.ttls[entry.kind]);
    this.logger.debug(`Cache SET: ${key}`);
  }
}
