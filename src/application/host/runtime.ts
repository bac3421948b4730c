/**
 * @squadline/runtime - Composition Root
 *
 * Builds every runtime component from validated settings and wires them
 * into a `RuntimeHost`.
 */

import type { Settings } from '../config/settings';
import { DependencyContainer, InjectionToken } from '../di';
import { InboundMessageHandler, type MessageProcessor } from '../messaging/InboundMessageHandler';
import type { IChatTransport, IDocumentStore } from '../ports';
import { TeamMappingService } from '../tenancy/TeamMappingService';
import { CacheSweepService, TTLCache, TenantCacheManager, type TenantCacheValue } from '../../infrastructure/cache';
import { ExtensionPointCatalog, RegistryManager } from '../../infrastructure/registry';
import { InMemoryDocumentStore } from '../../infrastructure/store';
import { RuntimeHost, createConsoleLogger, type ILogger } from './host';

export const SettingsToken = new InjectionToken<Settings>('Settings');
export const LoggerToken = new InjectionToken<ILogger>('ILogger');
export const DocumentStoreToken = new InjectionToken<IDocumentStore>('IDocumentStore');

export interface RuntimeOptions {
  name?: string;
  logger?: ILogger;
  /** Defaults to an `InMemoryDocumentStore` */
  store?: IDocumentStore;
  catalog?: ExtensionPointCatalog;
  transports?: IChatTransport[];
  /** Handles messages that are not slash commands */
  fallback?: MessageProcessor;
  /** Register business services before the container is validated */
  configureServices?: (container: DependencyContainer) => void;
  /** Load persisted team mappings on start (default true) */
  loadMappings?: boolean;
  gracefulShutdown?: boolean;
  /** Clock for cache expiry */
  now?: () => number;
}

export interface Runtime {
  readonly settings: Settings;
  readonly logger: ILogger;
  readonly host: RuntimeHost;
  readonly container: DependencyContainer;
  readonly store: IDocumentStore;
  readonly cache: TTLCache<TenantCacheValue>;
  readonly tenantCache: TenantCacheManager;
  readonly sweep: CacheSweepService;
  readonly registries: RegistryManager;
  readonly teamMapping: TeamMappingService;
  readonly handler: InboundMessageHandler;
  start(): Promise<void>;
  stop(): Promise<void>;
}

/**
 * Create the runtime. Nothing runs until `start()`, which validates the
 * container, discovers capabilities and loads team mappings before the
 * sweep and the transports start.
 *
 * @example
 * ```typescript
 * const runtime = createRuntime(loadSettings(), {
 *   store: firestoreStore,
 *   transports: [telegram],
 *   configureServices: (container) => {
 *     container.addRequestScoped(PlayerService, PlayerService, [DocumentStoreToken, TenantCacheManager]);
 *   },
 * });
 * await runtime.start();
 * ```
 */
export function createRuntime(settings: Settings, options: RuntimeOptions = {}): Runtime {
  const logger = options.logger ?? createConsoleLogger(settings.logLevel);
  const store = options.store ?? new InMemoryDocumentStore();

  const cache = new TTLCache<TenantCacheValue>({ defaultTtlMs: settings.cacheDefaultTtlMs, now: options.now });
  const tenantCache = new TenantCacheManager({ cache, logger });
  const sweep = new CacheSweepService(cache, settings.cacheSweepIntervalMs, logger);
  const registries = new RegistryManager({ logger, catalog: options.catalog ?? new ExtensionPointCatalog() });
  const teamMapping = new TeamMappingService(settings, { store, logger });

  const container = new DependencyContainer({ logger })
    .addInstance(SettingsToken, settings)
    .addInstance(LoggerToken, logger)
    .addInstance(DocumentStoreToken, store)
    .addInstance(TenantCacheManager, tenantCache)
    .addInstance(RegistryManager, registries)
    .addInstance(TeamMappingService, teamMapping);
  options.configureServices?.(container);

  const handler = new InboundMessageHandler({
    teamMapping,
    container,
    commands: registries.commands,
    fallback: options.fallback,
    logger,
  });

  const host = new RuntimeHost({
    name: options.name ?? 'squadline-runtime',
    logger,
    gracefulShutdown: options.gracefulShutdown,
  });

  host
    .addStartupTask('validate-container', () => container.assertValid())
    .addStartupTask('discover-capabilities', async () => {
      await registries.initialize();
      const health = registries.healthCheck();
      for (const issue of health.issues) logger.warn(`Registry issue: ${issue}`);
    })
    .addBackgroundService(sweep)
    .addShutdownTask('dispose-services', () => container.cleanup())
    .addShutdownTask('clear-cache', () => cache.clear())
    .addShutdownTask('clear-registries', () => registries.cleanup());

  if (options.loadMappings !== false) {
    host.addStartupTask('load-team-mappings', async () => {
      await teamMapping.loadMappingsFromStore();
    });
  }

  for (const transport of options.transports ?? []) {
    transport.onMessage(handler.listener());
    host.addTransport(transport);
  }

  return {
    settings,
    logger,
    host,
    container,
    store,
    cache,
    tenantCache,
    sweep,
    registries,
    teamMapping,
    handler,
    start: () => host.start(),
    stop: () => host.stop(),
  };
}
