/**
 * @squadline/runtime - Registry Manager
 *
 * Owns the tool, command and service registries and runs system-wide
 * discovery, search and health checks over them.
 */

import { consoleLogger, type ILogger } from '../../application/host/host';
import { CommandRegistry, ServiceRegistry, ToolRegistry, type AnyRegistry, type DiscoveryResult } from './BaseRegistry';
import { EXTENSION_GROUPS, ExtensionPointCatalog } from './ExtensionPoints';
import { RegistryMonitor } from './RegistryMonitor';
import { RegistryValidator } from './RegistryValidator';
import type { RegistryItem, RegistryStatistics } from './types';

export interface RegistryManagerOptions {
  logger?: ILogger;
  catalog?: ExtensionPointCatalog;
  monitor?: RegistryMonitor;
  validator?: RegistryValidator;
}

export interface SystemStatistics {
  totalRegistries: number;
  totalItems: number;
  registries: Record<string, RegistryStatistics>;
}

export interface SearchResults {
  tools: RegistryItem[];
  commands: RegistryItem[];
  services: RegistryItem[];
}

export interface HealthReport {
  status: 'healthy' | 'unhealthy';
  issues: string[];
  recommendations: string[];
}

export interface DiscoverySummary {
  succeeded: number;
  failed: number;
  byRegistry: Record<string, DiscoveryResult>;
}

function matches(registered: RegistryItem, query: string): boolean {
  const description = registered.item.description ?? '';
  return (
    registered.name.toLowerCase().includes(query) ||
    description.toLowerCase().includes(query) ||
    registered.tags.some((tag) => tag.toLowerCase().includes(query))
  );
}

/**
 * RegistryManager
 *
 * @example
 * ```typescript
 * const manager = new RegistryManager({ catalog });
 * await manager.initialize();
 *
 * const health = manager.healthCheck();
 * if (health.status === 'unhealthy') logger.warn(health.issues.join('\n'));
 * ```
 */
export class RegistryManager {
  readonly tools: ToolRegistry;
  readonly commands: CommandRegistry;
  readonly services: ServiceRegistry;
  readonly catalog: ExtensionPointCatalog;
  readonly monitor: RegistryMonitor;
  readonly validator: RegistryValidator;

  private readonly logger: ILogger;
  private initialization: Promise<DiscoverySummary> | null = null;

  constructor(options: RegistryManagerOptions = {}) {
    this.logger = options.logger ?? consoleLogger;
    this.catalog = options.catalog ?? new ExtensionPointCatalog();
    this.monitor = options.monitor ?? new RegistryMonitor();
    this.validator = options.validator ?? new RegistryValidator();

    const registryOptions = {
      logger: this.logger,
      catalog: this.catalog,
      monitor: this.monitor,
      validator: this.validator,
    };
    this.tools = new ToolRegistry(registryOptions);
    this.commands = new CommandRegistry(registryOptions);
    this.services = new ServiceRegistry(registryOptions);
  }

  /**
   * Discover each group from the catalog, then run each registry's hooks.
   * Repeated calls share the first run.
   */
  initialize(): Promise<DiscoverySummary> {
    if (!this.initialization) {
      this.initialization = this.discoverAll();
    }
    return this.initialization;
  }

  get isInitialized(): boolean {
    return this.initialization !== null;
  }

  registries(): Array<AnyRegistry> {
    return [this.tools, this.commands, this.services];
  }

  getSystemStatistics(): SystemStatistics {
    const registries: Record<string, RegistryStatistics> = {};
    let totalItems = 0;
    for (const registry of this.registries()) {
      const statistics = registry.getStatistics();
      registries[registry.name] = statistics;
      totalItems += statistics.itemCount;
    }
    return { totalRegistries: this.registries().length, totalItems, registries };
  }

  /**
   * Case-insensitive substring match on name, description and tags
   */
  search(query: string): SearchResults {
    const needle = query.trim().toLowerCase();
    const find = (registry: AnyRegistry): RegistryItem[] => {
      const items: RegistryItem[] = registry.list();
      return needle.length === 0 ? [] : items.filter((registered) => matches(registered, needle));
    };

    return {
      tools: find(this.tools),
      commands: find(this.commands),
      services: find(this.services),
    };
  }

  /**
   * Dependencies named in item metadata that no registry provides
   * (errors) or that are disabled (warnings)
   */
  validateDependencies(): { errors: string[]; warnings: string[] } {
    const errors: string[] = [];
    const warnings: string[] = [];

    for (const registry of this.registries()) {
      for (const registered of registry.list()) {
        for (const dependency of registered.dependencies) {
          const target = this.findItem(dependency);
          if (!target) {
            errors.push(`${registry.kind} '${registered.name}' depends on missing item '${dependency}'`);
          } else if (!target.enabled) {
            warnings.push(`${registry.kind} '${registered.name}' depends on disabled item '${dependency}'`);
          }
        }
      }
    }

    return { errors, warnings };
  }

  healthCheck(): HealthReport {
    const issues: string[] = [];
    const recommendations: string[] = [];

    for (const registry of this.registries()) {
      issues.push(...registry.validate().map((error) => `[${registry.name}] ${error}`));

      for (const issue of this.validator.validateRegistry(registry)) {
        const line = `[${registry.name}] ${issue.field}: ${issue.message}`;
        if (issue.severity === 'error') {
          issues.push(line);
        } else {
          recommendations.push(line);
        }
      }

      if (registry.getStatistics().itemCount === 0) {
        recommendations.push(`Registry ${registry.name} is empty - consider adding items`);
      }
    }

    const dependencies = this.validateDependencies();
    issues.push(...dependencies.errors);
    recommendations.push(...dependencies.warnings);

    return { status: issues.length === 0 ? 'healthy' : 'unhealthy', issues, recommendations };
  }

  cleanup(): void {
    for (const registry of this.registries()) {
      registry.cleanup();
    }
    this.initialization = null;
  }

  private findItem(name: string): RegistryItem | undefined {
    for (const registry of this.registries()) {
      const registered = registry.getItem(name);
      if (registered) return registered;
    }
    return undefined;
  }

  private async discoverAll(): Promise<DiscoverySummary> {
    const summary: DiscoverySummary = { succeeded: 0, failed: 0, byRegistry: {} };
    const plan: Array<[AnyRegistry, string]> = [
      [this.tools, EXTENSION_GROUPS.tools],
      [this.commands, EXTENSION_GROUPS.commands],
      [this.services, EXTENSION_GROUPS.services],
    ];

    for (const [registry, group] of plan) {
      const fromCatalog = await registry.discoverFromEntryPoints(group);
      const fromHooks = await registry.runDiscoveryHooks();
      const result: DiscoveryResult = {
        succeeded: fromCatalog.succeeded + fromHooks.succeeded,
        failed: fromCatalog.failed + fromHooks.failed,
        errors: [...fromCatalog.errors, ...fromHooks.errors],
      };
      summary.byRegistry[registry.name] = result;
      summary.succeeded += result.succeeded;
      summary.failed += result.failed;
    }

    this.logger.info(
      `Registries initialized: ${summary.succeeded} discovery step(s) succeeded, ${summary.failed} failed`,
    );
    return summary;
  }
}
