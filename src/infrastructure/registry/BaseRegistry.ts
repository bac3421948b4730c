/**
 * @squadline/runtime - Base Registry
 *
 * Named capabilities of one kind, with aliases, discovery and validation.
 */

import { ConfigurationError, DiscoveryLoadError, DuplicateRegistrationError, describeError } from '../../domain/exceptions';
import { consoleLogger, type ILogger } from '../../application/host/host';
import type { ExtensionPointCatalog } from './ExtensionPoints';
import type { RegistryMonitor } from './RegistryMonitor';
import type { RegistryValidator, ValidatableRegistry } from './RegistryValidator';
import type {
  Capability,
  CapabilityOf,
  RegisterOptions,
  RegistrationMetadata,
  RegistryItem,
  RegistryKind,
  RegistryQuery,
  RegistryStatistics,
} from './types';

export const DEFAULT_ITEM_VERSION = '1.0.0';

/**
 * Callback that adds registrations to a registry
 */
export type DiscoveryHook<K extends RegistryKind> = (registry: BaseRegistry<K>) => void | Promise<void>;

export interface DiscoveryResult {
  succeeded: number;
  failed: number;
  errors: DiscoveryLoadError[];
}

export interface BaseRegistryOptions {
  logger?: ILogger;
  /** Checks metadata before each registration */
  validator?: RegistryValidator;
  /** Records lookups and item counts */
  monitor?: RegistryMonitor;
  /** Source for `discoverFromEntryPoints` */
  catalog?: ExtensionPointCatalog;
  now?: () => Date;
}

interface NamedHook {
  name: string;
  run: () => void | Promise<void>;
}

/**
 * Fields of a capability, in the shape the validator reads
 */
export function describeCapability(capability: Capability): Record<string, unknown> {
  const view: Record<string, unknown> = { name: capability.name, description: capability.description };
  switch (capability.kind) {
    case 'command':
      view.handler = capability.handler;
      view.permission = capability.permission;
      break;
    case 'service':
      view.interface = capability.interfaceName;
      view.implementation = capability.implementation;
      view.factory = capability.factory;
      break;
    case 'tool':
      break;
  }

  for (const key of Object.keys(view)) {
    if (view[key] === undefined) delete view[key];
  }
  return view;
}

/**
 * BaseRegistry
 *
 * @example
 * ```typescript
 * const commands = new CommandRegistry({ validator, monitor });
 * commands.register('/list', listCommand, { tags: ['players'] });
 * commands.addAlias('/ls', '/list');
 *
 * commands.get('/ls'); // listCommand
 * ```
 */
export class BaseRegistry<K extends RegistryKind> implements ValidatableRegistry {
  protected items: Map<string, RegistryItem<CapabilityOf<K>>> = new Map();
  protected aliases: Map<string, string> = new Map();
  private hooks: NamedHook[] = [];

  protected readonly logger: ILogger;
  private readonly validator?: RegistryValidator;
  private readonly monitor?: RegistryMonitor;
  private readonly catalog?: ExtensionPointCatalog;
  private readonly now: () => Date;

  constructor(
    readonly name: string,
    readonly kind: K,
    options: BaseRegistryOptions = {},
  ) {
    this.logger = options.logger ?? consoleLogger;
    this.validator = options.validator;
    this.monitor = options.monitor;
    this.catalog = options.catalog;
    this.now = options.now ?? (() => new Date());
  }

  // ==================== Registration ====================

  /**
   * Register `item` under `name`
   *
   * @returns false when `tryAdd` skipped an existing name
   * @throws DuplicateRegistrationError - name taken and neither `replace` nor `tryAdd` set
   * @throws ConfigurationError - the item kind differs from the registry's, `name` differs from the
   * item's own name, or validation failed
   */
  register(
    name: string,
    item: CapabilityOf<K>,
    metadata: RegistrationMetadata = {},
    options: RegisterOptions = {},
  ): boolean {
    if (item.kind !== this.kind) {
      throw new ConfigurationError(
        `Cannot register ${item.kind} '${name}' in ${this.kind} registry '${this.name}'`,
        { registry: this.name, item: name },
      );
    }

    if (item.name !== name) {
      throw new ConfigurationError(
        `Cannot register ${this.kind} '${item.name}' under the name '${name}' in registry '${this.name}'`,
        { registry: this.name, item: name },
      );
    }

    if (this.items.has(name) && !options.replace) {
      if (options.tryAdd) {
        this.logger.debug(`[${this.name}] '${name}' already registered, skipping`);
        return false;
      }
      throw new DuplicateRegistrationError(this.name, name);
    }

    if (this.validator) {
      const issues = this.validator.validateMetadata(this.kind, { ...metadata, ...describeCapability(item) });
      for (const warning of issues.filter((issue) => issue.severity === 'warning')) {
        this.logger.warn(`[${this.name}] '${name}': ${warning.field}: ${warning.message}`);
      }
      const errors = issues.filter((issue) => issue.severity === 'error');
      if (errors.length > 0) {
        throw new ConfigurationError(
          `Invalid ${this.kind} '${name}': ${errors.map((issue) => `${issue.field}: ${issue.message}`).join('; ')}`,
          { registry: this.name, item: name, issues: errors },
        );
      }
    }

    const { version, enabled, dependencies, tags } = metadata;
    this.items.set(name, {
      name,
      item,
      metadata: { ...metadata },
      kind: this.kind,
      version: version ?? DEFAULT_ITEM_VERSION,
      enabled: enabled ?? true,
      dependencies: dependencies ? [...dependencies] : [],
      tags: tags ? [...tags] : [],
      registeredAt: this.now(),
    });

    this.logger.debug(`[${this.name}] Registered ${this.kind} '${name}'`);
    this.onItemsChanged();
    return true;
  }

  unregister(name: string): boolean {
    const existed = this.items.delete(name);
    if (existed) {
      this.logger.debug(`[${this.name}] Unregistered '${name}'`);
      this.onItemsChanged();
    }
    return existed;
  }

  /**
   * Enable or disable an item; disabled items are invisible to `get`
   *
   * @returns false when no item has that name
   */
  setEnabled(name: string, enabled: boolean): boolean {
    const registered = this.items.get(name);
    if (!registered) return false;
    registered.enabled = enabled;
    return true;
  }

  /**
   * Make `alias` resolve to `target`. `target` may itself be an alias.
   */
  addAlias(alias: string, target: string): void {
    if (alias === target) {
      throw new ConfigurationError(`Alias '${alias}' cannot point to itself`, { registry: this.name });
    }
    this.aliases.set(alias, target);
  }

  removeAlias(alias: string): boolean {
    return this.aliases.delete(alias);
  }

  // ==================== Lookup ====================

  /**
   * Enabled item by name or alias. The lookup is recorded with the monitor.
   */
  get(name: string): CapabilityOf<K> | undefined {
    const startedAt = performance.now();
    const registered = this.lookup(name);
    const item = registered?.enabled ? registered.item : undefined;
    this.monitor?.recordRequest(this.name, name, item !== undefined, performance.now() - startedAt);
    return item;
  }

  /**
   * Item with its metadata, by name or alias, enabled or not
   */
  getItem(name: string): RegistryItem<CapabilityOf<K>> | undefined {
    return this.lookup(name);
  }

  has(name: string): boolean {
    return this.lookup(name) !== undefined;
  }

  list(query: RegistryQuery = {}): RegistryItem<CapabilityOf<K>>[] {
    return Array.from(this.items.values()).filter(
      (registered) =>
        (query.kind === undefined || registered.kind === query.kind) &&
        (query.enabled === undefined || registered.enabled === query.enabled) &&
        (query.tag === undefined || registered.tags.includes(query.tag)),
    );
  }

  names(): string[] {
    return Array.from(this.items.keys());
  }

  /**
   * Metadata of every item merged with its capability fields
   */
  entries(): Array<{ name: string; metadata: Record<string, unknown> }> {
    return Array.from(this.items.values(), (registered) => ({
      name: registered.name,
      metadata: { ...registered.metadata, ...describeCapability(registered.item) },
    }));
  }

  /**
   * Follow aliases until an item is reached; undefined on a dangling alias
   * or a cycle
   */
  private lookup(name: string): RegistryItem<CapabilityOf<K>> | undefined {
    const direct = this.items.get(name);
    if (direct) return direct;

    const visited = new Set<string>([name]);
    let current = this.aliases.get(name);
    while (current !== undefined) {
      const registered = this.items.get(current);
      if (registered) return registered;
      if (visited.has(current)) return undefined;
      visited.add(current);
      current = this.aliases.get(current);
    }
    return undefined;
  }

  // ==================== Discovery ====================

  addDiscoveryHook(hook: DiscoveryHook<K>, name = `hook-${this.hooks.length + 1}`): void {
    this.hooks.push({ name, run: () => hook(this) });
  }

  /**
   * Run every discovery hook in the order added. A failing hook is logged
   * and the rest still run.
   */
  async runDiscoveryHooks(): Promise<DiscoveryResult> {
    const result: DiscoveryResult = { succeeded: 0, failed: 0, errors: [] };

    for (const { name, run } of this.hooks) {
      try {
        await run();
        result.succeeded++;
      } catch (error) {
        this.recordDiscoveryFailure(result, new DiscoveryLoadError(`${this.name}:hooks`, name, error));
      }
    }

    return result;
  }

  /**
   * Load every entry of `group` from the extension point catalog and
   * register what it yields. A failing loader is logged and isolated.
   */
  async discoverFromEntryPoints(group: string): Promise<DiscoveryResult> {
    const result: DiscoveryResult = { succeeded: 0, failed: 0, errors: [] };
    if (!this.catalog) {
      this.logger.debug(`[${this.name}] No extension point catalog; nothing to discover in '${group}'`);
      return result;
    }

    for (const entry of this.catalog.entries(group)) {
      try {
        const loaded = await entry.load();
        const capabilities = Array.isArray(loaded) ? loaded : [loaded];
        for (const capability of capabilities) {
          if (!this.isOwnKind(capability)) {
            throw new ConfigurationError(
              `Entry yielded a ${capability.kind} '${capability.name}' for ${this.kind} registry '${this.name}'`,
            );
          }
          this.register(capability.name, capability, {}, { tryAdd: true });
        }
        result.succeeded++;
      } catch (error) {
        this.recordDiscoveryFailure(result, new DiscoveryLoadError(group, entry.name, error));
      }
    }

    this.logger.info(
      `[${this.name}] Discovery of '${group}': ${result.succeeded} loaded, ${result.failed} failed`,
    );
    return result;
  }

  private isOwnKind(capability: Capability): capability is CapabilityOf<K> {
    return capability.kind === this.kind;
  }

  private recordDiscoveryFailure(result: DiscoveryResult, error: DiscoveryLoadError): void {
    result.failed++;
    result.errors.push(error);
    this.logger.error(`[${this.name}] ${describeError(error)}`);
  }

  // ==================== Diagnostics ====================

  /**
   * Consistency problems: case-insensitive name collisions, aliases that
   * shadow items, alias cycles and dangling aliases
   */
  validate(): string[] {
    const errors: string[] = [];

    const seen = new Map<string, string>();
    for (const name of this.items.keys()) {
      const folded = name.toLowerCase();
      const previous = seen.get(folded);
      if (previous !== undefined) {
        errors.push(`Duplicate name: '${previous}' and '${name}' differ only in case`);
      } else {
        seen.set(folded, name);
      }
    }

    for (const [alias, target] of this.aliases) {
      if (this.items.has(alias)) {
        errors.push(`Duplicate name: alias '${alias}' shadows a registered item`);
        continue;
      }

      const chain = [alias];
      let current: string | undefined = target;
      while (current !== undefined && !this.items.has(current)) {
        if (chain.includes(current)) {
          // Report each cycle once, from its smallest member
          const cycle = chain.slice(chain.indexOf(current));
          if (current === alias && cycle.every((member) => alias <= member)) {
            errors.push(`Circular alias: ${[...cycle, current].join(' -> ')}`);
          }
          break;
        }
        chain.push(current);
        current = this.aliases.get(current);
      }

      if (current === undefined) {
        errors.push(`Alias '${alias}' points to unknown item '${chain[chain.length - 1]}'`);
      }
    }

    return errors;
  }

  getStatistics(): RegistryStatistics {
    return {
      name: this.name,
      kind: this.kind,
      itemCount: this.items.size,
      aliasCount: this.aliases.size,
      enabledCount: this.list({ enabled: true }).length,
    };
  }

  /**
   * Drop every item, alias and discovery hook
   */
  cleanup(): void {
    this.items.clear();
    this.aliases.clear();
    this.hooks = [];
    this.onItemsChanged();
  }

  private onItemsChanged(): void {
    this.monitor?.recordItemCount(this.name, this.items.size);
  }
}

/**
 * Tools callable by the natural-language layer
 */
export class ToolRegistry extends BaseRegistry<'tool'> {
  constructor(options: BaseRegistryOptions = {}) {
    super('tools', 'tool', options);
  }
}

/**
 * Slash commands
 */
export class CommandRegistry extends BaseRegistry<'command'> {
  constructor(options: BaseRegistryOptions = {}) {
    super('commands', 'command', options);
  }

  /**
   * Command for a chat message's first word, e.g. `/list` in `"/list all"`.
   * The word is tried as typed, then lowercased.
   */
  match(text: string): CapabilityOf<'command'> | undefined {
    const [word] = text.trim().split(/\s+/, 1);
    if (!word?.startsWith('/')) return undefined;
    return this.get(this.has(word) ? word : word.toLowerCase());
  }
}

/**
 * Services offered to the DI container
 */
export class ServiceRegistry extends BaseRegistry<'service'> {
  constructor(options: BaseRegistryOptions = {}) {
    super('services', 'service', options);
  }
}

export type AnyRegistry = ToolRegistry | CommandRegistry | ServiceRegistry;
