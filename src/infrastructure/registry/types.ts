/**
 * @squadline/runtime - Registry Types
 *
 * Capabilities are a closed set of tagged variants. Every registry stores
 * one variant, wrapped in a `RegistryItem` with its metadata.
 */

import type { Constructor } from '../../application/di/IDependencyInjection';

/**
 * Registry kinds
 */
export type RegistryKind = 'tool' | 'command' | 'service';

/**
 * What a capability sees about the message being handled
 */
export interface CapabilityContext {
  teamId: string;
  conversationId: string;
  senderId: string;
}

/**
 * Tool callable by the natural-language layer
 */
export interface ToolCapability {
  readonly kind: 'tool';
  readonly name: string;
  readonly description: string;
  execute(input: Record<string, unknown>, context: CapabilityContext): Promise<string>;
}

export type CommandPermission = 'public' | 'player' | 'leadership' | 'admin';

/**
 * Slash command, e.g. `/list`
 */
export interface CommandCapability {
  readonly kind: 'command';
  /** Always starts with `/` */
  readonly name: string;
  readonly description: string;
  readonly permission?: CommandPermission;
  handler(args: string[], context: CapabilityContext): Promise<string>;
}

/**
 * Service offered to the DI container
 */
export interface ServiceCapability {
  readonly kind: 'service';
  readonly name: string;
  readonly description?: string;
  /** Name of the interface the service implements */
  readonly interfaceName: string;
  readonly implementation?: Constructor<unknown>;
  readonly factory?: () => unknown;
}

export type Capability = ToolCapability | CommandCapability | ServiceCapability;

/**
 * Capability variant stored by a registry of kind `K`
 */
export type CapabilityOf<K extends RegistryKind> = Extract<Capability, { kind: K }>;

/**
 * Metadata accepted by `register`. Known keys are typed; anything else is
 * kept verbatim in `RegistryItem.metadata`.
 */
export interface RegistrationMetadata {
  version?: string;
  enabled?: boolean;
  dependencies?: string[];
  tags?: string[];
  [key: string]: unknown;
}

/**
 * A registered capability with its metadata
 */
export interface RegistryItem<T extends Capability = Capability> {
  name: string;
  item: T;
  metadata: Record<string, unknown>;
  kind: RegistryKind;
  /** Semver `X.Y.Z` */
  version: string;
  enabled: boolean;
  dependencies: string[];
  tags: string[];
  registeredAt: Date;
}

export interface RegisterOptions {
  /** Overwrite an existing item of the same name */
  replace?: boolean;
  /** Skip silently when the name is taken */
  tryAdd?: boolean;
}

/**
 * Filter for `list`
 */
export interface RegistryQuery {
  kind?: RegistryKind;
  enabled?: boolean;
  tag?: string;
}

/**
 * Counts reported by `getStatistics`
 */
export interface RegistryStatistics {
  name: string;
  kind: RegistryKind;
  itemCount: number;
  aliasCount: number;
  enabledCount: number;
}
