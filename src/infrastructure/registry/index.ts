/**
 * @module @squadline/runtime/infrastructure/registry
 * @description Capability registries, discovery, validation and metrics
 */

export type {
  Capability,
  CapabilityContext,
  CapabilityOf,
  CommandCapability,
  CommandPermission,
  RegisterOptions,
  RegistrationMetadata,
  RegistryItem,
  RegistryKind,
  RegistryQuery,
  RegistryStatistics,
  ServiceCapability,
  ToolCapability,
} from './types';

export {
  BaseRegistry,
  ToolRegistry,
  CommandRegistry,
  ServiceRegistry,
  DEFAULT_ITEM_VERSION,
  describeCapability,
} from './BaseRegistry';
export type { AnyRegistry, BaseRegistryOptions, DiscoveryHook, DiscoveryResult } from './BaseRegistry';

export { ExtensionPointCatalog, EXTENSION_GROUPS } from './ExtensionPoints';
export type { ExtensionEntry, ExtensionGroup, ExtensionLoader } from './ExtensionPoints';

export { RegistryValidator } from './RegistryValidator';
export type { ValidatableRegistry, ValidationIssue, ValidationSeverity } from './RegistryValidator';

export { RegistryMonitor, LATENCY_WINDOW_SIZE } from './RegistryMonitor';
export type { PerformanceReport, RegistryMetrics, RegistryPerformance } from './RegistryMonitor';

export { RegistryManager } from './RegistryManager';
export type {
  DiscoverySummary,
  HealthReport,
  RegistryManagerOptions,
  SearchResults,
  SystemStatistics,
} from './RegistryManager';
