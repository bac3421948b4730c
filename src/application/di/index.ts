/**
 * @module @squadline/runtime/application/di
 * @description Dependency Injection container exports
 */

// ============================================================================
// Contracts
// ============================================================================

export type {
  AbstractConstructor,
  Constructor,
  ContainerStatistics,
  DependencySpec,
  IDisposable,
  IServiceCollection,
  IServiceProvider,
  IServiceScope,
  InjectableOptions,
  ServiceDescriptor,
  ServiceFactory,
  ServiceIdentifier,
  ServiceRegistrationOptions,
} from './IDependencyInjection';

export {
  InjectionToken,
  ServiceScope,
  Injectable,
  getInjectableMetadata,
  identifierName,
} from './IDependencyInjection';

// ============================================================================
// Container
// ============================================================================

/**
 * @example
 * ```typescript
 * import { DependencyContainer, ServiceScope } from '@squadline/runtime/application/di';
 *
 * const container = new DependencyContainer({ logger });
 * container.addSingleton(TeamMappingService, TeamMappingService, [SettingsToken, DocumentStoreToken]);
 * container.assertValid();
 * ```
 */
export { DependencyContainer } from './DependencyContainer';
export type { DependencyContainerOptions } from './DependencyContainer';

export { RequestScope, InstanceStore, isDisposable } from './RequestScope';
