/**
 * @fileoverview Dependency Injection Contracts
 *
 * @packageDocumentation
 * @module @squadline/runtime/application/di
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * Registration and resolution contracts for the runtime's DI container.
 *
 * ## Lifetimes
 *
 * | Scope       | Instance shared by                    | Dropped when            |
 * |-------------|---------------------------------------|-------------------------|
 * | `singleton` | every resolve, for the container life | `cleanup()`             |
 * | `transient` | nobody; new on every resolve          | caller lets go          |
 * | `request`   | resolves inside one request scope     | `endRequestScope()`     |
 *
 * One inbound chat message is one request scope.
 *
 * ## Auto-wiring without reflection
 *
 * TypeScript erases interfaces and parameter types, so the container never
 * inspects constructors. Each registration lists its dependencies
 * explicitly, either on the registration call or through `@Injectable`:
 *
 * ```typescript
 * @Injectable({ scope: ServiceScope.Request, dependencies: [PlayerRepository, TenantCacheToken] })
 * class PlayerService {
 *   constructor(
 *     private readonly players: PlayerRepository,
 *     private readonly cache: TenantCacheManager,
 *   ) {}
 * }
 * ```
 *
 * A `null` entry stands for an unannotated parameter: the container passes
 * `undefined` so the constructor's default value applies.
 */

import 'reflect-metadata';

/**
 * Class constructor of `T`.
 *
 * @remarks
 * `any[]` is required here: a constructor with typed parameters is only
 * assignable to a construct signature whose rest parameter accepts them.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Constructor<T> = new (...args: any[]) => T;

/**
 * Abstract class usable as a service key (an "interface" with a runtime
 * identity).
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type AbstractConstructor<T> = abstract new (...args: any[]) => T;

/**
 * Typed token for services that have no class to key them by
 * (plain interfaces, configuration objects, primitives).
 *
 * @example
 * ```typescript
 * export const DocumentStoreToken = new InjectionToken<IDocumentStore>('IDocumentStore');
 * container.addInstance(DocumentStoreToken, new InMemoryDocumentStore());
 * const store = container.resolve(DocumentStoreToken); // IDocumentStore
 * ```
 */
export class InjectionToken<T> {
  /** Phantom field carrying `T`; never set at run time */
  declare readonly __type?: T;

  constructor(readonly description: string) {}

  toString(): string {
    return `InjectionToken(${this.description})`;
  }
}

/**
 * Key a service is registered and resolved under
 */
export type ServiceIdentifier<T> = Constructor<T> | AbstractConstructor<T> | InjectionToken<T>;

/**
 * A declared constructor dependency; `null` means "use the parameter's
 * default".
 */
export type DependencySpec = ServiceIdentifier<unknown> | null;

/**
 * Service lifetime scopes
 */
export enum ServiceScope {
  /** One instance for the container's lifetime */
  Singleton = 'singleton',

  /** A new instance on every resolve */
  Transient = 'transient',

  /** One instance per request scope (one inbound message) */
  Request = 'request',
}

/**
 * Factory function creating a service instance.
 * Factories bypass auto-wiring; they may use the provider to fetch what they
 * need, or ignore it.
 */
export type ServiceFactory<T> = (provider: IServiceProvider) => T | Promise<T>;

/**
 * Additional options for service registration
 */
export interface ServiceRegistrationOptions {
  /** Metadata tags for filtering and discovery */
  tags?: string[];

  /** Custom metadata for application-specific purposes */
  metadata?: Record<string, unknown>;
}

/**
 * Descriptor for a registered service
 */
export interface ServiceDescriptor<T = unknown> {
  /** Key used when resolving */
  serviceType: ServiceIdentifier<T>;

  /** Concrete class; optional when a factory is given */
  implementationType?: Constructor<T>;

  scope: ServiceScope;

  /** Used instead of constructor injection when present */
  factory?: ServiceFactory<T>;

  /**
   * Constructor dependencies in parameter order. When omitted, the
   * implementation's `@Injectable` metadata is used, then none.
   */
  dependencies?: DependencySpec[];

  options?: ServiceRegistrationOptions;
}

/**
 * Services that release resources when their scope ends
 */
export interface IDisposable {
  dispose(): void | Promise<void>;
}

/**
 * Registration side of the container (configuration phase, at startup)
 */
export interface IServiceCollection {
  addSingleton<T>(
    serviceType: ServiceIdentifier<T>,
    implementationType?: Constructor<T>,
    dependencies?: DependencySpec[],
  ): this;

  addTransient<T>(
    serviceType: ServiceIdentifier<T>,
    implementationType?: Constructor<T>,
    dependencies?: DependencySpec[],
  ): this;

  addRequestScoped<T>(
    serviceType: ServiceIdentifier<T>,
    implementationType?: Constructor<T>,
    dependencies?: DependencySpec[],
  ): this;

  addSingletonFactory<T>(serviceType: ServiceIdentifier<T>, factory: ServiceFactory<T>): this;

  addTransientFactory<T>(serviceType: ServiceIdentifier<T>, factory: ServiceFactory<T>): this;

  addRequestScopedFactory<T>(serviceType: ServiceIdentifier<T>, factory: ServiceFactory<T>): this;

  /**
   * Register a pre-built singleton
   */
  addInstance<T>(serviceType: ServiceIdentifier<T>, instance: T): this;

  /**
   * General form of every `add*` method
   */
  register<T>(descriptor: ServiceDescriptor<T>): this;

  getDescriptors(): ServiceDescriptor[];
}

/**
 * Resolution side of the container
 */
export interface IServiceProvider {
  /**
   * Resolve synchronously.
   *
   * @throws NotRegisteredError - identifier unknown
   * @throws DependencyResolutionError - construction of it or a dependency failed,
   *   or a factory returned a promise (use `resolveAsync`)
   */
  resolve<T>(serviceType: ServiceIdentifier<T>): T;

  /**
   * Resolve, awaiting async factories. Concurrent first resolves of a
   * singleton or request-scoped service construct it once.
   */
  resolveAsync<T>(serviceType: ServiceIdentifier<T>): Promise<T>;

  isRegistered(serviceType: ServiceIdentifier<unknown>): boolean;
}

/**
 * One request scope
 */
export interface IServiceScope {
  readonly id: string;

  /** Instances built in this scope so far */
  readonly size: number;

  /**
   * Drop every request instance, disposing those that are `IDisposable`
   */
  dispose(): Promise<void>;
}

/**
 * Counts reported by `getStatistics`
 */
export interface ContainerStatistics {
  registrations: number;
  singletons: number;
  requestInstances: number;
  activeScopeId: string | null;
}

const INJECTABLE_METADATA_KEY = Symbol('squadline:injectable');

/**
 * Metadata stored by `@Injectable`
 */
export interface InjectableOptions {
  scope?: ServiceScope;
  dependencies?: DependencySpec[];
}

/**
 * Mark a class as injectable and declare its lifetime and constructor
 * dependencies.
 *
 * @example
 * ```typescript
 * @Injectable({ scope: ServiceScope.Singleton, dependencies: [DocumentStoreToken] })
 * export class TeamRepository {
 *   constructor(private readonly store: IDocumentStore) {}
 * }
 *
 * container.addSingleton(TeamRepository); // dependencies come from the decorator
 * ```
 */
export function Injectable(options: InjectableOptions = {}): ClassDecorator {
  return (target) => {
    Reflect.defineMetadata(INJECTABLE_METADATA_KEY, options, target);
  };
}

/**
 * Read `@Injectable` metadata from a class
 */
export function getInjectableMetadata(target: object): InjectableOptions | undefined {
  const metadata: unknown = Reflect.getMetadata(INJECTABLE_METADATA_KEY, target);
  return isInjectableOptions(metadata) ? metadata : undefined;
}

function isInjectableOptions(value: unknown): value is InjectableOptions {
  return typeof value === 'object' && value !== null;
}

/**
 * Display name of an identifier, for errors and logs
 */
export function identifierName(serviceType: ServiceIdentifier<unknown>): string {
  if (serviceType instanceof InjectionToken) return serviceType.description;
  return serviceType.name || '<anonymous>';
}
