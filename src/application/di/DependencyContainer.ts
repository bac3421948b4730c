/**
 * @squadline/runtime - Dependency Container
 *
 * Identifier → implementation bindings with singleton, transient and request
 * lifetimes, explicit-dependency auto-wiring and startup validation.
 */

import { AsyncLocalStorage } from 'async_hooks';
import {
  ConfigurationError,
  DependencyResolutionError,
  NotRegisteredError,
  describeError,
} from '../../domain/exceptions';
import { consoleLogger, type ILogger } from '../host/host';
import {
  ServiceScope,
  getInjectableMetadata,
  identifierName,
  type Constructor,
  type ContainerStatistics,
  type DependencySpec,
  type IServiceCollection,
  type IServiceProvider,
  type IServiceScope,
  type ServiceDescriptor,
  type ServiceFactory,
  type ServiceIdentifier,
} from './IDependencyInjection';
import { InstanceStore, RequestScope, disposeAll } from './RequestScope';

/**
 * A descriptor with its dependency list settled
 */
interface Registration<T> {
  descriptor: ServiceDescriptor<T>;
  dependencies: DependencySpec[];
}

type ResolutionPath = ServiceIdentifier<unknown>[];

export interface DependencyContainerOptions {
  logger?: ILogger;
}

function isClass<T>(serviceType: ServiceIdentifier<T>): serviceType is Constructor<T> {
  return typeof serviceType === 'function';
}

/**
 * DependencyContainer
 *
 * @example
 * ```typescript
 * const container = new DependencyContainer();
 *
 * container
 *   .addInstance(DocumentStoreToken, store)
 *   .addSingleton(TeamRepository, TeamRepository, [DocumentStoreToken])
 *   .addRequestScoped(PlayerService, PlayerService, [TeamRepository]);
 *
 * container.assertValid(); // fail fast before serving traffic
 *
 * await container.runInRequestScope(async () => {
 *   const players = container.resolve(PlayerService);
 *   // ...
 * });
 * ```
 */
export class DependencyContainer implements IServiceCollection, IServiceProvider {
  private registrations: Map<ServiceIdentifier<unknown>, Registration<unknown>> = new Map();
  private singletons = new InstanceStore();
  private defaultScope = new RequestScope();
  private readonly scopeStorage = new AsyncLocalStorage<RequestScope>();
  private readonly logger: ILogger;

  constructor(options: DependencyContainerOptions = {}) {
    this.logger = options.logger ?? consoleLogger;
  }

  // ==================== Registration ====================

  register<T>(descriptor: ServiceDescriptor<T>): this {
    const dependencies =
      descriptor.dependencies ??
      (descriptor.implementationType
        ? getInjectableMetadata(descriptor.implementationType)?.dependencies
        : undefined) ??
      [];

    const { serviceType } = descriptor;
    if (this.registrations.has(serviceType)) {
      this.logger.debug(`Re-registering service '${identifierName(serviceType)}'`);
      this.singletons.delete(serviceType);
      this.currentScope().store.delete(serviceType);
    }

    this.registrations.set(serviceType, { descriptor, dependencies });
    return this;
  }

  addSingleton<T>(
    serviceType: ServiceIdentifier<T>,
    implementationType?: Constructor<T>,
    dependencies?: DependencySpec[],
  ): this {
    return this.addClass(ServiceScope.Singleton, serviceType, implementationType, dependencies);
  }

  addTransient<T>(
    serviceType: ServiceIdentifier<T>,
    implementationType?: Constructor<T>,
    dependencies?: DependencySpec[],
  ): this {
    return this.addClass(ServiceScope.Transient, serviceType, implementationType, dependencies);
  }

  addRequestScoped<T>(
    serviceType: ServiceIdentifier<T>,
    implementationType?: Constructor<T>,
    dependencies?: DependencySpec[],
  ): this {
    return this.addClass(ServiceScope.Request, serviceType, implementationType, dependencies);
  }

  /**
   * Register a class decorated with `@Injectable`, using the decorator's
   * scope (transient when it names none) and dependencies
   */
  addInjectable<T>(implementationType: Constructor<T>, serviceType: ServiceIdentifier<T> = implementationType): this {
    const metadata = getInjectableMetadata(implementationType);
    return this.register({
      serviceType,
      implementationType,
      scope: metadata?.scope ?? ServiceScope.Transient,
      dependencies: metadata?.dependencies,
    });
  }

  addSingletonFactory<T>(serviceType: ServiceIdentifier<T>, factory: ServiceFactory<T>): this {
    return this.register({ serviceType, factory, scope: ServiceScope.Singleton });
  }

  addTransientFactory<T>(serviceType: ServiceIdentifier<T>, factory: ServiceFactory<T>): this {
    return this.register({ serviceType, factory, scope: ServiceScope.Transient });
  }

  addRequestScopedFactory<T>(serviceType: ServiceIdentifier<T>, factory: ServiceFactory<T>): this {
    return this.register({ serviceType, factory, scope: ServiceScope.Request });
  }

  addInstance<T>(serviceType: ServiceIdentifier<T>, instance: T): this {
    this.register({ serviceType, factory: () => instance, scope: ServiceScope.Singleton });
    this.singletons.set(serviceType, instance);
    return this;
  }

  getDescriptors(): ServiceDescriptor[] {
    return Array.from(this.registrations.values(), (registration) => registration.descriptor);
  }

  isRegistered(serviceType: ServiceIdentifier<unknown>): boolean {
    return this.registrations.has(serviceType);
  }

  private addClass<T>(
    scope: ServiceScope,
    serviceType: ServiceIdentifier<T>,
    implementationType: Constructor<T> | undefined,
    dependencies: DependencySpec[] | undefined,
  ): this {
    const implementation = implementationType ?? (isClass(serviceType) ? serviceType : undefined);
    return this.register({ serviceType, implementationType: implementation, scope, dependencies });
  }

  // ==================== Request scopes ====================

  /**
   * Open a fresh request scope on the container. Instances of a scope that
   * was never ended are dropped.
   */
  beginRequestScope(): IServiceScope {
    const previous = this.defaultScope;
    this.defaultScope = new RequestScope();
    if (previous.size > 0) {
      this.logger.warn(`Request scope ${previous.id} was not ended before a new one began`);
      this.retire(previous);
    }
    return this.defaultScope;
  }

  /**
   * Close the container's request scope; its instances become unreachable
   */
  async endRequestScope(): Promise<void> {
    const ending = this.defaultScope;
    this.defaultScope = new RequestScope();
    await ending.dispose();
  }

  /**
   * Run `work` in its own request scope bound to the async call chain, so
   * concurrent messages never share request instances. The scope is
   * disposed when `work` settles.
   */
  async runInRequestScope<R>(work: (scope: IServiceScope) => Promise<R>): Promise<R> {
    const scope = new RequestScope();
    try {
      return await this.scopeStorage.run(scope, () => work(scope));
    } finally {
      await scope.dispose();
    }
  }

  private currentScope(): RequestScope {
    return this.scopeStorage.getStore() ?? this.defaultScope;
  }

  private retire(scope: RequestScope): void {
    scope.dispose().catch((error: unknown) => {
      this.logger.error(`Failed to dispose request scope ${scope.id}: ${describeError(error)}`);
    });
  }

  // ==================== Resolution ====================

  resolve<T>(serviceType: ServiceIdentifier<T>): T {
    try {
      return this.resolveWithPath(serviceType, []);
    } catch (error) {
      this.logResolutionFailure(serviceType, error);
      throw error;
    }
  }

  async resolveAsync<T>(serviceType: ServiceIdentifier<T>): Promise<T> {
    try {
      return await this.resolveAsyncWithPath(serviceType, []);
    } catch (error) {
      this.logResolutionFailure(serviceType, error);
      throw error;
    }
  }

  private resolveWithPath<T>(serviceType: ServiceIdentifier<T>, path: ResolutionPath): T {
    const registration = this.lookup(serviceType, path);

    switch (registration.descriptor.scope) {
      case ServiceScope.Singleton:
        return this.fromStore(this.singletons, registration, path);
      case ServiceScope.Request:
        return this.fromStore(this.currentScope().store, registration, path);
      case ServiceScope.Transient:
        return this.construct(registration, path);
    }
  }

  private fromStore<T>(store: InstanceStore, registration: Registration<T>, path: ResolutionPath): T {
    const { serviceType } = registration.descriptor;
    const existing = store.lookup(serviceType);
    if (existing) return existing.instance;
    if (store.getInFlight(serviceType)) {
      throw new DependencyResolutionError(
        `Service '${identifierName(serviceType)}' is still being constructed asynchronously; use resolveAsync`,
        buildGraph(path, `${identifierName(serviceType)} (PENDING)`),
      );
    }

    const instance = this.construct(registration, path);
    store.set(serviceType, instance);
    return instance;
  }

  private construct<T>(registration: Registration<T>, path: ResolutionPath): T {
    const { descriptor } = registration;
    const name = identifierName(descriptor.serviceType);

    if (descriptor.factory) {
      const produced = this.invokeFactory(descriptor.factory, path, name);
      if (produced instanceof Promise) {
        // Settle the orphaned promise so a rejection is not left unhandled
        produced.catch(() => undefined);
        throw new DependencyResolutionError(
          `Factory of '${name}' is asynchronous; use resolveAsync`,
          buildGraph(path, `${name} (ASYNC FACTORY)`),
        );
      }
      return produced;
    }

    const implementation = this.implementationOf(registration, path);
    const nextPath = [...path, descriptor.serviceType];
    const args = registration.dependencies.map((dependency) =>
      dependency === null ? undefined : this.resolveWithPath(dependency, nextPath),
    );
    return this.instantiate(implementation, args, path, name);
  }

  private async resolveAsyncWithPath<T>(serviceType: ServiceIdentifier<T>, path: ResolutionPath): Promise<T> {
    const registration = this.lookup(serviceType, path);

    switch (registration.descriptor.scope) {
      case ServiceScope.Singleton:
        return this.fromStoreAsync(this.singletons, registration, path);
      case ServiceScope.Request:
        return this.fromStoreAsync(this.currentScope().store, registration, path);
      case ServiceScope.Transient:
        return this.constructAsync(registration, path);
    }
  }

  /**
   * At most one construction per identifier and store: later callers await
   * the construction already in flight.
   */
  private fromStoreAsync<T>(store: InstanceStore, registration: Registration<T>, path: ResolutionPath): Promise<T> {
    const { serviceType } = registration.descriptor;
    const existing = store.lookup(serviceType);
    if (existing) return Promise.resolve(existing.instance);

    const inFlight = store.getInFlight(serviceType);
    if (inFlight) return inFlight;

    return store.trackInFlight(serviceType, this.constructAsync(registration, path));
  }

  private async constructAsync<T>(registration: Registration<T>, path: ResolutionPath): Promise<T> {
    const { descriptor } = registration;
    const name = identifierName(descriptor.serviceType);

    if (descriptor.factory) {
      try {
        return await this.invokeFactory(descriptor.factory, path, name);
      } catch (error) {
        throw this.wrapFailure(error, path, name);
      }
    }

    const implementation = this.implementationOf(registration, path);
    const nextPath = [...path, descriptor.serviceType];
    const args: unknown[] = [];
    for (const dependency of registration.dependencies) {
      args.push(dependency === null ? undefined : await this.resolveAsyncWithPath(dependency, nextPath));
    }
    return this.instantiate(implementation, args, path, name);
  }

  private lookup<T>(serviceType: ServiceIdentifier<T>, path: ResolutionPath): Registration<T> {
    const name = identifierName(serviceType);
    const registration = this.registrationOf(serviceType);

    if (!registration) {
      if (path.length === 0) {
        throw new NotRegisteredError(name);
      }
      const parent = identifierName(path[path.length - 1]);
      throw new DependencyResolutionError(
        `Dependency '${name}' required by '${parent}' is not registered`,
        buildGraph(path, `${name} (UNREGISTERED)`),
        new NotRegisteredError(name),
      );
    }

    if (path.includes(serviceType)) {
      const cycle = [...path, serviceType].map(identifierName).join(' -> ');
      throw new DependencyResolutionError(
        `Circular dependency detected: ${cycle}`,
        buildGraph(path, `${name} (CIRCULAR!)`),
      );
    }

    return registration;
  }

  /**
   * Registration of `serviceType`; the map is keyed so its entry is a
   * `Registration<T>`
   */
  private registrationOf<T>(serviceType: ServiceIdentifier<T>): Registration<T> | undefined {
    return this.registrations.get(serviceType) as Registration<T> | undefined;
  }

  private implementationOf<T>(registration: Registration<T>, path: ResolutionPath): Constructor<T> {
    const { descriptor } = registration;
    if (!descriptor.implementationType) {
      const name = identifierName(descriptor.serviceType);
      throw new DependencyResolutionError(
        `Service '${name}' has neither an implementation nor a factory`,
        buildGraph(path, `${name} (NO IMPLEMENTATION)`),
        new ConfigurationError(`Service '${name}' has neither an implementation nor a factory`),
      );
    }
    return descriptor.implementationType;
  }

  private invokeFactory<T>(factory: ServiceFactory<T>, path: ResolutionPath, name: string): T | Promise<T> {
    try {
      return factory(this);
    } catch (error) {
      throw this.wrapFailure(error, path, name);
    }
  }

  private instantiate<T>(implementation: Constructor<T>, args: unknown[], path: ResolutionPath, name: string): T {
    try {
      return new implementation(...args);
    } catch (error) {
      throw this.wrapFailure(error, path, name);
    }
  }

  private wrapFailure(error: unknown, path: ResolutionPath, name: string): DependencyResolutionError {
    if (error instanceof DependencyResolutionError) return error;
    return new DependencyResolutionError(
      `Failed to construct '${name}': ${describeError(error)}`,
      buildGraph(path, `${name} (FAILED)`),
      error,
    );
  }

  private logResolutionFailure(serviceType: ServiceIdentifier<unknown>, error: unknown): void {
    const graph = error instanceof DependencyResolutionError ? `\n${error.dependencyGraph}` : '';
    this.logger.error(`Failed to resolve '${identifierName(serviceType)}': ${describeError(error)}${graph}`);
  }

  // ==================== Diagnostics ====================

  /**
   * Structural problems that would make resolution fail. Run at startup.
   */
  validate(): ConfigurationError[] {
    const errors: ConfigurationError[] = [];

    for (const { descriptor, dependencies } of this.registrations.values()) {
      const name = identifierName(descriptor.serviceType);

      if (!descriptor.implementationType && !descriptor.factory) {
        errors.push(
          new ConfigurationError(`Service '${name}' has neither an implementation nor a factory`, { service: name }),
        );
      }

      if (descriptor.factory) continue;

      for (const dependency of dependencies) {
        if (dependency === null) continue;
        const dependencyName = identifierName(dependency);
        const target = this.registrations.get(dependency);

        if (!target) {
          errors.push(
            new ConfigurationError(`Service '${name}' depends on unregistered '${dependencyName}'`, {
              service: name,
              dependency: dependencyName,
            }),
          );
        } else if (
          descriptor.scope === ServiceScope.Singleton &&
          target.descriptor.scope === ServiceScope.Request
        ) {
          errors.push(
            new ConfigurationError(
              `Scope mismatch: singleton '${name}' depends on request-scoped '${dependencyName}'`,
              { service: name, dependency: dependencyName },
            ),
          );
        }
      }
    }

    return errors;
  }

  /**
   * @throws ConfigurationError listing every problem `validate()` finds
   */
  assertValid(): void {
    const errors = this.validate();
    if (errors.length === 0) return;

    const messages = errors.map((error) => error.message);
    throw new ConfigurationError(
      `Container configuration is invalid (${errors.length} error(s)):\n- ${messages.join('\n- ')}`,
      { errors: messages },
    );
  }

  getStatistics(): ContainerStatistics {
    const scope = this.currentScope();
    return {
      registrations: this.registrations.size,
      singletons: this.singletons.size,
      requestInstances: scope.size,
      activeScopeId: scope.id,
    };
  }

  /**
   * Drop every cached instance, disposing singletons and the container's
   * request scope. Registrations stay.
   */
  async cleanup(): Promise<void> {
    const singletons = this.singletons.values();
    this.singletons = new InstanceStore();

    const scope = this.defaultScope;
    this.defaultScope = new RequestScope();

    const errors = await disposeAll(singletons);
    await scope.dispose().catch((error: unknown) => errors.push(error));
    for (const error of errors) {
      this.logger.error(`Dispose failed during container cleanup: ${describeError(error)}`);
    }
    this.logger.debug('Container caches cleared');
  }
}

/**
 * Render the resolution path as a tree
 */
function buildGraph(path: ResolutionPath, current: string): string {
  let graph = '';
  path.forEach((serviceType, depth) => {
    graph += `${'  '.repeat(depth)}└─ ${identifierName(serviceType)}\n`;
  });
  graph += `${'  '.repeat(path.length)}└─ ${current}\n`;
  return graph;
}
