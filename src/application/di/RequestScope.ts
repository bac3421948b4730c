/**
 * @squadline/runtime - Request Scope
 *
 * Instance storage for singleton and request lifetimes.
 */

import { v4 as uuidv4 } from 'uuid';
import type { IDisposable, IServiceScope, ServiceIdentifier } from './IDependencyInjection';

/**
 * Instances keyed by service identifier.
 *
 * @remarks
 * Values are only ever written through `set<T>(id: ServiceIdentifier<T>, T)`,
 * so the identifier fixes the value's type; the reads below rely on that.
 */
export class InstanceStore {
  private instances: Map<ServiceIdentifier<unknown>, unknown> = new Map();
  private inFlight: Map<ServiceIdentifier<unknown>, Promise<unknown>> = new Map();

  has(serviceType: ServiceIdentifier<unknown>): boolean {
    return this.instances.has(serviceType);
  }

  get<T>(serviceType: ServiceIdentifier<T>): T | undefined {
    return this.instances.get(serviceType) as T | undefined;
  }

  /**
   * Wraps the stored instance so an instance that is itself `undefined`
   * reads differently from a missing entry.
   */
  lookup<T>(serviceType: ServiceIdentifier<T>): { instance: T } | undefined {
    if (!this.instances.has(serviceType)) return undefined;
    return { instance: this.instances.get(serviceType) as T };
  }

  set<T>(serviceType: ServiceIdentifier<T>, instance: T): void {
    this.instances.set(serviceType, instance);
  }

  delete(serviceType: ServiceIdentifier<unknown>): void {
    this.instances.delete(serviceType);
    this.inFlight.delete(serviceType);
  }

  /**
   * Construction already under way for `serviceType`, if any
   */
  getInFlight<T>(serviceType: ServiceIdentifier<T>): Promise<T> | undefined {
    return this.inFlight.get(serviceType) as Promise<T> | undefined;
  }

  /**
   * Track a construction so concurrent resolves await it instead of
   * building a second instance. The instance is stored once it settles.
   */
  trackInFlight<T>(serviceType: ServiceIdentifier<T>, construction: Promise<T>): Promise<T> {
    const tracked = construction
      .then((instance) => {
        if (this.inFlight.get(serviceType) === tracked) {
          this.instances.set(serviceType, instance);
        }
        return instance;
      })
      .finally(() => {
        if (this.inFlight.get(serviceType) === tracked) {
          this.inFlight.delete(serviceType);
        }
      });

    this.inFlight.set(serviceType, tracked);
    return tracked;
  }

  get size(): number {
    return this.instances.size;
  }

  values(): unknown[] {
    return Array.from(this.instances.values());
  }

  clear(): void {
    this.instances.clear();
    this.inFlight.clear();
  }
}

export function isDisposable(value: unknown): value is IDisposable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'dispose' in value &&
    typeof value.dispose === 'function'
  );
}

/**
 * Dispose every disposable instance, newest first
 *
 * @returns errors thrown by `dispose()` calls; every instance is attempted
 */
export async function disposeAll(instances: unknown[]): Promise<unknown[]> {
  const errors: unknown[] = [];
  for (const instance of [...instances].reverse()) {
    if (!isDisposable(instance)) continue;
    try {
      await instance.dispose();
    } catch (error) {
      errors.push(error);
    }
  }
  return errors;
}

/**
 * One request scope: the lifetime of a single inbound message
 */
export class RequestScope implements IServiceScope {
  readonly id: string = uuidv4();
  readonly store = new InstanceStore();
  private disposed = false;

  get size(): number {
    return this.store.size;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;

    const instances = this.store.values();
    this.store.clear();

    const errors = await disposeAll(instances);
    if (errors.length > 0) {
      throw new AggregateError(errors, `Failed to dispose ${errors.length} instance(s) of scope ${this.id}`);
    }
  }
}
