/**
 * @squadline/runtime - Runtime Exceptions
 *
 * Error taxonomy for the composition and tenancy layer.
 * Structural errors fail fast at startup, per-item discovery errors are
 * isolated and logged, and cache or mapping misses are ordinary control flow
 * (they never reach this module).
 */

/**
 * Error codes carried by every runtime exception
 */
export type RuntimeErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'DUPLICATE_REGISTRATION'
  | 'NOT_REGISTERED'
  | 'DEPENDENCY_RESOLUTION'
  | 'DISCOVERY_LOAD'
  | 'MAPPING_NOT_FOUND'
  | 'STORE_ERROR';

/**
 * Reply shown to end users whenever a request fails internally.
 * Internal registry and DI errors never leak past the message boundary.
 */
export const GENERIC_USER_MESSAGE = 'Something went wrong, please try again.';

/**
 * Reply for a conversation that no team has been linked to yet
 */
export const NOT_LINKED_USER_MESSAGE =
  'This chat is not linked to a team yet. Ask your team admin to finish setup.';

/**
 * Base runtime exception class
 */
export class RuntimeError extends Error {
  constructor(
    public readonly code: RuntimeErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'RuntimeError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Structurally invalid registration or configuration.
 * Surfaced by `validate()` so startup can stop before serving traffic.
 */
export class ConfigurationError extends RuntimeError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    code: RuntimeErrorCode = 'CONFIGURATION_ERROR',
  ) {
    super(code, message, details);
    this.name = 'ConfigurationError';
  }
}

/**
 * A registry already holds an item under this name
 */
export class DuplicateRegistrationError extends ConfigurationError {
  constructor(
    public readonly registryName: string,
    public readonly itemName: string,
  ) {
    super(
      `Item '${itemName}' is already registered in registry '${registryName}'`,
      { registryName, itemName },
      'DUPLICATE_REGISTRATION',
    );
    this.name = 'DuplicateRegistrationError';
  }
}

/**
 * Resolve was called for an identifier the container does not know.
 * Always fatal to that call, never retried.
 */
export class NotRegisteredError extends RuntimeError {
  constructor(public readonly serviceName: string) {
    super('NOT_REGISTERED', `Service '${serviceName}' is not registered in the container`, {
      serviceName,
    });
    this.name = 'NotRegisteredError';
  }
}

/**
 * Nested auto-wiring failure.
 *
 * @remarks
 * `dependencyGraph` shows the resolution path down to the failing node:
 *
 * ```
 * └─ InboundMessageHandler
 *   └─ PlayerService
 *     └─ IDocumentStore (UNREGISTERED)
 * ```
 */
export class DependencyResolutionError extends RuntimeError {
  constructor(
    message: string,
    public readonly dependencyGraph: string = '',
    cause?: unknown,
  ) {
    super('DEPENDENCY_RESOLUTION', message, undefined, cause);
    this.name = 'DependencyResolutionError';
  }
}

/**
 * One extension point or discovery hook failed to load.
 * Logged and isolated; sibling loads carry on.
 */
export class DiscoveryLoadError extends RuntimeError {
  constructor(
    public readonly group: string,
    public readonly entryName: string,
    cause?: unknown,
  ) {
    super(
      'DISCOVERY_LOAD',
      `Failed to load '${entryName}' from group '${group}': ${describeError(cause)}`,
      { group, entryName },
      cause,
    );
    this.name = 'DiscoveryLoadError';
  }
}

/**
 * Tenant resolution exhausted every source.
 * The caller decides whether this is fatal or a prompt to link the chat.
 */
export class MappingNotFoundError extends RuntimeError {
  constructor(public readonly conversationId: string) {
    super('MAPPING_NOT_FOUND', `No team is mapped to conversation '${conversationId}'`, {
      conversationId,
    });
    this.name = 'MappingNotFoundError';
  }
}

/**
 * Document store call failed
 */
export class StoreError extends RuntimeError {
  constructor(
    public readonly operation: string,
    public readonly collection: string,
    cause?: unknown,
  ) {
    super(
      'STORE_ERROR',
      `Store ${operation} on '${collection}' failed: ${describeError(cause)}`,
      { operation, collection },
      cause,
    );
    this.name = 'StoreError';
  }
}

/**
 * Human-readable message of anything thrown
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Map any failure to the reply an end user may see
 */
export function toUserMessage(error: unknown): string {
  if (error instanceof MappingNotFoundError) return NOT_LINKED_USER_MESSAGE;
  return GENERIC_USER_MESSAGE;
}
