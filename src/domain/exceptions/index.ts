/**
 * @squadline/runtime - Exception Module
 *
 * Runtime error taxonomy
 */

export {
  RuntimeError,
  ConfigurationError,
  DuplicateRegistrationError,
  NotRegisteredError,
  DependencyResolutionError,
  DiscoveryLoadError,
  MappingNotFoundError,
  StoreError,
  GENERIC_USER_MESSAGE,
  NOT_LINKED_USER_MESSAGE,
  describeError,
  toUserMessage,
} from './exceptions';

export type { RuntimeErrorCode } from './exceptions';
