/**
 * @squadline/runtime - Port Module
 *
 * Contracts for external collaborators
 */

export type {
  IDocumentStore,
  StoredDocument,
  DocumentFilter,
  FilterOperator,
} from './store';

export type {
  IChatTransport,
  InboundMessage,
  InboundMessageListener,
} from './transport';
