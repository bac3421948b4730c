/**
 * @squadline/runtime - Store Module
 */

export { InMemoryDocumentStore } from './InMemoryDocumentStore';
