/**
 * @squadline/runtime - Document Store Port
 *
 * Contract of the document database behind team mapping persistence and
 * cache-miss refills. Implementations live outside this package (Firestore,
 * Mongo, ...); `InMemoryDocumentStore` is the in-process one.
 */

/**
 * A stored document. `id` is assigned by the store when omitted on create.
 */
export interface StoredDocument {
  id: string;
  [field: string]: unknown;
}

/**
 * Comparison operators supported by `queryDocuments`
 */
export type FilterOperator = '==' | '!=' | '<' | '<=' | '>' | '>=' | 'in';

/**
 * One query condition
 */
export interface DocumentFilter {
  field: string;
  operator: FilterOperator;
  value: unknown;
}

/**
 * Document store contract
 */
export interface IDocumentStore {
  getDocument(collection: string, id: string): Promise<StoredDocument | null>;

  /**
   * All documents in `collection` matching every filter (AND)
   */
  queryDocuments(collection: string, filters?: DocumentFilter[]): Promise<StoredDocument[]>;

  /**
   * @returns the id of the created document
   */
  createDocument(collection: string, data: Record<string, unknown>, id?: string): Promise<string>;

  /**
   * Merge `data` into an existing document
   */
  updateDocument(collection: string, id: string, data: Record<string, unknown>): Promise<void>;

  deleteDocument(collection: string, id: string): Promise<void>;
}
