/**
 * @squadline/runtime - In-Memory Document Store
 *
 * Process-local `IDocumentStore` for development and tests.
 * Documents are copied on the way in and out so callers never share state
 * with the store.
 */

import { v4 as uuidv4 } from 'uuid';
import type { DocumentFilter, IDocumentStore, StoredDocument } from '../../application/ports';

export class InMemoryDocumentStore implements IDocumentStore {
  private collections: Map<string, Map<string, StoredDocument>> = new Map();

  async getDocument(collection: string, id: string): Promise<StoredDocument | null> {
    const document = this.collection(collection).get(id);
    return document ? { ...document } : null;
  }

  async queryDocuments(collection: string, filters: DocumentFilter[] = []): Promise<StoredDocument[]> {
    return Array.from(this.collection(collection).values())
      .filter((document) => filters.every((filter) => matches(document, filter)))
      .map((document) => ({ ...document }));
  }

  async createDocument(
    collection: string,
    data: Record<string, unknown>,
    id: string = uuidv4(),
  ): Promise<string> {
    const documents = this.collection(collection);
    if (documents.has(id)) {
      throw new Error(`Document '${id}' already exists in '${collection}'`);
    }
    documents.set(id, { ...data, id });
    return id;
  }

  async updateDocument(collection: string, id: string, data: Record<string, unknown>): Promise<void> {
    const documents = this.collection(collection);
    const existing = documents.get(id);
    if (!existing) {
      throw new Error(`Document '${id}' not found in '${collection}'`);
    }
    documents.set(id, { ...existing, ...data, id });
  }

  async deleteDocument(collection: string, id: string): Promise<void> {
    this.collection(collection).delete(id);
  }

  /**
   * Number of documents in a collection
   */
  count(collection: string): number {
    return this.collection(collection).size;
  }

  private collection(name: string): Map<string, StoredDocument> {
    let documents = this.collections.get(name);
    if (!documents) {
      documents = new Map();
      this.collections.set(name, documents);
    }
    return documents;
  }
}

function matches(document: StoredDocument, filter: DocumentFilter): boolean {
  const actual = document[filter.field];
  const expected = filter.value;

  switch (filter.operator) {
    case '==':
      return actual === expected;
    case '!=':
      return actual !== expected;
    case 'in':
      return Array.isArray(expected) && expected.includes(actual);
    default:
      return compare(actual, expected, filter.operator);
  }
}

function compare(actual: unknown, expected: unknown, operator: '<' | '<=' | '>' | '>='): boolean {
  if (typeof actual === 'number' && typeof expected === 'number') {
    return ordered(actual, expected, operator);
  }
  if (typeof actual === 'string' && typeof expected === 'string') {
    return ordered(actual, expected, operator);
  }
  return false;
}

function ordered<T extends number | string>(a: T, b: T, operator: '<' | '<=' | '>' | '>='): boolean {
  switch (operator) {
    case '<':
      return a < b;
    case '<=':
      return a <= b;
    case '>':
      return a > b;
    case '>=':
      return a >= b;
  }
}
