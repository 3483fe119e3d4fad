import {
  CollectionName,
  DocumentFilter,
  DocumentStore,
  StoreResult,
  StoredDocument
} from '@/types';
import { ok, toDocumentFields } from './result';

function matches(document: StoredDocument, filter: DocumentFilter): boolean {
  return Object.entries(filter).every(([key, value]) => document[key] === value);
}

/**
 * Process-local store for development (`DOCUMENT_STORE=memory`) and tests.
 * Documents are cloned on the way in and out.
 */
export class InMemoryDocumentStore implements DocumentStore {
  private readonly collections = new Map<CollectionName, StoredDocument[]>();
  private nextId = 1;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async insert(collection: CollectionName, document: object): Promise<StoreResult<string>> {
    const id = String(this.nextId++);
    const timestamp = this.now().toISOString();
    const stored: StoredDocument = {
      ...structuredClone(toDocumentFields(document)),
      id,
      created_at: timestamp,
      updated_at: timestamp
    };

    const documents = this.collections.get(collection) ?? [];
    documents.push(stored);
    this.collections.set(collection, documents);
    return ok(id);
  }

  async find(collection: CollectionName, filter: DocumentFilter, limit: number): Promise<StoreResult<StoredDocument[]>> {
    const documents = this.collections.get(collection) ?? [];
    return ok(
      documents
        .filter(document => matches(document, filter))
        .slice(0, limit)
        .map(document => structuredClone(document))
    );
  }

  async countDocuments(collection: CollectionName, filter: DocumentFilter): Promise<StoreResult<number>> {
    const documents = this.collections.get(collection) ?? [];
    return ok(documents.filter(document => matches(document, filter)).length);
  }

  async listCollections(): Promise<StoreResult<string[]>> {
    return ok([...this.collections.keys()].sort());
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.collections.clear();
  }
}
