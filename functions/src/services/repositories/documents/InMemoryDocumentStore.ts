import { randomUUID } from 'crypto';
import type { CollectionName, DocumentData, DocumentStore, StoredDocument } from './DocumentStore';

/**
 * Process-local store for tests and `STORE_DRIVER=memory` runs.
 * Documents are cloned on the way in and out so callers never share state
 * with the store.
 */
export class InMemoryDocumentStore implements DocumentStore {
  private readonly collections = new Map<CollectionName, Map<string, DocumentData>>();

  constructor(private readonly generateId: () => string = randomUUID) {}

  private collection(name: CollectionName): Map<string, DocumentData> {
    let documents = this.collections.get(name);
    if (!documents) {
      documents = new Map();
      this.collections.set(name, documents);
    }
    return documents;
  }

  async insert(collection: CollectionName, doc: DocumentData): Promise<string> {
    const documents = this.collection(collection);
    let id = this.generateId();
    while (documents.has(id)) {
      id = this.generateId();
    }
    documents.set(id, structuredClone(doc));
    return id;
  }

  async get(collection: CollectionName, id: string): Promise<StoredDocument | null> {
    const data = this.collection(collection).get(id);
    return data ? { id, data: structuredClone(data) } : null;
  }

  async list(collection: CollectionName): Promise<StoredDocument[]> {
    return Array.from(this.collection(collection).entries()).map(([id, data]) => ({
      id,
      data: structuredClone(data),
    }));
  }

  async replace(collection: CollectionName, id: string, doc: DocumentData): Promise<boolean> {
    const documents = this.collection(collection);
    if (!documents.has(id)) {
      return false;
    }
    documents.set(id, structuredClone(doc));
    return true;
  }

  async remove(collection: CollectionName, id: string): Promise<boolean> {
    return this.collection(collection).delete(id);
  }

  clear(): void {
    this.collections.clear();
  }
}
