import * as functions from 'firebase-functions';
import { StoreError } from '../../errors';
import type { CollectionName, DocumentData, DocumentStore, StoredDocument } from './DocumentStore';

const MAX_DOCUMENT_ID_BYTES = 1500;
const RESERVED_ID_REGEX = /^__.*__$/;

/**
 * Firestore rejects these ids with an exception instead of a missing
 * snapshot, so they are screened before building a reference.
 */
export function isValidDocumentId(id: string): boolean {
  if (id.length === 0 || id === '.' || id === '..') {
    return false;
  }

  if (id.includes('/') || RESERVED_ID_REGEX.test(id)) {
    return false;
  }

  return Buffer.byteLength(id, 'utf8') <= MAX_DOCUMENT_ID_BYTES;
}

function mapSnapshot(
  snapshot: FirebaseFirestore.DocumentSnapshot<FirebaseFirestore.DocumentData>,
): StoredDocument {
  return {
    id: snapshot.id,
    data: snapshot.data() ?? {},
  };
}

function storeFailure(action: string, collection: CollectionName, error: unknown): StoreError {
  functions.logger.error(`[store] Failed to ${action} ${collection}:`, error);
  return new StoreError(`Failed to ${action} ${collection}`, { cause: error });
}

export class FirestoreDocumentStore implements DocumentStore {
  constructor(private readonly db: FirebaseFirestore.Firestore) {}

  async insert(collection: CollectionName, doc: DocumentData): Promise<string> {
    try {
      const ref = await this.db.collection(collection).add(doc);
      return ref.id;
    } catch (error) {
      throw storeFailure('insert into', collection, error);
    }
  }

  async get(collection: CollectionName, id: string): Promise<StoredDocument | null> {
    if (!isValidDocumentId(id)) {
      return null;
    }

    try {
      const snapshot = await this.db.collection(collection).doc(id).get();
      return snapshot.exists ? mapSnapshot(snapshot) : null;
    } catch (error) {
      throw storeFailure('read', collection, error);
    }
  }

  async list(collection: CollectionName): Promise<StoredDocument[]> {
    try {
      const snapshot = await this.db.collection(collection).get();
      return snapshot.docs.map((doc) => mapSnapshot(doc));
    } catch (error) {
      throw storeFailure('list', collection, error);
    }
  }

  async replace(collection: CollectionName, id: string, doc: DocumentData): Promise<boolean> {
    if (!isValidDocumentId(id)) {
      return false;
    }

    const ref = this.db.collection(collection).doc(id);
    try {
      return await this.db.runTransaction(async (tx) => {
        const snapshot = await tx.get(ref);
        if (!snapshot.exists) {
          return false;
        }
        tx.set(ref, doc);
        return true;
      });
    } catch (error) {
      throw storeFailure('update', collection, error);
    }
  }

  async remove(collection: CollectionName, id: string): Promise<boolean> {
    if (!isValidDocumentId(id)) {
      return false;
    }

    const ref = this.db.collection(collection).doc(id);
    try {
      return await this.db.runTransaction(async (tx) => {
        const snapshot = await tx.get(ref);
        if (!snapshot.exists) {
          return false;
        }
        tx.delete(ref);
        return true;
      });
    } catch (error) {
      throw storeFailure('delete from', collection, error);
    }
  }
}
