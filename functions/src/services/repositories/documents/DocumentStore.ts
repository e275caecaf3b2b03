export type CollectionName = 'owners' | 'dogs' | 'sitters' | 'bookings';

export type DocumentData = { [field: string]: unknown };

export type StoredDocument = {
  id: string;
  data: DocumentData;
};

/**
 * Persistence contract for the resource collections.
 *
 * Ids are opaque strings assigned by the store on insert. An id that cannot
 * name a document is treated the same as a missing document. Implementations
 * throw StoreError on driver failures and never return partial writes.
 */
export interface DocumentStore {
  insert(collection: CollectionName, doc: DocumentData): Promise<string>;
  get(collection: CollectionName, id: string): Promise<StoredDocument | null>;
  list(collection: CollectionName): Promise<StoredDocument[]>;
  /** Overwrites the whole document. Resolves false when no document has that id. */
  replace(collection: CollectionName, id: string, doc: DocumentData): Promise<boolean>;
  /** Resolves false when no document has that id. */
  remove(collection: CollectionName, id: string): Promise<boolean>;
}
