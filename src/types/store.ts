export type CollectionName = 'patient' | 'doctor' | 'appointment';

export type FilterValue = string | number | boolean | null;

/** Flat equality filter, e.g. `{ on_duty: true }`. */
export type DocumentFilter = Record<string, FilterValue>;

export interface StoredDocument extends Record<string, unknown> {
  id: string;
  created_at: string;
  updated_at: string;
}

export type StoreErrorKind = 'StoreUnavailable' | 'QueryFailed';

export interface StoreError {
  kind: StoreErrorKind;
  message: string;
}

export type Ok<T> = { ok: true; value: T };
export type Err<E> = { ok: false; error: E };
export type Result<T, E> = Ok<T> | Err<E>;

export type StoreResult<T> = Result<T, StoreError>;

/**
 * Generic document persistence. Implementations report failures through
 * the returned result and never reject.
 */
export interface DocumentStore {
  insert(collection: CollectionName, document: object): Promise<StoreResult<string>>;
  find(collection: CollectionName, filter: DocumentFilter, limit: number): Promise<StoreResult<StoredDocument[]>>;
  countDocuments(collection: CollectionName, filter: DocumentFilter): Promise<StoreResult<number>>;
  listCollections(): Promise<StoreResult<string[]>>;
  healthCheck(): Promise<boolean>;
  close(): Promise<void>;
}
