import { Err, Ok, StoreError, StoreErrorKind } from '@/types';

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });
export const err = <E>(error: E): Err<E> => ({ ok: false, error });

export function storeError(kind: StoreErrorKind, cause: unknown): Err<StoreError> {
  const message = cause instanceof Error ? cause.message : String(cause);
  return err({ kind, message: message || kind });
}

/** Drops undefined fields so a document serializes the same in every store. */
export function toDocumentFields(document: object): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(document).filter(([, value]) => value !== undefined)
  );
}
