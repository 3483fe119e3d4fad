import { AppConfig } from '@/config/env';
import { InMemoryDocumentStore } from '@/store';
import { err } from '@/store/result';
import {
  CollectionName,
  DocumentFilter,
  DocumentStore,
  StoreError,
  StoreErrorKind,
  StoreResult,
  StoredDocument,
  Queryable
} from '@/types';

export const testConfig: AppConfig = {
  nodeEnv: 'test',
  port: 0,
  storeDriver: 'memory',
  corsOrigin: '*',
  requestTimeoutMs: 30000,
  shutdownTimeoutMs: 1000
};

/** A store whose every operation fails the same way. */
export class FailingStore implements DocumentStore {
  constructor(
    private readonly message = 'connection refused',
    private readonly kind: StoreErrorKind = 'StoreUnavailable'
  ) {}

  private fail() {
    return err<StoreError>({ kind: this.kind, message: this.message });
  }

  async insert(_collection: CollectionName, _document: object): Promise<StoreResult<string>> {
    return this.fail();
  }

  async find(_collection: CollectionName, _filter: DocumentFilter, _limit: number): Promise<StoreResult<StoredDocument[]>> {
    return this.fail();
  }

  async countDocuments(_collection: CollectionName, _filter: DocumentFilter): Promise<StoreResult<number>> {
    return this.fail();
  }

  async listCollections(): Promise<StoreResult<string[]>> {
    return this.fail();
  }

  async healthCheck(): Promise<boolean> {
    return false;
  }

  async close(): Promise<void> {}
}

export function addDays(date: Date, days: number): Date {
  const result = new Date(date);
  result.setUTCDate(result.getUTCDate() + days);
  return result;
}

export interface CountCall {
  collection: CollectionName;
  filter: DocumentFilter;
}

/** Answers countDocuments from a lookup and records every call. */
export class ScriptedCountStore extends FailingStore {
  readonly calls: CountCall[] = [];

  constructor(private readonly answer: (collection: CollectionName) => StoreResult<number>) {
    super();
  }

  async countDocuments(collection: CollectionName, filter: DocumentFilter): Promise<StoreResult<number>> {
    this.calls.push({ collection, filter });
    return this.answer(collection);
  }
}

/** Delays every count, so requests that read stats outlive a short timeout. */
export class SlowCountStore extends InMemoryDocumentStore {
  constructor(private readonly delayMs: number) {
    super();
  }

  async countDocuments(collection: CollectionName, filter: DocumentFilter): Promise<StoreResult<number>> {
    await new Promise(resolve => setTimeout(resolve, this.delayMs));
    return super.countDocuments(collection, filter);
  }
}

export interface FlakyDatabase {
  db: Queryable;
  recover(): void;
}

/**
 * A Postgres stand-in that refuses connections until `recover()` and
 * has no `documents` table until its schema is created.
 */
export function createFlakyDatabase(): FlakyDatabase {
  const rows: { collection: unknown; doc: Record<string, unknown> }[] = [];
  let up = false;
  let tableExists = false;

  const refused = () =>
    Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:5432'), { code: 'ECONNREFUSED' });

  const query = jest.fn().mockImplementation(async (text: string, params: unknown[] = []) => {
    if (!up) {
      throw refused();
    }
    if (!tableExists) {
      throw new Error('relation "documents" does not exist');
    }

    if (text.includes('INSERT INTO documents')) {
      rows.push({ collection: params[0], doc: JSON.parse(String(params[1])) });
      return { rows: [{ id: String(rows.length) }], rowCount: 1, command: 'INSERT' };
    }
    if (text.includes('COUNT(*)')) {
      const filter: Record<string, unknown> = JSON.parse(String(params[1]));
      const count = rows.filter(row =>
        row.collection === params[0] &&
        Object.entries(filter).every(([key, value]) => row.doc[key] === value)
      ).length;
      return { rows: [{ count: String(count) }], rowCount: 1, command: 'SELECT' };
    }
    return { rows: [], rowCount: 0, command: 'SELECT' };
  });

  const db: Queryable = {
    query,
    ensureSchema: jest.fn().mockImplementation(async () => {
      if (!up) {
        throw refused();
      }
      tableExists = true;
    }),
    healthCheck: async () => up,
    close: async () => {},
  };

  return {
    db,
    recover: () => {
      up = true;
    },
  };
}
