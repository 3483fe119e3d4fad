import logger from '@/config/logger';
import {
  CollectionName,
  DocumentFilter,
  DocumentRow,
  DocumentStore,
  Queryable,
  StoreResult,
  StoredDocument
} from '@/types';
import { ok, storeError, toDocumentFields } from './result';

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  '57P01', // admin_shutdown
  '57P03', // cannot_connect_now
  '08000',
  '08001',
  '08003',
  '08006'
]);

function isConnectionError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  const code = 'code' in error ? String(error.code) : '';
  return CONNECTION_ERROR_CODES.has(code) || /timeout exceeded when trying to connect/i.test(error.message);
}

function toStoredDocument(row: DocumentRow): StoredDocument {
  return {
    ...row.doc,
    id: String(row.id),
    created_at: new Date(row.created_at).toISOString(),
    updated_at: new Date(row.updated_at).toISOString()
  };
}

/**
 * Keeps every collection in a single `documents` table with a JSONB body.
 * Equality filters are evaluated with JSONB containment.
 *
 * The table is created before the first operation that reaches the
 * database; a failed attempt is retried on the next operation.
 */
export class PostgresDocumentStore implements DocumentStore {
  private schemaReady?: Promise<void>;

  constructor(private readonly db: Queryable) {}

  private ready(): Promise<void> {
    if (!this.schemaReady) {
      this.schemaReady = this.db.ensureSchema().catch((error: unknown) => {
        this.schemaReady = undefined;
        throw error;
      });
    }
    return this.schemaReady;
  }

  async insert(collection: CollectionName, document: object): Promise<StoreResult<string>> {
    try {
      await this.ready();
      const result = await this.db.query<{ id: string }>(`
        INSERT INTO documents (collection, doc)
        VALUES ($1, $2::jsonb)
        RETURNING id
      `, [collection, JSON.stringify(toDocumentFields(document))]);

      return ok(String(result.rows[0].id));
    } catch (error) {
      return this.fail(`insert into ${collection}`, error);
    }
  }

  async find(collection: CollectionName, filter: DocumentFilter, limit: number): Promise<StoreResult<StoredDocument[]>> {
    try {
      await this.ready();
      const result = await this.db.query<DocumentRow>(`
        SELECT id, collection, doc, created_at, updated_at
        FROM documents
        WHERE collection = $1 AND doc @> $2::jsonb
        ORDER BY id ASC
        LIMIT $3
      `, [collection, JSON.stringify(filter), limit]);

      return ok(result.rows.map(toStoredDocument));
    } catch (error) {
      return this.fail(`find in ${collection}`, error);
    }
  }

  async countDocuments(collection: CollectionName, filter: DocumentFilter): Promise<StoreResult<number>> {
    try {
      await this.ready();
      const result = await this.db.query<{ count: string }>(`
        SELECT COUNT(*) AS count
        FROM documents
        WHERE collection = $1 AND doc @> $2::jsonb
      `, [collection, JSON.stringify(filter)]);

      // COUNT(*) is a bigint, which pg hands back as a string
      return ok(parseInt(result.rows[0].count, 10));
    } catch (error) {
      return this.fail(`count in ${collection}`, error);
    }
  }

  async listCollections(): Promise<StoreResult<string[]>> {
    try {
      await this.ready();
      const result = await this.db.query<{ collection: string }>(
        'SELECT DISTINCT collection FROM documents ORDER BY collection'
      );
      return ok(result.rows.map(row => row.collection));
    } catch (error) {
      return this.fail('list collections', error);
    }
  }

  healthCheck(): Promise<boolean> {
    return this.db.healthCheck();
  }

  close(): Promise<void> {
    return this.db.close();
  }

  private fail(operation: string, error: unknown) {
    const kind = isConnectionError(error) ? 'StoreUnavailable' : 'QueryFailed';
    logger.error(`Document store ${operation} failed`, { kind, error });
    return storeError(kind, error);
  }
}
