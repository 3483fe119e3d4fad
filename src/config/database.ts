import { Pool, QueryResultRow } from 'pg';
import logger from './logger';
import { DatabaseConfig, QueryResult } from '@/types/database';

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS documents (
    id BIGSERIAL PRIMARY KEY,
    collection TEXT NOT NULL,
    doc JSONB NOT NULL,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  );
  CREATE INDEX IF NOT EXISTS documents_collection_idx ON documents (collection);
  CREATE INDEX IF NOT EXISTS documents_doc_idx ON documents USING GIN (doc jsonb_path_ops);
`;

export class DatabaseService {
  private pool: Pool;

  constructor(config: DatabaseConfig) {
    this.pool = new Pool({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.username,
      password: config.password,
      ssl: config.ssl ? { rejectUnauthorized: false } : false,
      max: config.maxConnections || 20,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    });

    this.setupEventListeners();
  }

  /**
   * Builds a config from a `postgres://` URL. `databaseName` overrides the
   * database given in the URL path.
   */
  static configFromUrl(url: string, databaseName?: string, ssl = false): DatabaseConfig {
    const parsed = new URL(url);
    return {
      host: parsed.hostname,
      port: parseInt(parsed.port) || 5432,
      database: databaseName || decodeURIComponent(parsed.pathname.slice(1)),
      username: decodeURIComponent(parsed.username),
      password: decodeURIComponent(parsed.password),
      ssl,
    };
  }

  private setupEventListeners(): void {
    this.pool.on('connect', () => {
      logger.debug('New database connection established');
    });

    this.pool.on('error', (err) => {
      logger.error('Database connection error:', err);
    });
  }

  async query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>> {
    const start = Date.now();
    const client = await this.pool.connect();

    try {
      const result = await client.query<T>(text, params);
      const duration = Date.now() - start;

      logger.debug('Executed query', {
        text: text.trim().substring(0, 100),
        duration,
        rows: result.rowCount
      });

      return {
        rows: result.rows,
        rowCount: result.rowCount || 0,
        command: result.command
      };
    } catch (error) {
      logger.error('Database query error:', { text: text.trim().substring(0, 100), error });
      throw error;
    } finally {
      client.release();
    }
  }

  async ensureSchema(): Promise<void> {
    await this.query(SCHEMA_SQL);
    logger.info('Document schema ready');
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.query('SELECT 1');
      return true;
    } catch (error) {
      logger.error('Database health check failed:', error);
      return false;
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
    logger.info('Database connection pool closed');
  }
}
