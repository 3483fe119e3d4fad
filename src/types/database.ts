export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  username: string;
  password: string;
  ssl?: boolean;
  maxConnections?: number;
}

export interface QueryResult<T> {
  rows: T[];
  rowCount: number;
  command: string;
}

/** The slice of DatabaseService the document store depends on. */
export interface Queryable {
  query<T extends Record<string, unknown>>(text: string, params?: unknown[]): Promise<QueryResult<T>>;
  ensureSchema(): Promise<void>;
  healthCheck(): Promise<boolean>;
  close(): Promise<void>;
}

/** Row shape of the `documents` table. */
export interface DocumentRow extends Record<string, unknown> {
  id: string;
  collection: string;
  doc: Record<string, unknown>;
  created_at: Date;
  updated_at: Date;
}
