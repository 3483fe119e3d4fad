import { AppConfig } from '@/config/env';
import { DatabaseService } from '@/config/database';
import { DocumentStore } from '@/types';
import { InMemoryDocumentStore } from './InMemoryDocumentStore';
import { PostgresDocumentStore } from './PostgresDocumentStore';

export { InMemoryDocumentStore } from './InMemoryDocumentStore';
export { PostgresDocumentStore } from './PostgresDocumentStore';
export { ok, err, storeError } from './result';

export interface StoreHandle {
  store: DocumentStore;
  /** Present only for the Postgres driver. */
  database?: DatabaseService;
}

export function createDocumentStore(config: AppConfig): StoreHandle {
  if (config.storeDriver === 'memory' || !config.databaseUrl) {
    return { store: new InMemoryDocumentStore() };
  }

  const database = new DatabaseService(
    DatabaseService.configFromUrl(config.databaseUrl, config.databaseName, config.nodeEnv === 'production')
  );
  return { store: new PostgresDocumentStore(database), database };
}
