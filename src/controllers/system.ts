import { Router, Request, Response } from 'express';
import { AppConfig } from '@/config/env';
import { asyncHandler } from '@/middleware/errorHandler';
import { DiagnosticsPayload, DocumentStore } from '@/types';

const MAX_LISTED_COLLECTIONS = 10;
const MAX_ERROR_LENGTH = 80;

/** Service banner and the `/test` connectivity report. */
export function createSystemRouter(store: DocumentStore, config: AppConfig): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response): void => {
    res.json({ message: 'Hospital Management API is running' });
  });

  router.get('/test', asyncHandler(async (_req: Request, res: Response) => {
    const report: DiagnosticsPayload = {
      backend: '✅ Running',
      database: '❌ Not Available',
      database_url: config.databaseUrl ? '✅ Set' : '❌ Not Set',
      database_name: config.databaseName || '❌ Not Set',
      connection_status: 'Not Connected',
      collections: []
    };

    const collections = await store.listCollections();
    if (collections.ok) {
      report.database = '✅ Connected & Working';
      report.connection_status = 'Connected';
      report.collections = collections.value.slice(0, MAX_LISTED_COLLECTIONS);
    } else {
      report.database = `⚠️ Connected but error: ${collections.error.message.slice(0, MAX_ERROR_LENGTH)}`;
    }

    res.json(report);
  }));

  return router;
}
