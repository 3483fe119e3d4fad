import { Router, Request, Response, RequestHandler } from 'express';
import logger from '@/config/logger';
import { asyncHandler, fromStoreError } from '@/middleware/errorHandler';
import { parseListLimit } from '@/middleware/validation';
import { CollectionName, CreatedResponse, DocumentStore } from '@/types';

/**
 * POST / validates and inserts, GET / lists up to `?limit=` documents in
 * insertion order.
 */
export function createDocumentRouter(
  collection: CollectionName,
  validate: RequestHandler,
  store: DocumentStore
): Router {
  const router = Router();

  router.post('/', validate, asyncHandler(async (req: Request, res: Response) => {
    const result = await store.insert(collection, req.body);
    if (!result.ok) {
      throw fromStoreError(result.error);
    }

    logger.info('Document created', { collection, id: result.value });

    const response: CreatedResponse = { id: result.value, status: 'ok' };
    res.json(response);
  }));

  router.get('/', asyncHandler(async (req: Request, res: Response) => {
    const limit = parseListLimit(req.query);
    const result = await store.find(collection, {}, limit);
    if (!result.ok) {
      throw fromStoreError(result.error);
    }

    res.json(result.value);
  }));

  return router;
}
