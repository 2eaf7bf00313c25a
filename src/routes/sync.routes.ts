import { Router, Request, Response } from 'express';
import type { CatalogSyncService } from '../services/catalog-sync.service.js';
import { asyncHandler } from '../utils/http.js';

/**
 * Operator-triggered full pulls from Shopify
 */
export function createSyncRoutes(syncService: CatalogSyncService): Router {
  const router = Router();

  router.post('/products', asyncHandler(async (_req: Request, res: Response) => {
    const result = await syncService.syncProducts();
    res.json({ success: true, ...result });
  }));

  router.post('/customers', asyncHandler(async (_req: Request, res: Response) => {
    const result = await syncService.syncCustomers();
    res.json({ success: true, ...result });
  }));

  return router;
}

export default createSyncRoutes;
