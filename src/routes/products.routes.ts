import { Router, Request, Response } from 'express';
import type { ProductService } from '../services/product.service.js';
import { paginationQuerySchema, productSearchQuerySchema } from '../schemas/pos.schemas.js';
import { parseOrThrow } from '../schemas/parse.js';
import { asyncHandler } from '../utils/http.js';

export function createProductRoutes(productService: ProductService): Router {
  const router = Router();

  router.get('/', asyncHandler(async (req: Request, res: Response) => {
    const query = parseOrThrow(paginationQuerySchema, req.query);
    const { total, items } = await productService.listProducts(query);
    res.json({ success: true, total, offset: query.offset, limit: query.limit, products: items });
  }));

  // Registered before /barcode/:barcode so "search" is never read as a barcode
  router.get('/search', asyncHandler(async (req: Request, res: Response) => {
    const { query } = parseOrThrow(productSearchQuerySchema, req.query);
    const products = await productService.searchProducts(query);
    res.json({ success: true, count: products.length, products });
  }));

  router.get('/barcode/:barcode', asyncHandler(async (req: Request, res: Response) => {
    const products = await productService.getProductsByBarcode(req.params.barcode);
    res.json({ success: true, count: products.length, products });
  }));

  router.delete('/clear', asyncHandler(async (_req: Request, res: Response) => {
    const deleted = await productService.clearProducts();
    res.json({ success: true, deleted, message: `Deleted ${deleted} products from local database` });
  }));

  return router;
}

export default createProductRoutes;
