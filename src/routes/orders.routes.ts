import { Router, Request, Response } from 'express';
import type { PosOrderService } from '../services/pos-order.service.js';
import type { SalesReportService } from '../services/sales-report.service.js';
import {
  cartOrderSchema,
  idParamSchema,
  manualOrderSchema,
  paginationQuerySchema,
  reportRangeQuerySchema,
} from '../schemas/pos.schemas.js';
import { parseOrThrow } from '../schemas/parse.js';
import { asyncHandler } from '../utils/http.js';

export function createOrderRoutes(orderService: PosOrderService, reportService: SalesReportService): Router {
  const router = Router();

  router.post('/cart', asyncHandler(async (req: Request, res: Response) => {
    const input = parseOrThrow(cartOrderSchema, req.body);
    const result = await orderService.createCartOrder(input);
    res.status(201).json({ success: true, ...result });
  }));

  router.post('/manual', asyncHandler(async (req: Request, res: Response) => {
    const input = parseOrThrow(manualOrderSchema, req.body);
    const result = await orderService.createManualOrder(input);
    res.status(201).json({ success: true, ...result });
  }));

  router.get('/', asyncHandler(async (req: Request, res: Response) => {
    const query = parseOrThrow(paginationQuerySchema, req.query);
    const { total, items } = await orderService.listOrderLines(query);
    res.json({ success: true, total, offset: query.offset, limit: query.limit, orders: items });
  }));

  // Sales reports read Shopify's order history, in-store and online
  router.get('/stats/today', asyncHandler(async (_req: Request, res: Response) => {
    const stats = await reportService.todayStats();
    res.json({ success: true, stats });
  }));

  router.get('/reports/weekly', asyncHandler(async (_req: Request, res: Response) => {
    const report = await reportService.weeklyReport();
    res.json({ success: true, report });
  }));

  router.get('/reports/monthly', asyncHandler(async (_req: Request, res: Response) => {
    const report = await reportService.monthlyReport();
    res.json({ success: true, report });
  }));

  router.get('/reports/custom', asyncHandler(async (req: Request, res: Response) => {
    const { startDate, endDate } = parseOrThrow(reportRangeQuerySchema, req.query);
    const report = await reportService.customReport(startDate, endDate);
    res.json({ success: true, report });
  }));

  router.get('/external/:externalOrderId', asyncHandler(async (req: Request, res: Response) => {
    const lines = await orderService.getOrderLinesByExternalOrderId(req.params.externalOrderId);
    res.json({ success: true, count: lines.length, orders: lines });
  }));

  router.get('/:id', asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseOrThrow(idParamSchema, req.params);
    const order = await orderService.getOrderLine(id);
    res.json({ success: true, order });
  }));

  return router;
}

export default createOrderRoutes;
