import { Router, Request, Response } from 'express';
import type { CustomerService } from '../services/customer.service.js';
import {
  customerSearchQuerySchema,
  idParamSchema,
  newCustomerSchema,
  paginationQuerySchema,
} from '../schemas/pos.schemas.js';
import { parseOrThrow } from '../schemas/parse.js';
import { asyncHandler } from '../utils/http.js';

export function createCustomerRoutes(customerService: CustomerService): Router {
  const router = Router();

  router.get('/', asyncHandler(async (req: Request, res: Response) => {
    const query = parseOrThrow(paginationQuerySchema, req.query);
    const { total, items } = await customerService.listCustomers(query);
    res.json({ success: true, total, offset: query.offset, limit: query.limit, customers: items });
  }));

  router.get('/search', asyncHandler(async (req: Request, res: Response) => {
    const criteria = parseOrThrow(customerSearchQuerySchema, req.query);
    const { source, customers } = await customerService.searchCustomers(criteria);
    res.json({ success: true, source, count: customers.length, customers });
  }));

  router.get('/:id', asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseOrThrow(idParamSchema, req.params);
    const customer = await customerService.getCustomer(id);
    res.json({ success: true, customer });
  }));

  router.post('/', asyncHandler(async (req: Request, res: Response) => {
    const input = parseOrThrow(newCustomerSchema, req.body);
    const customer = await customerService.createCustomer(input);
    res.status(201).json({ success: true, customer });
  }));

  return router;
}

export default createCustomerRoutes;
