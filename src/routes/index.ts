import { Router, Request, Response } from 'express';
import type { CatalogSyncService } from '../services/catalog-sync.service.js';
import type { CustomerService } from '../services/customer.service.js';
import type { PosOrderService } from '../services/pos-order.service.js';
import type { ProductService } from '../services/product.service.js';
import type { SalesReportService } from '../services/sales-report.service.js';
import type { WebhookProcessorService } from '../services/webhook-processor.service.js';
import createSyncRoutes from './sync.routes.js';
import createProductRoutes from './products.routes.js';
import createCustomerRoutes from './customers.routes.js';
import createOrderRoutes from './orders.routes.js';
import createWebhookRoutes from './webhooks.routes.js';

export interface AppServices {
  sync: CatalogSyncService;
  products: ProductService;
  customers: CustomerService;
  orders: PosOrderService;
  reports: SalesReportService;
  webhooks: WebhookProcessorService;
}

export function createRoutes(services: AppServices): Router {
  const router = Router();

  // Health check endpoint
  router.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      syncing: {
        products: services.sync.isRunning('products'),
        customers: services.sync.isRunning('customers'),
      },
      webhookSignatures: services.webhooks.signatureRequired ? 'enforced' : 'disabled',
    });
  });

  // Full pulls from Shopify
  router.use('/sync', createSyncRoutes(services.sync));

  // Local catalog
  router.use('/products', createProductRoutes(services.products));

  // Customers (local first, Shopify fallback)
  router.use('/customers', createCustomerRoutes(services.customers));

  // POS sales and sales reports
  router.use('/orders', createOrderRoutes(services.orders, services.reports));

  // Shopify webhooks and their delivery log
  router.use('/webhooks', createWebhookRoutes(services.webhooks));

  return router;
}

export default createRoutes;
