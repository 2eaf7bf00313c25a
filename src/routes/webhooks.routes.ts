/**
 * Shopify webhook endpoint plus the delivery log.
 * The receive route needs the raw body for the signature, so the app mounts
 * express.raw() for /api/webhooks ahead of express.json().
 */

import { Router, Request, Response } from 'express';
import type { WebhookProcessorService } from '../services/webhook-processor.service.js';
import { webhookLogsQuerySchema } from '../schemas/pos.schemas.js';
import { parseOrThrow } from '../schemas/parse.js';
import { asyncHandler } from '../utils/http.js';

export function createWebhookRoutes(webhookProcessor: WebhookProcessorService): Router {
  const router = Router();

  router.get('/logs', asyncHandler(async (req: Request, res: Response) => {
    const query = parseOrThrow(webhookLogsQuerySchema, req.query);
    const events = await webhookProcessor.listWebhookEvents(query);
    res.json({ success: true, count: events.length, events });
  }));

  router.get('/stats', asyncHandler(async (_req: Request, res: Response) => {
    const stats = await webhookProcessor.webhookStats();
    res.json({ success: true, ...stats });
  }));

  router.post('/:resource/:action', asyncHandler(async (req: Request, res: Response) => {
    const topic = `${req.params.resource}/${req.params.action}`;
    const rawBody: Buffer | string = Buffer.isBuffer(req.body) ? req.body : '';

    const receipt = await webhookProcessor.receive({
      topic,
      rawBody,
      signature: req.get('x-shopify-hmac-sha256') ?? null,
    });

    res.status(200).json({ status: receipt.status, topic: receipt.topic, resourceId: receipt.resourceId });
  }));

  return router;
}

export default createWebhookRoutes;
