/**
 * Webhook Processor Service
 * Applies Shopify webhook deliveries to the local store.
 *
 * Every accepted delivery ends in exactly one webhook_events row:
 * - processed: the store was changed (or re-applied idempotently)
 * - skipped: nothing to apply (unknown topic, no matching rows, no barcoded variants)
 * - failed: the payload could not be parsed or a handler threw
 *
 * Deliveries rejected by the signature check are not logged.
 */

import { ShopifyService } from './integrations/shopify.service.js';
import type {
  LocalStore,
  OrderLineStatus,
  ProductUpsert,
  WebhookEventQuery,
  WebhookEventRecord,
  WebhookEventStats,
  WebhookEventStatus,
} from './store/local-store.js';
import { mapShopifyCustomer, mapVariantToProduct } from './record-mappers.js';
import {
  inventoryLevelSchema,
  resourceIdSchema,
  shopifyCustomerSchema,
  shopifyProductSchema,
} from '../schemas/webhook.schemas.js';
import { parseOrThrow } from '../schemas/parse.js';
import { PosError, POS_ERROR_CODES, extractErrorMessage } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';

// ============= TYPES =============

export const WEBHOOK_TOPICS = [
  'products/create',
  'products/update',
  'products/delete',
  'customers/create',
  'customers/update',
  'inventory_levels/update',
  'orders/paid',
  'orders/cancelled',
] as const;

export type WebhookTopic = (typeof WEBHOOK_TOPICS)[number];

export function isWebhookTopic(topic: string): topic is WebhookTopic {
  return WEBHOOK_TOPICS.some(known => known === topic);
}

export interface WebhookDelivery {
  topic: string;
  rawBody: Buffer | string;
  signature?: string | null;
}

export interface WebhookReceipt {
  status: WebhookEventStatus;
  topic: string;
  resourceId: string | null;
  message: string | null;
}

interface HandlerOutcome {
  status: Exclude<WebhookEventStatus, 'failed'>;
  message: string;
}

export interface WebhookProcessorOptions {
  /** Shared secret; when empty, signatures are not checked */
  secret?: string | null;
}

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parsePayload(body: string): JsonObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    throw new Error(`Invalid JSON payload: ${extractErrorMessage(error)}`);
  }
  if (!isJsonObject(parsed)) {
    throw new Error('Webhook payload must be a JSON object');
  }
  return parsed;
}

/**
 * Best-effort resource id for the log row, read before the payload is validated
 */
function peekResourceId(payload: JsonObject): string | null {
  const candidate = payload.id ?? payload.inventory_item_id;
  return typeof candidate === 'number' || typeof candidate === 'string' ? String(candidate) : null;
}

const skipped = (message: string): HandlerOutcome => ({ status: 'skipped', message });
const processed = (message: string): HandlerOutcome => ({ status: 'processed', message });

// ============= SERVICE =============

export class WebhookProcessorService {
  private logger = new Logger('Webhooks');
  private secret: string | null;

  constructor(
    private store: LocalStore,
    options: WebhookProcessorOptions = {}
  ) {
    this.secret = options.secret || null;
  }

  get signatureRequired(): boolean {
    return this.secret !== null;
  }

  /**
   * Verify, dispatch and log one delivery.
   * Only a signature failure throws; handler errors become failed rows.
   */
  async receive(delivery: WebhookDelivery): Promise<WebhookReceipt> {
    const { topic } = delivery;
    this.verifySignature(delivery);

    const body = typeof delivery.rawBody === 'string' ? delivery.rawBody : delivery.rawBody.toString('utf8');
    let resourceId: string | null = null;
    let status: WebhookEventStatus;
    let message: string | null;
    let errorMessage: string | null = null;

    try {
      const payload = parsePayload(body);
      resourceId = peekResourceId(payload);
      const outcome = await this.dispatch(topic, payload);
      status = outcome.status;
      message = outcome.message;
    } catch (error) {
      status = 'failed';
      errorMessage = extractErrorMessage(error);
      message = errorMessage;
      this.logger.error({ event: 'webhook_failed', topic, resourceId, error });
    }

    this.logger.info({ event: `webhook_${status}`, topic, resourceId, message });
    await this.record({ topic, externalResourceId: resourceId, payload: body, status, errorMessage });

    return { status, topic, resourceId, message };
  }

  async listWebhookEvents(query: WebhookEventQuery): Promise<WebhookEventRecord[]> {
    return this.store.listWebhookEvents(query);
  }

  async webhookStats(): Promise<WebhookEventStats> {
    return this.store.webhookEventStats();
  }

  // ============= DISPATCH =============

  private async dispatch(topic: string, payload: JsonObject): Promise<HandlerOutcome> {
    if (!isWebhookTopic(topic)) {
      return skipped(`Unhandled topic ${topic}`);
    }

    switch (topic) {
      case 'products/create':
      case 'products/update':
        return this.handleProductUpsert(payload);
      case 'products/delete':
        return this.handleProductDelete(payload);
      case 'customers/create':
      case 'customers/update':
        return this.handleCustomerUpsert(payload);
      case 'inventory_levels/update':
        return this.handleInventoryUpdate(payload);
      case 'orders/paid':
        return this.handleOrderStatus(payload, 'paid');
      case 'orders/cancelled':
        return this.handleOrderStatus(payload, 'cancelled');
      default: {
        const unreachable: never = topic;
        return skipped(`Unhandled topic ${String(unreachable)}`);
      }
    }
  }

  private async handleProductUpsert(payload: JsonObject): Promise<HandlerOutcome> {
    const product = parseOrThrow(shopifyProductSchema, payload);

    const eligible = new Map<string, ProductUpsert>();
    for (const variant of product.variants) {
      const fields = mapVariantToProduct(product, variant);
      if (fields && !eligible.has(fields.externalVariantId)) {
        eligible.set(fields.externalVariantId, fields);
      }
    }

    if (eligible.size === 0) {
      return skipped(`Product ${product.id} has no variants with a barcode`);
    }

    for (const fields of eligible.values()) {
      await this.store.upsertProduct(fields);
    }
    return processed(`Upserted ${eligible.size} variant(s) of product ${product.id}`);
  }

  private async handleProductDelete(payload: JsonObject): Promise<HandlerOutcome> {
    const { id } = parseOrThrow(resourceIdSchema, payload);
    const deleted = await this.store.deleteProductsByExternalProductId(String(id));
    if (deleted === 0) {
      return skipped(`No local variants for product ${id}`);
    }
    return processed(`Deleted ${deleted} variant(s) of product ${id}`);
  }

  private async handleCustomerUpsert(payload: JsonObject): Promise<HandlerOutcome> {
    const customer = parseOrThrow(shopifyCustomerSchema, payload);
    const { created } = await this.store.upsertCustomer(mapShopifyCustomer(customer));
    return processed(`${created ? 'Created' : 'Updated'} customer ${customer.id}`);
  }

  private async handleInventoryUpdate(payload: JsonObject): Promise<HandlerOutcome> {
    const level = parseOrThrow(inventoryLevelSchema, payload);
    const updated = await this.store.updateInventoryByItemId(String(level.inventory_item_id), level.available);
    if (updated === 0) {
      return skipped(`No local variant for inventory item ${level.inventory_item_id}`);
    }
    return processed(`Set inventory of ${updated} variant(s) to ${level.available}`);
  }

  /**
   * Repeated deliveries re-apply the same status and still count as processed
   */
  private async handleOrderStatus(payload: JsonObject, status: OrderLineStatus): Promise<HandlerOutcome> {
    const { id } = parseOrThrow(resourceIdSchema, payload);
    const updated = await this.store.updateOrderLinesStatus(String(id), status);
    if (updated === 0) {
      return skipped(`No local lines for order ${id}`);
    }
    return processed(`Marked ${updated} line(s) of order ${id} as ${status}`);
  }

  // ============= HELPERS =============

  private verifySignature(delivery: WebhookDelivery): void {
    if (!this.secret) return;

    const signature = delivery.signature?.trim();
    if (!signature || !ShopifyService.verifyWebhookSignature(delivery.rawBody, signature, this.secret)) {
      this.logger.warn({ event: 'signature_rejected', topic: delivery.topic, hasSignature: Boolean(signature) });
      throw new PosError(POS_ERROR_CODES.SIGNATURE_INVALID, { context: { topic: delivery.topic } });
    }
  }

  private async record(row: {
    topic: string;
    externalResourceId: string | null;
    payload: string;
    status: WebhookEventStatus;
    errorMessage: string | null;
  }): Promise<void> {
    try {
      await this.store.appendWebhookEvent(row);
    } catch (error) {
      // The delivery is still acknowledged
      this.logger.error({ event: 'webhook_log_failed', topic: row.topic, status: row.status, error });
    }
  }
}
