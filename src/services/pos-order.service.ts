/**
 * POS Order Service
 *
 * Cart-to-order commit pipeline:
 * 1. Validate the cart, payment method, customer reference and discount
 * 2. Resolve lines against the local catalog and price them in cents
 * 3. Resolve the customer (may adopt or create one in Shopify)
 * 4. Create one paid order in Shopify
 * 5. Mirror the lines locally as one batch
 *
 * Nothing is written locally unless Shopify accepted the order.
 */

import type { RemoteCatalogClient, RemoteOrderResult } from './integrations/types.js';
import type {
  Customer,
  LocalStore,
  NewOrderLine,
  OrderLine,
  PagedResult,
  PageQuery,
  PaymentMethod,
  Product,
} from './store/local-store.js';
import { CustomerService, CustomerReference, NewCustomerInput } from './customer.service.js';
import { PosError, POS_ERROR_CODES, extractErrorMessage } from '../utils/errors.js';
import { Cents, fromCents, toCents } from '../utils/money.js';
import { Logger } from '../utils/logger.js';

// ============= TYPES =============

export type CartItem =
  | { type: 'barcode'; barcode: string; quantity: number; variantId?: string }
  | { type: 'custom'; title: string; price: number; quantity: number; size?: string | null };

export interface CustomerReferenceInput {
  email?: string | null;
  newCustomer?: NewCustomerInput | null;
}

export interface CartOrderInput extends CustomerReferenceInput {
  items: CartItem[];
  paymentMethod: string;
  discount?: number;
  discountReason?: string | null;
}

export interface ManualOrderInput extends CustomerReferenceInput {
  title: string;
  size?: string | null;
  price: number;
  quantity: number;
  paymentMethod: string;
  discount?: number;
  discountReason?: string | null;
}

export interface OrderCommitResult {
  externalOrderId: string;
  externalOrderNumber: string;
  subtotal: number;
  finalAmount: number;
  discountApplied: number;
  discountReason: string | null;
  customer: Customer;
  lines: OrderLine[];
}

interface ResolvedLine {
  product: Product | null;
  title: string;
  quantity: number;
  unitPrice: number;
}

interface ValidatedOrder {
  items: CartItem[];
  paymentMethod: PaymentMethod;
  customer: CustomerReference;
  discountCents: Cents;
  discountReason: string | null;
  tags: string[];
}

export const PAYMENT_METHODS: readonly PaymentMethod[] = ['cash', 'pos'];
export const DEFAULT_DISCOUNT_REASON = 'Store discount';
const IN_STORE_TAG = 'in-store';
const MANUAL_TAG = 'manual';

// ============= VALIDATION =============

function invalid(message: string, context?: Record<string, unknown>): PosError {
  return new PosError(POS_ERROR_CODES.VALIDATION_ERROR, { message, context });
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

function validateItems(items: CartItem[]): void {
  if (items.length === 0) {
    throw invalid('Cart must contain at least one item');
  }

  items.forEach((item, index) => {
    if (!isPositiveInteger(item.quantity)) {
      throw invalid(`Item ${index + 1}: quantity must be a positive integer`, { index });
    }
    switch (item.type) {
      case 'barcode':
        if (!item.barcode.trim()) {
          throw invalid(`Item ${index + 1}: barcode is required`, { index });
        }
        break;
      case 'custom':
        if (!item.title.trim()) {
          throw invalid(`Item ${index + 1}: title is required`, { index });
        }
        if (!Number.isFinite(item.price) || toCents(item.price) <= 0) {
          throw invalid(`Item ${index + 1}: price must be greater than 0`, { index });
        }
        break;
    }
  });
}

function validatePaymentMethod(value: string): PaymentMethod {
  const match = PAYMENT_METHODS.find(method => method === value);
  if (!match) {
    throw new PosError(POS_ERROR_CODES.INVALID_PAYMENT_METHOD, { context: { paymentMethod: value } });
  }
  return match;
}

function toCustomerReference(input: CustomerReferenceInput): CustomerReference {
  const email = input.email?.trim();
  const newCustomer = input.newCustomer ?? null;

  if (email && !newCustomer) return { kind: 'email', email };
  if (newCustomer && !email) return { kind: 'new', customer: newCustomer };

  throw new PosError(POS_ERROR_CODES.AMBIGUOUS_CUSTOMER_REFERENCE, {
    message: email
      ? "Provide either 'email' or 'newCustomer', not both"
      : "Provide either 'email' or 'newCustomer'",
  });
}

function validateDiscount(discount: number | undefined): Cents {
  const value = discount ?? 0;
  if (!Number.isFinite(value) || value < 0) {
    throw invalid('Discount cannot be negative', { discount: value });
  }
  return toCents(value);
}

function customTitle(title: string, size: string | null | undefined): string {
  const trimmedSize = size?.trim();
  return trimmedSize ? `${title.trim()} - ${trimmedSize}` : title.trim();
}

// ============= SERVICE =============

export class PosOrderService {
  private logger = new Logger('PosOrders');

  constructor(
    private store: LocalStore,
    private remote: RemoteCatalogClient,
    private customers: CustomerService
  ) {}

  async createCartOrder(input: CartOrderInput): Promise<OrderCommitResult> {
    validateItems(input.items);
    const paymentMethod = validatePaymentMethod(input.paymentMethod);
    const customer = toCustomerReference(input);
    const discountCents = validateDiscount(input.discount);

    return this.commit({
      items: input.items,
      paymentMethod,
      customer,
      discountCents,
      discountReason: input.discountReason ?? null,
      tags: [IN_STORE_TAG],
    });
  }

  /**
   * A single off-catalog item through the same pipeline, tagged as manual
   */
  async createManualOrder(input: ManualOrderInput): Promise<OrderCommitResult> {
    const items: CartItem[] = [
      { type: 'custom', title: input.title, price: input.price, quantity: input.quantity, size: input.size },
    ];
    validateItems(items);
    const paymentMethod = validatePaymentMethod(input.paymentMethod);
    const customer = toCustomerReference(input);
    const discountCents = validateDiscount(input.discount);

    return this.commit({
      items,
      paymentMethod,
      customer,
      discountCents,
      discountReason: input.discountReason ?? null,
      tags: [IN_STORE_TAG, MANUAL_TAG],
    });
  }

  // ============= QUERIES =============

  async listOrderLines(query: PageQuery): Promise<PagedResult<OrderLine>> {
    return this.store.listOrderLines(query);
  }

  async getOrderLine(id: number): Promise<OrderLine> {
    const line = await this.store.findOrderLineById(id);
    if (!line) {
      throw new PosError(POS_ERROR_CODES.ORDER_LINE_NOT_FOUND, {
        message: `Order line ${id} not found`,
        context: { id },
      });
    }
    return line;
  }

  async getOrderLinesByExternalOrderId(externalOrderId: string): Promise<OrderLine[]> {
    const lines = await this.store.findOrderLinesByExternalOrderId(externalOrderId);
    if (lines.length === 0) {
      throw new PosError(POS_ERROR_CODES.ORDER_LINE_NOT_FOUND, {
        message: `No order lines found for order ${externalOrderId}`,
        context: { externalOrderId },
      });
    }
    return lines;
  }

  // ============= PIPELINE =============

  private async commit(order: ValidatedOrder): Promise<OrderCommitResult> {
    const lines = await this.resolveLines(order.items);

    const subtotalCents = lines.reduce((sum, line) => sum + toCents(line.unitPrice) * line.quantity, 0);
    if (order.discountCents >= subtotalCents) {
      throw new PosError(POS_ERROR_CODES.DISCOUNT_EXCEEDS_TOTAL, {
        context: { subtotal: fromCents(subtotalCents), discount: fromCents(order.discountCents) },
      });
    }
    const finalCents = subtotalCents - order.discountCents;
    const discountReason =
      order.discountCents > 0 ? order.discountReason?.trim() || DEFAULT_DISCOUNT_REASON : null;

    const customer = await this.customers.resolve(order.customer);

    let remoteOrder: RemoteOrderResult;
    try {
      remoteOrder = await this.remote.createOrder({
        lines: lines.map(line => ({
          title: line.title,
          quantity: line.quantity,
          unitPrice: line.unitPrice,
          ...(line.product ? { externalVariantId: line.product.externalVariantId } : {}),
        })),
        finalAmount: fromCents(finalCents),
        discount: fromCents(order.discountCents),
        discountReason,
        tags: order.tags,
        paymentMethod: order.paymentMethod,
        customer: { externalCustomerId: customer.externalCustomerId, email: customer.email },
      });
    } catch (error) {
      this.logger.error({ event: 'remote_commit_failed', customerId: customer.id, error });
      throw new PosError(POS_ERROR_CODES.REMOTE_COMMIT_FAILED, {
        message: `Failed to create the order in Shopify: ${extractErrorMessage(error)}`,
        cause: error,
      });
    }

    if (order.discountCents > 0) {
      this.logger.info({
        event: 'discount_applied',
        externalOrderId: remoteOrder.externalOrderId,
        discount: fromCents(order.discountCents),
        reason: discountReason,
      });
    }

    const rows: NewOrderLine[] = lines.map(line => ({
      externalOrderId: remoteOrder.externalOrderId,
      externalOrderNumber: remoteOrder.externalOrderNumber,
      customerId: customer.id,
      productId: line.product?.id ?? null,
      barcode: line.product?.barcode ?? null,
      title: line.title,
      quantity: line.quantity,
      unitPrice: line.unitPrice,
      paymentMethod: order.paymentMethod,
      status: 'completed',
    }));

    // The Shopify order exists from here on; a local failure must be reconciled by hand
    let persisted: OrderLine[];
    try {
      persisted = await this.store.insertOrderLines(rows);
    } catch (error) {
      this.logger.error({
        event: 'local_persist_failed',
        externalOrderId: remoteOrder.externalOrderId,
        externalOrderNumber: remoteOrder.externalOrderNumber,
        lineCount: rows.length,
        error,
      });
      throw error;
    }

    this.logger.info({
      event: 'order_committed',
      externalOrderId: remoteOrder.externalOrderId,
      lines: persisted.length,
      finalAmount: fromCents(finalCents),
    });

    return {
      externalOrderId: remoteOrder.externalOrderId,
      externalOrderNumber: remoteOrder.externalOrderNumber,
      subtotal: fromCents(subtotalCents),
      finalAmount: fromCents(finalCents),
      discountApplied: fromCents(order.discountCents),
      discountReason,
      customer,
      lines: persisted,
    };
  }

  private async resolveLines(items: CartItem[]): Promise<ResolvedLine[]> {
    const lines: ResolvedLine[] = [];

    for (const item of items) {
      switch (item.type) {
        case 'barcode': {
          const product = await this.resolveBarcode(item.barcode.trim(), item.variantId);
          lines.push({
            product,
            title: product.title,
            quantity: item.quantity,
            unitPrice: product.price,
          });
          break;
        }
        case 'custom':
          lines.push({
            product: null,
            title: customTitle(item.title, item.size),
            quantity: item.quantity,
            unitPrice: fromCents(toCents(item.price)),
          });
          break;
      }
    }

    return lines;
  }

  /**
   * An explicit variant wins; otherwise the first in-stock row by ascending id,
   * falling back to the first row.
   */
  private async resolveBarcode(barcode: string, variantId: string | undefined): Promise<Product> {
    const matches = await this.store.findProductsByBarcode(barcode);
    const [first] = matches;
    if (!first) {
      throw new PosError(POS_ERROR_CODES.PRODUCT_NOT_FOUND, {
        message: `No product found with barcode ${barcode}`,
        context: { barcode },
      });
    }

    if (variantId) {
      const variant = matches.find(product => product.externalVariantId === variantId);
      if (!variant) {
        throw new PosError(POS_ERROR_CODES.PRODUCT_NOT_FOUND, {
          message: `No variant ${variantId} found with barcode ${barcode}`,
          context: { barcode, variantId },
        });
      }
      return variant;
    }

    return matches.find(product => product.inventoryQuantity > 0) ?? first;
  }
}
