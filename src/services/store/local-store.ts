/**
 * Local Store contract.
 *
 * The store is the only mutator of products, customers, order lines and webhook events.
 * Every mutation is either an upsert keyed by a unique external id or an append-only insert.
 */

import type { OrderLineStatus, PaymentMethod, WebhookEventStatus } from '../../db/schema.js';

export type { OrderLineStatus, PaymentMethod, WebhookEventStatus };

// ============= RECORDS =============

export interface Product {
  id: number;
  externalVariantId: string;
  externalProductId: string;
  externalInventoryItemId: string | null;
  title: string;
  variantLabel: string | null;
  sku: string | null;
  barcode: string | null;
  price: number;
  inventoryQuantity: number;
  imageUrl: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface CustomerFields {
  firstName: string | null;
  lastName: string | null;
  email: string | null;
  phone: string | null;
  address1: string | null;
  address2: string | null;
  city: string | null;
  province: string | null;
  country: string | null;
  zip: string | null;
}

export interface Customer extends CustomerFields {
  id: number;
  externalCustomerId: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface OrderLine {
  id: number;
  externalOrderId: string;
  externalOrderNumber: string | null;
  customerId: number | null;
  productId: number | null;
  barcode: string | null;
  title: string;
  quantity: number;
  unitPrice: number;
  paymentMethod: PaymentMethod;
  status: OrderLineStatus;
  createdAt: Date;
}

export interface WebhookEventRecord {
  id: number;
  topic: string;
  externalResourceId: string | null;
  payload: string | null;
  status: WebhookEventStatus;
  errorMessage: string | null;
  createdAt: Date;
}

// ============= WRITE MODELS =============

export type ProductUpsert = Omit<Product, 'id' | 'createdAt' | 'updatedAt'>;

export interface CustomerUpsert extends CustomerFields {
  externalCustomerId: string;
}

export type NewOrderLine = Omit<OrderLine, 'id' | 'createdAt'>;

export type NewWebhookEvent = Omit<WebhookEventRecord, 'id' | 'createdAt'>;

export interface UpsertResult<T> {
  record: T;
  created: boolean;
}

// ============= QUERIES =============

export interface PageQuery {
  offset: number;
  limit: number;
}

export interface PagedResult<T> {
  total: number;
  items: T[];
}

export interface CustomerSearchCriteria {
  email?: string;
  phone?: string;
  name?: string;
}

export interface WebhookEventQuery {
  limit: number;
  topic?: string;
  status?: WebhookEventStatus;
}

export interface WebhookEventStats {
  total: number;
  byStatus: Record<string, number>;
  byTopic: Record<string, number>;
}

// ============= CONTRACT =============

export interface LocalStore {
  // Products
  upsertProduct(fields: ProductUpsert): Promise<UpsertResult<Product>>;
  /** Ordered by ascending local id */
  findProductsByBarcode(barcode: string): Promise<Product[]>;
  deleteProductsByExternalProductId(externalProductId: string): Promise<number>;
  /** Order lines keep their barcode and title; their product reference is cleared */
  deleteAllProducts(): Promise<number>;
  updateInventoryByItemId(externalInventoryItemId: string, quantity: number): Promise<number>;
  listProducts(query: PageQuery): Promise<PagedResult<Product>>;
  searchProducts(query: string): Promise<Product[]>;

  // Customers
  upsertCustomer(fields: CustomerUpsert): Promise<UpsertResult<Customer>>;
  /** Case-insensitive exact match; the lowest id wins when several rows share an email */
  findCustomerByEmail(email: string): Promise<Customer | null>;
  findCustomerById(id: number): Promise<Customer | null>;
  listCustomers(query: PageQuery): Promise<PagedResult<Customer>>;
  searchCustomers(criteria: CustomerSearchCriteria): Promise<Customer[]>;

  // Order lines
  insertOrderLines(rows: NewOrderLine[]): Promise<OrderLine[]>;
  updateOrderLinesStatus(externalOrderId: string, status: OrderLineStatus): Promise<number>;
  findOrderLineById(id: number): Promise<OrderLine | null>;
  findOrderLinesByExternalOrderId(externalOrderId: string): Promise<OrderLine[]>;
  listOrderLines(query: PageQuery): Promise<PagedResult<OrderLine>>;

  // Webhook events
  appendWebhookEvent(row: NewWebhookEvent): Promise<WebhookEventRecord>;
  listWebhookEvents(query: WebhookEventQuery): Promise<WebhookEventRecord[]>;
  webhookEventStats(): Promise<WebhookEventStats>;
}

/** Digits only, for phone comparisons */
export function normalizePhone(phone: string): string {
  return phone.replace(/\D/g, '');
}
