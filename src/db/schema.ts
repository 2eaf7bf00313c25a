/**
 * Kysely table definitions.
 * Column names are camelCase here; CamelCasePlugin maps them to snake_case.
 */

import type { ColumnType, Generated, Selectable } from 'kysely';

// pg returns numeric as string
type Money = ColumnType<string, string | number, string | number>;
type CreatedAt = ColumnType<Date, Date | undefined, never>;
type UpdatedAt = ColumnType<Date, Date | undefined, Date>;

export type PaymentMethod = 'cash' | 'pos';
export type OrderLineStatus = 'completed' | 'paid' | 'cancelled';
export type WebhookEventStatus = 'processed' | 'failed' | 'skipped';

export interface ProductsTable {
  id: Generated<number>;
  externalVariantId: string;
  externalProductId: string;
  externalInventoryItemId: string | null;
  title: string;
  variantLabel: string | null;
  sku: string | null;
  barcode: string | null;
  price: Money;
  inventoryQuantity: number;
  imageUrl: string | null;
  createdAt: CreatedAt;
  updatedAt: UpdatedAt;
}

export interface CustomersTable {
  id: Generated<number>;
  externalCustomerId: string | null;
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
  createdAt: CreatedAt;
  updatedAt: UpdatedAt;
}

export interface OrderLinesTable {
  id: Generated<number>;
  externalOrderId: string;
  externalOrderNumber: string | null;
  customerId: number | null;
  productId: number | null;
  barcode: string | null;
  title: string;
  quantity: number;
  unitPrice: Money;
  paymentMethod: PaymentMethod;
  status: OrderLineStatus;
  createdAt: CreatedAt;
}

export interface WebhookEventsTable {
  id: Generated<number>;
  topic: string;
  externalResourceId: string | null;
  payload: string | null;
  status: WebhookEventStatus;
  errorMessage: string | null;
  createdAt: CreatedAt;
}

export interface Database {
  products: ProductsTable;
  customers: CustomersTable;
  orderLines: OrderLinesTable;
  webhookEvents: WebhookEventsTable;
}

export type ProductRow = Selectable<ProductsTable>;
export type CustomerRow = Selectable<CustomersTable>;
export type OrderLineRow = Selectable<OrderLinesTable>;
export type WebhookEventRow = Selectable<WebhookEventsTable>;
