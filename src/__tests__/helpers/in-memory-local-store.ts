/**
 * In-memory LocalStore with the same ordering and matching rules as the
 * PostgreSQL implementation.
 */

import {
  Customer,
  CustomerSearchCriteria,
  CustomerUpsert,
  LocalStore,
  NewOrderLine,
  NewWebhookEvent,
  OrderLine,
  OrderLineStatus,
  PagedResult,
  PageQuery,
  Product,
  ProductUpsert,
  UpsertResult,
  WebhookEventQuery,
  WebhookEventRecord,
  WebhookEventStats,
  normalizePhone,
} from '../../services/store/local-store.js';

const SEARCH_LIMIT = 100;

function page<T>(rows: T[], query: PageQuery): PagedResult<T> {
  return { total: rows.length, items: rows.slice(query.offset, query.offset + query.limit) };
}

function contains(value: string | null, needle: string): boolean {
  return value !== null && value.toLowerCase().includes(needle.toLowerCase());
}

export class InMemoryLocalStore implements LocalStore {
  products: Product[] = [];
  customers: Customer[] = [];
  orderLines: OrderLine[] = [];
  webhookEvents: WebhookEventRecord[] = [];

  private sequence = { products: 0, customers: 0, orderLines: 0, webhookEvents: 0 };

  // ============= PRODUCTS =============

  async upsertProduct(fields: ProductUpsert): Promise<UpsertResult<Product>> {
    const existing = this.products.find(p => p.externalVariantId === fields.externalVariantId);
    if (existing) {
      Object.assign(existing, fields, { updatedAt: new Date() });
      return { record: { ...existing }, created: false };
    }
    const now = new Date();
    const record: Product = { ...fields, id: ++this.sequence.products, createdAt: now, updatedAt: now };
    this.products.push(record);
    return { record: { ...record }, created: true };
  }

  async findProductsByBarcode(barcode: string): Promise<Product[]> {
    return this.products
      .filter(p => p.barcode === barcode)
      .sort((a, b) => a.id - b.id)
      .map(p => ({ ...p }));
  }

  async deleteProductsByExternalProductId(externalProductId: string): Promise<number> {
    const before = this.products.length;
    this.products = this.products.filter(p => p.externalProductId !== externalProductId);
    return before - this.products.length;
  }

  async deleteAllProducts(): Promise<number> {
    const deleted = this.products.length;
    this.products = [];
    for (const line of this.orderLines) {
      line.productId = null;
    }
    return deleted;
  }

  async updateInventoryByItemId(externalInventoryItemId: string, quantity: number): Promise<number> {
    const matches = this.products.filter(p => p.externalInventoryItemId === externalInventoryItemId);
    for (const product of matches) {
      product.inventoryQuantity = quantity;
      product.updatedAt = new Date();
    }
    return matches.length;
  }

  async listProducts(query: PageQuery): Promise<PagedResult<Product>> {
    return page([...this.products].sort((a, b) => a.id - b.id), query);
  }

  async searchProducts(query: string): Promise<Product[]> {
    return this.products
      .filter(p => contains(p.title, query) || contains(p.sku, query) || contains(p.barcode, query))
      .sort((a, b) => a.id - b.id)
      .slice(0, SEARCH_LIMIT);
  }

  // ============= CUSTOMERS =============

  async upsertCustomer(fields: CustomerUpsert): Promise<UpsertResult<Customer>> {
    const existing = this.customers.find(c => c.externalCustomerId === fields.externalCustomerId);
    if (existing) {
      Object.assign(existing, fields, { updatedAt: new Date() });
      return { record: { ...existing }, created: false };
    }
    const now = new Date();
    const record: Customer = { ...fields, id: ++this.sequence.customers, createdAt: now, updatedAt: now };
    this.customers.push(record);
    return { record: { ...record }, created: true };
  }

  async findCustomerByEmail(email: string): Promise<Customer | null> {
    const wanted = email.trim().toLowerCase();
    const match = this.customers
      .filter(c => c.email?.toLowerCase() === wanted)
      .sort((a, b) => a.id - b.id)[0];
    return match ? { ...match } : null;
  }

  async findCustomerById(id: number): Promise<Customer | null> {
    const match = this.customers.find(c => c.id === id);
    return match ? { ...match } : null;
  }

  async listCustomers(query: PageQuery): Promise<PagedResult<Customer>> {
    return page([...this.customers].sort((a, b) => a.id - b.id), query);
  }

  async searchCustomers(criteria: CustomerSearchCriteria): Promise<Customer[]> {
    const email = criteria.email?.trim().toLowerCase();
    const digits = criteria.phone ? normalizePhone(criteria.phone) : '';
    const name = criteria.name?.trim();

    return this.customers
      .filter(c => {
        if (email && c.email?.toLowerCase() === email) return true;
        if (digits && normalizePhone(c.phone ?? '').includes(digits)) return true;
        if (name) {
          const fullName = [c.firstName, c.lastName].filter(Boolean).join(' ');
          if (contains(c.firstName, name) || contains(c.lastName, name) || contains(fullName, name)) return true;
        }
        return false;
      })
      .sort((a, b) => a.id - b.id)
      .slice(0, SEARCH_LIMIT);
  }

  // ============= ORDER LINES =============

  async insertOrderLines(rows: NewOrderLine[]): Promise<OrderLine[]> {
    const createdAt = new Date();
    const inserted = rows.map(row => ({ ...row, id: ++this.sequence.orderLines, createdAt }));
    this.orderLines.push(...inserted);
    return inserted.map(line => ({ ...line }));
  }

  async updateOrderLinesStatus(externalOrderId: string, status: OrderLineStatus): Promise<number> {
    const matches = this.orderLines.filter(line => line.externalOrderId === externalOrderId);
    for (const line of matches) {
      line.status = status;
    }
    return matches.length;
  }

  async findOrderLineById(id: number): Promise<OrderLine | null> {
    const match = this.orderLines.find(line => line.id === id);
    return match ? { ...match } : null;
  }

  async findOrderLinesByExternalOrderId(externalOrderId: string): Promise<OrderLine[]> {
    return this.orderLines
      .filter(line => line.externalOrderId === externalOrderId)
      .sort((a, b) => a.id - b.id)
      .map(line => ({ ...line }));
  }

  async listOrderLines(query: PageQuery): Promise<PagedResult<OrderLine>> {
    const newestFirst = [...this.orderLines].sort(
      (a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id
    );
    return page(newestFirst, query);
  }

  // ============= WEBHOOK EVENTS =============

  async appendWebhookEvent(row: NewWebhookEvent): Promise<WebhookEventRecord> {
    const record: WebhookEventRecord = { ...row, id: ++this.sequence.webhookEvents, createdAt: new Date() };
    this.webhookEvents.push(record);
    return { ...record };
  }

  async listWebhookEvents(query: WebhookEventQuery): Promise<WebhookEventRecord[]> {
    return this.webhookEvents
      .filter(e => (!query.topic || e.topic === query.topic) && (!query.status || e.status === query.status))
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id)
      .slice(0, query.limit);
  }

  async webhookEventStats(): Promise<WebhookEventStats> {
    const stats: WebhookEventStats = { total: this.webhookEvents.length, byStatus: {}, byTopic: {} };
    for (const event of this.webhookEvents) {
      stats.byStatus[event.status] = (stats.byStatus[event.status] ?? 0) + 1;
      stats.byTopic[event.topic] = (stats.byTopic[event.topic] ?? 0) + 1;
    }
    return stats;
  }
}
