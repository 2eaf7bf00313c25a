/**
 * PostgreSQL-backed LocalStore.
 * Upserts use INSERT ... ON CONFLICT on the external id; `xmax = 0` tells inserts from updates.
 */

import { Expression, Kysely, SqlBool, sql } from 'kysely';
import type {
  CustomerRow,
  Database,
  OrderLineRow,
  ProductRow,
  WebhookEventRow,
} from '../../db/schema.js';
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
} from './local-store.js';
import { formatMoney, parseMoney } from '../../utils/money.js';

const SEARCH_LIMIT = 100;

function toProduct(row: ProductRow): Product {
  return { ...row, price: parseMoney(row.price) };
}

function toOrderLine(row: OrderLineRow): OrderLine {
  return { ...row, unitPrice: parseMoney(row.unitPrice) };
}

function toWebhookEvent(row: WebhookEventRow): WebhookEventRecord {
  return { ...row };
}

function toCustomer(row: CustomerRow): Customer {
  return { ...row };
}

function countOf(row: { count: string | number | bigint } | undefined): number {
  return row ? Number(row.count) : 0;
}

export class KyselyLocalStore implements LocalStore {
  constructor(private db: Kysely<Database>) {}

  // ============= PRODUCTS =============

  async upsertProduct(fields: ProductUpsert): Promise<UpsertResult<Product>> {
    const values = { ...fields, price: formatMoney(fields.price) };
    const { externalVariantId: _key, ...mutable } = values;

    const row = await this.db
      .insertInto('products')
      .values(values)
      .onConflict(oc => oc.column('externalVariantId').doUpdateSet({ ...mutable, updatedAt: new Date() }))
      .returningAll()
      .returning(sql<boolean>`(xmax = 0)`.as('inserted'))
      .executeTakeFirstOrThrow();

    const { inserted, ...product } = row;
    return { record: toProduct(product), created: inserted };
  }

  async findProductsByBarcode(barcode: string): Promise<Product[]> {
    const rows = await this.db
      .selectFrom('products')
      .selectAll()
      .where('barcode', '=', barcode)
      .orderBy('id', 'asc')
      .execute();
    return rows.map(toProduct);
  }

  async deleteProductsByExternalProductId(externalProductId: string): Promise<number> {
    const result = await this.db
      .deleteFrom('products')
      .where('externalProductId', '=', externalProductId)
      .executeTakeFirst();
    return Number(result.numDeletedRows);
  }

  async deleteAllProducts(): Promise<number> {
    const result = await this.db.deleteFrom('products').executeTakeFirst();
    return Number(result.numDeletedRows);
  }

  async updateInventoryByItemId(externalInventoryItemId: string, quantity: number): Promise<number> {
    const result = await this.db
      .updateTable('products')
      .set({ inventoryQuantity: quantity, updatedAt: new Date() })
      .where('externalInventoryItemId', '=', externalInventoryItemId)
      .executeTakeFirst();
    return Number(result.numUpdatedRows);
  }

  async listProducts(query: PageQuery): Promise<PagedResult<Product>> {
    const [countRow, rows] = await Promise.all([
      this.db.selectFrom('products').select(eb => eb.fn.countAll().as('count')).executeTakeFirst(),
      this.db
        .selectFrom('products')
        .selectAll()
        .orderBy('id', 'asc')
        .offset(query.offset)
        .limit(query.limit)
        .execute(),
    ]);
    return { total: countOf(countRow), items: rows.map(toProduct) };
  }

  async searchProducts(query: string): Promise<Product[]> {
    const pattern = `%${query}%`;
    const rows = await this.db
      .selectFrom('products')
      .selectAll()
      .where(eb =>
        eb.or([
          eb('title', 'ilike', pattern),
          eb('sku', 'ilike', pattern),
          eb('barcode', 'ilike', pattern),
        ])
      )
      .orderBy('id', 'asc')
      .limit(SEARCH_LIMIT)
      .execute();
    return rows.map(toProduct);
  }

  // ============= CUSTOMERS =============

  async upsertCustomer(fields: CustomerUpsert): Promise<UpsertResult<Customer>> {
    const { externalCustomerId: _key, ...mutable } = fields;

    const row = await this.db
      .insertInto('customers')
      .values(fields)
      .onConflict(oc => oc.column('externalCustomerId').doUpdateSet({ ...mutable, updatedAt: new Date() }))
      .returningAll()
      .returning(sql<boolean>`(xmax = 0)`.as('inserted'))
      .executeTakeFirstOrThrow();

    const { inserted, ...customer } = row;
    return { record: toCustomer(customer), created: inserted };
  }

  async findCustomerByEmail(email: string): Promise<Customer | null> {
    const row = await this.db
      .selectFrom('customers')
      .selectAll()
      .where(eb => eb(eb.fn('lower', [eb.ref('email')]), '=', email.trim().toLowerCase()))
      .orderBy('id', 'asc')
      .limit(1)
      .executeTakeFirst();
    return row ? toCustomer(row) : null;
  }

  async findCustomerById(id: number): Promise<Customer | null> {
    const row = await this.db.selectFrom('customers').selectAll().where('id', '=', id).executeTakeFirst();
    return row ? toCustomer(row) : null;
  }

  async listCustomers(query: PageQuery): Promise<PagedResult<Customer>> {
    const [countRow, rows] = await Promise.all([
      this.db.selectFrom('customers').select(eb => eb.fn.countAll().as('count')).executeTakeFirst(),
      this.db
        .selectFrom('customers')
        .selectAll()
        .orderBy('id', 'asc')
        .offset(query.offset)
        .limit(query.limit)
        .execute(),
    ]);
    return { total: countOf(countRow), items: rows.map(toCustomer) };
  }

  async searchCustomers(criteria: CustomerSearchCriteria): Promise<Customer[]> {
    const rows = await this.db
      .selectFrom('customers')
      .selectAll()
      .where(eb => {
        const conditions: Expression<SqlBool>[] = [];
        if (criteria.email) {
          conditions.push(eb(eb.fn('lower', [eb.ref('email')]), '=', criteria.email.trim().toLowerCase()));
        }
        // A phone without digits would match every row
        const digits = criteria.phone ? normalizePhone(criteria.phone) : '';
        if (digits) {
          conditions.push(
            eb(sql<string>`regexp_replace(coalesce(${sql.ref('phone')}, ''), '\\D', '', 'g')`, 'like', `%${digits}%`)
          );
        }
        if (criteria.name) {
          const pattern = `%${criteria.name.trim()}%`;
          conditions.push(
            eb.or([
              eb('firstName', 'ilike', pattern),
              eb('lastName', 'ilike', pattern),
              eb(sql<string>`concat_ws(' ', ${sql.ref('firstName')}, ${sql.ref('lastName')})`, 'ilike', pattern),
            ])
          );
        }
        return eb.or(conditions);
      })
      .orderBy('id', 'asc')
      .limit(SEARCH_LIMIT)
      .execute();
    return rows.map(toCustomer);
  }

  // ============= ORDER LINES =============

  async insertOrderLines(rows: NewOrderLine[]): Promise<OrderLine[]> {
    if (rows.length === 0) return [];

    // One statement, so the batch lands atomically
    const inserted = await this.db
      .insertInto('orderLines')
      .values(rows.map(row => ({ ...row, unitPrice: formatMoney(row.unitPrice) })))
      .returningAll()
      .execute();

    return inserted.sort((a, b) => a.id - b.id).map(toOrderLine);
  }

  async updateOrderLinesStatus(externalOrderId: string, status: OrderLineStatus): Promise<number> {
    const result = await this.db
      .updateTable('orderLines')
      .set({ status })
      .where('externalOrderId', '=', externalOrderId)
      .executeTakeFirst();
    return Number(result.numUpdatedRows);
  }

  async findOrderLineById(id: number): Promise<OrderLine | null> {
    const row = await this.db.selectFrom('orderLines').selectAll().where('id', '=', id).executeTakeFirst();
    return row ? toOrderLine(row) : null;
  }

  async findOrderLinesByExternalOrderId(externalOrderId: string): Promise<OrderLine[]> {
    const rows = await this.db
      .selectFrom('orderLines')
      .selectAll()
      .where('externalOrderId', '=', externalOrderId)
      .orderBy('id', 'asc')
      .execute();
    return rows.map(toOrderLine);
  }

  async listOrderLines(query: PageQuery): Promise<PagedResult<OrderLine>> {
    const [countRow, rows] = await Promise.all([
      this.db.selectFrom('orderLines').select(eb => eb.fn.countAll().as('count')).executeTakeFirst(),
      this.db
        .selectFrom('orderLines')
        .selectAll()
        .orderBy('createdAt', 'desc')
        .orderBy('id', 'desc')
        .offset(query.offset)
        .limit(query.limit)
        .execute(),
    ]);
    return { total: countOf(countRow), items: rows.map(toOrderLine) };
  }

  // ============= WEBHOOK EVENTS =============

  async appendWebhookEvent(row: NewWebhookEvent): Promise<WebhookEventRecord> {
    const inserted = await this.db
      .insertInto('webhookEvents')
      .values(row)
      .returningAll()
      .executeTakeFirstOrThrow();
    return toWebhookEvent(inserted);
  }

  async listWebhookEvents(query: WebhookEventQuery): Promise<WebhookEventRecord[]> {
    let select = this.db.selectFrom('webhookEvents').selectAll();
    if (query.topic) {
      select = select.where('topic', '=', query.topic);
    }
    if (query.status) {
      select = select.where('status', '=', query.status);
    }

    const rows = await select.orderBy('createdAt', 'desc').orderBy('id', 'desc').limit(query.limit).execute();
    return rows.map(toWebhookEvent);
  }

  async webhookEventStats(): Promise<WebhookEventStats> {
    const [byStatus, byTopic] = await Promise.all([
      this.db
        .selectFrom('webhookEvents')
        .select(eb => ['status', eb.fn.countAll().as('count')])
        .groupBy('status')
        .execute(),
      this.db
        .selectFrom('webhookEvents')
        .select(eb => ['topic', eb.fn.countAll().as('count')])
        .groupBy('topic')
        .execute(),
    ]);

    const stats: WebhookEventStats = { total: 0, byStatus: {}, byTopic: {} };
    for (const row of byStatus) {
      stats.byStatus[row.status] = Number(row.count);
      stats.total += Number(row.count);
    }
    for (const row of byTopic) {
      stats.byTopic[row.topic] = Number(row.count);
    }
    return stats;
  }
}
