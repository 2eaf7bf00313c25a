import { Kysely, sql } from 'kysely';

// snake_case names pass through CamelCasePlugin unchanged
export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('products')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('external_variant_id', 'text', (col) => col.notNull().unique())
    .addColumn('external_product_id', 'text', (col) => col.notNull())
    .addColumn('external_inventory_item_id', 'text')
    .addColumn('title', 'text', (col) => col.notNull())
    .addColumn('variant_label', 'text')
    .addColumn('sku', 'text')
    .addColumn('barcode', 'text')
    .addColumn('price', 'numeric(12, 2)', (col) => col.notNull().defaultTo(0))
    .addColumn('inventory_quantity', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('image_url', 'text')
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await db.schema.createIndex('products_barcode_idx').on('products').column('barcode').execute();
  await db.schema.createIndex('products_external_product_id_idx').on('products').column('external_product_id').execute();
  await db.schema
    .createIndex('products_external_inventory_item_id_idx')
    .on('products')
    .column('external_inventory_item_id')
    .execute();

  await db.schema
    .createTable('customers')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('external_customer_id', 'text', (col) => col.unique())
    .addColumn('first_name', 'text')
    .addColumn('last_name', 'text')
    .addColumn('email', 'text')
    .addColumn('phone', 'text')
    .addColumn('address1', 'text')
    .addColumn('address2', 'text')
    .addColumn('city', 'text')
    .addColumn('province', 'text')
    .addColumn('country', 'text')
    .addColumn('zip', 'text')
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await db.schema.createIndex('customers_email_lower_idx').on('customers').expression(sql`lower(email)`).execute();

  await db.schema
    .createTable('order_lines')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('external_order_id', 'text', (col) => col.notNull())
    .addColumn('external_order_number', 'text')
    .addColumn('customer_id', 'integer', (col) => col.references('customers.id').onDelete('set null'))
    .addColumn('product_id', 'integer', (col) => col.references('products.id').onDelete('set null'))
    .addColumn('barcode', 'text')
    .addColumn('title', 'text', (col) => col.notNull())
    .addColumn('quantity', 'integer', (col) => col.notNull().check(sql`quantity > 0`))
    .addColumn('unit_price', 'numeric(12, 2)', (col) => col.notNull())
    .addColumn('payment_method', 'text', (col) => col.notNull().check(sql`payment_method in ('cash', 'pos')`))
    .addColumn('status', 'text', (col) =>
      col.notNull().defaultTo('completed').check(sql`status in ('completed', 'paid', 'cancelled')`)
    )
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await db.schema
    .createIndex('order_lines_external_order_id_idx')
    .on('order_lines')
    .column('external_order_id')
    .execute();

  await db.schema
    .createTable('webhook_events')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('topic', 'text', (col) => col.notNull())
    .addColumn('external_resource_id', 'text')
    .addColumn('payload', 'text')
    .addColumn('status', 'text', (col) => col.notNull().check(sql`status in ('processed', 'failed', 'skipped')`))
    .addColumn('error_message', 'text')
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await db.schema.createIndex('webhook_events_topic_idx').on('webhook_events').column('topic').execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('webhook_events').execute();
  await db.schema.dropTable('order_lines').execute();
  await db.schema.dropTable('customers').execute();
  await db.schema.dropTable('products').execute();
}
