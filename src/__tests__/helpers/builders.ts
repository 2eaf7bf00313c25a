import type {
  ShopifyCustomer,
  ShopifyOrder,
  ShopifyOrderLineItem,
  ShopifyProduct,
  ShopifyVariant,
} from '../../services/integrations/types.js';
import type { CustomerUpsert, ProductUpsert } from '../../services/store/local-store.js';

export function shopifyVariant(overrides: Partial<ShopifyVariant> & { id: number }): ShopifyVariant {
  return {
    title: 'Default Title',
    price: '100.00',
    sku: `SKU-${overrides.id}`,
    barcode: `BC-${overrides.id}`,
    inventory_quantity: 5,
    inventory_item_id: overrides.id + 100000,
    ...overrides,
  };
}

export function shopifyProduct(
  id: number,
  variants: ShopifyVariant[],
  overrides: Partial<ShopifyProduct> = {}
): ShopifyProduct {
  return { id, title: `Product ${id}`, variants, images: [], ...overrides };
}

export function shopifyCustomer(overrides: Partial<ShopifyCustomer> & { id: number }): ShopifyCustomer {
  return {
    email: `customer${overrides.id}@example.com`,
    first_name: 'Test',
    last_name: `Customer ${overrides.id}`,
    phone: null,
    addresses: [],
    ...overrides,
  };
}

export function productUpsert(overrides: Partial<ProductUpsert> & { externalVariantId: string }): ProductUpsert {
  return {
    externalProductId: 'P-1',
    externalInventoryItemId: null,
    title: 'Test Product',
    variantLabel: null,
    sku: null,
    barcode: 'B1',
    price: 100,
    inventoryQuantity: 5,
    imageUrl: null,
    ...overrides,
  };
}

export function customerUpsert(overrides: Partial<CustomerUpsert> & { externalCustomerId: string }): CustomerUpsert {
  return {
    firstName: 'Ada',
    lastName: 'Yilmaz',
    email: 'ada@example.com',
    phone: null,
    address1: null,
    address2: null,
    city: null,
    province: null,
    country: null,
    zip: null,
    ...overrides,
  };
}

export function orderLineItem(overrides: Partial<ShopifyOrderLineItem> & { title: string }): ShopifyOrderLineItem {
  return {
    quantity: 1,
    price: '100.00',
    sku: null,
    variant_title: null,
    variant_id: null,
    product_id: null,
    ...overrides,
  };
}

export function shopifyOrder(overrides: Partial<ShopifyOrder> & { id: number }): ShopifyOrder {
  return {
    order_number: overrides.id - 4000,
    name: `#${overrides.id - 4000}`,
    created_at: '2024-11-15T10:00:00+03:00',
    cancelled_at: null,
    total_price: '100.00',
    financial_status: 'paid',
    tags: 'in-store, cash',
    customer: null,
    line_items: [],
    refunds: [],
    ...overrides,
  };
}
