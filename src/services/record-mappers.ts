/**
 * Shopify record → local record mapping, shared by the sync engine and webhooks.
 */

import type { ShopifyAddress, ShopifyCustomer, ShopifyProduct, ShopifyVariant } from './integrations/types.js';
import type { CustomerUpsert, ProductUpsert } from './store/local-store.js';
import { parseMoney } from '../utils/money.js';

function emptyToNull(value: string | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/**
 * Variant image first, then the product's main image, then its first image
 */
export function resolveImageUrl(product: ShopifyProduct, variant: ShopifyVariant): string | null {
  if (variant.image_id && product.images) {
    const match = product.images.find(image => image.id === variant.image_id);
    if (match) return match.src;
  }
  if (product.image) return product.image.src;
  return product.images?.[0]?.src ?? null;
}

/**
 * Map one variant to a Product upsert. Variants without a barcode are not sellable
 * at the register and map to null.
 */
export function mapVariantToProduct(product: ShopifyProduct, variant: ShopifyVariant): ProductUpsert | null {
  const barcode = emptyToNull(variant.barcode);
  if (!barcode) return null;

  return {
    externalVariantId: String(variant.id),
    externalProductId: String(product.id),
    externalInventoryItemId: variant.inventory_item_id ? String(variant.inventory_item_id) : null,
    title: product.title || 'Unknown Product',
    variantLabel: variant.title ?? null,
    sku: emptyToNull(variant.sku),
    barcode,
    price: parseMoney(variant.price),
    inventoryQuantity: variant.inventory_quantity ?? 0,
    imageUrl: resolveImageUrl(product, variant),
  };
}

function primaryAddress(customer: ShopifyCustomer): ShopifyAddress | null {
  return customer.addresses?.[0] ?? customer.default_address ?? null;
}

export function mapShopifyCustomer(customer: ShopifyCustomer): CustomerUpsert {
  const address = primaryAddress(customer);

  return {
    externalCustomerId: String(customer.id),
    firstName: emptyToNull(customer.first_name),
    lastName: emptyToNull(customer.last_name),
    email: emptyToNull(customer.email),
    phone: emptyToNull(customer.phone),
    address1: emptyToNull(address?.address1),
    address2: emptyToNull(address?.address2),
    city: emptyToNull(address?.city),
    province: emptyToNull(address?.province),
    country: emptyToNull(address?.country),
    zip: emptyToNull(address?.zip),
  };
}
