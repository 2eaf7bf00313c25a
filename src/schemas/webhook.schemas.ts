/**
 * Shopify webhook payload schemas.
 * Unknown keys are stripped; absent optional fields default to null.
 */

import { z } from 'zod';

const shopifyId = z.number().int();
const nullableString = z.string().nullable().default(null);

const priceString = z
  .union([z.string(), z.number()])
  .nullable()
  .default(null)
  .transform(value => (value === null ? null : String(value)));

export const shopifyVariantSchema = z.object({
  id: shopifyId,
  product_id: shopifyId.optional(),
  title: nullableString,
  price: priceString,
  sku: nullableString,
  barcode: nullableString,
  inventory_quantity: z.number().int().nullable().default(null),
  inventory_item_id: shopifyId.nullable().default(null),
  image_id: shopifyId.nullable().optional(),
});

const productImageSchema = z.object({
  id: shopifyId,
  src: z.string(),
});

export const shopifyProductSchema = z.object({
  id: shopifyId,
  title: z.string().default(''),
  status: z.string().optional(),
  variants: z.array(shopifyVariantSchema).default([]),
  images: z.array(productImageSchema).default([]),
  image: productImageSchema.nullable().optional(),
});

const addressSchema = z.object({
  address1: z.string().nullish(),
  address2: z.string().nullish(),
  city: z.string().nullish(),
  province: z.string().nullish(),
  country: z.string().nullish(),
  zip: z.string().nullish(),
});

export const shopifyCustomerSchema = z.object({
  id: shopifyId,
  email: nullableString,
  first_name: nullableString,
  last_name: nullableString,
  phone: nullableString,
  addresses: z.array(addressSchema).optional(),
  default_address: addressSchema.nullable().optional(),
});

// Untracked inventory arrives as null
export const inventoryLevelSchema = z.object({
  inventory_item_id: shopifyId,
  available: z.number().int().nullable().transform(value => value ?? 0),
});

export const resourceIdSchema = z.object({
  id: shopifyId,
});
