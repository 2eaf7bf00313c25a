/**
 * Request schemas for the POS API.
 *
 * These check request shape only. Business rules (positive quantities, payment
 * methods, discounts, customer reference) are enforced by the services so that
 * each violation keeps its own error code.
 */

import { z } from 'zod';

// ============= COMMON =============

export const paginationQuerySchema = z.object({
  offset: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().positive().max(250).default(50),
});

export const idParamSchema = z.object({
  id: z.coerce.number().int().positive(),
});

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a date in YYYY-MM-DD format');

export const reportRangeQuerySchema = z.object({
  startDate: isoDate,
  endDate: isoDate,
});

const optionalText = z.string().trim().nullish();

// ============= CUSTOMERS =============

export const newCustomerSchema = z.object({
  firstName: z.string().trim().min(1, 'First name is required'),
  lastName: z.string().trim().min(1, 'Last name is required'),
  email: z.string().trim().email('A valid email is required'),
  phone: optionalText,
  address1: optionalText,
  address2: optionalText,
  city: optionalText,
  province: optionalText,
  country: optionalText,
  zip: optionalText,
});

export const customerSearchQuerySchema = z.object({
  email: z.string().trim().min(1).optional(),
  phone: z.string().trim().min(1).optional(),
  name: z.string().trim().min(1).optional(),
});

// ============= PRODUCTS =============

export const productSearchQuerySchema = z.object({
  query: z.string().trim().min(1, 'Search query is required'),
});

// ============= ORDERS =============

const barcodeItemSchema = z.object({
  type: z.literal('barcode'),
  barcode: z.string(),
  quantity: z.number(),
  variantId: z
    .union([z.string(), z.number()])
    .transform(value => String(value))
    .optional(),
});

const customItemSchema = z.object({
  type: z.literal('custom'),
  title: z.string(),
  price: z.number(),
  quantity: z.number(),
  size: optionalText,
});

export const cartItemSchema = z.discriminatedUnion('type', [barcodeItemSchema, customItemSchema]);

const customerReferenceFields = {
  email: optionalText,
  newCustomer: newCustomerSchema.nullish(),
};

export const cartOrderSchema = z.object({
  items: z.array(cartItemSchema),
  paymentMethod: z.string(),
  discount: z.number().optional(),
  discountReason: optionalText,
  ...customerReferenceFields,
});

export const manualOrderSchema = z.object({
  title: z.string(),
  size: optionalText,
  price: z.number(),
  quantity: z.number().default(1),
  paymentMethod: z.string(),
  discount: z.number().optional(),
  discountReason: optionalText,
  ...customerReferenceFields,
});

// ============= WEBHOOKS =============

export const webhookLogsQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(500).default(50),
  topic: z.string().trim().min(1).optional(),
  status: z.enum(['processed', 'failed', 'skipped']).optional(),
});

export type CartOrderBody = z.infer<typeof cartOrderSchema>;
export type ManualOrderBody = z.infer<typeof manualOrderSchema>;
export type NewCustomerBody = z.infer<typeof newCustomerSchema>;
