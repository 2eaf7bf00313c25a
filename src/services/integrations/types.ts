/**
 * Shopify Admin REST types and the remote catalog contract
 * the sync engine and the commit pipeline depend on.
 */

// ============= SHOPIFY TYPES =============

export interface ShopifyCredentials {
  shopDomain: string;
  accessToken: string;
  apiVersion?: string;
  requestTimeoutMs?: number;
}

export interface ShopifyVariant {
  id: number;
  product_id?: number;
  title: string | null;
  price: string | null;
  sku: string | null;
  barcode: string | null;
  inventory_quantity: number | null;
  inventory_item_id: number | null;
  image_id?: number | null;
}

export interface ShopifyProductImage {
  id: number;
  src: string;
}

export interface ShopifyProduct {
  id: number;
  title: string;
  status?: string;
  variants: ShopifyVariant[];
  images?: ShopifyProductImage[];
  image?: ShopifyProductImage | null;
}

export interface ShopifyAddress {
  address1?: string | null;
  address2?: string | null;
  city?: string | null;
  province?: string | null;
  country?: string | null;
  zip?: string | null;
}

export interface ShopifyCustomer {
  id: number;
  email: string | null;
  first_name: string | null;
  last_name: string | null;
  phone: string | null;
  addresses?: ShopifyAddress[];
  default_address?: ShopifyAddress | null;
}

export interface ShopifyCustomerInput {
  first_name: string;
  last_name: string;
  email: string;
  phone?: string | null;
  addresses?: ShopifyAddress[];
}

export interface ShopifyOrderLineInput {
  title: string;
  quantity: number;
  price: string;
  variant_id?: number;
}

export interface ShopifyOrderInput {
  line_items: ShopifyOrderLineInput[];
  tags: string;
  financial_status: 'paid';
  currency: string;
  email?: string;
  customer?: { id: number };
  note?: string;
  discount_codes?: Array<{ code: string; amount: string; type: 'fixed_amount' }>;
  transactions: Array<{
    kind: 'sale';
    status: 'success';
    amount: string;
    gateway: string;
  }>;
  send_receipt: boolean;
  inventory_behaviour: 'bypass' | 'decrement_ignoring_policy' | 'decrement_obeying_policy';
}

export interface ShopifyOrderLineItem {
  title: string;
  quantity: number;
  price: string;
  sku: string | null;
  variant_title: string | null;
  variant_id: number | null;
  product_id: number | null;
}

export interface ShopifyRefundTransaction {
  amount: string;
  kind?: string;
}

export interface ShopifyRefund {
  id: number;
  created_at?: string;
  transactions: ShopifyRefundTransaction[];
}

export interface ShopifyOrderCustomer {
  first_name: string | null;
  last_name: string | null;
  email: string | null;
  phone: string | null;
}

export interface ShopifyOrder {
  id: number;
  order_number: number;
  name: string;
  created_at: string;
  cancelled_at: string | null;
  total_price: string;
  financial_status: string;
  tags: string;
  customer?: ShopifyOrderCustomer | null;
  line_items: ShopifyOrderLineItem[];
  refunds?: ShopifyRefund[];
}

// ============= REMOTE CATALOG CONTRACT =============

export interface Page<T> {
  records: T[];
  nextPageToken: string | null;
}

export interface RemoteOrderLine {
  title: string;
  quantity: number;
  unitPrice: number;
  externalVariantId?: string;
}

export interface RemoteOrderInput {
  lines: RemoteOrderLine[];
  finalAmount: number;
  discount: number;
  discountReason: string | null;
  tags: string[];
  paymentMethod: string;
  customer: { externalCustomerId: string | null; email: string | null } | null;
}

/** Shopify reads naive timestamps in the shop's timezone */
export interface OrderDateRange {
  createdAtMin: string;
  createdAtMax: string;
}

export interface RemoteOrderResult {
  externalOrderId: string;
  externalOrderNumber: string;
}

/**
 * What the rest of the system needs from the external platform.
 * Implementations throw PosError(REMOTE_UNAVAILABLE) on transport, auth or timeout failures.
 */
export interface RemoteCatalogClient {
  listProducts(pageToken?: string | null): Promise<Page<ShopifyProduct>>;
  listCustomers(pageToken?: string | null): Promise<Page<ShopifyCustomer>>;
  createOrder(input: RemoteOrderInput): Promise<RemoteOrderResult>;
  createCustomer(input: ShopifyCustomerInput): Promise<ShopifyCustomer>;
  findCustomer(email: string): Promise<ShopifyCustomer | null>;
  searchCustomers(query: string): Promise<ShopifyCustomer[]>;
  /** Orders of any status created inside the range, one page at a time */
  getOrdersByDateRange(range: OrderDateRange, pageToken?: string | null): Promise<Page<ShopifyOrder>>;
}
