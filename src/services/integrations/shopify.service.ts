/**
 * Shopify Integration Service
 * Handles all communication with the Shopify Admin REST API
 */

import crypto from 'crypto';
import {
  OrderDateRange,
  Page,
  RemoteCatalogClient,
  RemoteOrderInput,
  RemoteOrderResult,
  ShopifyCredentials,
  ShopifyCustomer,
  ShopifyCustomerInput,
  ShopifyOrder,
  ShopifyOrderInput,
  ShopifyProduct,
} from './types.js';
import { PosError, POS_ERROR_CODES, extractErrorMessage } from '../../utils/errors.js';
import { formatMoney } from '../../utils/money.js';
import { Logger } from '../../utils/logger.js';

const DEFAULT_API_VERSION = '2024-10';
const DEFAULT_TIMEOUT_MS = 30000;

// Shopify's maximum for REST list endpoints
export const PAGE_SIZE = 250;

interface ShopifyResponse<T> {
  data: T;
  headers: Headers;
}

/**
 * Extract the page_info cursor of the rel="next" entry of a Link header
 */
export function parseNextPageInfo(linkHeader: string | null): string | null {
  if (!linkHeader) return null;

  for (const part of linkHeader.split(',')) {
    const [urlPart, ...params] = part.split(';');
    if (!params.some(param => param.trim() === 'rel="next"')) continue;

    const url = urlPart.trim().replace(/^</, '').replace(/>$/, '');
    try {
      return new URL(url).searchParams.get('page_info');
    } catch {
      return null;
    }
  }

  return null;
}

export class ShopifyService implements RemoteCatalogClient {
  private credentials: ShopifyCredentials;
  private baseUrl: string;
  private timeoutMs: number;
  private currency: string;
  private logger = new Logger('Shopify');

  constructor(credentials: ShopifyCredentials, options: { currency?: string } = {}) {
    this.credentials = credentials;
    this.currency = options.currency ?? 'TRY';
    const apiVersion = credentials.apiVersion || DEFAULT_API_VERSION;
    // Trim whitespace from shopDomain to prevent invalid URLs
    const shopDomain = credentials.shopDomain.trim().replace(/^https?:\/\//, '');
    this.baseUrl = `https://${shopDomain}/admin/api/${apiVersion}`;
    this.timeoutMs = credentials.requestTimeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * Make an authenticated request to Shopify API.
   * Every call is bounded by the configured timeout.
   */
  private async request<T>(
    endpoint: string,
    options: RequestInit = {}
  ): Promise<ShopifyResponse<T>> {
    const url = `${this.baseUrl}${endpoint}`;
    const method = options.method ?? 'GET';

    let response: Response;
    let text: string;
    try {
      response = await fetch(url, {
        ...options,
        headers: {
          'Content-Type': 'application/json',
          'X-Shopify-Access-Token': this.credentials.accessToken,
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      // The timeout also covers reading the body
      text = await response.text();
    } catch (error) {
      throw this.transportError(error, method, endpoint);
    }

    if (!response.ok) {
      this.logger.warn({ event: 'request_rejected', method, endpoint, status: response.status });
      throw new PosError(POS_ERROR_CODES.REMOTE_UNAVAILABLE, {
        message: `Shopify API error: ${response.status} - ${text}`,
        context: { method, endpoint, status: response.status },
      });
    }

    let data: T;
    try {
      data = JSON.parse(text) as T;
    } catch (error) {
      this.logger.warn({ event: 'invalid_response_body', method, endpoint, status: response.status });
      throw new PosError(POS_ERROR_CODES.REMOTE_UNAVAILABLE, {
        message: `Shopify returned an invalid JSON body: ${extractErrorMessage(error)}`,
        context: { method, endpoint, status: response.status },
        cause: error,
      });
    }

    return { data, headers: response.headers };
  }

  private transportError(error: unknown, method: string, endpoint: string): PosError {
    const timedOut = error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
    this.logger.warn({ event: timedOut ? 'request_timed_out' : 'request_failed', method, endpoint, error });
    return new PosError(POS_ERROR_CODES.REMOTE_UNAVAILABLE, {
      message: timedOut
        ? `Shopify request timed out after ${this.timeoutMs}ms`
        : `Shopify request failed: ${extractErrorMessage(error)}`,
      context: { method, endpoint },
      cause: error,
    });
  }

  private pageEndpoint(resource: string, pageToken?: string | null, filters: Record<string, string> = {}): string {
    const params = new URLSearchParams({ limit: String(PAGE_SIZE) });
    // Shopify rejects any other filter once page_info is present; the cursor carries them
    if (pageToken) {
      params.set('page_info', pageToken);
    } else {
      for (const [key, value] of Object.entries(filters)) {
        params.set(key, value);
      }
    }
    return `/${resource}.json?${params.toString()}`;
  }

  // ============= PRODUCTS =============

  /**
   * Fetch one page of products (with their variants)
   */
  async listProducts(pageToken?: string | null): Promise<Page<ShopifyProduct>> {
    const { data, headers } = await this.request<{ products?: ShopifyProduct[] }>(
      this.pageEndpoint('products', pageToken)
    );
    return {
      records: data.products ?? [],
      nextPageToken: parseNextPageInfo(headers.get('link')),
    };
  }

  // ============= CUSTOMERS =============

  /**
   * Fetch one page of customers
   */
  async listCustomers(pageToken?: string | null): Promise<Page<ShopifyCustomer>> {
    const { data, headers } = await this.request<{ customers?: ShopifyCustomer[] }>(
      this.pageEndpoint('customers', pageToken)
    );
    return {
      records: data.customers ?? [],
      nextPageToken: parseNextPageInfo(headers.get('link')),
    };
  }

  async searchCustomers(query: string): Promise<ShopifyCustomer[]> {
    const params = new URLSearchParams({ query });
    const { data } = await this.request<{ customers?: ShopifyCustomer[] }>(
      `/customers/search.json?${params.toString()}`
    );
    return data.customers ?? [];
  }

  /**
   * Search returns fuzzy matches, so only an exact (case-insensitive) email match counts
   */
  async findCustomer(email: string): Promise<ShopifyCustomer | null> {
    const wanted = email.trim().toLowerCase();
    const customers = await this.searchCustomers(`email:${wanted}`);
    return customers.find(customer => customer.email?.toLowerCase() === wanted) ?? null;
  }

  async createCustomer(input: ShopifyCustomerInput): Promise<ShopifyCustomer> {
    const { data } = await this.request<{ customer: ShopifyCustomer }>('/customers.json', {
      method: 'POST',
      body: JSON.stringify({ customer: input }),
    });
    return data.customer;
  }

  // ============= ORDERS =============

  /**
   * Create an already-paid order for an in-store sale
   */
  async createOrder(input: RemoteOrderInput): Promise<RemoteOrderResult> {
    const { data } = await this.request<{ order: ShopifyOrder }>('/orders.json', {
      method: 'POST',
      body: JSON.stringify({ order: ShopifyService.buildOrderPayload(input, this.currency) }),
    });

    return {
      externalOrderId: String(data.order.id),
      externalOrderNumber: String(data.order.order_number),
    };
  }

  /**
   * Map a remote order request onto the REST order body
   */
  static buildOrderPayload(input: RemoteOrderInput, currency: string): ShopifyOrderInput {
    const order: ShopifyOrderInput = {
      line_items: input.lines.map(line => ({
        title: line.title,
        quantity: line.quantity,
        price: formatMoney(line.unitPrice),
        ...(line.externalVariantId ? { variant_id: Number(line.externalVariantId) } : {}),
      })),
      tags: [...input.tags, input.paymentMethod].join(', '),
      financial_status: 'paid',
      currency,
      transactions: [
        {
          kind: 'sale',
          status: 'success',
          amount: formatMoney(input.finalAmount),
          gateway: input.paymentMethod,
        },
      ],
      send_receipt: false,
      inventory_behaviour: 'decrement_ignoring_policy',
    };

    if (input.customer?.email) {
      order.email = input.customer.email;
    }
    if (input.customer?.externalCustomerId) {
      order.customer = { id: Number(input.customer.externalCustomerId) };
    }
    if (input.discount > 0) {
      const reason = input.discountReason || 'Store discount';
      order.note = `Discount applied: ${formatMoney(input.discount)} - Reason: ${reason}`;
      order.discount_codes = [{ code: reason, amount: formatMoney(input.discount), type: 'fixed_amount' }];
    }

    return order;
  }

  /**
   * Fetch one page of orders (any status) created inside the range
   */
  async getOrdersByDateRange(range: OrderDateRange, pageToken?: string | null): Promise<Page<ShopifyOrder>> {
    const { data, headers } = await this.request<{ orders?: ShopifyOrder[] }>(
      this.pageEndpoint('orders', pageToken, {
        status: 'any',
        created_at_min: range.createdAtMin,
        created_at_max: range.createdAtMax,
      })
    );
    return {
      records: data.orders ?? [],
      nextPageToken: parseNextPageInfo(headers.get('link')),
    };
  }

  // ============= WEBHOOKS =============

  /**
   * Verify webhook signature: base64 HMAC-SHA256 of the raw body
   */
  static verifyWebhookSignature(
    body: Buffer | string,
    signature: string,
    secret: string
  ): boolean {
    const hmac = crypto.createHmac('sha256', secret);
    hmac.update(body);
    const computed = Buffer.from(hmac.digest('base64'));
    const provided = Buffer.from(signature);
    // timingSafeEqual throws on length mismatch
    if (computed.length !== provided.length) return false;
    return crypto.timingSafeEqual(provided, computed);
  }
}

export default ShopifyService;
