/**
 * Sales Report Service
 * Revenue reports over Shopify's order history, online and in-store alike.
 *
 * - Cancelled or voided orders are counted apart and add no revenue
 * - Refund transactions are subtracted from gross revenue
 * - Shopify refunds name no payment method, so the cash/pos/online split
 *   spreads them in proportion to each channel's sales
 */

import type { OrderDateRange, RemoteCatalogClient, ShopifyOrder } from './integrations/types.js';
import { PosError, POS_ERROR_CODES } from '../utils/errors.js';
import { Cents, fromCents, parseMoney, toCents } from '../utils/money.js';
import { Logger } from '../utils/logger.js';

// ============= TYPES =============

export type ReportPeriod = 'today' | 'weekly' | 'monthly' | 'custom';
export type PaymentChannel = 'cash' | 'pos' | 'online';

export interface PaymentBucket {
  count: number;
  amount: number;
}

export interface ProductSales {
  productName: string;
  sku: string | null;
  variantTitle: string | null;
  totalQuantity: number;
  totalRevenue: number;
  orderCount: number;
}

export interface ReportLineItem {
  title: string;
  quantity: number;
  price: number;
  total: number;
  sku: string | null;
  variantTitle: string | null;
}

export interface ReportOrder {
  orderId: string;
  orderNumber: number;
  customerName: string;
  customerEmail: string | null;
  total: number;
  itemsCount: number;
  lineItems: ReportLineItem[];
  financialStatus: string;
  tags: string;
  createdAt: string;
}

export interface RefundedOrder {
  orderId: string;
  orderNumber: number;
  customerName: string;
  originalTotal: number;
  refundedAmount: number;
  netPayment: number;
  financialStatus: string;
  refundCount: number;
  createdAt: string;
}

export interface SalesSummary {
  totalOrders: number;
  grossRevenue: number;
  totalRefunded: number;
  netRevenue: number;
  averageOrderValue: number;
  totalProductsSold: number;
  uniqueProducts: number;
  cancelledOrders: number;
  cancelledRevenue: number;
  partiallyRefundedCount: number;
  fullyRefundedCount: number;
}

export interface SalesReport {
  period: ReportPeriod;
  startDate: string;
  endDate: string;
  summary: SalesSummary;
  paymentBreakdown: Record<PaymentChannel, PaymentBucket>;
  dailyBreakdown: Record<string, { count: number; revenue: number }>;
  productDailySales: Record<string, Record<string, { quantity: number; revenue: number }>>;
  topProducts: ProductSales[];
  refunds: { partiallyRefunded: RefundedOrder[]; fullyRefunded: RefundedOrder[] };
  orders: ReportOrder[];
}

export interface SalesReportOptions {
  now?: () => Date;
}

type OrderHistorySource = Pick<RemoteCatalogClient, 'getOrdersByDateRange'>;

// ============= DATE HELPERS =============

const TOP_PRODUCTS_LIMIT = 20;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const pad = (value: number): string => String(value).padStart(2, '0');

function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

// Server-local wall time without an offset, the way Shopify's filters read it
function formatDateTime(date: Date): string {
  return `${formatDate(date)}T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

function daysBefore(date: Date, days: number): Date {
  const shifted = new Date(date.getTime());
  shifted.setDate(shifted.getDate() - days);
  return shifted;
}

function assertCalendarDate(field: string, value: string): void {
  const [year, month, day] = value.split('-').map(Number);
  const valid = DATE_PATTERN.test(value) && formatDate(new Date(year, month - 1, day)) === value;
  if (!valid) {
    throw new PosError(POS_ERROR_CODES.VALIDATION_ERROR, {
      message: `${field}: must be a date in YYYY-MM-DD format`,
      context: { [field]: value },
    });
  }
}

// ============= ORDER HELPERS =============

function isCancelled(order: ShopifyOrder): boolean {
  return order.financial_status === 'voided' || Boolean(order.cancelled_at);
}

function paymentChannel(order: ShopifyOrder): PaymentChannel {
  const tags = order.tags.split(',').map(tag => tag.trim().toLowerCase());
  if (tags.includes('cash')) return 'cash';
  if (tags.includes('pos')) return 'pos';
  return 'online';
}

function refundedCents(order: ShopifyOrder): Cents {
  let total = 0;
  for (const refund of order.refunds ?? []) {
    for (const transaction of refund.transactions) {
      total += toCents(parseMoney(transaction.amount));
    }
  }
  return total;
}

function customerName(order: ShopifyOrder): string {
  const name = [order.customer?.first_name, order.customer?.last_name].filter(Boolean).join(' ').trim();
  return name || 'Guest';
}

function toReportOrder(order: ShopifyOrder): ReportOrder {
  return {
    orderId: String(order.id),
    orderNumber: order.order_number,
    customerName: customerName(order),
    customerEmail: order.customer?.email ?? null,
    total: parseMoney(order.total_price),
    itemsCount: order.line_items.length,
    lineItems: order.line_items.map(item => {
      const price = parseMoney(item.price);
      return {
        title: item.title,
        quantity: item.quantity,
        price,
        total: fromCents(toCents(price) * item.quantity),
        sku: item.sku,
        variantTitle: item.variant_title,
      };
    }),
    financialStatus: order.financial_status,
    tags: order.tags,
    createdAt: order.created_at,
  };
}

// ============= AGGREGATION =============

/**
 * Aggregate one range of orders. Pure; every sum is taken in cents.
 */
export function buildSalesReport(
  orders: ShopifyOrder[],
  meta: { period: ReportPeriod; startDate: string; endDate: string; productLimit?: number }
): SalesReport {
  const active = orders.filter(order => !isCancelled(order));
  const cancelled = orders.filter(isCancelled);

  let grossCents = 0;
  let refundCents = 0;
  const channels: Record<PaymentChannel, { count: number; cents: Cents }> = {
    cash: { count: 0, cents: 0 },
    pos: { count: 0, cents: 0 },
    online: { count: 0, cents: 0 },
  };
  const daily = new Map<string, { count: number; cents: Cents }>();
  const productDaily = new Map<string, Map<string, { quantity: number; cents: Cents }>>();
  const products = new Map<string, { sales: ProductSales; cents: Cents; orderIds: Set<number> }>();
  const partiallyRefunded: RefundedOrder[] = [];
  const fullyRefunded: RefundedOrder[] = [];

  for (const order of active) {
    const totalCents = toCents(parseMoney(order.total_price));
    const orderRefundCents = refundedCents(order);
    const day = order.created_at.slice(0, 10);

    grossCents += totalCents;
    refundCents += orderRefundCents;

    const channel = channels[paymentChannel(order)];
    channel.count += 1;
    channel.cents += totalCents;

    const dayTotals = daily.get(day) ?? { count: 0, cents: 0 };
    dayTotals.count += 1;
    dayTotals.cents += totalCents;
    daily.set(day, dayTotals);

    for (const item of order.line_items) {
      const lineCents = toCents(parseMoney(item.price)) * item.quantity;

      let entry = products.get(item.title);
      if (!entry) {
        entry = {
          sales: {
            productName: item.title,
            sku: item.sku,
            variantTitle: item.variant_title,
            totalQuantity: 0,
            totalRevenue: 0,
            orderCount: 0,
          },
          cents: 0,
          orderIds: new Set<number>(),
        };
        products.set(item.title, entry);
      }
      entry.sales.totalQuantity += item.quantity;
      entry.cents += lineCents;
      entry.orderIds.add(order.id);

      const dayProducts = productDaily.get(day) ?? new Map<string, { quantity: number; cents: Cents }>();
      const dayProduct = dayProducts.get(item.title) ?? { quantity: 0, cents: 0 };
      dayProduct.quantity += item.quantity;
      dayProduct.cents += lineCents;
      dayProducts.set(item.title, dayProduct);
      productDaily.set(day, dayProducts);
    }

    if (orderRefundCents > 0) {
      const refunded: RefundedOrder = {
        orderId: String(order.id),
        orderNumber: order.order_number,
        customerName: customerName(order),
        originalTotal: fromCents(totalCents),
        refundedAmount: fromCents(orderRefundCents),
        netPayment: fromCents(totalCents - orderRefundCents),
        financialStatus: order.financial_status,
        refundCount: order.refunds?.length ?? 0,
        createdAt: order.created_at,
      };
      if (order.financial_status === 'refunded') {
        fullyRefunded.push(refunded);
      } else if (order.financial_status === 'partially_refunded') {
        partiallyRefunded.push(refunded);
      }
    }
  }

  const netCents = grossCents - refundCents;

  const bucket = (channel: PaymentChannel): PaymentBucket => {
    const { count, cents } = channels[channel];
    const refundShare = grossCents > 0 ? Math.round((cents * refundCents) / grossCents) : 0;
    return { count, amount: fromCents(cents - refundShare) };
  };

  const productSales = [...products.values()]
    .map(({ sales, cents, orderIds }) => ({ ...sales, totalRevenue: fromCents(cents), orderCount: orderIds.size }))
    .sort((a, b) => b.totalRevenue - a.totalRevenue || a.productName.localeCompare(b.productName));

  const dailyBreakdown: SalesReport['dailyBreakdown'] = {};
  for (const [day, totals] of daily) {
    dailyBreakdown[day] = { count: totals.count, revenue: fromCents(totals.cents) };
  }

  const productDailySales: SalesReport['productDailySales'] = {};
  for (const [day, dayProducts] of productDaily) {
    productDailySales[day] = {};
    for (const [title, totals] of dayProducts) {
      productDailySales[day][title] = { quantity: totals.quantity, revenue: fromCents(totals.cents) };
    }
  }

  return {
    period: meta.period,
    startDate: meta.startDate,
    endDate: meta.endDate,
    summary: {
      totalOrders: active.length,
      grossRevenue: fromCents(grossCents),
      totalRefunded: fromCents(refundCents),
      netRevenue: fromCents(netCents),
      averageOrderValue: active.length > 0 ? fromCents(Math.round(netCents / active.length)) : 0,
      totalProductsSold: productSales.reduce((sum, product) => sum + product.totalQuantity, 0),
      uniqueProducts: productSales.length,
      cancelledOrders: cancelled.length,
      cancelledRevenue: fromCents(cancelled.reduce((sum, order) => sum + toCents(parseMoney(order.total_price)), 0)),
      partiallyRefundedCount: partiallyRefunded.length,
      fullyRefundedCount: fullyRefunded.length,
    },
    paymentBreakdown: { cash: bucket('cash'), pos: bucket('pos'), online: bucket('online') },
    dailyBreakdown,
    productDailySales,
    topProducts: meta.productLimit === undefined ? productSales : productSales.slice(0, meta.productLimit),
    refunds: { partiallyRefunded, fullyRefunded },
    orders: active.map(toReportOrder),
  };
}

// ============= SERVICE =============

export class SalesReportService {
  private logger = new Logger('Reports');
  private now: () => Date;

  constructor(
    private remote: OrderHistorySource,
    options: SalesReportOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Today from midnight to 23:59:59, with every product sold
   */
  async todayStats(): Promise<SalesReport> {
    const today = formatDate(this.now());
    const orders = await this.fetchOrders('today', {
      createdAtMin: `${today}T00:00:00`,
      createdAtMax: `${today}T23:59:59`,
    });
    return buildSalesReport(orders, { period: 'today', startDate: today, endDate: today });
  }

  /** The last 7 days up to now */
  async weeklyReport(): Promise<SalesReport> {
    return this.rollingReport('weekly', 7);
  }

  /** The last 30 days up to now */
  async monthlyReport(): Promise<SalesReport> {
    return this.rollingReport('monthly', 30);
  }

  /**
   * Whole days from startDate to endDate inclusive, both YYYY-MM-DD
   */
  async customReport(startDate: string, endDate: string): Promise<SalesReport> {
    assertCalendarDate('startDate', startDate);
    assertCalendarDate('endDate', endDate);
    if (startDate > endDate) {
      throw new PosError(POS_ERROR_CODES.VALIDATION_ERROR, {
        message: 'startDate must not be after endDate',
        context: { startDate, endDate },
      });
    }

    const orders = await this.fetchOrders('custom', {
      createdAtMin: `${startDate}T00:00:00`,
      createdAtMax: `${endDate}T23:59:59`,
    });
    return buildSalesReport(orders, { period: 'custom', startDate, endDate, productLimit: TOP_PRODUCTS_LIMIT });
  }

  private async rollingReport(period: 'weekly' | 'monthly', days: number): Promise<SalesReport> {
    const end = this.now();
    const start = daysBefore(end, days);
    const orders = await this.fetchOrders(period, {
      createdAtMin: formatDateTime(start),
      createdAtMax: formatDateTime(end),
    });
    return buildSalesReport(orders, {
      period,
      startDate: formatDate(start),
      endDate: formatDate(end),
      productLimit: TOP_PRODUCTS_LIMIT,
    });
  }

  private async fetchOrders(period: ReportPeriod, range: OrderDateRange): Promise<ShopifyOrder[]> {
    const orders: ShopifyOrder[] = [];
    let pageToken: string | null = null;
    let pages = 0;

    do {
      const page = await this.remote.getOrdersByDateRange(range, pageToken);
      orders.push(...page.records);
      pageToken = page.nextPageToken;
      pages++;
    } while (pageToken);

    this.logger.info({ event: 'orders_fetched', period, ...range, pages, orders: orders.length });
    return orders;
  }
}

export default SalesReportService;
