/**
 * Catalog Sync Service
 *
 * Full pulls of products and customers from Shopify into the local store.
 * Each page is upserted before the next one is requested, so pages already
 * written stay durable when a later page fails.
 */

import type { Page, RemoteCatalogClient } from './integrations/types.js';
import type { LocalStore } from './store/local-store.js';
import { mapShopifyCustomer, mapVariantToProduct } from './record-mappers.js';
import { PosError, POS_ERROR_CODES } from '../utils/errors.js';
import { SyncLogger } from '../utils/sync-logger.js';

// ============= TYPES =============

export type SyncKind = 'products' | 'customers';

export interface ProductSyncResult {
  totalSynced: number;
  created: number;
  updated: number;
  skippedNoBarcode: number;
  skippedDuplicate: number;
  pages: number;
}

export interface CustomerSyncResult {
  totalSynced: number;
  created: number;
  updated: number;
  skippedDuplicate: number;
  pages: number;
}

// ============= SERVICE =============

export class CatalogSyncService {
  private running = new Set<SyncKind>();
  private syncLogger = new SyncLogger('CatalogSync');

  constructor(
    private store: LocalStore,
    private remote: RemoteCatalogClient
  ) {}

  isRunning(kind: SyncKind): boolean {
    return this.running.has(kind);
  }

  /**
   * Pull every product variant. Variants without a barcode and variants already
   * seen earlier in this pass are skipped.
   */
  async syncProducts(): Promise<ProductSyncResult> {
    return this.exclusive('products', async () => {
      const result: ProductSyncResult = {
        totalSynced: 0,
        created: 0,
        updated: 0,
        skippedNoBarcode: 0,
        skippedDuplicate: 0,
        pages: 0,
      };
      const seenVariantIds = new Set<string>();

      await this.forEachPage('products', token => this.remote.listProducts(token), async products => {
        result.pages++;
        for (const product of products) {
          for (const variant of product.variants) {
            const fields = mapVariantToProduct(product, variant);
            if (!fields) {
              result.skippedNoBarcode++;
              continue;
            }
            if (seenVariantIds.has(fields.externalVariantId)) {
              result.skippedDuplicate++;
              continue;
            }
            seenVariantIds.add(fields.externalVariantId);

            const { created } = await this.store.upsertProduct(fields);
            result.totalSynced++;
            if (created) result.created++;
            else result.updated++;
          }
        }
      });

      this.syncLogger.logBatchSummary('products', {
        totalProcessed: result.totalSynced,
        created: result.created,
        updated: result.updated,
        skipped: result.skippedNoBarcode + result.skippedDuplicate,
        pages: result.pages,
      });
      return result;
    });
  }

  /**
   * Pull every customer. Identity is the external customer id only; customers
   * sharing an email across passes are not merged.
   */
  async syncCustomers(): Promise<CustomerSyncResult> {
    return this.exclusive('customers', async () => {
      const result: CustomerSyncResult = {
        totalSynced: 0,
        created: 0,
        updated: 0,
        skippedDuplicate: 0,
        pages: 0,
      };
      const seenCustomerIds = new Set<string>();

      await this.forEachPage('customers', token => this.remote.listCustomers(token), async customers => {
        result.pages++;
        for (const customer of customers) {
          const fields = mapShopifyCustomer(customer);
          if (seenCustomerIds.has(fields.externalCustomerId)) {
            result.skippedDuplicate++;
            continue;
          }
          seenCustomerIds.add(fields.externalCustomerId);

          const { created } = await this.store.upsertCustomer(fields);
          result.totalSynced++;
          if (created) result.created++;
          else result.updated++;
        }
      });

      this.syncLogger.logBatchSummary('customers', {
        totalProcessed: result.totalSynced,
        created: result.created,
        updated: result.updated,
        skipped: result.skippedDuplicate,
        pages: result.pages,
      });
      return result;
    });
  }

  // ============= HELPERS =============

  private async exclusive<T>(kind: SyncKind, run: () => Promise<T>): Promise<T> {
    if (this.running.has(kind)) {
      this.syncLogger.getLogger().warn({ event: 'sync_skipped', entity: kind, reason: 'sync_already_in_progress' });
      throw new PosError(POS_ERROR_CODES.SYNC_IN_PROGRESS, {
        message: `A ${kind} sync is already running`,
        context: { kind },
      });
    }

    this.running.add(kind);
    try {
      return await run();
    } finally {
      this.running.delete(kind);
    }
  }

  private async forEachPage<T>(
    entity: SyncKind,
    fetchPage: (pageToken: string | null) => Promise<Page<T>>,
    handlePage: (records: T[]) => Promise<void>
  ): Promise<void> {
    this.syncLogger.startBatch();
    let pageToken: string | null = null;
    let page = 0;

    do {
      page++;
      try {
        const { records, nextPageToken }: Page<T> = await fetchPage(pageToken);
        this.syncLogger.logPage(entity, page, records.length);
        await handlePage(records);
        pageToken = nextPageToken;
      } catch (error) {
        this.syncLogger.logBatchFailure(entity, page, error);
        throw error;
      }
    } while (pageToken);
  }
}
