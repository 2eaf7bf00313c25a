import type { LocalStore, PagedResult, PageQuery, Product } from './store/local-store.js';
import { PosError, POS_ERROR_CODES } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';

/**
 * Catalog queries for the register, plus clearing the local mirror
 */
export class ProductService {
  private logger = new Logger('Products');

  constructor(private store: LocalStore) {}

  async getProductsByBarcode(barcode: string): Promise<Product[]> {
    const products = await this.store.findProductsByBarcode(barcode);
    if (products.length === 0) {
      throw new PosError(POS_ERROR_CODES.PRODUCT_NOT_FOUND, {
        message: `No product found with barcode ${barcode}`,
        context: { barcode },
      });
    }
    // In-stock variants first; ties keep ascending id
    return [...products].sort((a, b) => Number(b.inventoryQuantity > 0) - Number(a.inventoryQuantity > 0) || a.id - b.id);
  }

  async listProducts(query: PageQuery): Promise<PagedResult<Product>> {
    return this.store.listProducts(query);
  }

  async searchProducts(query: string): Promise<Product[]> {
    const trimmed = query.trim();
    if (!trimmed) {
      throw new PosError(POS_ERROR_CODES.VALIDATION_ERROR, { message: 'Search query is required' });
    }
    return this.store.searchProducts(trimmed);
  }

  /**
   * Drop every mirrored variant. A products sync rebuilds them.
   */
  async clearProducts(): Promise<number> {
    const deleted = await this.store.deleteAllProducts();
    this.logger.warn({ event: 'products_cleared', deleted });
    return deleted;
  }
}
