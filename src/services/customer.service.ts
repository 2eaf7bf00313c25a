/**
 * Customer Service
 *
 * Resolves the customer of a sale and serves customer creation and lookup.
 * Every customer with a local row also exists in Shopify; local rows are only
 * written after Shopify has assigned the external id.
 */

import type { RemoteCatalogClient, ShopifyCustomer, ShopifyCustomerInput } from './integrations/types.js';
import type {
  Customer,
  CustomerFields,
  CustomerSearchCriteria,
  CustomerUpsert,
  LocalStore,
  PagedResult,
  PageQuery,
} from './store/local-store.js';
import { normalizePhone } from './store/local-store.js';
import { mapShopifyCustomer } from './record-mappers.js';
import { PosError, POS_ERROR_CODES, extractErrorMessage, isPosError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';

// ============= TYPES =============

export interface NewCustomerInput {
  firstName: string;
  lastName: string;
  email: string;
  phone?: string | null;
  address1?: string | null;
  address2?: string | null;
  city?: string | null;
  province?: string | null;
  country?: string | null;
  zip?: string | null;
}

export type CustomerReference =
  | { kind: 'email'; email: string }
  | { kind: 'new'; customer: NewCustomerInput };

export type CustomerSearchResult =
  | { source: 'local'; customers: Customer[] }
  | { source: 'remote'; customers: CustomerUpsert[] };

const ADDRESS_KEYS = ['address1', 'address2', 'city', 'province', 'country', 'zip'] as const;

function toShopifyInput(input: NewCustomerInput): ShopifyCustomerInput {
  const hasAddress = ADDRESS_KEYS.some(key => Boolean(input[key]));

  return {
    first_name: input.firstName,
    last_name: input.lastName,
    email: input.email,
    phone: input.phone ?? null,
    ...(hasAddress
      ? {
          addresses: [
            {
              address1: input.address1 ?? null,
              address2: input.address2 ?? null,
              city: input.city ?? null,
              province: input.province ?? null,
              country: input.country ?? null,
              zip: input.zip ?? null,
            },
          ],
        }
      : {}),
  };
}

/**
 * Shopify's answer wins; fields it left empty fall back to what the cashier typed
 */
function mergeCreated(created: ShopifyCustomer, input: NewCustomerInput): CustomerUpsert {
  const mapped = mapShopifyCustomer(created);
  const typed: CustomerFields = {
    firstName: input.firstName,
    lastName: input.lastName,
    email: input.email,
    phone: input.phone ?? null,
    address1: input.address1 ?? null,
    address2: input.address2 ?? null,
    city: input.city ?? null,
    province: input.province ?? null,
    country: input.country ?? null,
    zip: input.zip ?? null,
  };

  return {
    externalCustomerId: mapped.externalCustomerId,
    firstName: mapped.firstName ?? typed.firstName,
    lastName: mapped.lastName ?? typed.lastName,
    email: mapped.email ?? typed.email,
    phone: mapped.phone ?? typed.phone,
    address1: mapped.address1 ?? typed.address1,
    address2: mapped.address2 ?? typed.address2,
    city: mapped.city ?? typed.city,
    province: mapped.province ?? typed.province,
    country: mapped.country ?? typed.country,
    zip: mapped.zip ?? typed.zip,
  };
}

// ============= SERVICE =============

export class CustomerService {
  private logger = new Logger('Customers');

  constructor(
    private store: LocalStore,
    private remote: RemoteCatalogClient
  ) {}

  /**
   * Resolve the customer of a sale.
   * By email: local store, then Shopify (adopting the match locally).
   * Inline: reuse a local customer with the same email, else create in Shopify first.
   */
  async resolve(reference: CustomerReference): Promise<Customer> {
    if (reference.kind === 'new') {
      const existing = await this.store.findCustomerByEmail(reference.customer.email);
      if (existing) {
        this.logger.info({ event: 'customer_reused', customerId: existing.id });
        return existing;
      }
      return this.createCustomer(reference.customer);
    }

    const local = await this.store.findCustomerByEmail(reference.email);
    if (local) return local;

    const remote = await this.remote.findCustomer(reference.email);
    if (!remote) {
      throw new PosError(POS_ERROR_CODES.CUSTOMER_NOT_FOUND, {
        message: `No customer found with email ${reference.email}`,
        context: { email: reference.email },
      });
    }

    const { record } = await this.store.upsertCustomer(mapShopifyCustomer(remote));
    this.logger.info({ event: 'customer_adopted', customerId: record.id, externalCustomerId: record.externalCustomerId });
    return record;
  }

  async createCustomer(input: NewCustomerInput): Promise<Customer> {
    let created: ShopifyCustomer;
    try {
      created = await this.remote.createCustomer(toShopifyInput(input));
    } catch (error) {
      this.logger.error({ event: 'remote_customer_create_failed', email: input.email, error });
      if (isPosError(error, POS_ERROR_CODES.REMOTE_UNAVAILABLE)) throw error;
      throw new PosError(POS_ERROR_CODES.REMOTE_UNAVAILABLE, {
        message: `Failed to create customer in Shopify: ${extractErrorMessage(error)}`,
        cause: error,
      });
    }

    const { record } = await this.store.upsertCustomer(mergeCreated(created, input));
    this.logger.info({ event: 'customer_created', customerId: record.id, externalCustomerId: record.externalCustomerId });
    return record;
  }

  /**
   * Local search first. Only an email search falls back to Shopify, and remote
   * matches are reported without being stored.
   */
  async searchCustomers(criteria: CustomerSearchCriteria): Promise<CustomerSearchResult> {
    if (!criteria.email && !criteria.phone && !criteria.name) {
      throw new PosError(POS_ERROR_CODES.VALIDATION_ERROR, {
        message: 'Provide at least one of email, phone or name',
      });
    }
    if (criteria.phone && normalizePhone(criteria.phone).length === 0) {
      throw new PosError(POS_ERROR_CODES.VALIDATION_ERROR, {
        message: 'phone: must contain at least one digit',
      });
    }

    const local = await this.store.searchCustomers(criteria);
    if (local.length > 0) {
      return { source: 'local', customers: local };
    }

    if (criteria.email) {
      const remote = await this.remote.searchCustomers(`email:${criteria.email.trim().toLowerCase()}`);
      if (remote.length > 0) {
        return { source: 'remote', customers: remote.map(mapShopifyCustomer) };
      }
    }

    throw new PosError(POS_ERROR_CODES.CUSTOMER_NOT_FOUND, { context: { ...criteria } });
  }

  async getCustomer(id: number): Promise<Customer> {
    const customer = await this.store.findCustomerById(id);
    if (!customer) {
      throw new PosError(POS_ERROR_CODES.CUSTOMER_NOT_FOUND, {
        message: `Customer ${id} not found`,
        context: { id },
      });
    }
    return customer;
  }

  async listCustomers(query: PageQuery): Promise<PagedResult<Customer>> {
    return this.store.listCustomers(query);
  }
}
