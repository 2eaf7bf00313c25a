import { CustomerService } from '../../services/customer.service.js';
import { PosError, POS_ERROR_CODES } from '../../utils/errors.js';
import { InMemoryLocalStore } from '../helpers/in-memory-local-store.js';
import { FakeRemoteCatalog } from '../helpers/fake-remote-catalog.js';
import { customerUpsert, shopifyCustomer } from '../helpers/builders.js';

describe('CustomerService', () => {
    let store: InMemoryLocalStore;
    let remote: FakeRemoteCatalog;
    let service: CustomerService;

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
        store = new InMemoryLocalStore();
        remote = new FakeRemoteCatalog();
        service = new CustomerService(store, remote);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('resolve by email', () => {
        it('should find a local customer case-insensitively without calling Shopify', async () => {
            await store.upsertCustomer(customerUpsert({ externalCustomerId: '700', email: 'Ada@Example.com' }));

            const customer = await service.resolve({ kind: 'email', email: 'ada@example.COM' });

            expect(customer.externalCustomerId).toBe('700');
            expect(remote.findCustomer).not.toHaveBeenCalled();
        });

        it('should adopt a Shopify match into the local store', async () => {
            remote.customers = [shopifyCustomer({ id: 701, email: 'remote@example.com', first_name: 'Remo' })];

            const customer = await service.resolve({ kind: 'email', email: 'remote@example.com' });

            expect(customer.externalCustomerId).toBe('701');
            expect(customer.firstName).toBe('Remo');
            expect(store.customers).toHaveLength(1);
        });

        it('should fail with CUSTOMER_NOT_FOUND when nobody matches', async () => {
            await expect(service.resolve({ kind: 'email', email: 'ghost@example.com' })).rejects.toMatchObject({
                code: POS_ERROR_CODES.CUSTOMER_NOT_FOUND,
                message: 'No customer found with email ghost@example.com',
            });
            expect(store.customers).toHaveLength(0);
        });
    });

    describe('resolve inline customer', () => {
        const newCustomer = { firstName: 'Can', lastName: 'Demir', email: 'can@example.com', city: 'Bursa' };

        it('should create in Shopify first, then mirror with the external id', async () => {
            const customer = await service.resolve({ kind: 'new', customer: newCustomer });

            expect(remote.createCustomer).toHaveBeenCalledWith({
                first_name: 'Can',
                last_name: 'Demir',
                email: 'can@example.com',
                phone: null,
                addresses: [{ address1: null, address2: null, city: 'Bursa', province: null, country: null, zip: null }],
            });
            expect(customer.externalCustomerId).toBe('9001');
            expect(customer.city).toBe('Bursa');
        });

        it('should reuse a local customer with the same email', async () => {
            const { record } = await store.upsertCustomer(customerUpsert({ externalCustomerId: '702', email: 'CAN@example.com' }));

            const customer = await service.resolve({ kind: 'new', customer: newCustomer });

            expect(customer.id).toBe(record.id);
            expect(remote.createCustomer).not.toHaveBeenCalled();
        });

        it('should surface REMOTE_UNAVAILABLE and write nothing when Shopify fails', async () => {
            remote.createCustomer.mockRejectedValueOnce(new Error('socket hang up'));

            await expect(service.resolve({ kind: 'new', customer: newCustomer })).rejects.toMatchObject({
                code: POS_ERROR_CODES.REMOTE_UNAVAILABLE,
                message: 'Failed to create customer in Shopify: socket hang up',
            });
            expect(store.customers).toHaveLength(0);
        });

        it('should pass an existing REMOTE_UNAVAILABLE through unchanged', async () => {
            const timeout = new PosError(POS_ERROR_CODES.REMOTE_UNAVAILABLE, { message: 'Shopify request timed out after 30000ms' });
            remote.createCustomer.mockRejectedValueOnce(timeout);

            await expect(service.createCustomer(newCustomer)).rejects.toBe(timeout);
        });
    });

    describe('searchCustomers', () => {
        beforeEach(async () => {
            await store.upsertCustomer(customerUpsert({ externalCustomerId: '801', firstName: 'Elif', lastName: 'Kaya', email: 'elif@example.com', phone: '+90 (532) 111-22-33' }));
            await store.upsertCustomer(customerUpsert({ externalCustomerId: '802', firstName: 'Mert', lastName: 'Kaya', email: 'mert@example.com', phone: null }));
        });

        it('should require at least one criterion', async () => {
            await expect(service.searchCustomers({})).rejects.toMatchObject({ code: POS_ERROR_CODES.VALIDATION_ERROR });
        });

        it('should match phone numbers by digits only', async () => {
            const result = await service.searchCustomers({ phone: '532 111 22 33' });

            expect(result.source).toBe('local');
            expect(result.customers.map(c => c.externalCustomerId)).toEqual(['801']);
        });

        it('should reject a phone without digits instead of matching everyone', async () => {
            await expect(service.searchCustomers({ phone: 'abc' })).rejects.toMatchObject({
                code: POS_ERROR_CODES.VALIDATION_ERROR,
                message: 'phone: must contain at least one digit',
            });
        });

        it('should ignore a digit-less phone next to another criterion in the store', async () => {
            const matches = await store.searchCustomers({ phone: '---', name: 'Mert' });

            expect(matches.map(c => c.externalCustomerId)).toEqual(['802']);
        });

        it('should match names across first, last and full name', async () => {
            const byLast = await service.searchCustomers({ name: 'kaya' });
            const byFull = await service.searchCustomers({ name: 'Mert Kaya' });

            expect(byLast.customers).toHaveLength(2);
            expect(byFull.customers.map(c => c.externalCustomerId)).toEqual(['802']);
        });

        it('should fall back to Shopify for an unknown email without storing the result', async () => {
            remote.customers = [shopifyCustomer({ id: 803, email: 'new@example.com' })];

            const result = await service.searchCustomers({ email: 'New@example.com' });

            expect(result.source).toBe('remote');
            expect(result.customers.map(c => c.externalCustomerId)).toEqual(['803']);
            expect(remote.searchCustomers).toHaveBeenCalledWith('email:new@example.com');
            expect(store.customers).toHaveLength(2);
        });

        it('should fail with CUSTOMER_NOT_FOUND when nothing matches anywhere', async () => {
            await expect(service.searchCustomers({ name: 'Nobody' })).rejects.toMatchObject({
                code: POS_ERROR_CODES.CUSTOMER_NOT_FOUND,
            });
            expect(remote.searchCustomers).not.toHaveBeenCalled();
        });
    });

    describe('getCustomer', () => {
        it('should fail with CUSTOMER_NOT_FOUND for an unknown id', async () => {
            await expect(service.getCustomer(42)).rejects.toMatchObject({
                code: POS_ERROR_CODES.CUSTOMER_NOT_FOUND,
                status: 404,
                message: 'Customer 42 not found',
            });
        });
    });
});
