/**
 * Webhook Processor Tests
 *
 * One log row per delivery, idempotent re-delivery, signature enforcement
 * and handler failures turned into failed rows.
 */

import crypto from 'crypto';
import { WebhookProcessorService, isWebhookTopic } from '../../services/webhook-processor.service.js';
import { POS_ERROR_CODES } from '../../utils/errors.js';
import { InMemoryLocalStore } from '../helpers/in-memory-local-store.js';
import { customerUpsert, productUpsert } from '../helpers/builders.js';

function sign(body: string, secret: string): string {
    return crypto.createHmac('sha256', secret).update(body).digest('base64');
}

function productPayload(variants: Array<Record<string, unknown>>): string {
    return JSON.stringify({
        id: 1,
        title: 'Linen Shirt',
        variants,
        images: [{ id: 9, src: 'https://cdn.example.com/shirt.jpg' }],
    });
}

describe('WebhookProcessorService', () => {
    let store: InMemoryLocalStore;
    let processor: WebhookProcessorService;

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        store = new InMemoryLocalStore();
        processor = new WebhookProcessorService(store);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('orders/paid', () => {
        beforeEach(async () => {
            const line = {
                externalOrderId: '5001',
                externalOrderNumber: '1001',
                customerId: null,
                productId: null,
                barcode: null,
                quantity: 1,
                unitPrice: 10,
                paymentMethod: 'cash' as const,
                status: 'completed' as const,
            };
            await store.insertOrderLines([
                { ...line, title: 'A' },
                { ...line, title: 'B' },
                { ...line, title: 'C' },
            ]);
        });

        it('should mark every line of the order paid and log one processed row', async () => {
            const receipt = await processor.receive({ topic: 'orders/paid', rawBody: JSON.stringify({ id: 5001 }) });

            expect(receipt).toEqual({
                status: 'processed',
                topic: 'orders/paid',
                resourceId: '5001',
                message: 'Marked 3 line(s) of order 5001 as paid',
            });
            expect(store.orderLines.map(line => line.status)).toEqual(['paid', 'paid', 'paid']);
            expect(store.webhookEvents).toHaveLength(1);
        });

        it('should treat a repeated delivery as processed and log a second row', async () => {
            const body = JSON.stringify({ id: 5001 });
            await processor.receive({ topic: 'orders/paid', rawBody: body });
            const repeat = await processor.receive({ topic: 'orders/paid', rawBody: body });

            expect(repeat.status).toBe('processed');
            expect(store.orderLines.map(line => line.status)).toEqual(['paid', 'paid', 'paid']);
            expect(store.webhookEvents.map(event => event.status)).toEqual(['processed', 'processed']);
        });

        it('should skip an order with no local lines', async () => {
            const receipt = await processor.receive({ topic: 'orders/cancelled', rawBody: JSON.stringify({ id: 42 }) });

            expect(receipt.status).toBe('skipped');
            expect(store.webhookEvents[0]).toMatchObject({ topic: 'orders/cancelled', status: 'skipped', errorMessage: null });
        });
    });

    describe('products', () => {
        it('should upsert barcoded variants and leave state unchanged on re-delivery', async () => {
            const body = productPayload([
                { id: 11, title: 'S', price: '59.90', sku: 'LS-S', barcode: '111', inventory_quantity: 4, inventory_item_id: 811, image_id: 9 },
                { id: 12, title: 'M', price: '59.90', sku: 'LS-M', barcode: '', inventory_quantity: 2, inventory_item_id: 812 },
            ]);

            await processor.receive({ topic: 'products/create', rawBody: body });
            const snapshot = store.products.map(({ updatedAt: _updatedAt, ...rest }) => rest);
            await processor.receive({ topic: 'products/update', rawBody: body });

            expect(store.products.map(({ updatedAt: _updatedAt, ...rest }) => rest)).toEqual(snapshot);
            expect(store.products).toHaveLength(1);
            expect(store.products[0]).toMatchObject({
                externalVariantId: '11',
                externalProductId: '1',
                externalInventoryItemId: '811',
                title: 'Linen Shirt',
                variantLabel: 'S',
                price: 59.9,
                inventoryQuantity: 4,
                imageUrl: 'https://cdn.example.com/shirt.jpg',
            });
            expect(store.webhookEvents.map(event => event.status)).toEqual(['processed', 'processed']);
        });

        it('should skip a product without barcoded variants', async () => {
            const receipt = await processor.receive({
                topic: 'products/update',
                rawBody: productPayload([{ id: 13, barcode: null }]),
            });

            expect(receipt.status).toBe('skipped');
            expect(store.products).toHaveLength(0);
        });

        it('should delete every variant of a product', async () => {
            await store.upsertProduct(productUpsert({ externalVariantId: 'V1', externalProductId: '77' }));
            await store.upsertProduct(productUpsert({ externalVariantId: 'V2', externalProductId: '77' }));

            const receipt = await processor.receive({ topic: 'products/delete', rawBody: JSON.stringify({ id: 77 }) });
            const again = await processor.receive({ topic: 'products/delete', rawBody: JSON.stringify({ id: 77 }) });

            expect(receipt.status).toBe('processed');
            expect(again.status).toBe('skipped');
            expect(store.products).toHaveLength(0);
        });
    });

    describe('inventory and customers', () => {
        it('should set inventory by inventory item id', async () => {
            await store.upsertProduct(productUpsert({ externalVariantId: 'V1', externalInventoryItemId: '811', inventoryQuantity: 5 }));

            const receipt = await processor.receive({
                topic: 'inventory_levels/update',
                rawBody: JSON.stringify({ inventory_item_id: 811, location_id: 1, available: 2 }),
            });

            expect(receipt).toMatchObject({ status: 'processed', resourceId: '811' });
            expect(store.products[0].inventoryQuantity).toBe(2);
        });

        it('should skip inventory for an unknown item', async () => {
            const receipt = await processor.receive({
                topic: 'inventory_levels/update',
                rawBody: JSON.stringify({ inventory_item_id: 999, available: 2 }),
            });

            expect(receipt.status).toBe('skipped');
        });

        it('should upsert customers by external id', async () => {
            await store.upsertCustomer(customerUpsert({ externalCustomerId: '501', firstName: 'Old' }));

            await processor.receive({
                topic: 'customers/update',
                rawBody: JSON.stringify({ id: 501, email: 'ada@example.com', first_name: 'New', last_name: 'Yilmaz', phone: null }),
            });

            expect(store.customers).toHaveLength(1);
            expect(store.customers[0].firstName).toBe('New');
        });
    });

    describe('dispatch boundary', () => {
        it('should skip unknown topics', async () => {
            const receipt = await processor.receive({ topic: 'orders/create', rawBody: JSON.stringify({ id: 1 }) });

            expect(receipt).toEqual({
                status: 'skipped',
                topic: 'orders/create',
                resourceId: '1',
                message: 'Unhandled topic orders/create',
            });
            expect(isWebhookTopic('orders/create')).toBe(false);
        });

        it('should log invalid JSON as failed', async () => {
            const receipt = await processor.receive({ topic: 'orders/paid', rawBody: '{not json' });

            expect(receipt.status).toBe('failed');
            expect(receipt.resourceId).toBeNull();
            expect(store.webhookEvents[0].status).toBe('failed');
            expect(store.webhookEvents[0].payload).toBe('{not json');
            expect(store.webhookEvents[0].errorMessage).toMatch(/^Invalid JSON payload: /);
        });

        it('should log a payload that fails validation as failed', async () => {
            const receipt = await processor.receive({ topic: 'orders/paid', rawBody: JSON.stringify({ id: 'abc' }) });

            expect(receipt.status).toBe('failed');
            expect(store.webhookEvents[0].errorMessage).toBe('id: Expected number, received string');
        });

        it('should convert a handler exception into a failed row', async () => {
            jest.spyOn(store, 'updateOrderLinesStatus').mockRejectedValueOnce(new Error('deadlock detected'));

            const receipt = await processor.receive({ topic: 'orders/paid', rawBody: JSON.stringify({ id: 5001 }) });

            expect(receipt).toMatchObject({ status: 'failed', resourceId: '5001', message: 'deadlock detected' });
            expect(store.webhookEvents[0]).toMatchObject({ status: 'failed', errorMessage: 'deadlock detected' });
        });

        it('should still acknowledge when the log row cannot be written', async () => {
            jest.spyOn(store, 'appendWebhookEvent').mockRejectedValueOnce(new Error('disk full'));

            await expect(
                processor.receive({ topic: 'orders/paid', rawBody: JSON.stringify({ id: 1 }) })
            ).resolves.toMatchObject({ status: 'skipped' });
        });
    });

    describe('signature check', () => {
        const secret = 'test-secret';
        const body = JSON.stringify({ id: 5001 });

        beforeEach(() => {
            processor = new WebhookProcessorService(store, { secret });
        });

        it('should accept a valid signature over the raw bytes', async () => {
            const receipt = await processor.receive({
                topic: 'orders/paid',
                rawBody: Buffer.from(body),
                signature: sign(body, secret),
            });

            expect(receipt.status).toBe('skipped');
            expect(store.webhookEvents).toHaveLength(1);
        });

        it.each([
            ['a wrong signature', sign(body, 'other-secret')],
            ['a missing signature', null],
        ])('should reject %s without logging', async (_label, signature) => {
            await expect(processor.receive({ topic: 'orders/paid', rawBody: body, signature })).rejects.toMatchObject({
                code: POS_ERROR_CODES.SIGNATURE_INVALID,
                status: 401,
            });
            expect(store.webhookEvents).toHaveLength(0);
        });

        it('should skip the check when no secret is configured', async () => {
            const open = new WebhookProcessorService(store, { secret: '' });

            await expect(open.receive({ topic: 'orders/paid', rawBody: body, signature: 'garbage' })).resolves.toMatchObject({
                status: 'skipped',
            });
            expect(open.signatureRequired).toBe(false);
        });
    });

    describe('log queries', () => {
        it('should report totals by status and topic', async () => {
            await processor.receive({ topic: 'orders/paid', rawBody: JSON.stringify({ id: 1 }) });
            await processor.receive({ topic: 'orders/paid', rawBody: '{' });
            await processor.receive({ topic: 'shop/update', rawBody: '{}' });

            await expect(processor.webhookStats()).resolves.toEqual({
                total: 3,
                byStatus: { skipped: 2, failed: 1 },
                byTopic: { 'orders/paid': 2, 'shop/update': 1 },
            });
            const failed = await processor.listWebhookEvents({ limit: 10, status: 'failed' });
            expect(failed.map(event => event.topic)).toEqual(['orders/paid']);
        });
    });
});
