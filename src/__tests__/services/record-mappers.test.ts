import { mapShopifyCustomer, mapVariantToProduct, resolveImageUrl } from '../../services/record-mappers.js';
import { shopifyCustomer, shopifyProduct, shopifyVariant } from '../helpers/builders.js';

describe('mapVariantToProduct', () => {
    it('maps a barcoded variant with string ids and numeric price', () => {
        const variant = shopifyVariant({ id: 11, price: '149.90', sku: 'TS-RED-M', barcode: ' 8690001 ', title: 'Red / M', inventory_item_id: 77 });
        const product = shopifyProduct(1, [variant], { title: 'T-Shirt' });

        expect(mapVariantToProduct(product, variant)).toEqual({
            externalVariantId: '11',
            externalProductId: '1',
            externalInventoryItemId: '77',
            title: 'T-Shirt',
            variantLabel: 'Red / M',
            sku: 'TS-RED-M',
            barcode: '8690001',
            price: 149.9,
            inventoryQuantity: 5,
            imageUrl: null,
        });
    });

    it('returns null for variants without a barcode', () => {
        const empty = shopifyVariant({ id: 12, barcode: '   ' });
        const missing = shopifyVariant({ id: 13, barcode: null });
        const product = shopifyProduct(1, [empty, missing]);

        expect(mapVariantToProduct(product, empty)).toBeNull();
        expect(mapVariantToProduct(product, missing)).toBeNull();
    });

    it('defaults missing inventory to zero', () => {
        const variant = shopifyVariant({ id: 14, inventory_quantity: null, inventory_item_id: null });
        const mapped = mapVariantToProduct(shopifyProduct(1, [variant]), variant);

        expect(mapped?.inventoryQuantity).toBe(0);
        expect(mapped?.externalInventoryItemId).toBeNull();
    });
});

describe('resolveImageUrl', () => {
    const images = [
        { id: 1, src: 'https://cdn.example.com/first.jpg' },
        { id: 2, src: 'https://cdn.example.com/second.jpg' },
    ];

    it('prefers the variant image', () => {
        const variant = shopifyVariant({ id: 21, image_id: 2 });
        expect(resolveImageUrl(shopifyProduct(1, [variant], { images }), variant)).toBe('https://cdn.example.com/second.jpg');
    });

    it('falls back to the main image, then the first image', () => {
        const variant = shopifyVariant({ id: 22 });
        const main = { id: 3, src: 'https://cdn.example.com/main.jpg' };

        expect(resolveImageUrl(shopifyProduct(1, [variant], { images, image: main }), variant)).toBe('https://cdn.example.com/main.jpg');
        expect(resolveImageUrl(shopifyProduct(1, [variant], { images }), variant)).toBe('https://cdn.example.com/first.jpg');
        expect(resolveImageUrl(shopifyProduct(1, [variant]), variant)).toBeNull();
    });
});

describe('mapShopifyCustomer', () => {
    it('maps the first address and blanks to null', () => {
        const mapped = mapShopifyCustomer(
            shopifyCustomer({
                id: 501,
                email: 'ayse@example.com',
                first_name: 'Ayse',
                last_name: '',
                phone: '+90 555 000 0000',
                addresses: [{ address1: 'Main St 1', city: 'Izmir', country: 'Turkey', zip: '35000' }],
            })
        );

        expect(mapped).toEqual({
            externalCustomerId: '501',
            firstName: 'Ayse',
            lastName: null,
            email: 'ayse@example.com',
            phone: '+90 555 000 0000',
            address1: 'Main St 1',
            address2: null,
            city: 'Izmir',
            province: null,
            country: 'Turkey',
            zip: '35000',
        });
    });

    it('uses the default address when the list is empty', () => {
        const mapped = mapShopifyCustomer(
            shopifyCustomer({ id: 502, addresses: [], default_address: { city: 'Ankara' } })
        );
        expect(mapped.city).toBe('Ankara');
    });
});
