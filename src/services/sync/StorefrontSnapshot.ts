import { Logger, LogMethods } from '../../utils/logger';
import { ResponseParseError } from '../../utils/errors';
import type { StorefrontListingSource } from '../shopify';
import type { StorefrontItem, StorefrontSnapshot } from '../../types/reconciliation';
import type { ShopifyProduct } from './schemas';

/** Price assumed when a variant omits the field entirely. */
const MISSING_PRICE = '0.00';

/**
 * Flattens products into one item per variant. Variants without a SKU or an
 * inventory item id cannot be matched or written to and are left out.
 */
export function toStorefrontItems(products: ShopifyProduct[]): { items: StorefrontItem[]; skipped: number } {
    const items: StorefrontItem[] = [];
    let skipped = 0;

    for (const product of products) {
        for (const variant of product.variants) {
            if (!variant.sku || !variant.inventory_item_id) {
                skipped++;
                continue;
            }

            items.push({
                sku: variant.sku,
                productId: product.id,
                variantId: variant.id,
                inventoryItemId: variant.inventory_item_id,
                currentPrice: variant.price === undefined ? MISSING_PRICE : variant.price,
                referencePrice: variant.compare_at_price ?? null,
            });
        }
    }

    return { items, skipped };
}

/**
 * Reads every page of the storefront listing.
 *
 * All or nothing: any failed or unreadable page rejects, and the caller must
 * not reconcile against the pages read so far.
 */
export async function buildStorefrontSnapshot(
    source: StorefrontListingSource,
    log: LogMethods = Logger
): Promise<StorefrontSnapshot> {
    const items: StorefrontItem[] = [];
    const visited = new Set<string>();
    let variantsSkipped = 0;
    let pagesFetched = 0;
    let url: string | null = source.firstPageUrl();

    while (url) {
        if (visited.has(url)) {
            throw new ResponseParseError('Shopify', 'Pagination pointed back to a page that was already read', {
                context: { pagesFetched },
            });
        }
        visited.add(url);

        const page = await source.getProductsPage(url);
        pagesFetched++;

        const converted = toStorefrontItems(page.products);
        items.push(...converted.items);
        variantsSkipped += converted.skipped;

        log.debug('[StorefrontSnapshot] Page read', {
            page: pagesFetched,
            products: page.products.length,
            variants: converted.items.length,
        });

        url = page.nextPageUrl;
    }

    log.info('[StorefrontSnapshot] Retrieved storefront variants', {
        items: items.length,
        pagesFetched,
        variantsSkipped,
    });

    return { items, pagesFetched, variantsSkipped };
}
