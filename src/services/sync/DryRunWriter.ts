import { Logger, LogMethods } from '../../utils/logger';
import type { StorefrontWriter } from '../shopify';

/**
 * Stands in for the storefront mutation client on dry runs: every write is
 * logged and reported as successful, nothing leaves the process.
 */
export class DryRunWriter implements StorefrontWriter {
    constructor(private readonly log: LogMethods = Logger) { }

    setOnHandQuantity(inventoryItemId: string, quantity: number): Promise<void> {
        this.log.info('[DryRun] Would set on-hand quantity', { inventoryItemId, quantity });
        return Promise.resolve();
    }

    updateVariantPrice(variantId: string, price: number): Promise<void> {
        this.log.info('[DryRun] Would update variant price', { variantId, price: price.toFixed(2) });
        return Promise.resolve();
    }
}
