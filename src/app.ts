import type { ReconcilerConfig } from './utils/env';
import { RequestPacer } from './utils/requestPacer';
import { ShopifyService } from './services/shopify';
import { PosService } from './services/pos';
import { DryRunWriter } from './services/sync/DryRunWriter';
import { ReconciliationSync } from './services/sync/ReconciliationSync';
import { countProblems } from './services/sync/report';
import type { ReconciliationReport } from './types/reconciliation';

export const EXIT_CODES = {
    OK: 0,
    /** Configuration error or aborted run */
    FAILED: 1,
    /** Completed, but some items failed or had an unreadable price */
    ITEM_PROBLEMS: 2,
} as const;

/**
 * Wires the clients for one run. On a dry run the Shopify client still
 * reads the listing, but every write goes to the DryRunWriter.
 */
export function createReconciliation(config: Readonly<ReconcilerConfig>): ReconciliationSync {
    const shopify = new ShopifyService(config.shopify);
    const pos = new PosService(config.pos);

    return new ReconciliationSync({
        listing: shopify,
        authoritative: pos,
        writer: config.dryRun ? new DryRunWriter() : shopify,
        itemPacer: new RequestPacer(config.itemSpacingMs),
        pricing: {
            markupPercent: config.pricing.markupPercent,
            tolerance: config.pricing.tolerance,
        },
        dryRun: config.dryRun,
    });
}

export function exitCodeFor(report: ReconciliationReport): number {
    if (report.status === 'aborted') return EXIT_CODES.FAILED;
    return countProblems(report.summary) > 0 ? EXIT_CODES.ITEM_PROBLEMS : EXIT_CODES.OK;
}
