import type {
    PriceResult,
    ReconciliationOutcome,
    ReconciliationSummary,
    StockResult,
} from '../../types/reconciliation';

function emptySummary(): ReconciliationSummary {
    return {
        total: 0,
        matched: 0,
        unmatched: 0,
        stockSynced: 0,
        stockFailed: 0,
        priceUpdated: 0,
        priceSkippedDiscount: 0,
        priceSkippedAtTarget: 0,
        priceInvalid: 0,
        priceFailed: 0,
        failuresRecoverable: 0,
    };
}

export function summarizeOutcomes(outcomes: ReconciliationOutcome[]): ReconciliationSummary {
    const summary = emptySummary();

    for (const outcome of outcomes) {
        summary.total++;

        const { stock, price } = outcome;

        switch (stock.status) {
            case 'unmatched':
                summary.unmatched++;
                break;
            case 'synced':
                summary.matched++;
                summary.stockSynced++;
                break;
            case 'failed':
                summary.matched++;
                summary.stockFailed++;
                if (stock.recoverable) summary.failuresRecoverable++;
                break;
        }

        if (!price) continue;

        switch (price.status) {
            case 'updated':
                summary.priceUpdated++;
                break;
            case 'skipped_discount':
                summary.priceSkippedDiscount++;
                break;
            case 'skipped_at_target':
                summary.priceSkippedAtTarget++;
                break;
            case 'invalid_price':
                summary.priceInvalid++;
                break;
            case 'failed':
                summary.priceFailed++;
                if (price.recoverable) summary.failuresRecoverable++;
                break;
        }
    }

    return summary;
}

/** Items that need an operator's attention: failed writes and unreadable prices. */
export function countProblems(summary: ReconciliationSummary): number {
    return summary.stockFailed + summary.priceFailed + summary.priceInvalid;
}

function describeStock(stock: StockResult): string {
    switch (stock.status) {
        case 'synced':
            return `stock set to ${stock.quantity}`;
        case 'unmatched':
            return 'not found in POS';
        case 'failed':
            return `stock failed (${stock.code}): ${stock.message}`;
    }
}

function describePrice(price: PriceResult): string {
    switch (price.status) {
        case 'updated':
            return `price ${price.previous} -> ${price.next.toFixed(2)}`;
        case 'skipped_discount':
            return `price kept, markdown active (${price.currentPrice ?? 'none'} < ${price.referencePrice})`;
        case 'skipped_at_target':
            return `price kept at ${price.currentPrice} (target ${price.target.toFixed(2)})`;
        case 'invalid_price':
            return `price unreadable (${price.raw === null ? 'null' : `'${price.raw}'`}), target ${price.target.toFixed(2)}`;
        case 'failed':
            return `price failed (${price.code}): ${price.message}`;
    }
}

/**
 * One-line description of an item's outcome, e.g.
 * `ABC-1: stock set to 4; price 100.00 -> 115.00`.
 */
export function describeOutcome(outcome: ReconciliationOutcome): string {
    const parts = [describeStock(outcome.stock)];
    if (outcome.price) parts.push(describePrice(outcome.price));
    return `${outcome.sku}: ${parts.join('; ')}`;
}
