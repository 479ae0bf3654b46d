import { randomUUID } from 'crypto';
import { Logger, LogMethods } from '../../utils/logger';
import { BusinessRejectionError, ReconcilerError, ResponseParseError } from '../../utils/errors';
import { RequestPacer } from '../../utils/requestPacer';
import { normalizeSku } from '../../utils/sku';
import { computeTargetPrice, isDiscounted, PriceDecision, PricingOptions } from '../../utils/priceCalculations';
import type { StorefrontListingSource, StorefrontWriter } from '../shopify';
import type { AuthoritativeSource } from '../pos';
import type {
    AbortReason,
    AuthoritativeItem,
    AuthoritativeSnapshot,
    ErrorOrigin,
    FailedResult,
    FailureReason,
    PriceResult,
    ReconciliationOutcome,
    ReconciliationReport,
    StockResult,
    StorefrontItem,
    StorefrontSnapshot,
} from '../../types/reconciliation';
import { buildStorefrontSnapshot } from './StorefrontSnapshot';
import { buildAuthoritativeSnapshot } from './PosSnapshot';
import { mapSyncError } from './syncErrors';
import { countProblems, describeOutcome, summarizeOutcomes } from './report';

export interface ReconciliationDeps {
    listing: StorefrontListingSource;
    authoritative: AuthoritativeSource;
    writer: StorefrontWriter;
    /** Spacing between storefront items */
    itemPacer: RequestPacer;
    pricing?: PricingOptions;
    dryRun?: boolean;
    /** Clock for report timestamps */
    now?: () => Date;
}

function errorOrigin(error: unknown): ErrorOrigin {
    if (!(error instanceof ReconcilerError)) return { recoverable: false };

    return {
        recoverable: error.isRecoverable,
        ...(error.service ? { service: error.service } : {}),
        ...(error.context ? { details: error.context } : {}),
    };
}

function toFailure(error: unknown): FailedResult {
    const info = mapSyncError(error);
    let reason: FailureReason = 'transport';
    if (error instanceof BusinessRejectionError) reason = 'rejected';
    else if (error instanceof ResponseParseError || error instanceof RangeError) reason = 'parse';

    return { status: 'failed', reason, code: info.code, message: info.message, ...errorOrigin(error) };
}

/**
 * One reconciliation pass: snapshot the storefront, snapshot the POS, then
 * walk the storefront items one by one, setting stock and then price for
 * every SKU the POS knows.
 *
 * `perform()` never throws. A failed snapshot yields an `aborted` report;
 * a failed write is recorded on that item and the pass moves on.
 */
export class ReconciliationSync {
    protected readonly entityType = 'reconciliation';

    private readonly now: () => Date;

    constructor(private readonly deps: ReconciliationDeps) {
        this.now = deps.now ?? (() => new Date());
    }

    get dryRun(): boolean {
        return this.deps.dryRun ?? false;
    }

    async perform(): Promise<ReconciliationReport> {
        const syncId = randomUUID().slice(0, 8); // Short correlation ID
        const log = Logger.child({ syncId });
        const startedAt = this.now();

        log.info(`Starting ${this.entityType} sync`, { dryRun: this.dryRun });

        const report = (
            fields: Pick<ReconciliationReport, 'status' | 'storefrontItems' | 'authoritativeItems' | 'duplicateSkus' | 'outcomes'>,
            abortReason?: AbortReason
        ): ReconciliationReport => {
            const finishedAt = this.now();
            return {
                syncId,
                dryRun: this.dryRun,
                startedAt: startedAt.toISOString(),
                finishedAt: finishedAt.toISOString(),
                durationMs: finishedAt.getTime() - startedAt.getTime(),
                ...fields,
                summary: summarizeOutcomes(fields.outcomes),
                ...(abortReason ? { abortReason } : {}),
            };
        };

        const abort = (
            stage: AbortReason['stage'],
            error: unknown,
            counts: { storefrontItems?: number; authoritativeItems?: number; duplicateSkus?: string[] } = {}
        ): ReconciliationReport => {
            const info = mapSyncError(error);
            const origin = errorOrigin(error);
            log.error(`Sync Failed: ${this.entityType}`, { stage, code: info.code, error: info.message, ...origin });
            return report(
                {
                    status: 'aborted',
                    storefrontItems: counts.storefrontItems ?? 0,
                    authoritativeItems: counts.authoritativeItems ?? 0,
                    duplicateSkus: counts.duplicateSkus ?? [],
                    outcomes: [],
                },
                { stage, ...info, ...origin }
            );
        };

        let storefront: StorefrontSnapshot;
        try {
            storefront = await buildStorefrontSnapshot(this.deps.listing, log);
        } catch (error) {
            return abort('storefront_snapshot', error);
        }

        let authoritative: AuthoritativeSnapshot;
        try {
            authoritative = await buildAuthoritativeSnapshot(this.deps.authoritative, log);
        } catch (error) {
            return abort('authoritative_snapshot', error, { storefrontItems: storefront.items.length });
        }

        // An empty export would mark every storefront item unmatched
        if (authoritative.items.size === 0) {
            return abort(
                'authoritative_snapshot',
                new ResponseParseError('POS', `Inventory export has no usable records (${authoritative.recordsReceived} received)`),
                { storefrontItems: storefront.items.length, duplicateSkus: authoritative.duplicateSkus }
            );
        }

        const outcomes = await this.sync(storefront.items, authoritative.items, log);

        const result = report({
            status: 'completed',
            storefrontItems: storefront.items.length,
            authoritativeItems: authoritative.items.size,
            duplicateSkus: authoritative.duplicateSkus,
            outcomes,
        });

        log.info(`Sync Complete: ${this.entityType}`, {
            dryRun: this.dryRun,
            durationMs: result.durationMs,
            problems: countProblems(result.summary),
            ...result.summary,
        });

        return result;
    }

    protected async sync(
        items: StorefrontItem[],
        index: ReadonlyMap<string, AuthoritativeItem>,
        log: LogMethods
    ): Promise<ReconciliationOutcome[]> {
        const outcomes: ReconciliationOutcome[] = [];

        for (const item of items) {
            // Dry runs make no remote calls, so there is nothing to space out
            if (!this.dryRun) {
                await this.deps.itemPacer.wait();
            }

            const outcome = await this.reconcileItem(item, index);
            outcomes.push(outcome);

            const failed = outcome.stock.status === 'failed'
                || outcome.price?.status === 'failed'
                || outcome.price?.status === 'invalid_price';
            if (failed) {
                log.warn(describeOutcome(outcome), { variantId: item.variantId });
            } else {
                log.info(describeOutcome(outcome));
            }
        }

        return outcomes;
    }

    private async reconcileItem(
        item: StorefrontItem,
        index: ReadonlyMap<string, AuthoritativeItem>
    ): Promise<ReconciliationOutcome> {
        const normalizedSku = normalizeSku(item.sku);
        const base = { sku: item.sku, normalizedSku, variantId: item.variantId };

        const match = normalizedSku ? index.get(normalizedSku) : undefined;
        if (!match) {
            return { ...base, stock: { status: 'unmatched' }, price: null };
        }

        const stock = await this.syncStock(item, match);
        const price = await this.syncPrice(item, match);

        return { ...base, stock, price };
    }

    private async syncStock(item: StorefrontItem, match: AuthoritativeItem): Promise<StockResult> {
        try {
            await this.deps.writer.setOnHandQuantity(item.inventoryItemId, match.quantity);
            return { status: 'synced', quantity: match.quantity };
        } catch (error) {
            return toFailure(error);
        }
    }

    private async syncPrice(item: StorefrontItem, match: AuthoritativeItem): Promise<PriceResult> {
        // A markdown on the storefront is left alone
        if (item.referencePrice !== null && isDiscounted(item.currentPrice, item.referencePrice)) {
            return { status: 'skipped_discount', currentPrice: item.currentPrice, referencePrice: item.referencePrice };
        }

        let decision: PriceDecision;
        try {
            decision = computeTargetPrice(match.basePrice, item.currentPrice, this.deps.pricing);
        } catch (error) {
            return toFailure(error);
        }

        if (decision.action === 'invalid_current_price' || item.currentPrice === null) {
            return { status: 'invalid_price', raw: item.currentPrice, target: decision.target };
        }

        if (decision.action === 'skip') {
            return { status: 'skipped_at_target', currentPrice: item.currentPrice, target: decision.target };
        }

        try {
            await this.deps.writer.updateVariantPrice(item.variantId, decision.target);
            return { status: 'updated', previous: item.currentPrice, next: decision.target };
        } catch (error) {
            return toFailure(error);
        }
    }
}
