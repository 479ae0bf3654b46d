/**
 * Reconciliation Data Types
 *
 * Snapshot records for both catalogs and the per-item outcomes of a run.
 */

import type Decimal from 'decimal.js';
import type { SyncErrorCode } from '../services/sync/syncErrors';

// ============================================
// SNAPSHOT TYPES
// ============================================

/** One storefront variant as it was when the listing was read. */
export interface StorefrontItem {
    readonly sku: string;
    readonly productId: string;
    /** Price mutation handle */
    readonly variantId: string;
    /** Stock mutation handle */
    readonly inventoryItemId: string;
    /** Storefront decimal string; null when the API sent none */
    readonly currentPrice: string | null;
    /** "Compare-at" price; set while a markdown is shown */
    readonly referencePrice: string | null;
}

/** One POS record, keyed by normalized SKU. */
export interface AuthoritativeItem {
    readonly normalizedSku: string;
    readonly quantity: number;
    readonly basePrice: Decimal;
}

export interface StorefrontSnapshot {
    items: StorefrontItem[];
    pagesFetched: number;
    /** Variants without a SKU or inventory item id */
    variantsSkipped: number;
}

export interface AuthoritativeSnapshot {
    items: ReadonlyMap<string, AuthoritativeItem>;
    recordsReceived: number;
    recordsDropped: number;
    /** Keys seen more than once; the last record won */
    duplicateSkus: string[];
}

// ============================================
// OUTCOME TYPES
// ============================================

export type FailureReason = 'transport' | 'rejected' | 'parse';

/** Where an error came from, as far as the thrown value tells. */
export interface ErrorOrigin {
    /** A later run may succeed without any change to data or settings */
    recoverable: boolean;
    /** Remote system that failed or refused */
    service?: string;
    /** Remote status, rejection reasons or schema issues */
    details?: Record<string, unknown>;
}

export interface FailedResult extends ErrorOrigin {
    status: 'failed';
    reason: FailureReason;
    code: SyncErrorCode;
    message: string;
}

export type StockResult =
    | { status: 'synced'; quantity: number }
    | { status: 'unmatched' }
    | FailedResult;

export type PriceResult =
    | { status: 'updated'; previous: string; next: number }
    | { status: 'skipped_discount'; currentPrice: string | null; referencePrice: string }
    | { status: 'skipped_at_target'; currentPrice: string; target: number }
    | { status: 'invalid_price'; raw: string | null; target: number }
    | FailedResult;

export interface ReconciliationOutcome {
    sku: string;
    normalizedSku: string;
    variantId: string;
    stock: StockResult;
    /** null when the SKU had no POS match and no price sync was attempted */
    price: PriceResult | null;
}

export interface ReconciliationSummary {
    total: number;
    matched: number;
    unmatched: number;
    stockSynced: number;
    stockFailed: number;
    priceUpdated: number;
    priceSkippedDiscount: number;
    priceSkippedAtTarget: number;
    priceInvalid: number;
    priceFailed: number;
    /** Failed stock and price writes that a later run may get through */
    failuresRecoverable: number;
}

export interface AbortReason extends ErrorOrigin {
    stage: 'storefront_snapshot' | 'authoritative_snapshot';
    code: SyncErrorCode;
    message: string;
    friendlyMessage: string;
}

export interface ReconciliationReport {
    syncId: string;
    status: 'completed' | 'aborted';
    dryRun: boolean;
    startedAt: string;
    finishedAt: string;
    durationMs: number;
    storefrontItems: number;
    authoritativeItems: number;
    duplicateSkus: string[];
    outcomes: ReconciliationOutcome[];
    summary: ReconciliationSummary;
    abortReason?: AbortReason;
}
