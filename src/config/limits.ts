/**
 * Centralized Configuration: Limits & Defaults
 *
 * Pacing, timeouts and pricing defaults. Environment variables override the
 * tunable ones (see utils/env.ts).
 */


export const PACING_LIMITS = {
    /** Minimum spacing between two storefront items in milliseconds */
    ITEM_SPACING_MS: 200,
    /** Minimum spacing between two storefront mutation calls in milliseconds */
    MUTATION_SPACING_MS: 200,
} as const;


export const TIMEOUT_LIMITS = {
    /** Stock and price mutations */
    MUTATION_TIMEOUT_MS: 15_000,
    /** One page of the storefront product listing */
    LISTING_TIMEOUT_MS: 30_000,
    /** The POS bulk export can take a while on large catalogs */
    POS_EXPORT_TIMEOUT_MS: 60_000,
} as const;


export const SHOPIFY_DEFAULTS = {
    API_VERSION: '2024-07',
    /** Maximum page size accepted by the REST products endpoint */
    PAGE_SIZE: 250,
    /** Reason recorded on inventory adjustments */
    ADJUSTMENT_REASON: 'correction',
} as const;


export const PRICING_DEFAULTS = {
    /** Retail markup applied on top of the POS base price */
    MARKUP_PERCENT: 15,
    /** Prices closer than this are considered equal */
    TOLERANCE: '0.01',
    /** POS base prices at or above this are dropped as unusable */
    MAX_BASE_PRICE: '1000000000',
    /** Upper bound accepted for PRICE_MARKUP_PERCENT */
    MAX_MARKUP_PERCENT: 1000,
} as const;
