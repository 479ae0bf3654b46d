/**
 * Environment Configuration
 *
 * Builds the immutable run configuration from environment variables.
 * Fails fast, before any network activity, if required values are missing
 * or malformed.
 */

import { Logger } from './logger';
import { ConfigurationError } from './errors';
import { PACING_LIMITS, PRICING_DEFAULTS, SHOPIFY_DEFAULTS, TIMEOUT_LIMITS } from '../config/limits';

interface EnvConfig {
    /** Variable name */
    name: string;
    /** Is this variable required? */
    required: boolean;
    /** Default value if not required and missing */
    default?: string;
}

const ENV_CONFIG: EnvConfig[] = [
    // Storefront
    { name: 'SHOPIFY_STORE', required: true },
    { name: 'SHOPIFY_TOKEN', required: true },
    { name: 'LOCATION_ID', required: true },
    { name: 'SHOPIFY_API_VERSION', required: false, default: SHOPIFY_DEFAULTS.API_VERSION },

    // Point of sale
    { name: 'POS_BASE_URL', required: true },
    { name: 'POS_PASSWORD', required: true },

    // Pricing & pacing
    { name: 'PRICE_MARKUP_PERCENT', required: false, default: String(PRICING_DEFAULTS.MARKUP_PERCENT) },
    { name: 'ITEM_SPACING_MS', required: false, default: String(PACING_LIMITS.ITEM_SPACING_MS) },
    { name: 'MUTATION_SPACING_MS', required: false, default: String(PACING_LIMITS.MUTATION_SPACING_MS) },
    { name: 'DRY_RUN', required: false, default: 'false' },
];

export interface ShopifyConfig {
    /** Store host, e.g. `example-shop.myshopify.com` */
    storeDomain: string;
    accessToken: string;
    apiVersion: string;
    /** Numeric location id that stock is written to */
    locationId: string;
    pageSize: number;
    listingTimeoutMs: number;
    mutationTimeoutMs: number;
    mutationSpacingMs: number;
}

export interface PosConfig {
    baseUrl: string;
    password: string;
    timeoutMs: number;
}

export interface PricingConfig {
    markupPercent: number;
    tolerance: string;
}

export interface ReconcilerConfig {
    shopify: ShopifyConfig;
    pos: PosConfig;
    pricing: PricingConfig;
    itemSpacingMs: number;
    dryRun: boolean;
}

const LOCATION_GID = /^gid:\/\/shopify\/Location\/(\d+)$/;

function parseMilliseconds(name: string, raw: string): number {
    if (!/^\d+$/.test(raw)) {
        throw new ConfigurationError(`${name} must be a whole number of milliseconds, got '${raw}'`, [name]);
    }
    return Number(raw);
}

function parsePercent(name: string, raw: string, max: number): number {
    if (!/^\d+(\.\d+)?$/.test(raw)) {
        throw new ConfigurationError(`${name} must be a non-negative number, got '${raw}'`, [name]);
    }
    const value = Number(raw);
    if (value > max) {
        throw new ConfigurationError(`${name} must be at most ${max}, got '${raw}'`, [name]);
    }
    return value;
}

function parseFlag(name: string, raw: string): boolean {
    const value = raw.trim().toLowerCase();
    if (['true', '1', 'yes'].includes(value)) return true;
    if (['false', '0', 'no', ''].includes(value)) return false;
    throw new ConfigurationError(`${name} must be true or false, got '${raw}'`, [name]);
}

function parseLocationId(raw: string): string {
    const gid = LOCATION_GID.exec(raw);
    if (gid) return gid[1];
    if (/^\d+$/.test(raw)) return raw;
    throw new ConfigurationError(`LOCATION_ID must be a numeric location id, got '${raw}'`, ['LOCATION_ID']);
}

function parseStoreDomain(raw: string): string {
    return raw.replace(/^https?:\/\//i, '').replace(/\/+$/, '');
}

function parsePosBaseUrl(raw: string): string {
    let url: URL;
    try {
        url = new URL(raw);
    } catch {
        throw new ConfigurationError('POS_BASE_URL is not a valid URL', ['POS_BASE_URL']);
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
        throw new ConfigurationError('POS_BASE_URL must use http or https', ['POS_BASE_URL']);
    }
    return raw;
}

/**
 * Reads, validates and freezes the run configuration.
 *
 * @param env - Variables to read; `process.env` unless a test passes its own
 * @param overrides - Command-line flags that win over the environment
 * @throws ConfigurationError naming every missing required variable
 */
export function loadConfig(
    env: NodeJS.ProcessEnv = process.env,
    overrides: { dryRun?: boolean } = {}
): Readonly<ReconcilerConfig> {
    const missing: string[] = [];
    const defaulted: string[] = [];
    const values: Record<string, string> = {};

    for (const config of ENV_CONFIG) {
        const value = env[config.name]?.trim();

        if (value) {
            values[config.name] = value;
        } else if (config.required) {
            missing.push(config.name);
        } else if (config.default !== undefined) {
            values[config.name] = config.default;
            defaulted.push(config.name);
        }
    }

    if (missing.length > 0) {
        throw new ConfigurationError(`Missing required environment variables: ${missing.join(', ')}`, missing);
    }

    if (defaulted.length > 0) {
        Logger.debug('[ENV] Using default values', { variables: defaulted });
    }

    const config: ReconcilerConfig = {
        shopify: Object.freeze({
            storeDomain: parseStoreDomain(values.SHOPIFY_STORE),
            accessToken: values.SHOPIFY_TOKEN,
            apiVersion: values.SHOPIFY_API_VERSION,
            locationId: parseLocationId(values.LOCATION_ID),
            pageSize: SHOPIFY_DEFAULTS.PAGE_SIZE,
            listingTimeoutMs: TIMEOUT_LIMITS.LISTING_TIMEOUT_MS,
            mutationTimeoutMs: TIMEOUT_LIMITS.MUTATION_TIMEOUT_MS,
            mutationSpacingMs: parseMilliseconds('MUTATION_SPACING_MS', values.MUTATION_SPACING_MS),
        }),
        pos: Object.freeze({
            baseUrl: parsePosBaseUrl(values.POS_BASE_URL),
            password: values.POS_PASSWORD,
            timeoutMs: TIMEOUT_LIMITS.POS_EXPORT_TIMEOUT_MS,
        }),
        pricing: Object.freeze({
            markupPercent: parsePercent('PRICE_MARKUP_PERCENT', values.PRICE_MARKUP_PERCENT, PRICING_DEFAULTS.MAX_MARKUP_PERCENT),
            tolerance: PRICING_DEFAULTS.TOLERANCE,
        }),
        itemSpacingMs: parseMilliseconds('ITEM_SPACING_MS', values.ITEM_SPACING_MS),
        dryRun: overrides.dryRun ?? parseFlag('DRY_RUN', values.DRY_RUN),
    };

    return Object.freeze(config);
}

