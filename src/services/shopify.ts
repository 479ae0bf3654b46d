import { Logger } from '../utils/logger';
import { BusinessRejectionError, ExternalAPIError, ResponseParseError } from '../utils/errors';
import { fetchWithTimeout, readJson } from '../utils/http';
import { RequestPacer } from '../utils/requestPacer';
import { SHOPIFY_DEFAULTS } from '../config/limits';
import type { ShopifyConfig } from '../utils/env';
import type { ZodError } from 'zod';
import {
    InventorySetOnHandResponseSchema,
    ShopifyProduct,
    ShopifyProductListSchema,
} from './sync/schemas';

const SERVICE = 'Shopify';

const SET_ON_HAND_MUTATION = `
mutation inventorySetOnHandQuantities($input: InventorySetOnHandQuantitiesInput!) {
  inventorySetOnHandQuantities(input: $input) {
    userErrors {
      field
      message
    }
    inventoryAdjustmentGroup {
      createdAt
    }
  }
}`;

export interface ShopifyProductPage {
    products: ShopifyProduct[];
    /** Absolute URL of the following page, null on the last page */
    nextPageUrl: string | null;
}

/** Paginated product listing. */
export interface StorefrontListingSource {
    firstPageUrl(): string;
    getProductsPage(url: string): Promise<ShopifyProductPage>;
}

/**
 * Storefront mutations. Both methods resolve on success and throw
 * ExternalAPIError, ResponseParseError or BusinessRejectionError otherwise.
 */
export interface StorefrontWriter {
    setOnHandQuantity(inventoryItemId: string, quantity: number): Promise<void>;
    updateVariantPrice(variantId: string, price: number): Promise<void>;
}

/**
 * Extracts the `rel="next"` target from a pagination `Link` header:
 * `<https://…page_info=abc>; rel="next", <https://…>; rel="previous"`.
 */
export function parseNextPageUrl(linkHeader: string | null): string | null {
    if (!linkHeader) return null;

    for (const part of linkHeader.split(',')) {
        const [target, ...params] = part.split(';');
        if (params.some(param => /^rel="?next"?$/i.test(param.trim()))) {
            const url = target.trim().replace(/^</, '').replace(/>$/, '');
            return url || null;
        }
    }

    return null;
}

function summarizeIssues(error: ZodError): string[] {
    return error.issues.slice(0, 3).map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Shopify Admin API client: REST product listing, GraphQL stock writes and
 * REST variant price writes.
 *
 * Mutations share one RequestPacer so that stock and price writes for the
 * same store never fire closer together than the configured spacing.
 */
export class ShopifyService implements StorefrontListingSource, StorefrontWriter {
    private readonly origin: string;
    private readonly baseUrl: string;

    constructor(
        private readonly config: ShopifyConfig,
        private readonly pacer: RequestPacer = new RequestPacer(config.mutationSpacingMs)
    ) {
        this.origin = `https://${config.storeDomain.toLowerCase()}`;
        this.baseUrl = `${this.origin}/admin/api/${config.apiVersion}`;
    }

    /** The access token is only ever sent to the configured store. */
    private assertStoreUrl(url: string): void {
        let origin: string;
        try {
            origin = new URL(url).origin;
        } catch (error) {
            throw new ResponseParseError(SERVICE, 'Pagination link is not a valid URL', { cause: error });
        }

        if (origin !== this.origin) {
            throw new ResponseParseError(SERVICE, 'Pagination link points outside the store', {
                context: { origin },
            });
        }
    }

    private headers(json = false): Record<string, string> {
        return {
            'X-Shopify-Access-Token': this.config.accessToken,
            Accept: 'application/json',
            ...(json ? { 'Content-Type': 'application/json' } : {}),
        };
    }

    firstPageUrl(): string {
        return `${this.baseUrl}/products.json?limit=${this.config.pageSize}`;
    }

    async getProductsPage(url: string): Promise<ShopifyProductPage> {
        this.assertStoreUrl(url);

        const response = await fetchWithTimeout(SERVICE, 'Product listing', url, {
            headers: this.headers(),
            timeoutMs: this.config.listingTimeoutMs,
        });

        const parsed = ShopifyProductListSchema.safeParse(await readJson(SERVICE, 'Product listing', response));
        if (!parsed.success) {
            throw new ResponseParseError(SERVICE, 'Product listing has an unexpected shape', {
                context: { issues: summarizeIssues(parsed.error) },
            });
        }

        return {
            products: parsed.data.products,
            nextPageUrl: parseNextPageUrl(response.headers.get('link')),
        };
    }

    /**
     * Sets the absolute on-hand quantity of an inventory item at the
     * configured location.
     */
    async setOnHandQuantity(inventoryItemId: string, quantity: number): Promise<void> {
        await this.pacer.wait();

        const variables = {
            input: {
                reason: SHOPIFY_DEFAULTS.ADJUSTMENT_REASON,
                setQuantities: [
                    {
                        inventoryItemId: `gid://shopify/InventoryItem/${inventoryItemId}`,
                        locationId: `gid://shopify/Location/${this.config.locationId}`,
                        quantity,
                    },
                ],
            },
        };

        const response = await fetchWithTimeout(SERVICE, 'Stock update', `${this.baseUrl}/graphql.json`, {
            method: 'POST',
            headers: this.headers(true),
            body: JSON.stringify({ query: SET_ON_HAND_MUTATION, variables }),
            timeoutMs: this.config.mutationTimeoutMs,
        });

        const parsed = InventorySetOnHandResponseSchema.safeParse(await readJson(SERVICE, 'Stock update', response));
        if (!parsed.success) {
            throw new ResponseParseError(SERVICE, 'Stock update response has an unexpected shape', {
                context: { issues: summarizeIssues(parsed.error) },
            });
        }

        // Top-level GraphQL errors (throttling, access scopes) mean nothing was applied
        const graphqlErrors = parsed.data.errors ?? [];
        if (graphqlErrors.length > 0) {
            throw new ExternalAPIError(SERVICE, `Stock update GraphQL error: ${graphqlErrors.map(e => e.message).join('; ')}`);
        }

        const payload = parsed.data.data?.inventorySetOnHandQuantities;
        if (!payload) {
            throw new ResponseParseError(SERVICE, 'Stock update response has no inventorySetOnHandQuantities payload');
        }

        if (payload.userErrors.length > 0) {
            throw new BusinessRejectionError(SERVICE, payload.userErrors.map(e => e.message));
        }

        Logger.debug('[Shopify] On-hand quantity set', { inventoryItemId, quantity });
    }

    /**
     * Writes a whole-unit retail price to a variant.
     */
    async updateVariantPrice(variantId: string, price: number): Promise<void> {
        await this.pacer.wait();

        const body = {
            variant: {
                id: /^\d+$/.test(variantId) ? Number(variantId) : variantId,
                price: price.toFixed(2),
            },
        };

        try {
            await fetchWithTimeout(SERVICE, 'Price update', `${this.baseUrl}/variants/${variantId}.json`, {
                method: 'PUT',
                headers: this.headers(true),
                body: JSON.stringify(body),
                timeoutMs: this.config.mutationTimeoutMs,
            });
        } catch (error) {
            // 422 carries validation messages for a well-formed request
            if (error instanceof ExternalAPIError && error.status === 422) {
                throw new BusinessRejectionError(SERVICE, [error.responseBody || 'HTTP 422 Unprocessable Entity']);
            }
            throw error;
        }

        Logger.debug('[Shopify] Variant price updated', { variantId, price });
    }
}
