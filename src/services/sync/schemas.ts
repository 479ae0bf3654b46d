/**
 * Remote payload schemas
 *
 * Shapes of the Shopify Admin API and POS export responses this project reads.
 * Unknown keys are stripped; only the fields used downstream are declared.
 */

import { z } from 'zod';
import Decimal from 'decimal.js';
import { parseDecimal } from '../../utils/priceCalculations';
import { PRICING_DEFAULTS } from '../../config/limits';

/** Shopify REST ids are JSON numbers; kept as strings from here on. */
const idField = z.union([z.number().int().nonnegative(), z.string().min(1)]).transform(String);

const moneyText = z.union([z.string(), z.number()]).transform(String);

const decimalField = z.union([z.string(), z.number()]).transform((value, ctx): Decimal => {
    const parsed = parseDecimal(value);
    if (!parsed) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `'${value}' is not a decimal` });
        return z.NEVER;
    }
    return parsed;
});

// ============================================
// SHOPIFY
// ============================================

export const ShopifyVariantSchema = z.object({
    id: idField,
    sku: z.string().nullish(),
    inventory_item_id: idField.nullish(),
    price: moneyText.nullish(),
    compare_at_price: moneyText.nullish(),
});

export const ShopifyProductSchema = z.object({
    id: idField,
    title: z.string().optional(),
    variants: z.array(ShopifyVariantSchema).default([]),
});

export const ShopifyProductListSchema = z.object({
    products: z.array(ShopifyProductSchema),
});

const UserErrorSchema = z.object({
    field: z.array(z.string()).nullish(),
    message: z.string(),
});

export const InventorySetOnHandResponseSchema = z.object({
    data: z.object({
        inventorySetOnHandQuantities: z.object({
            userErrors: z.array(UserErrorSchema).default([]),
        }).nullish(),
    }).nullish(),
    errors: z.array(z.object({ message: z.string() })).optional(),
});

export type ShopifyVariant = z.infer<typeof ShopifyVariantSchema>;
export type ShopifyProduct = z.infer<typeof ShopifyProductSchema>;

// ============================================
// POS
// ============================================

/**
 * A usable POS export record. Quantity arrives as text or a float ("12.0")
 * and is truncated to whole units.
 */
export const PosRecordSchema = z.object({
    ID: z.union([z.string(), z.number()]).transform(String),
    Qua: decimalField
        .transform(quantity => quantity.trunc().toNumber())
        .pipe(z.number().int().nonnegative()),
    Price: decimalField
        .refine(price => price.gte(0), { message: 'Price must not be negative' })
        .refine(price => price.lt(PRICING_DEFAULTS.MAX_BASE_PRICE), { message: 'Price is out of range' }),
});

export const PosExportSchema = z.array(z.unknown());
