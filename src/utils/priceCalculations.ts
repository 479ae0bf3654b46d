/**
 * Price Calculations Utility
 *
 * Retail pricing rules applied when storefront prices are brought in line
 * with the POS base price: markup, rounding to a 5/10 price point, markdown
 * protection and the no-op tolerance. All arithmetic is exact decimal.
 */

import Decimal from 'decimal.js';
import { PRICING_DEFAULTS } from '../config/limits';

const DECIMAL_TEXT = /^[+-]?(\d+(\.\d*)?|\.\d+)(e[+-]?\d+)?$/i;

export interface PricingOptions {
    /** Markup over the base price, in percent. Default 15 */
    markupPercent?: number;
    /** Prices this close to the target count as already at target. Default 0.01 */
    tolerance?: Decimal.Value;
}

export type PriceDecision =
    | { action: 'update'; target: number; current: Decimal }
    | { action: 'skip'; target: number; current: Decimal }
    | { action: 'invalid_current_price'; target: number; raw: unknown };

/**
 * Parses a money amount as sent by the remote APIs (usually a string such
 * as "115.00", sometimes a JSON number).
 *
 * @returns null for anything that is not a finite decimal
 */
export function parseDecimal(value: unknown): Decimal | null {
    if (value instanceof Decimal) return value.isFinite() ? value : null;
    if (typeof value === 'number') return Number.isFinite(value) ? new Decimal(value) : null;
    if (typeof value !== 'string') return null;

    const text = value.trim();
    if (!DECIMAL_TEXT.test(text)) return null;
    return new Decimal(text);
}

/**
 * Rounds a price up to the next whole price point ending in 5 or 0.
 *
 * The fraction is dropped first (truncated, not rounded), so 104.99 → 104 → 105.
 * Prices already ending in 0 or 5 are returned as they are.
 *
 * @example
 * roundUpToFiveOrTen(101) // 105
 * roundUpToFiveOrTen(106) // 110
 * roundUpToFiveOrTen(115) // 115
 */
export function roundUpToFiveOrTen(price: Decimal | number): number {
    const units = new Decimal(price).trunc();
    // Infinity and NaN have no last digit
    if (!units.isFinite()) return units.toNumber();

    const remainder = units.mod(10).plus(10).mod(10).toNumber();

    if (remainder === 0 || remainder === 5) return units.toNumber();

    return remainder < 5
        ? units.minus(remainder).plus(5).toNumber()
        : units.minus(remainder).plus(10).toNumber();
}

/**
 * True when the storefront shows a markdown: a reference ("compare-at")
 * price that is positive and strictly above the live price. Missing or
 * malformed prices never count as a discount.
 */
export function isDiscounted(currentPrice: unknown, referencePrice: unknown): boolean {
    const reference = parseDecimal(referencePrice);
    if (!reference || reference.lte(0)) return false;

    const current = parseDecimal(currentPrice);
    if (!current) return false;

    return reference.gt(current);
}

/**
 * Retail target for a POS base price: base × (1 + markup), rounded half-up to
 * cents, then up to the next 5/10 price point.
 *
 * @throws RangeError when the target is not a safe whole number
 */
export function calculateTargetPrice(
    basePrice: Decimal.Value,
    markupPercent: number = PRICING_DEFAULTS.MARKUP_PERCENT
): number {
    const multiplier = new Decimal(100).plus(markupPercent).div(100);
    const marked = new Decimal(basePrice).times(multiplier).toDecimalPlaces(2, Decimal.ROUND_HALF_UP);
    const target = roundUpToFiveOrTen(marked);

    if (!Number.isSafeInteger(target)) {
        throw new RangeError(`Target price for base ${new Decimal(basePrice).toString()} is out of range`);
    }
    return target;
}

/**
 * Decides whether the storefront price has to move to the target.
 *
 * Prices within tolerance of the target, or above it, are left alone: a
 * price is never lowered automatically, and a second run over unchanged
 * data always skips.
 *
 * @throws RangeError as calculateTargetPrice does
 */
export function computeTargetPrice(
    basePrice: Decimal.Value,
    currentPrice: unknown,
    options: PricingOptions = {}
): PriceDecision {
    const target = calculateTargetPrice(basePrice, options.markupPercent);

    const current = parseDecimal(currentPrice);
    if (!current) {
        return { action: 'invalid_current_price', target, raw: currentPrice };
    }

    const tolerance = new Decimal(options.tolerance ?? PRICING_DEFAULTS.TOLERANCE);
    if (current.minus(target).abs().lte(tolerance) || current.gt(target)) {
        return { action: 'skip', target, current };
    }

    return { action: 'update', target, current };
}
