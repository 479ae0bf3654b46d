/**
 * Control, format, surrogate, private-use and unassigned code points (`\p{C}`)
 * plus separators (`\p{Z}`), except the plain space, which prints.
 */
const NON_PRINTABLE = /(?! )[\p{C}\p{Z}]/gu;

/**
 * Canonical lookup key for a SKU. Both catalogs must go through this before
 * keys are compared, otherwise zero-width or control characters pasted into
 * one system make otherwise identical SKUs miss each other.
 *
 * @returns The SKU without non-printable characters; `''` for non-string input
 */
export function normalizeSku(raw: unknown): string {
    if (typeof raw !== 'string') return '';
    return raw.replace(NON_PRINTABLE, '');
}
