/**
 * Exact decimal parsing of the monto column.
 * Money never goes through native numbers.
 */

import { Money } from '../utils/money.js';
import { InvalidAmountError } from '../errors.js';

/**
 * Optional sign, digits with optional fraction. No exponent, no separators.
 */
const AMOUNT_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

export type AmountResult =
    | { ok: true; value: Money }
    | { ok: false; error: InvalidAmountError };

/**
 * Parse a raw amount string into an exact decimal.
 *
 * @param raw - Amount text as read from the CSV (surrounding whitespace allowed)
 * @param txnId - Owning transaction id, for diagnostics
 * @throws InvalidAmountError if the text is not a plain decimal number
 */
export function parseAmount(raw: string, txnId: string): Money {
    const trimmed = raw.trim();
    if (!AMOUNT_PATTERN.test(trimmed)) {
        throw new InvalidAmountError(txnId, raw);
    }
    return new Money(trimmed);
}

/**
 * Result-returning variant of parseAmount for per-row folding.
 */
export function tryParseAmount(raw: string, txnId: string): AmountResult {
    try {
        return { ok: true, value: parseAmount(raw, txnId) };
    } catch (err) {
        if (err instanceof InvalidAmountError) {
            return { ok: false, error: err };
        }
        throw err;
    }
}
