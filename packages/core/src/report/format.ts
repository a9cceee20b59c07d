import { Money } from '../utils/money.js';
import { REPORT_DEFAULTS } from '../types/index.js';

/**
 * Format a decimal string as money: currency prefix, at least two fraction
 * digits, more when the exact value carries more. Never rounds.
 *
 * @example formatMoney('150.1') // '$150.10'
 * @example formatMoney('12.345', '€') // '€12.345'
 */
export function formatMoney(amount: string, currencySymbol: string = REPORT_DEFAULTS.CURRENCY_SYMBOL): string {
    const value = new Money(amount);
    const digits = Math.max(REPORT_DEFAULTS.MIN_FRACTION_DIGITS, value.decimalPlaces());
    return `${currencySymbol}${value.toFixed(digits)}`;
}
