/**
 * Plain-text report rendering.
 * The same text goes to the console and, with a closing newline, to the file.
 */

import { REPORT_DEFAULTS, REPORT_LABELS } from '../types/index.js';
import type { StatisticsSummary } from '../types/index.js';
import { formatMoney } from './format.js';

export interface RenderOptions {
    currencySymbol?: string;
}

/**
 * Render the summary as report lines, in fixed order.
 */
export function renderReportLines(summary: StatisticsSummary, options: RenderOptions = {}): string[] {
    const symbol = options.currencySymbol ?? REPORT_DEFAULTS.CURRENCY_SYMBOL;
    const money = (amount: string) => formatMoney(amount, symbol);
    const largest = summary.largest_transaction;
    const largestId = largest.id ?? REPORT_DEFAULTS.MISSING_ID_LABEL;

    return [
        REPORT_LABELS.TITLE,
        '',
        REPORT_LABELS.AMOUNTS_HEADER,
        `${REPORT_LABELS.TOTAL_CREDITS}${money(summary.total_credits)}`,
        `${REPORT_LABELS.TOTAL_DEBITS}${money(summary.total_debits)}`,
        `${REPORT_LABELS.FINAL_BALANCE}${money(summary.final_balance)}`,
        '',
        `${REPORT_LABELS.LARGEST}${largestId} con ${money(largest.amount)}`,
        '',
        REPORT_LABELS.COUNTS_HEADER,
        `${REPORT_LABELS.CREDIT_COUNT}${summary.credit_count}`,
        `${REPORT_LABELS.DEBIT_COUNT}${summary.debit_count}`,
        `${REPORT_LABELS.TOTAL_COUNT}${summary.credit_count + summary.debit_count}`,
    ];
}

/**
 * Render the summary as a single block of text without a trailing newline.
 */
export function renderReport(summary: StatisticsSummary, options: RenderOptions = {}): string {
    return renderReportLines(summary, options).join('\n');
}
