/**
 * Constants for the bank transaction report.
 */

/**
 * Columns every input CSV must carry. Extra columns are ignored.
 */
export const REQUIRED_COLUMNS = ['id', 'tipo', 'monto'] as const;

/**
 * Transaction categories. Only credito and debito contribute to the balance.
 */
export const CATEGORY = {
    CREDIT: 'credito',
    DEBIT: 'debito',
    UNKNOWN: 'desconocido',
} as const;

/**
 * Normalized type spellings recognized without any configuration.
 * Accented forms normalize onto these (Crédito -> credito).
 */
export const DEFAULT_TYPE_KEYWORDS = {
    credito: ['credito'],
    debito: ['debito'],
} as const;

/**
 * Defaults applied when no workspace config is present.
 */
export const REPORT_DEFAULTS = {
    CURRENCY_SYMBOL: '$',
    REPORT_SUFFIX: '_reporte.txt',
    MIN_FRACTION_DIGITS: 2,
    MISSING_ID_LABEL: 'N/A',
} as const;

/**
 * Answer accepted by the save prompt (case-insensitive).
 */
export const AFFIRMATIVE_ANSWER = 's';

/**
 * Fixed labels of the rendered report.
 */
export const REPORT_LABELS = {
    TITLE: '===== REPORTE DE TRANSACCIONES BANCARIAS =====',
    AMOUNTS_HEADER: 'Resumen de Montos:',
    TOTAL_CREDITS: '  - Total Créditos: ',
    TOTAL_DEBITS: '  - Total Débitos: ',
    FINAL_BALANCE: 'Balance Final: ',
    LARGEST: 'Transacción de Mayor Monto: ID ',
    COUNTS_HEADER: 'Conteo de Transacciones:',
    CREDIT_COUNT: '  - Créditos: ',
    DEBIT_COUNT: '  - Débitos: ',
    TOTAL_COUNT: '  - Total: ',
} as const;
