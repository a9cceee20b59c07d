export { parseTransactionCsv } from './csv.js';
export { parseAmount, tryParseAmount } from './amount.js';
export type { AmountResult } from './amount.js';
