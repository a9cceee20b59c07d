import { Decimal } from 'decimal.js';

/**
 * Decimal constructor for money. Precision is raised to the library maximum
 * so that plus/minus never round, whatever the length of the input amounts.
 */
export const Money = Decimal.clone({ precision: 1e9 });

export type Money = Decimal;
