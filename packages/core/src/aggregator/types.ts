/**
 * Internal types for aggregator module.
 */

import type { ParsedTransaction, Diagnostic, TypeAliases } from '../types/index.js';
import type { TypeKeywords } from '../classifier/classify.js';

/**
 * Per-row outcome folded into the aggregate.
 */
export type RowOutcome =
    | { ok: true; transaction: ParsedTransaction }
    | { ok: false; diagnostic: Diagnostic };

/**
 * Options for aggregateTransactions() and evaluateRow().
 * Prebuilt keywords take precedence over typeAliases.
 */
export interface AggregateOptions {
    typeAliases?: Partial<TypeAliases>;
    keywords?: TypeKeywords;
}
