/**
 * Zod schemas for the report data structures.
 *
 * IMPORTANT: Decimal values are stored as strings in schemas.
 * Convert to Decimal at computation boundaries, back to string at output.
 */

import { z } from 'zod';
import { CATEGORY, REPORT_DEFAULTS } from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * Decimal amount as string (never native number for money).
 * Plain notation only, no exponent.
 */
const decimalString = z.string().regex(/^-?\d+(\.\d+)?$/, 'Must be valid decimal string');

// ============================================================================
// Transaction Schemas
// ============================================================================

/**
 * Raw CSV row, restricted to the columns the report reads.
 * Values are kept exactly as they appear in the file.
 */
export const TransactionRecordSchema = z.object({
    id: z.string(),
    tipo: z.string(),
    monto: z.string(),
});

export type TransactionRecord = z.infer<typeof TransactionRecordSchema>;

export const CategorySchema = z.enum([CATEGORY.CREDIT, CATEGORY.DEBIT, CATEGORY.UNKNOWN]);

export type Category = z.infer<typeof CategorySchema>;

/**
 * Record whose amount parsed and whose type was resolved.
 */
export const ParsedTransactionSchema = TransactionRecordSchema.extend({
    amount: decimalString,
    category: CategorySchema,
});

export type ParsedTransaction = z.infer<typeof ParsedTransactionSchema>;

// ============================================================================
// Aggregation Schemas
// ============================================================================

export const LargestTransactionSchema = z.object({
    id: z.string().nullable(),
    amount: decimalString,
});

export type LargestTransaction = z.infer<typeof LargestTransactionSchema>;

/**
 * Summary produced once per run and consumed by the reporter.
 * final_balance = total_credits - total_debits, may be negative.
 */
export const StatisticsSummarySchema = z.object({
    total_credits: decimalString,
    total_debits: decimalString,
    final_balance: decimalString,
    largest_transaction: LargestTransactionSchema,
    credit_count: z.number().int().min(0),
    debit_count: z.number().int().min(0),
});

export type StatisticsSummary = z.infer<typeof StatisticsSummarySchema>;

/**
 * Row-level event raised while aggregating. Never fatal.
 */
export const DiagnosticSchema = z.object({
    kind: z.enum(['invalid_amount', 'unknown_type']),
    txn_id: z.string(),
    value: z.string(),
    message: z.string(),
});

export type Diagnostic = z.infer<typeof DiagnosticSchema>;

export const AggregationResultSchema = z.object({
    summary: StatisticsSummarySchema,
    diagnostics: z.array(DiagnosticSchema),
});

export type AggregationResult = z.infer<typeof AggregationResultSchema>;

// ============================================================================
// Configuration Schemas
// ============================================================================

/**
 * Extra type spellings per category, on top of the built-in keywords.
 */
export const TypeAliasesSchema = z.object({
    credito: z.array(z.string().min(1)).default([]),
    debito: z.array(z.string().min(1)).default([]),
});

export type TypeAliases = z.infer<typeof TypeAliasesSchema>;

/**
 * Workspace configuration (config/report.yaml). Every key is optional.
 */
export const ReportConfigSchema = z.object({
    currency_symbol: z.string().default(REPORT_DEFAULTS.CURRENCY_SYMBOL),
    report_suffix: z
        .string()
        .min(1)
        .regex(/^[^/\\]+$/, 'Must not contain path separators')
        .default(REPORT_DEFAULTS.REPORT_SUFFIX),
    type_aliases: TypeAliasesSchema.default({}),
});

export type ReportConfig = z.infer<typeof ReportConfigSchema>;
