/**
 * Folds raw transaction records into a StatisticsSummary.
 *
 * Each record is first evaluated into a RowOutcome (parsed or rejected),
 * then folded in input order:
 * - invalid amount: invalid_amount diagnostic, row skipped
 * - credito / debito: added to its sum and count, eligible for largest
 * - desconocido: unknown_type diagnostic, row skipped (including largest)
 *
 * ARCHITECTURAL NOTE: No console.* calls. Diagnostics returned in result.
 */

import { tryParseAmount } from '../parser/amount.js';
import { classifyType, buildTypeKeywords } from '../classifier/classify.js';
import { Money } from '../utils/money.js';
import { CATEGORY } from '../types/index.js';
import type {
    TransactionRecord,
    ParsedTransaction,
    Diagnostic,
    AggregationResult,
} from '../types/index.js';
import type { AggregateOptions, RowOutcome } from './types.js';

/**
 * Parse and classify a single record.
 *
 * @param record - Raw CSV row
 * @param options - Optional type aliases
 * @returns parsed transaction, or the diagnostic explaining the rejection
 */
export function evaluateRow(record: TransactionRecord, options: AggregateOptions = {}): RowOutcome {
    const amount = tryParseAmount(record.monto, record.id);
    if (!amount.ok) {
        return {
            ok: false,
            diagnostic: {
                kind: 'invalid_amount',
                txn_id: record.id,
                value: record.monto,
                message: amount.error.message,
            },
        };
    }

    const keywords = options.keywords ?? buildTypeKeywords(options.typeAliases);
    const transaction: ParsedTransaction = {
        ...record,
        amount: amount.value.toFixed(),
        category: classifyType(record.tipo, keywords),
    };
    return { ok: true, transaction };
}

/**
 * Aggregate all records into summary statistics.
 * Never throws for a well-formed record list.
 */
export function aggregateTransactions(
    records: readonly TransactionRecord[],
    options: AggregateOptions = {}
): AggregationResult {
    const keywords = options.keywords ?? buildTypeKeywords(options.typeAliases);
    const diagnostics: Diagnostic[] = [];

    let totalCredits = new Money(0);
    let totalDebits = new Money(0);
    let largestId: string | null = null;
    let largestAmount = new Money(0);
    let creditCount = 0;
    let debitCount = 0;

    for (const record of records) {
        const outcome = evaluateRow(record, { keywords });
        if (!outcome.ok) {
            diagnostics.push(outcome.diagnostic);
            continue;
        }

        const { transaction } = outcome;
        const amount = new Money(transaction.amount);

        if (transaction.category === CATEGORY.CREDIT) {
            totalCredits = totalCredits.plus(amount);
            creditCount++;
        } else if (transaction.category === CATEGORY.DEBIT) {
            totalDebits = totalDebits.plus(amount);
            debitCount++;
        } else {
            diagnostics.push({
                kind: 'unknown_type',
                txn_id: transaction.id,
                value: transaction.tipo,
                message: `Tipo de transacción desconocido: ${transaction.tipo} en ID: ${transaction.id}`,
            });
            continue;
        }

        // Strictly greater: the first of equal amounts is kept
        if (amount.greaterThan(largestAmount)) {
            largestId = transaction.id;
            largestAmount = amount;
        }
    }

    return {
        summary: {
            total_credits: totalCredits.toFixed(),
            total_debits: totalDebits.toFixed(),
            final_balance: totalCredits.minus(totalDebits).toFixed(),
            largest_transaction: {
                id: largestId,
                amount: largestAmount.toFixed(),
            },
            credit_count: creditCount,
            debit_count: debitCount,
        },
        diagnostics,
    };
}
