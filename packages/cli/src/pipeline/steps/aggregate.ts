import { aggregateTransactions } from '@bank-report/core';
import type { PipelineStep } from '../types.js';
import { error, warn } from '../../utils/console.js';

/**
 * Step 2: Aggregate
 * Computes the summary and prints row diagnostics in input order.
 */
export const aggregate: PipelineStep = async (state) => {
    const result = aggregateTransactions(state.records, {
        typeAliases: state.config.type_aliases,
    });

    for (const diagnostic of result.diagnostics) {
        if (diagnostic.kind === 'invalid_amount') {
            error(diagnostic.message);
        } else {
            warn(diagnostic.message);
        }
    }

    state.result = result;
    return state;
};
