import { renderReport } from '@bank-report/core';
import type { PipelineStep } from '../types.js';
import { log } from '../../utils/console.js';

/**
 * Step 3: Report
 * Renders the summary and prints it to the console.
 */
export const printReport: PipelineStep = async (state) => {
    if (!state.result) {
        state.errors.push({ step: 'report', message: 'No hay estadísticas para reportar.', fatal: true });
        return state;
    }

    state.reportText = renderReport(state.result.summary, {
        currencySymbol: state.config.currency_symbol,
    });

    log('');
    log(state.reportText);
    return state;
};
