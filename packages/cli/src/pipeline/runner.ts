import type { ReportConfig } from '@bank-report/shared';
import type { PipelineState, PipelineStep } from './types.js';
import { loadInput } from './steps/load.js';
import { aggregate } from './steps/aggregate.js';
import { printReport } from './steps/report.js';
import { saveReport } from './steps/save.js';
import type { ReportOptions } from '../types.js';

/**
 * Orchestrates the execution of the report pipeline.
 * Runs each step sequentially, stopping if a fatal error occurs.
 */
export async function runPipeline(
    inputPath: string,
    config: ReportConfig,
    options: ReportOptions
): Promise<PipelineState> {
    let state: PipelineState = {
        inputPath,
        options,
        config,
        records: [],
        errors: [],
    };

    const steps: PipelineStep[] = [loadInput, aggregate, printReport, saveReport];

    for (const step of steps) {
        state = await step(state);

        if (state.errors.some(e => e.fatal)) {
            break;
        }
    }

    return state;
}
