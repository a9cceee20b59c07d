import type { AggregationResult, ReportConfig, TransactionRecord } from '@bank-report/shared';
import type { ReportOptions } from '../types.js';

/**
 * Representation of an error occurring within a pipeline step.
 */
export interface PipelineError {
    step: string;
    message: string;
    fatal: boolean;
    error?: unknown;
}

/**
 * State object passed through the load → aggregate → report → save pipeline.
 */
export interface PipelineState {
    inputPath: string;
    options: ReportOptions;
    config: ReportConfig;

    // Accumulated during pipeline execution
    records: TransactionRecord[];
    result?: AggregationResult;
    reportText?: string;

    errors: PipelineError[];
}

/**
 * Function signature for a discrete pipeline step.
 */
export type PipelineStep = (state: PipelineState) => Promise<PipelineState>;
