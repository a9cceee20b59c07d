export { aggregateTransactions, evaluateRow } from './aggregate.js';
export type { AggregateOptions, RowOutcome } from './types.js';
