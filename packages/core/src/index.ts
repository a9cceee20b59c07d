// Types (re-exported from shared)
export type {
    TransactionRecord,
    Category,
    ParsedTransaction,
    LargestTransaction,
    StatisticsSummary,
    Diagnostic,
    AggregationResult,
    TypeAliases,
    ReportConfig,
} from './types/index.js';

export {
    TransactionRecordSchema,
    StatisticsSummarySchema,
    REQUIRED_COLUMNS,
    CATEGORY,
    DEFAULT_TYPE_KEYWORDS,
    REPORT_DEFAULTS,
    REPORT_LABELS,
} from './types/index.js';

// Errors
export { ReportError, NotFoundError, IoError, SchemaError, InvalidAmountError } from './errors.js';

// Utils
export { normalizeType, Money } from './utils/index.js';

// Parsers
export { parseTransactionCsv, parseAmount, tryParseAmount } from './parser/index.js';
export type { AmountResult } from './parser/index.js';

// Classifier
export { classifyType, buildTypeKeywords } from './classifier/index.js';
export type { TypeKeywords } from './classifier/index.js';

// Aggregator
export { aggregateTransactions, evaluateRow } from './aggregator/index.js';
export type { AggregateOptions, RowOutcome } from './aggregator/index.js';

// Report
export { renderReport, renderReportLines, formatMoney } from './report/index.js';
export type { RenderOptions } from './report/index.js';
