/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
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
} from '@bank-report/shared';

export {
    TransactionRecordSchema,
    StatisticsSummarySchema,
    REQUIRED_COLUMNS,
    CATEGORY,
    DEFAULT_TYPE_KEYWORDS,
    REPORT_DEFAULTS,
    REPORT_LABELS,
} from '@bank-report/shared';
