// Schemas
export {
    TransactionRecordSchema,
    CategorySchema,
    ParsedTransactionSchema,
    LargestTransactionSchema,
    StatisticsSummarySchema,
    DiagnosticSchema,
    AggregationResultSchema,
    TypeAliasesSchema,
    ReportConfigSchema,
} from './schemas.js';

// Types
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
} from './schemas.js';

// Constants
export {
    REQUIRED_COLUMNS,
    CATEGORY,
    DEFAULT_TYPE_KEYWORDS,
    REPORT_DEFAULTS,
    AFFIRMATIVE_ANSWER,
    REPORT_LABELS,
} from './constants.js';
