// Schemas
export {
    AccountRecordSchema,
    SplitRecordSchema,
    TransactionRecordSchema,
    LedgerFileSchema,
    LogLevelSchema,
    MatchFieldSchema,
    FixupConfigFileSchema,
} from './schemas.js';

// Types
export type {
    AccountRecord,
    SplitRecord,
    TransactionRecord,
    LedgerFile,
    LogLevel,
    MatchField,
    FixupConfigFile,
} from './schemas.js';

// Constants
export {
    DEFAULT_IMBALANCE_PATTERN,
    ACCOUNT_PATH_SEPARATOR,
    RULE_COMMENT_PREFIX,
    LOG_LEVELS,
    MATCH_FIELDS,
    CONFIG_FILENAME,
    LEDGER_FILE_VERSION,
} from './constants.js';
