/**
 * Constants for ledger-fixup.
 */

/**
 * Default imbalance account name pattern.
 * Import tools park uncategorized line-items in accounts named like
 * "Imbalance-USD" (one per currency).
 */
export const DEFAULT_IMBALANCE_PATTERN = 'Imbalance-[A-Z]{3}';

/**
 * Separator between segments of a hierarchical account path,
 * e.g. "Expenses:Dining".
 */
export const ACCOUNT_PATH_SEPARATOR = ':';

/**
 * Rules-file comment marker (first non-whitespace character).
 */
export const RULE_COMMENT_PREFIX = '#';

/**
 * Console verbosity levels, quietest first.
 */
export const LOG_LEVELS = ['quiet', 'normal', 'verbose'] as const;

/**
 * Transaction text a rule pattern is matched against.
 */
export const MATCH_FIELDS = ['description', 'memo'] as const;

/**
 * Name of the optional config file looked up from the working directory upwards.
 */
export const CONFIG_FILENAME = '.ledger-fixup.yaml';

/**
 * Current ledger file format version.
 */
export const LEDGER_FILE_VERSION = 1;
