/**
 * ledger-fixup CLI - Core Types
 */

import type { LogLevel, MatchField } from '@ledger-fixup/shared';

/**
 * Options as given on the command line. Unset flags fall back to the
 * config file, then to defaults.
 */
export interface CliOptions {
    accountPath: string;
    rulesPath: string;
    ledgerPath: string;
    imbalancePattern?: string;
    useMemo: boolean;
    noChange: boolean;
    silent: boolean;
    verbose: boolean;
    configPath?: string;
}

/**
 * Fully resolved settings for one run.
 */
export interface RunConfig {
    accountPath: string;
    rulesPath: string;
    ledgerPath: string;
    imbalancePattern: string;
    matchField: MatchField;
    dryRun: boolean;
    logLevel: LogLevel;
}
