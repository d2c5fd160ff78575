import type { MatchField } from '@ledger-fixup/shared';
import type { ImbalancePredicate } from '../categorizer/types.js';
import type { Rule } from '../rules/types.js';

/**
 * Run configuration passed into the driver.
 */
export interface FixupConfig {
    imbalance: ImbalancePredicate;
    /** Transaction text matched against the rules. */
    matchField: MatchField;
}

export interface FixupStats {
    /** Line-items inspected. */
    total: number;
    /** Line-items found in an imbalance account. */
    imbalance: number;
    /** Line-items moved to a rule's account. */
    fixed: number;
}

/**
 * - skipped: not in an imbalance account, left alone
 * - unmatched: in an imbalance account, no rule matched
 * - reassigned: moved to the matching rule's account
 */
export type LineItemStatus = 'skipped' | 'unmatched' | 'reassigned';

/**
 * What happened to one line-item, for reporting.
 */
export interface LineItemOutcome {
    date: string;
    description: string;
    memo: string;
    /** Account name before the run. */
    accountName: string;
    status: LineItemStatus;
    /** Full name of the new account, when reassigned. */
    newAccountName?: string;
    rule?: Rule;
}

export interface FixupResult {
    stats: FixupStats;
    outcomes: LineItemOutcome[];
}
