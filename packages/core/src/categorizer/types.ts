/**
 * Internal types for categorizer module.
 */

import type { AccountRef } from '../ledger/types.js';
import type { Rule } from '../rules/types.js';

/**
 * Result of classifying one search string.
 * "No match" is a normal outcome, distinct from any account handle.
 */
export type Classification =
    | { kind: 'match'; account: AccountRef; rule: Rule }
    | { kind: 'no-match' };

/**
 * Decides whether an account name is an import holding ("imbalance") account.
 */
export type ImbalancePredicate = (accountName: string) => boolean;
