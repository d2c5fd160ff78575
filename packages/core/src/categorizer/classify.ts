/**
 * Rule-based classification of transaction text.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Reads the account tree, never writes it.
 */

import { resolveAccountName } from '../ledger/account-resolve.js';
import type { AccountRef } from '../ledger/types.js';
import type { Rule, RuleSet } from '../rules/types.js';
import type { Classification } from './types.js';

/**
 * First rule whose pattern occurs anywhere in the text.
 *
 * Uses String.prototype.search, which ignores the global flag and lastIndex,
 * so repeated calls give the same answer for any RegExp.
 */
export function findMatchingRule(searchText: string, rules: RuleSet): Rule | undefined {
    return rules.find(rule => searchText.search(rule.pattern) !== -1);
}

/**
 * Classify a description or memo against the rules.
 *
 * First match wins: later rules are not tried once one matches, even if
 * they would match more of the text.
 *
 * @param searchText - Transaction description or memo
 * @param rules - Rules in priority order
 * @param root - Account root the matched rule's path is resolved from
 * @returns The resolved target account, or no-match
 * @throws AccountNotFoundError when the matching rule names a missing account
 */
export function classify(searchText: string, rules: RuleSet, root: AccountRef): Classification {
    const rule = findMatchingRule(searchText, rules);
    if (!rule) {
        return { kind: 'no-match' };
    }
    return { kind: 'match', account: resolveAccountName(root, rule.account), rule };
}
