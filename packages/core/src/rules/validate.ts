/**
 * Rule-set checks run before processing.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Findings returned as warnings;
 * none of them stop a run.
 */

import { AccountNotFoundError } from '../errors.js';
import { resolveAccountName } from '../ledger/account-resolve.js';
import type { AccountRef } from '../ledger/types.js';
import type { RuleSet } from './types.js';

/**
 * Find rules that can never take effect, and rules whose target account
 * does not exist.
 *
 * - Same pattern and account as an earlier rule: duplicate, inert.
 * - Same pattern as an earlier rule, different account: shadowed, never reached.
 * - Target missing under root (only when root is given). Such a rule is
 *   still a fatal error if it matches during the run.
 *
 * @param rules - Parsed rules in priority order
 * @param root - Optional account root to check targets against
 * @returns Warnings in rule order
 */
export function checkRuleSet(rules: RuleSet, root?: AccountRef): string[] {
    const warnings: string[] = [];
    const firstBySource = new Map<string, { account: string; line: number }>();
    const missingAccounts = new Map<string, boolean>();

    for (const rule of rules) {
        const earlier = firstBySource.get(rule.source);
        if (!earlier) {
            firstBySource.set(rule.source, { account: rule.account, line: rule.line });
        } else if (earlier.account === rule.account) {
            warnings.push(
                `Rule on line ${rule.line} duplicates line ${earlier.line} ("${rule.source}" -> ${rule.account}) and is never used`
            );
        } else {
            warnings.push(
                `Rule on line ${rule.line} ("${rule.source}" -> ${rule.account}) is shadowed by line ${earlier.line} (-> ${earlier.account})`
            );
        }

        if (root) {
            let missing = missingAccounts.get(rule.account);
            if (missing === undefined) {
                missing = isMissingAccount(root, rule.account);
                missingAccounts.set(rule.account, missing);
            }
            if (missing) {
                warnings.push(`Rule on line ${rule.line} targets missing account "${rule.account}"`);
            }
        }
    }

    return warnings;
}

function isMissingAccount(root: AccountRef, path: string): boolean {
    try {
        resolveAccountName(root, path);
        return false;
    } catch (e) {
        if (e instanceof AccountNotFoundError) return true;
        throw e;
    }
}
