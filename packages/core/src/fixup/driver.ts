/**
 * Imbalance fix-up over one source account.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Outcomes are returned for the
 * caller to report. Persisting is the caller's decision (session.save()).
 */

import { classify } from '../categorizer/classify.js';
import type { AccountRef, LedgerSession, LedgerTransaction, LineItem } from '../ledger/types.js';
import type { RuleSet } from '../rules/types.js';
import type { FixupConfig, FixupResult, FixupStats, LineItemOutcome } from './types.js';

/**
 * Re-categorize imbalance line-items of every transaction touching sourceAccount.
 *
 * Every line-item of each such transaction is inspected, not only the one
 * opposite the source account. A transaction with several line-items in the
 * source account is visited once.
 *
 * Only line-items whose current account name satisfies config.imbalance are
 * candidates, so a second run over the same ledger changes nothing.
 *
 * @param session - Open ledger session (exclusively owned by this run)
 * @param sourceAccount - Account whose transactions are fixed, e.g. a credit card
 * @param rules - Rules in priority order
 * @param config - Imbalance predicate and match field
 * @returns Counters and one outcome per inspected line-item
 * @throws AccountNotFoundError when a matching rule names a missing account.
 *   Line-items reassigned before the error keep their new account.
 */
export function fixImbalances(
    session: LedgerSession,
    sourceAccount: AccountRef,
    rules: RuleSet,
    config: FixupConfig
): FixupResult {
    const root = session.getRootAccount();
    const stats: FixupStats = { total: 0, imbalance: 0, fixed: 0 };
    const outcomes: LineItemOutcome[] = [];
    const visited = new Set<LedgerTransaction>();

    for (const sourceItem of session.getLineItems(sourceAccount)) {
        const txn = sourceItem.getTransaction();
        if (visited.has(txn)) continue;
        visited.add(txn);

        for (const item of txn.getLineItems()) {
            outcomes.push(fixLineItem(item, txn, root, rules, config, stats));
        }
    }

    return { stats, outcomes };
}

function fixLineItem(
    item: LineItem,
    txn: LedgerTransaction,
    root: AccountRef,
    rules: RuleSet,
    config: FixupConfig,
    stats: FixupStats
): LineItemOutcome {
    const outcome: LineItemOutcome = {
        date: txn.getDate(),
        description: txn.getDescription(),
        memo: txn.getMemo(),
        accountName: item.getAccount().getName(),
        status: 'skipped',
    };
    stats.total++;

    if (!config.imbalance(outcome.accountName)) {
        return outcome;
    }
    stats.imbalance++;

    const searchText = config.matchField === 'memo' ? outcome.memo : outcome.description;
    const classification = classify(searchText, rules, root);
    if (classification.kind === 'no-match') {
        outcome.status = 'unmatched';
        return outcome;
    }

    item.setAccount(classification.account);
    stats.fixed++;
    outcome.status = 'reassigned';
    outcome.newAccountName = classification.account.getFullName();
    outcome.rule = classification.rule;
    return outcome;
}
