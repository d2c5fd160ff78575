import { readFile } from 'node:fs/promises';
import {
    checkRuleSet,
    compileImbalancePredicate,
    fixImbalances,
    parseRules,
    resolveAccountName,
    RulePatternError,
    type FixupStats,
    type LineItemOutcome,
    type ParseRulesResult,
} from '@ledger-fixup/core';
import { openLedgerSession } from '../store/json-store.js';
import { ConfigError } from '../workspace/config.js';
import type { CliConsole } from '../utils/console.js';
import type { RunConfig } from '../types.js';

export interface FixReport {
    stats: FixupStats;
    /** False for dry runs. */
    saved: boolean;
}

/**
 * Categorize the imbalance line-items of one account and save the ledger.
 *
 * Setup errors (rules file, imbalance pattern, ledger file, account to fix)
 * are thrown before anything changes. A rule naming a missing account is
 * thrown mid-run; the session is still ended, without saving.
 */
export async function runFix(config: RunConfig, out: CliConsole): Promise<FixReport> {
    // 1. Rules
    let rulesText: string;
    try {
        rulesText = await readFile(config.rulesPath, 'utf8');
    } catch (err) {
        const errorMsg = err instanceof Error ? err.message : String(err);
        throw new ConfigError(`Cannot read rules file ${config.rulesPath}: ${errorMsg}`, { cause: err });
    }
    let parsedRules: ParseRulesResult;
    try {
        parsedRules = parseRules(rulesText);
    } catch (err) {
        if (err instanceof RulePatternError) {
            for (const w of err.warnings) {
                out.warn(w);
            }
        }
        throw err;
    }
    const { rules, warnings } = parsedRules;
    for (const w of warnings) {
        out.warn(w);
    }
    out.arrow(`Loaded ${rules.length} rule(s) from ${config.rulesPath}`);

    const imbalance = compileImbalancePredicate(config.imbalancePattern);

    // 2. Ledger
    const session = await openLedgerSession(config.ledgerPath, { noChange: config.dryRun });
    let stats: FixupStats;
    try {
        const root = session.getRootAccount();
        const source = resolveAccountName(root, config.accountPath);

        for (const w of checkRuleSet(rules, root)) {
            out.warn(w);
        }

        // 3. Fix-up
        const result = fixImbalances(session, source, rules, {
            imbalance,
            matchField: config.matchField,
        });
        for (const outcome of result.outcomes) {
            reportOutcome(outcome, out);
        }
        stats = result.stats;

        await session.save();
    } finally {
        await session.end();
    }

    // 4. Summary
    out.log(`Total splits=${stats.total} imbalance=${stats.imbalance} fixed=${stats.fixed}`);
    if (config.dryRun) {
        out.info('[DRY RUN] No changes were saved.');
    } else {
        out.success(`Saved ${config.ledgerPath}`);
    }

    return { stats, saved: !config.dryRun };
}

function reportOutcome(outcome: LineItemOutcome, out: CliConsole): void {
    out.log(`${outcome.date} : ${outcome.description} => ${outcome.accountName}`);
    if (outcome.status === 'reassigned' && outcome.newAccountName !== undefined) {
        out.log(`\t Changing account to: ${outcome.newAccountName}`);
        if (outcome.rule) {
            out.debug(`\t Matched rule on line ${outcome.rule.line}: ${outcome.rule.source}`);
        }
    } else if (outcome.status === 'unmatched') {
        out.debug('\t No rule matched');
    }
}
