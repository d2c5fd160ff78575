import { describe, it, expect } from 'vitest';
import { fixImbalances } from '../../src/fixup/driver.js';
import { compileImbalancePredicate } from '../../src/categorizer/imbalance.js';
import { parseRules } from '../../src/rules/parse.js';
import { resolveAccountName } from '../../src/ledger/account-resolve.js';
import { BookSession } from '../../src/ledger/session.js';
import { AccountNotFoundError } from '../../src/errors.js';
import type { FixupConfig } from '../../src/fixup/types.js';
import { makeBook, splitAccountId } from '../helpers/ledger.js';

const RULES = [
    '# card rules',
    'Expenses:Dining ^PIZZA',
    'Expenses:Groceries GROCER',
    'Expenses:Dining DINNER',
].join('\n');

const descriptionConfig: FixupConfig = {
    imbalance: compileImbalancePredicate(),
    matchField: 'description',
};

function setup(rulesText: string = RULES) {
    const book = makeBook();
    const session = new BookSession(book);
    const card = resolveAccountName(session.getRootAccount(), 'Liabilities:CreditCard');
    const { rules } = parseRules(rulesText);
    return { book, session, card, rules };
}

describe('fixImbalances', () => {
    it('reassigns matching imbalance line-items and counts them', () => {
        const { book, session, card, rules } = setup();

        const { stats } = fixImbalances(session, card, rules, descriptionConfig);

        expect(stats).toEqual({ total: 11, imbalance: 5, fixed: 4 });
        expect(splitAccountId(book, 's2')).toBe('dining');
        expect(splitAccountId(book, 's4')).toBe('groceries');
        expect(splitAccountId(book, 's6')).toBe('imb-usd');
    });

    it('inspects every line-item of multi-split transactions', () => {
        const { book, session, card, rules } = setup();

        fixImbalances(session, card, rules, descriptionConfig);

        expect(splitAccountId(book, 's10')).toBe('dining');
        expect(splitAccountId(book, 's11')).toBe('dining');
    });

    it('never touches already categorized line-items', () => {
        const { book, session, card, rules } = setup('Expenses:Groceries .');

        const { outcomes } = fixImbalances(session, card, rules, descriptionConfig);

        expect(splitAccountId(book, 's8')).toBe('dining');
        expect(splitAccountId(book, 's1')).toBe('card');
        expect(outcomes.filter(o => o.status === 'skipped').map(o => o.accountName)).toEqual([
            'CreditCard',
            'CreditCard',
            'CreditCard',
            'CreditCard',
            'Dining',
            'CreditCard',
        ]);
    });

    it('ignores transactions that do not touch the source account', () => {
        const { book, session, card, rules } = setup();

        fixImbalances(session, card, rules, descriptionConfig);

        expect(splitAccountId(book, 's13')).toBe('imb-usd');
    });

    it('reports one outcome per line-item in ledger order', () => {
        const { session, card, rules } = setup();

        const { outcomes } = fixImbalances(session, card, rules, descriptionConfig);

        expect(outcomes.map(o => [o.date, o.status])).toEqual([
            ['2026-01-03', 'skipped'],
            ['2026-01-03', 'reassigned'],
            ['2026-01-05', 'skipped'],
            ['2026-01-05', 'reassigned'],
            ['2026-01-07', 'skipped'],
            ['2026-01-07', 'unmatched'],
            ['2026-01-08', 'skipped'],
            ['2026-01-08', 'skipped'],
            ['2026-01-09', 'skipped'],
            ['2026-01-09', 'reassigned'],
            ['2026-01-09', 'reassigned'],
        ]);
        expect(outcomes[1]).toMatchObject({
            description: 'CORNER GROCER',
            memo: 'weekly shop',
            accountName: 'Imbalance-USD',
            newAccountName: 'Expenses:Groceries',
        });
        expect(outcomes[1].rule?.line).toBe(3);
    });

    it('is idempotent', () => {
        const { session, card, rules } = setup();

        fixImbalances(session, card, rules, descriptionConfig);
        const second = fixImbalances(session, card, rules, descriptionConfig);

        expect(second.stats).toEqual({ total: 11, imbalance: 1, fixed: 0 });
    });

    it('matches against the memo when configured', () => {
        const { book, session, card, rules } = setup('Expenses:Dining lunch\nExpenses:Groceries GROCER');

        const { stats } = fixImbalances(session, card, rules, {
            ...descriptionConfig,
            matchField: 'memo',
        });

        expect(stats).toEqual({ total: 11, imbalance: 5, fixed: 1 });
        expect(splitAccountId(book, 's2')).toBe('dining');
        expect(splitAccountId(book, 's4')).toBe('imb-usd');
    });

    it('uses the configured imbalance predicate', () => {
        const { book, session, card, rules } = setup();

        const { stats } = fixImbalances(session, card, rules, {
            ...descriptionConfig,
            imbalance: compileImbalancePredicate('Imbalance-EUR'),
        });

        expect(stats).toEqual({ total: 11, imbalance: 1, fixed: 1 });
        expect(splitAccountId(book, 's11')).toBe('dining');
        expect(splitAccountId(book, 's10')).toBe('imb-usd');
    });

    it('stops on a rule naming a missing account and keeps earlier changes', () => {
        const { book, session, card, rules } = setup('Expenses:Groceries GROCER\nExpenses:NoSuchSub UNKNOWN');

        expect(() => fixImbalances(session, card, rules, descriptionConfig)).toThrow(AccountNotFoundError);
        expect(splitAccountId(book, 's4')).toBe('groceries');
    });

    it('counts nothing for an account without line-items', () => {
        const { session, rules } = setup();
        const checkingParent = resolveAccountName(session.getRootAccount(), 'Assets');

        const { stats, outcomes } = fixImbalances(session, checkingParent, rules, descriptionConfig);

        expect(stats).toEqual({ total: 0, imbalance: 0, fixed: 0 });
        expect(outcomes).toEqual([]);
    });
});
