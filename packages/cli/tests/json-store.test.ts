import { describe, it, expect, afterEach } from 'vitest';
import { readdirSync } from 'node:fs';
import { join } from 'node:path';
import { resolveAccountName } from '@ledger-fixup/core';
import { LedgerStoreError, openLedgerSession } from '../src/store/json-store.js';
import { makeTempWorkspace, storedAssignments, type TempWorkspace } from './helpers.js';

describe('openLedgerSession', () => {
    let ws: TempWorkspace;

    afterEach(() => {
        ws.cleanup();
    });

    it('opens a ledger file', async () => {
        ws = makeTempWorkspace();
        const session = await openLedgerSession(ws.ledgerPath);

        const card = resolveAccountName(session.getRootAccount(), 'Liabilities:CreditCard');
        expect(session.getLineItems(card)).toHaveLength(3);
        expect(session.noChange).toBe(false);
        await session.end();
    });

    it('writes reassignments on save', async () => {
        ws = makeTempWorkspace();
        const session = await openLedgerSession(ws.ledgerPath);
        const root = session.getRootAccount();
        const imbalance = resolveAccountName(root, 'Imbalance-USD');
        session.getLineItems(imbalance)[0].setAccount(resolveAccountName(root, 'Expenses:Dining'));

        await session.save();
        await session.end();

        expect(storedAssignments(ws.ledgerPath)).toEqual({
            s1: 'card',
            s2: 'dining',
            s3: 'card',
            s4: 'imb-usd',
            s5: 'card',
            s6: 'imb-usd',
        });
        expect(readdirSync(ws.dir).sort()).toEqual(['ledger.json', 'rules.txt']);
    });

    it('keeps keys it does not know about when saving', async () => {
        ws = makeTempWorkspace();
        const original = JSON.parse(ws.read('ledger.json'));
        original.commodities = ['USD'];
        original.book.owner = 'test-user';
        original.accounts[2].placeholder = false;
        original.transactions[0].num = '1001';
        original.transactions[0].splits[1].reconciled = 'n';
        ws.write('ledger.json', JSON.stringify(original, null, 2));

        const session = await openLedgerSession(ws.ledgerPath);
        const root = session.getRootAccount();
        const imbalance = resolveAccountName(root, 'Imbalance-USD');
        session.getLineItems(imbalance)[0].setAccount(resolveAccountName(root, 'Expenses:Dining'));
        await session.save();
        await session.end();

        const saved = JSON.parse(ws.read('ledger.json'));
        expect(saved.commodities).toEqual(['USD']);
        expect(saved.book).toEqual({ name: 'Fixture Book', root_account_id: 'root', owner: 'test-user' });
        expect(saved.accounts[2]).toEqual({
            id: 'card',
            name: 'CreditCard',
            parent_id: 'liab',
            type: 'CREDIT',
            placeholder: false,
        });
        expect(saved.transactions[0].num).toBe('1001');
        expect(saved.transactions[0].splits[1]).toEqual({
            id: 's2',
            account_id: 'dining',
            value: '12.50',
            reconciled: 'n',
        });
    });

    it('leaves the file untouched with noChange', async () => {
        ws = makeTempWorkspace();
        const before = ws.read('ledger.json');
        const session = await openLedgerSession(ws.ledgerPath, { noChange: true });
        const root = session.getRootAccount();
        const imbalance = resolveAccountName(root, 'Imbalance-USD');
        session.getLineItems(imbalance)[0].setAccount(resolveAccountName(root, 'Expenses:Dining'));

        await session.save();
        await session.end();

        expect(ws.read('ledger.json')).toBe(before);
    });

    it('fails for a missing file', async () => {
        ws = makeTempWorkspace();
        await expect(openLedgerSession(join(ws.dir, 'absent.json'))).rejects.toThrow(LedgerStoreError);
    });

    it('fails for malformed JSON', async () => {
        ws = makeTempWorkspace();
        const path = ws.write('broken.json', '{ "version": 1, ');
        await expect(openLedgerSession(path)).rejects.toThrow(`Ledger file ${path} is not valid JSON`);
    });

    it('fails for a file that does not match the schema', async () => {
        ws = makeTempWorkspace();
        const path = ws.write('wrong.json', JSON.stringify({ version: 1, accounts: [], transactions: [] }));
        await expect(openLedgerSession(path)).rejects.toThrow(`Ledger file ${path} is invalid: book: Required`);
    });

    it('fails for an inconsistent book', async () => {
        ws = makeTempWorkspace();
        const path = ws.write('orphan.json', JSON.stringify({
            version: 1,
            book: { root_account_id: 'root' },
            accounts: [
                { id: 'root', name: 'Root Account', parent_id: null },
                { id: 'lost', name: 'Lost', parent_id: 'nowhere' },
            ],
            transactions: [],
        }));
        await expect(openLedgerSession(path)).rejects.toThrow(
            `Ledger file ${path} is inconsistent: Account lost ("Lost") has unknown parent: nowhere`
        );
    });
});
