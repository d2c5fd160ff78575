/**
 * In-memory ledger book.
 *
 * Rebuilds the account tree and transactions from plain ledger records and
 * serializes them back. Used as the backing model of every session.
 *
 * ARCHITECTURAL NOTE: No file system access. Stores load and persist records.
 */

import { ACCOUNT_PATH_SEPARATOR, LEDGER_FILE_VERSION } from '@ledger-fixup/shared';
import type { AccountRecord, LedgerFile, SplitRecord, TransactionRecord } from '@ledger-fixup/shared';
import { LedgerIntegrityError } from '../errors.js';
import type { AccountRef, LedgerTransaction, LineItem } from './types.js';

export class BookAccount implements AccountRef {
    private parent: BookAccount | null = null;
    private readonly children: BookAccount[] = [];
    private readonly childrenByName = new Map<string, BookAccount>();

    constructor(
        readonly book: LedgerBook,
        readonly record: AccountRecord
    ) {}

    get id(): string {
        return this.record.id;
    }

    getName(): string {
        return this.record.name;
    }

    getParent(): BookAccount | null {
        return this.parent;
    }

    getFullName(): string {
        const names: string[] = [];
        let current: BookAccount | null = this;
        while (current && current.parent) {
            names.unshift(current.getName());
            current = current.parent;
        }
        return names.length > 0 ? names.join(ACCOUNT_PATH_SEPARATOR) : this.getName();
    }

    lookupChild(name: string): BookAccount | null {
        return this.childrenByName.get(name) ?? null;
    }

    getChildren(): readonly BookAccount[] {
        return this.children;
    }

    /** @internal */
    attach(child: BookAccount): void {
        child.parent = this;
        this.children.push(child);
        // Siblings sharing a name: lookups find the first one.
        if (!this.childrenByName.has(child.getName())) {
            this.childrenByName.set(child.getName(), child);
        }
    }
}

export class BookSplit implements LineItem {
    constructor(
        readonly transaction: BookTransaction,
        readonly record: SplitRecord,
        private account: BookAccount
    ) {}

    get id(): string {
        return this.record.id;
    }

    getTransaction(): BookTransaction {
        return this.transaction;
    }

    getAccount(): BookAccount {
        return this.account;
    }

    setAccount(account: AccountRef): void {
        this.account = this.transaction.book.ownAccount(account);
    }

    toRecord(): SplitRecord {
        return { ...this.record, account_id: this.account.id };
    }
}

export class BookTransaction implements LedgerTransaction {
    readonly splits: BookSplit[] = [];

    constructor(
        readonly book: LedgerBook,
        readonly record: TransactionRecord
    ) {}

    get id(): string {
        return this.record.id;
    }

    getDescription(): string {
        return this.record.description;
    }

    getMemo(): string {
        return this.record.memo ?? '';
    }

    getDate(): string {
        return this.record.date;
    }

    getLineItems(): readonly BookSplit[] {
        return this.splits;
    }

    toRecord(): TransactionRecord {
        return { ...this.record, splits: this.splits.map(s => s.toRecord()) };
    }
}

export class LedgerBook {
    private readonly accounts = new Map<string, BookAccount>();
    private readonly transactions: BookTransaction[] = [];
    private root: BookAccount | null = null;

    private constructor(private readonly source: LedgerFile) {}

    /**
     * Build a book from ledger records.
     *
     * @throws LedgerIntegrityError on duplicate ids, dangling parent or split
     *   account references, or accounts not reachable from the root.
     */
    static fromRecords(file: LedgerFile): LedgerBook {
        const book = new LedgerBook(file);

        for (const record of file.accounts) {
            if (book.accounts.has(record.id)) {
                throw new LedgerIntegrityError(`Duplicate account id: ${record.id}`);
            }
            book.accounts.set(record.id, new BookAccount(book, record));
        }

        const root = book.accounts.get(file.book.root_account_id);
        if (!root) {
            throw new LedgerIntegrityError(`Root account not found: ${file.book.root_account_id}`);
        }
        if (root.record.parent_id !== null) {
            throw new LedgerIntegrityError(`Root account ${root.id} must not have a parent`);
        }
        book.root = root;

        for (const account of book.accounts.values()) {
            if (account === root) continue;
            const parentId = account.record.parent_id;
            const parent = parentId === null ? undefined : book.accounts.get(parentId);
            if (!parent) {
                throw new LedgerIntegrityError(
                    `Account ${account.id} ("${account.getName()}") has unknown parent: ${parentId ?? 'none'}`
                );
            }
            parent.attach(account);
        }

        const reachable = countDescendants(root) + 1;
        if (reachable !== book.accounts.size) {
            throw new LedgerIntegrityError(
                `${book.accounts.size - reachable} account(s) are not reachable from the root (parent cycle)`
            );
        }

        const transactionIds = new Set<string>();
        const splitIds = new Set<string>();
        for (const record of file.transactions) {
            if (transactionIds.has(record.id)) {
                throw new LedgerIntegrityError(`Duplicate transaction id: ${record.id}`);
            }
            transactionIds.add(record.id);

            const txn = new BookTransaction(book, record);
            for (const splitRecord of record.splits) {
                if (splitIds.has(splitRecord.id)) {
                    throw new LedgerIntegrityError(`Duplicate split id: ${splitRecord.id}`);
                }
                splitIds.add(splitRecord.id);

                const account = book.accounts.get(splitRecord.account_id);
                if (!account) {
                    throw new LedgerIntegrityError(
                        `Split ${splitRecord.id} in transaction ${record.id} references unknown account: ${splitRecord.account_id}`
                    );
                }
                txn.splits.push(new BookSplit(txn, splitRecord, account));
            }
            book.transactions.push(txn);
        }

        return book;
    }

    getRootAccount(): BookAccount {
        if (!this.root) {
            throw new LedgerIntegrityError('Ledger book has no root account');
        }
        return this.root;
    }

    getAccount(id: string): BookAccount | undefined {
        return this.accounts.get(id);
    }

    getTransactions(): readonly BookTransaction[] {
        return this.transactions;
    }

    /**
     * Line-items currently assigned to the account, ordered by transaction
     * date (ties keep ledger order), then split order.
     */
    getLineItems(account: AccountRef): BookSplit[] {
        const target = this.ownAccount(account);
        const ordered = [...this.transactions].sort((a, b) => a.getDate().localeCompare(b.getDate()));
        const items: BookSplit[] = [];
        for (const txn of ordered) {
            for (const split of txn.splits) {
                if (split.getAccount() === target) {
                    items.push(split);
                }
            }
        }
        return items;
    }

    /**
     * Narrow a handle to an account of this book.
     *
     * @throws LedgerIntegrityError for handles from another book
     */
    ownAccount(account: AccountRef): BookAccount {
        if (account instanceof BookAccount && account.book === this) {
            return account;
        }
        throw new LedgerIntegrityError(`Account "${account.getFullName()}" does not belong to this ledger`);
    }

    /**
     * Records for persistence. Everything except split account assignments
     * is written back as it was read, unknown keys included.
     */
    toRecords(): LedgerFile {
        return {
            ...this.source,
            version: LEDGER_FILE_VERSION,
            accounts: [...this.accounts.values()].map(a => a.record),
            transactions: this.transactions.map(t => t.toRecord()),
        };
    }
}

function countDescendants(account: BookAccount): number {
    let count = 0;
    const stack: BookAccount[] = [...account.getChildren()];
    while (stack.length > 0) {
        const next = stack.pop();
        if (!next) break;
        count++;
        stack.push(...next.getChildren());
    }
    return count;
}
