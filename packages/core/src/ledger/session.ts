/**
 * Ledger session over an in-memory book.
 */

import { SessionClosedError } from '../errors.js';
import type { LedgerBook, BookAccount, BookSplit } from './book.js';
import type { AccountRef, LedgerSession } from './types.js';

/**
 * Writes the book's current state somewhere durable.
 */
export type PersistFn = (book: LedgerBook) => Promise<void>;

export interface BookSessionOptions {
    /** Dry run: save() persists nothing. */
    noChange?: boolean;
    persist?: PersistFn;
}

export class BookSession implements LedgerSession {
    readonly noChange: boolean;
    private readonly persist?: PersistFn;
    private ended = false;

    constructor(
        private readonly book: LedgerBook,
        options: BookSessionOptions = {}
    ) {
        this.noChange = options.noChange ?? false;
        this.persist = options.persist;
    }

    getBook(): LedgerBook {
        this.assertOpen();
        return this.book;
    }

    getRootAccount(): BookAccount {
        this.assertOpen();
        return this.book.getRootAccount();
    }

    getLineItems(account: AccountRef): readonly BookSplit[] {
        this.assertOpen();
        return this.book.getLineItems(account);
    }

    async save(): Promise<void> {
        this.assertOpen();
        if (this.noChange || !this.persist) return;
        await this.persist(this.book);
    }

    /**
     * End the session. Unsaved changes are discarded. Safe to call twice.
     */
    async end(): Promise<void> {
        this.ended = true;
    }

    isEnded(): boolean {
        return this.ended;
    }

    private assertOpen(): void {
        if (this.ended) {
            throw new SessionClosedError();
        }
    }
}
