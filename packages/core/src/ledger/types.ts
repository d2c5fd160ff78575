/**
 * Ledger collaborator contract.
 *
 * The core only traverses accounts and moves line-items between them.
 * It never creates or destroys accounts, and never reads amounts.
 */

/**
 * Handle to one node of the account hierarchy.
 */
export interface AccountRef {
    getName(): string;
    /** Colon-joined path from below the root, e.g. "Expenses:Dining". */
    getFullName(): string;
    /** Direct child by exact (case-sensitive) name. */
    lookupChild(name: string): AccountRef | null;
    getChildren(): readonly AccountRef[];
}

export interface LedgerTransaction {
    getDescription(): string;
    /** Empty string when the transaction carries no memo. */
    getMemo(): string;
    /** ISO date (YYYY-MM-DD). */
    getDate(): string;
    getLineItems(): readonly LineItem[];
}

/**
 * One leg (split) of a transaction.
 */
export interface LineItem {
    getTransaction(): LedgerTransaction;
    getAccount(): AccountRef;
    setAccount(account: AccountRef): void;
}

/**
 * An open ledger. Owned exclusively by one run; not reentrant.
 *
 * Transactions returned through line-items keep their identity for the
 * lifetime of the session, so they can be used as Set/Map keys.
 */
export interface LedgerSession {
    /** When set, save() persists nothing. */
    readonly noChange: boolean;
    getRootAccount(): AccountRef;
    /** Line-items currently assigned to the account, in ledger order. */
    getLineItems(account: AccountRef): readonly LineItem[];
    save(): Promise<void>;
    end(): Promise<void>;
}
