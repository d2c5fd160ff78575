/**
 * Ledger module: collaborator contract, in-memory book, path resolution.
 */

export { LedgerBook, BookAccount, BookTransaction, BookSplit } from './book.js';
export { BookSession } from './session.js';
export type { BookSessionOptions, PersistFn } from './session.js';
export { splitAccountPath, resolveAccountPath, resolveAccountName } from './account-resolve.js';
export type { AccountRef, LedgerTransaction, LineItem, LedgerSession } from './types.js';
