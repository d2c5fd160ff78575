import { ACCOUNT_PATH_SEPARATOR } from '@ledger-fixup/shared';
import { AccountNotFoundError } from '../errors.js';
import type { AccountRef } from './types.js';

/**
 * Split a colon-delimited account path into segments.
 * "Expenses:Dining" -> ["Expenses", "Dining"]
 */
export function splitAccountPath(path: string): string[] {
    return path.split(ACCOUNT_PATH_SEPARATOR);
}

/**
 * Resolve account path segments to an account, starting at root.
 *
 * Each segment must name a direct child of the previous account exactly
 * (case-sensitive, no wildcards). Zero segments resolve to root itself.
 * Nothing is cached; lookups happen once per matched rule.
 *
 * @throws AccountNotFoundError carrying the full requested path
 */
export function resolveAccountPath(root: AccountRef, segments: readonly string[]): AccountRef {
    let current = root;
    for (let i = 0; i < segments.length; i++) {
        const child = current.lookupChild(segments[i]);
        if (!child) {
            throw new AccountNotFoundError(segments.join(ACCOUNT_PATH_SEPARATOR), segments[i]);
        }
        current = child;
    }
    return current;
}

/**
 * Resolve a colon-delimited account path, e.g. "Liabilities:CreditCard".
 */
export function resolveAccountName(root: AccountRef, path: string): AccountRef {
    return resolveAccountPath(root, splitAccountPath(path));
}
