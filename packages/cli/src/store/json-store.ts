/**
 * JSON ledger file store.
 *
 * The CLI owns all file I/O; the core only sees the session.
 */

import { readFile, rename, rm, writeFile } from 'node:fs/promises';
import { LedgerFileSchema } from '@ledger-fixup/shared';
import { BookSession, LedgerBook, LedgerIntegrityError } from '@ledger-fixup/core';

export class LedgerStoreError extends Error {
    constructor(
        readonly path: string,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'LedgerStoreError';
    }
}

export interface OpenLedgerOptions {
    /** Dry run: save() leaves the file untouched. */
    noChange?: boolean;
}

/**
 * Opens a ledger file as a session.
 *
 * @throws LedgerStoreError when the file cannot be read, is not valid JSON,
 *   does not match the ledger schema, or describes an inconsistent book
 */
export async function openLedgerSession(path: string, options: OpenLedgerOptions = {}): Promise<BookSession> {
    let content: string;
    try {
        content = await readFile(path, 'utf8');
    } catch (err) {
        throw new LedgerStoreError(path, `Cannot open ledger file ${path}: ${messageOf(err)}`, { cause: err });
    }

    let data: unknown;
    try {
        data = JSON.parse(content);
    } catch (err) {
        throw new LedgerStoreError(path, `Ledger file ${path} is not valid JSON: ${messageOf(err)}`, { cause: err });
    }

    const parsed = LedgerFileSchema.safeParse(data);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new LedgerStoreError(path, `Ledger file ${path} is invalid: ${issues}`);
    }

    let book: LedgerBook;
    try {
        book = LedgerBook.fromRecords(parsed.data);
    } catch (err) {
        if (err instanceof LedgerIntegrityError) {
            throw new LedgerStoreError(path, `Ledger file ${path} is inconsistent: ${err.message}`, { cause: err });
        }
        throw err;
    }

    return new BookSession(book, {
        noChange: options.noChange ?? false,
        persist: b => writeLedgerFile(path, b),
    });
}

/**
 * Writes the book to path through a temporary file and a rename, so an
 * interrupted write leaves the previous file in place.
 */
export async function writeLedgerFile(path: string, book: LedgerBook): Promise<void> {
    const tmpPath = `${path}.tmp-${process.pid}`;
    try {
        await writeFile(tmpPath, JSON.stringify(book.toRecords(), null, 2) + '\n', 'utf8');
        await rename(tmpPath, path);
    } catch (err) {
        let message = `Cannot save ledger file ${path}: ${messageOf(err)}`;
        try {
            await rm(tmpPath, { force: true });
        } catch (cleanupErr) {
            message += ` (temporary file ${tmpPath} could not be removed: ${messageOf(cleanupErr)})`;
        }
        throw new LedgerStoreError(path, message, { cause: err });
    }
}

function messageOf(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
