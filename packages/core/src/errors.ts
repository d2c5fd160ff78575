/**
 * Fatal error types raised by the core.
 *
 * Recoverable problems (malformed rule lines, lint findings) are returned as
 * warnings instead. "No rule matched" is a classification result, not an error.
 */

/**
 * A well-formed rule line whose pattern is not a valid regular expression.
 * `warnings` holds the format warnings for lines before it.
 */
export class RulePatternError extends Error {
    constructor(
        readonly pattern: string,
        readonly line: number,
        reason: string,
        readonly warnings: readonly string[] = []
    ) {
        super(`Invalid rule pattern on line ${line} "${pattern}": ${reason}`);
        this.name = 'RulePatternError';
    }
}

/**
 * An account path with a segment that has no matching child account.
 * `path` is always the full path that was requested.
 */
export class AccountNotFoundError extends Error {
    constructor(
        readonly path: string,
        readonly missingSegment: string
    ) {
        super(`Account path "${path}" could not be found (no account named "${missingSegment}")`);
        this.name = 'AccountNotFoundError';
    }
}

export class ImbalancePatternError extends Error {
    constructor(
        readonly pattern: string,
        reason: string
    ) {
        super(`Invalid imbalance account pattern "${pattern}": ${reason}`);
        this.name = 'ImbalancePatternError';
    }
}

/**
 * Ledger data that cannot form a valid book, or a handle from another book.
 */
export class LedgerIntegrityError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'LedgerIntegrityError';
    }
}

export class SessionClosedError extends Error {
    constructor() {
        super('Ledger session has already ended');
        this.name = 'SessionClosedError';
    }
}
