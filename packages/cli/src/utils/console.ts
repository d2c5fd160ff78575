/**
 * Formatted console output helpers, bound to a log level.
 *
 * quiet   - errors only
 * normal  - everything except debug
 * verbose - everything
 */

import type { LogLevel } from '@ledger-fixup/shared';

export interface CliConsole {
    readonly level: LogLevel;
    log(message: string): void;
    success(message: string): void;
    warn(message: string): void;
    info(message: string): void;
    arrow(message: string): void;
    debug(message: string): void;
    error(message: string): void;
}

export function createConsole(level: LogLevel): CliConsole {
    const normal = level !== 'quiet';
    const verbose = level === 'verbose';

    return {
        level,
        log(message) {
            if (normal) console.log(message);
        },
        success(message) {
            if (normal) console.log(`✓ ${message}`);
        },
        warn(message) {
            if (normal) console.warn(`⚠️  ${message}`);
        },
        info(message) {
            if (normal) console.info(`ℹ ${message}`);
        },
        arrow(message) {
            if (normal) console.log(`→ ${message}`);
        },
        debug(message) {
            if (verbose) console.log(message);
        },
        error(message) {
            console.error(`✖ ${message}`);
        },
    };
}
