#!/usr/bin/env node
/**
 * ledger-fixup CLI entry point.
 */

import { main } from './cli.js';

main(process.argv.slice(2))
    .then((code) => {
        process.exitCode = code;
    })
    .catch((err: unknown) => {
        console.error('Unexpected error:', err instanceof Error ? err.message : String(err));
        process.exitCode = 1;
    });
