/**
 * ledger-fixup command line: argument handling and exit codes.
 */

import {
    AccountNotFoundError,
    ImbalancePatternError,
    RulePatternError,
} from '@ledger-fixup/core';
import { parseCommandLine, USAGE, UsageError, type ParsedCommandLine } from './args.js';
import { runFix } from './commands/fix.js';
import { LedgerStoreError } from './store/json-store.js';
import { createConsole } from './utils/console.js';
import { detectConfigFile } from './workspace/detect.js';
import { ConfigError, loadConfigFile, resolveRunConfig } from './workspace/config.js';
import type { RunConfig } from './types.js';

export const VERSION = '0.2.0';

/**
 * Errors that end a run with exit code 1 and a one-line message.
 */
function isFatalError(err: unknown): err is Error {
    return (
        err instanceof ConfigError ||
        err instanceof RulePatternError ||
        err instanceof ImbalancePatternError ||
        err instanceof AccountNotFoundError ||
        err instanceof LedgerStoreError
    );
}

/**
 * Runs the CLI.
 *
 * @param argv - Arguments after the script name
 * @param cwd - Directory the config file search starts from
 * @returns Process exit code: 0 on completion (including zero matches), 1 on fatal errors
 */
export async function main(argv: string[], cwd: string = process.cwd()): Promise<number> {
    let command: ParsedCommandLine;
    try {
        command = parseCommandLine(argv);
    } catch (err) {
        if (err instanceof UsageError) {
            console.error(`✖ Error: ${err.message}\n`);
            console.error(USAGE);
            return 1;
        }
        throw err;
    }

    if (command.kind === 'version') {
        console.log(VERSION);
        return 0;
    }
    if (command.kind === 'help') {
        console.log(USAGE);
        return 0;
    }

    let config: RunConfig;
    try {
        const configPath = command.options.configPath ?? detectConfigFile(cwd);
        config = resolveRunConfig(command.options, configPath ? loadConfigFile(configPath) : {});
    } catch (err) {
        if (err instanceof ConfigError) {
            console.error(`✖ Error: ${err.message}`);
            return 1;
        }
        throw err;
    }

    const out = createConsole(config.logLevel);
    try {
        await runFix(config, out);
        return 0;
    } catch (err) {
        if (isFatalError(err)) {
            out.error(`Error: ${err.message}`);
            return 1;
        }
        throw err;
    }
}
