/**
 * Command-line parsing.
 */

import { parseArgs } from 'node:util';
import type { CliOptions } from './types.js';

export const USAGE = `Usage: ledger-fixup [options] <account-to-fix> <rules-file> <ledger-file>

Re-categorize imported transactions sitting in an imbalance account.

Arguments:
  account-to-fix             Full path of account to fix, e.g. Liabilities:CreditCard
  rules-file                 Rules file ("<account-path> <regex>" per line)
  ledger-file                Ledger file to modify

Options:
  -i, --imbalance-ac <regex> Imbalance account name pattern (default: Imbalance-[A-Z]{3})
  -m, --use-memo             Match rules against the memo instead of the description
  -n, --nochange             Do not save changes to the ledger file
  -s, --silent               Suppress normal output (except errors)
      --verbose              Also show which rule matched each line-item
  -c, --config <file>        Config file (default: nearest .ledger-fixup.yaml)
  -v, --version              Display version and exit
  -h, --help                 Display this help and exit`;

export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

export type ParsedCommandLine =
    | { kind: 'run'; options: CliOptions }
    | { kind: 'version' }
    | { kind: 'help' };

/**
 * @param argv - Arguments after the executable and script, e.g. process.argv.slice(2)
 * @throws UsageError for unknown options, missing values or a wrong argument count
 */
export function parseCommandLine(argv: string[]): ParsedCommandLine {
    const { values, positionals } = readArgs(argv);

    if (values.help) return { kind: 'help' };
    if (values.version) return { kind: 'version' };

    if (values.silent && values.verbose) {
        throw new UsageError('--silent and --verbose cannot be used together');
    }
    if (positionals.length !== 3) {
        throw new UsageError(
            `Expected 3 arguments (account-to-fix, rules-file, ledger-file), got ${positionals.length}`
        );
    }

    const [accountPath, rulesPath, ledgerPath] = positionals;
    return {
        kind: 'run',
        options: {
            accountPath,
            rulesPath,
            ledgerPath,
            imbalancePattern: values['imbalance-ac'],
            useMemo: values['use-memo'] ?? false,
            noChange: values.nochange ?? false,
            silent: values.silent ?? false,
            verbose: values.verbose ?? false,
            configPath: values.config,
        },
    };
}

function readArgs(argv: string[]) {
    try {
        return parseArgs({
            args: argv,
            allowPositionals: true,
            strict: true,
            options: {
                'imbalance-ac': { type: 'string', short: 'i' },
                'use-memo': { type: 'boolean', short: 'm' },
                nochange: { type: 'boolean', short: 'n' },
                silent: { type: 'boolean', short: 's' },
                verbose: { type: 'boolean' },
                config: { type: 'string', short: 'c' },
                version: { type: 'boolean', short: 'v' },
                help: { type: 'boolean', short: 'h' },
            },
        });
    } catch (err) {
        throw new UsageError(err instanceof Error ? err.message : String(err));
    }
}
