import { readFileSync } from 'node:fs';
import { parse } from 'yaml';
import {
    DEFAULT_IMBALANCE_PATTERN,
    FixupConfigFileSchema,
    type FixupConfigFile,
} from '@ledger-fixup/shared';
import type { CliOptions, RunConfig } from '../types.js';

export class ConfigError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ConfigError';
    }
}

/**
 * Loads and validates a YAML config file. An empty file is an empty config.
 */
export function loadConfigFile(path: string): FixupConfigFile {
    let data: unknown;
    try {
        data = parse(readFileSync(path, 'utf-8'));
    } catch (err) {
        const errorMsg = err instanceof Error ? err.message : String(err);
        throw new ConfigError(`Cannot load config file ${path}: ${errorMsg}`, { cause: err });
    }
    if (data === null || data === undefined) {
        return {};
    }

    const result = FixupConfigFileSchema.safeParse(data);
    if (!result.success) {
        const issues = result.error.issues
            .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
            .join('; ');
        throw new ConfigError(`Invalid config file ${path}: ${issues}`);
    }
    return result.data;
}

/**
 * Merges command-line options over config file values over defaults.
 */
export function resolveRunConfig(options: CliOptions, file: FixupConfigFile = {}): RunConfig {
    let logLevel = file.log_level ?? 'normal';
    if (options.silent) {
        logLevel = 'quiet';
    } else if (options.verbose) {
        logLevel = 'verbose';
    }

    return {
        accountPath: options.accountPath,
        rulesPath: options.rulesPath,
        ledgerPath: options.ledgerPath,
        imbalancePattern: options.imbalancePattern ?? file.imbalance_pattern ?? DEFAULT_IMBALANCE_PATTERN,
        matchField: options.useMemo ? 'memo' : (file.match_field ?? 'description'),
        dryRun: options.noChange || (file.dry_run ?? false),
        logLevel,
    };
}
