/**
 * Rules-file parsing.
 *
 * Format, one rule per line:
 *   <account-path> <whitespace> <regex-pattern>
 *   "<account path with spaces>" <whitespace> <regex-pattern>
 * Lines starting with '#' are comments; blank lines are ignored.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Malformed lines come back as warnings.
 */

import { RULE_COMMENT_PREFIX } from '@ledger-fixup/shared';
import { RulePatternError } from '../errors.js';
import type { ParseRulesResult, Rule, RuleLine } from './types.js';

const UNQUOTED_LINE = /^(\S+)\s+(.+)$/;
const AFTER_QUOTED_NAME = /^\s+(.+)$/;

/**
 * Split one trimmed, non-comment line into account and pattern text.
 *
 * @returns null when the line does not have both tokens
 */
export function parseRuleLine(line: string): RuleLine | null {
    if (line.startsWith('"')) {
        const close = line.indexOf('"', 1);
        if (close === -1) return null;

        const account = line.slice(1, close);
        const rest = line.slice(close + 1).match(AFTER_QUOTED_NAME);
        if (!account || !rest) return null;

        return { account, source: rest[1] };
    }

    const match = line.match(UNQUOTED_LINE);
    if (!match) return null;
    return { account: match[1], source: match[2] };
}

/**
 * Parse rules-file text into an ordered rule list.
 *
 * File order is preserved; it is the priority order. Duplicate rules are kept
 * (they are inert after the first).
 *
 * @param text - Full rules-file contents
 * @returns Rules plus one warning per dropped line
 * @throws RulePatternError when a well-formed line has an invalid regex; it
 *   carries the warnings collected up to that line
 */
export function parseRules(text: string): ParseRulesResult {
    const rules: Rule[] = [];
    const warnings: string[] = [];

    const lines = text.split(/\r\n|\n|\r/);
    for (let i = 0; i < lines.length; i++) {
        const lineNumber = i + 1;
        const line = lines[i].trim();
        if (line === '' || line.startsWith(RULE_COMMENT_PREFIX)) continue;

        const parsed = parseRuleLine(line);
        if (!parsed) {
            warnings.push(`Ignoring line ${lineNumber} (incorrect format): ${line}`);
            continue;
        }

        rules.push(Object.freeze({
            pattern: compilePattern(parsed.source, lineNumber, warnings),
            source: parsed.source,
            account: parsed.account,
            line: lineNumber,
        }));
    }

    return { rules, warnings };
}

function compilePattern(source: string, line: number, warnings: readonly string[]): RegExp {
    try {
        return new RegExp(source);
    } catch (e) {
        const errorMsg = e instanceof Error ? e.message : String(e);
        throw new RulePatternError(source, line, errorMsg, [...warnings]);
    }
}
