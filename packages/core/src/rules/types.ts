/**
 * Internal types for the rules module.
 */

/**
 * One categorization rule. Immutable once parsed.
 */
export interface Rule {
    /** Compiled, case-sensitive, unanchored pattern. */
    readonly pattern: RegExp;
    /** Pattern text as written in the rules file. */
    readonly source: string;
    /** Target account path, e.g. "Expenses:Dining". */
    readonly account: string;
    /** 1-based line number in the rules file. */
    readonly line: number;
}

/**
 * Rules in priority order: earlier rules win.
 */
export type RuleSet = readonly Rule[];

export interface ParseRulesResult {
    rules: Rule[];
    warnings: string[];
}

/**
 * A rule line split into its two tokens, before the pattern is compiled.
 */
export interface RuleLine {
    account: string;
    source: string;
}
