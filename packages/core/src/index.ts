// Errors
export {
    RulePatternError,
    AccountNotFoundError,
    ImbalancePatternError,
    LedgerIntegrityError,
    SessionClosedError,
} from './errors.js';

// Ledger
export {
    LedgerBook,
    BookAccount,
    BookTransaction,
    BookSplit,
    BookSession,
    splitAccountPath,
    resolveAccountPath,
    resolveAccountName,
} from './ledger/index.js';
export type {
    AccountRef,
    LedgerTransaction,
    LineItem,
    LedgerSession,
    BookSessionOptions,
    PersistFn,
} from './ledger/index.js';

// Rules
export { parseRules, parseRuleLine, checkRuleSet } from './rules/index.js';
export type { Rule, RuleSet, RuleLine, ParseRulesResult } from './rules/index.js';

// Categorizer
export { classify, findMatchingRule, compileImbalancePredicate } from './categorizer/index.js';
export type { Classification, ImbalancePredicate } from './categorizer/index.js';

// Fix-up
export { fixImbalances } from './fixup/index.js';
export type {
    FixupConfig,
    FixupStats,
    FixupResult,
    LineItemOutcome,
    LineItemStatus,
} from './fixup/index.js';
