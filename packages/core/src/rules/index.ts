/**
 * Rules module: rules-file parsing and rule-set checks.
 */

export { parseRules, parseRuleLine } from './parse.js';
export { checkRuleSet } from './validate.js';
export type { Rule, RuleSet, RuleLine, ParseRulesResult } from './types.js';
