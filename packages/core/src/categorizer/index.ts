/**
 * Categorizer module: rule matching and the imbalance predicate.
 */

export { classify, findMatchingRule } from './classify.js';
export { compileImbalancePredicate } from './imbalance.js';
export type { Classification, ImbalancePredicate } from './types.js';
