import { DEFAULT_IMBALANCE_PATTERN } from '@ledger-fixup/shared';
import { ImbalancePatternError } from '../errors.js';
import type { ImbalancePredicate } from './types.js';

/**
 * Compile the imbalance account name predicate.
 *
 * The pattern must match the whole account name, case-sensitively:
 * with the default, "Imbalance-USD" is an imbalance account but
 * "Imbalance", "imbalance-usd" and "Imbalance-USD-2019" are not.
 *
 * @param pattern - Regex source (default: DEFAULT_IMBALANCE_PATTERN)
 * @throws ImbalancePatternError for an invalid regex
 */
export function compileImbalancePredicate(pattern: string = DEFAULT_IMBALANCE_PATTERN): ImbalancePredicate {
    let regex: RegExp;
    try {
        // Patterns like "a)(b" only compile once wrapped.
        new RegExp(pattern);
        regex = new RegExp(`^(?:${pattern})$`);
    } catch (e) {
        const errorMsg = e instanceof Error ? e.message : String(e);
        throw new ImbalancePatternError(pattern, errorMsg);
    }
    return (accountName: string) => regex.test(accountName);
}
