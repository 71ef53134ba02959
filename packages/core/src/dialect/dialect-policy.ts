/**
 * Dialect Policy
 *
 * Capability profile of one target SQL grammar. A single generic generator
 * reads these flags at each clause, so a new target is a new policy value
 * rather than a new generator class.
 *
 * Policies are frozen on creation and safe to share between renders.
 *
 * @example
 * ```typescript
 * const strict = defineDialectPolicy({
 *   name: 'strict',
 *   supportsOuterJoin: false,
 *   supportsAliasedSelection: true,
 *   supportsMultiTableCommaFrom: false,
 *   predicateEligibleForOn: createOperatorEligibility(['<>', '!=']),
 * });
 * ```
 */

import { DialectConfigurationError } from '../errors';

export type PredicateEligibility = (predicate: string) => boolean;

export interface DialectPolicy {
  readonly name: string;
  /** LEFT/RIGHT/FULL OUTER JOIN can be expressed */
  readonly supportsOuterJoin: boolean;
  /** `expr AS alias` is allowed in the SELECT list */
  readonly supportsAliasedSelection: boolean;
  /** `FROM a, b` is allowed; otherwise extra tables get a conditionless JOIN */
  readonly supportsMultiTableCommaFrom: boolean;
  /** Whether a join predicate may stay in the JOIN's ON condition */
  readonly predicateEligibleForOn: PredicateEligibility;
}

export function defineDialectPolicy(definition: DialectPolicy): DialectPolicy {
  if (!definition.name || definition.name.trim().length === 0) {
    throw new DialectConfigurationError('Dialect policy name must be a non-empty string');
  }

  if (typeof definition.predicateEligibleForOn !== 'function') {
    throw new DialectConfigurationError(
      `Dialect policy "${definition.name}" must provide predicateEligibleForOn`,
    );
  }

  return Object.freeze({
    name: definition.name,
    supportsOuterJoin: definition.supportsOuterJoin,
    supportsAliasedSelection: definition.supportsAliasedSelection,
    supportsMultiTableCommaFrom: definition.supportsMultiTableCommaFrom,
    predicateEligibleForOn: definition.predicateEligibleForOn,
  });
}

/**
 * Eligibility rule that rejects any predicate containing one of the given
 * operator tokens. Matching is a case-insensitive substring search.
 */
export function createOperatorEligibility(forbidden: readonly string[]): PredicateEligibility {
  const tokens = forbidden.map((token) => token.toUpperCase());
  return (predicate: string) => {
    const upper = predicate.toUpperCase();
    return !tokens.some((token) => upper.includes(token));
  };
}

export const acceptAllPredicates: PredicateEligibility = () => true;
