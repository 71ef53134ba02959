/**
 * ANSI Policy
 *
 * Permissive generic profile: every capability is available and every join
 * predicate may stay in its ON condition.
 */

import { acceptAllPredicates, defineDialectPolicy } from './dialect-policy';

export const ANSI_POLICY = defineDialectPolicy({
  name: 'ansi',
  supportsOuterJoin: true,
  supportsAliasedSelection: true,
  supportsMultiTableCommaFrom: true,
  predicateEligibleForOn: acceptAllPredicates,
});
