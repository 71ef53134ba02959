/**
 * Hive Policy
 *
 * Restrictive profile for Apache Hive's SELECT grammar:
 * - No outer joins
 * - No column aliases in the SELECT list
 * - One table reference in FROM; further tables need an explicit JOIN
 * - Only equality join conditions inside ON; everything else goes to WHERE
 */

import { createOperatorEligibility, defineDialectPolicy } from '@metaquery/core';

/** Operators Hive does not accept inside a JOIN ... ON condition */
export const HIVE_FORBIDDEN_JOIN_OPERATORS = ['!=', '>', '<', 'IS NULL', 'IS NOT NULL'] as const;

export const isHiveJoinCondition = createOperatorEligibility(HIVE_FORBIDDEN_JOIN_OPERATORS);

export const HIVE_POLICY = defineDialectPolicy({
  name: 'hive',
  supportsOuterJoin: false,
  supportsAliasedSelection: false,
  supportsMultiTableCommaFrom: false,
  predicateEligibleForOn: isHiveJoinCondition,
});
