/**
 * metaquery - All-in-one package
 *
 * This package includes the core generator and every bundled dialect.
 * Users can install this single package to get everything:
 *
 * ```bash
 * npm install metaquery
 * ```
 *
 * Or install individual packages:
 *
 * ```bash
 * npm install @metaquery/core @metaquery/hive
 * ```
 */

// Re-export everything from core
export * from '@metaquery/core';

// Re-export all dialects (importing registers them)
export {
  HIVE_POLICY,
  HIVE_FORBIDDEN_JOIN_OPERATORS,
  isHiveJoinCondition,
} from '@metaquery/hive';

// Convenience default export
import { SqlGenerator } from '@metaquery/core';
export default SqlGenerator;
