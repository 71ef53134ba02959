import './register';

export {
  HIVE_POLICY,
  HIVE_FORBIDDEN_JOIN_OPERATORS,
  isHiveJoinCondition,
} from './policy/hive-policy';

// Re-export core types
export type { DialectPolicy, QueryModel, JoinEdge, Selection, TableRef } from '@metaquery/core';
