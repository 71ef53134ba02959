export type {
  JoinEdge,
  JoinType,
  OrderTerm,
  QueryModel,
  Selection,
  SortDirection,
  TableRef,
} from './types';
export {
  tableKey,
  refKey,
  leftRef,
  rightRef,
  joinTypeOf,
  isOuterJoin,
  flipJoinType,
} from './table-ref';
export { QueryModelBuilder, type JoinEndpoint, type JoinOptions } from './query-model-builder';
