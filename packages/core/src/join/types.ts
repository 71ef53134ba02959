import type { JoinEdge, JoinType, TableRef } from '../model/types';

export interface JoinStep {
  /** Table newly attached by this step */
  readonly table: TableRef;
  /** Join type oriented from the already attached side */
  readonly joinType: JoinType;
  /** Inline ON condition; absent when the predicate was deferred to WHERE */
  readonly onPredicate?: string;
  /** Edge the step was derived from */
  readonly edge: JoinEdge;
}

/**
 * Ordered join chain produced by the resolver. Lives for one render only.
 */
export interface JoinPlan {
  readonly anchor: TableRef;
  readonly steps: readonly JoinStep[];
  /** Predicates the dialect cannot put in ON, verbatim and in attach order */
  readonly deferredPredicates: readonly string[];
}
