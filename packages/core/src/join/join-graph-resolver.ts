/**
 * Join Graph Resolver
 *
 * Turns an unordered set of join edges into a single connected join chain:
 *
 * 1. Edges are sorted by `orderKey` (see compareJoinEdges).
 * 2. The left table of the first edge anchors the FROM clause.
 * 3. The remaining edges are scanned from the head. The first edge with
 *    exactly one attached endpoint is oriented attached-side-left, its other
 *    table is attached, and the scan restarts from the head. A freshly
 *    attached table therefore wins over the rest of the interrupted pass.
 * 4. A pass that attaches nothing while edges remain means the graph is
 *    disconnected from the anchor.
 *
 * Each attached predicate stays in ON when the policy allows it and is
 * deferred to WHERE otherwise.
 */

import { FEATURES } from '../constants';
import {
  DuplicateJoinPathError,
  InvalidQueryModelError,
  UnreachableJoinPathError,
  UnsupportedConstructError,
} from '../errors';
import { flipJoinType, joinTypeOf, leftRef, refKey, rightRef } from '../model/table-ref';
import { sortJoinEdges } from './join-edge-comparator';

import type { JoinPlan, JoinStep } from './types';
import type { DialectPolicy } from '../dialect/dialect-policy';
import type { JoinEdge } from '../model/types';

export function resolveJoinGraph(edges: readonly JoinEdge[], policy: DialectPolicy): JoinPlan {
  const remaining = sortJoinEdges(edges);
  const first = remaining[0];
  if (!first) {
    throw new InvalidQueryModelError('Cannot resolve a join graph without join edges', 'joins');
  }

  const anchor = leftRef(first);
  const used = new Set<string>([refKey(anchor)]);
  const steps: JoinStep[] = [];
  const deferredPredicates: string[] = [];

  while (remaining.length > 0) {
    const index = findAttachableEdge(remaining, used);
    if (index === -1) {
      const blocked = remaining[0];
      throw new UnreachableJoinPathError(refKey(leftRef(blocked)), refKey(rightRef(blocked)));
    }

    const [edge] = remaining.splice(index, 1);
    const step = attach(edge, used, policy);
    steps.push(step);
    if (step.onPredicate === undefined) {
      deferredPredicates.push(edge.predicate);
    }
  }

  return { anchor, steps, deferredPredicates };
}

/**
 * Index of the first edge with exactly one attached endpoint, or -1 when a
 * full pass finds none. Throws on an edge whose endpoints are both attached.
 */
function findAttachableEdge(remaining: readonly JoinEdge[], used: ReadonlySet<string>): number {
  for (const [index, edge] of remaining.entries()) {
    const left = refKey(leftRef(edge));
    const right = refKey(rightRef(edge));
    const leftUsed = used.has(left);
    const rightUsed = used.has(right);

    if (leftUsed && rightUsed) {
      throw new DuplicateJoinPathError(left, right);
    }
    if (leftUsed || rightUsed) {
      return index;
    }
  }
  return -1;
}

function attach(edge: JoinEdge, used: Set<string>, policy: DialectPolicy): JoinStep {
  const flipped = used.has(refKey(rightRef(edge)));
  const table = flipped ? leftRef(edge) : rightRef(edge);
  const joinType = flipped ? flipJoinType(joinTypeOf(edge)) : joinTypeOf(edge);

  used.add(refKey(table));

  if (policy.predicateEligibleForOn(edge.predicate)) {
    return { table, joinType, onPredicate: edge.predicate, edge };
  }

  // an outer join condition cannot move to WHERE without changing the result
  if (joinType !== 'INNER') {
    throw new UnsupportedConstructError(FEATURES.OUTER_JOIN_CONDITION, policy.name);
  }

  return { table, joinType, edge };
}
