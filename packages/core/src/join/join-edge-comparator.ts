import type { JoinEdge } from '../model/types';

function hasKey(key: string | undefined): key is string {
  return key !== undefined && key.length > 0;
}

/**
 * Orders join edges by their `orderKey`: keyed edges come first, keys
 * compare lexicographically, and unkeyed edges are equal to each other.
 * Use with a stable sort so equal edges keep their input order.
 */
export function compareJoinEdges(left: JoinEdge, right: JoinEdge): number {
  const leftKeyed = hasKey(left.orderKey);
  const rightKeyed = hasKey(right.orderKey);

  if (!leftKeyed && !rightKeyed) {
    return 0;
  }
  if (leftKeyed && !rightKeyed) {
    return -1;
  }
  if (!leftKeyed && rightKeyed) {
    return 1;
  }

  const a = left.orderKey ?? '';
  const b = right.orderKey ?? '';
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}

/**
 * Stable copy of the edges in processing order
 */
export function sortJoinEdges(edges: readonly JoinEdge[]): JoinEdge[] {
  return [...edges].sort(compareJoinEdges);
}
