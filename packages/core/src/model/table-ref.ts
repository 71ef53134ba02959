import type { JoinEdge, JoinType, TableRef } from './types';

/**
 * Identity of a table reference: `name`, or `name alias` when aliased.
 * The same string is what the FROM clause prints for the table.
 */
export function tableKey(name: string, alias?: string): string {
  return alias ? `${name} ${alias}` : name;
}

export function refKey(ref: TableRef): string {
  return tableKey(ref.name, ref.alias);
}

export function leftRef(edge: JoinEdge): TableRef {
  return edge.leftAlias ? { name: edge.leftTable, alias: edge.leftAlias } : { name: edge.leftTable };
}

export function rightRef(edge: JoinEdge): TableRef {
  return edge.rightAlias
    ? { name: edge.rightTable, alias: edge.rightAlias }
    : { name: edge.rightTable };
}

export function joinTypeOf(edge: JoinEdge): JoinType {
  return edge.joinType ?? 'INNER';
}

export function isOuterJoin(edge: JoinEdge): boolean {
  return joinTypeOf(edge) !== 'INNER';
}

/**
 * Join type seen from the other side of the edge
 */
export function flipJoinType(type: JoinType): JoinType {
  switch (type) {
    case 'LEFT OUTER': {
      return 'RIGHT OUTER';
    }
    case 'RIGHT OUTER': {
      return 'LEFT OUTER';
    }
    default: {
      return type;
    }
  }
}
