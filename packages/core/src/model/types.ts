/**
 * Query Model
 *
 * Dialect-neutral description of a single SELECT query. The model is plain
 * data: it is built by the caller (usually from business metadata) and is
 * only ever read by the generator.
 *
 * @example
 * ```typescript
 * const model: QueryModel = {
 *   distinct: false,
 *   selections: [{ expression: 'o.total', alias: 'total' }],
 *   tables: [{ name: 'orders', alias: 'o' }, { name: 'customers', alias: 'c' }],
 *   joins: [
 *     {
 *       leftTable: 'orders',
 *       leftAlias: 'o',
 *       rightTable: 'customers',
 *       rightAlias: 'c',
 *       predicate: 'o.customer_id = c.id',
 *     },
 *   ],
 * };
 * ```
 */

export type JoinType = 'INNER' | 'LEFT OUTER' | 'RIGHT OUTER' | 'FULL OUTER';

export type SortDirection = 'ASC' | 'DESC';

export interface Selection {
  readonly expression: string;
  readonly alias?: string;
}

export interface TableRef {
  readonly name: string;
  readonly alias?: string;
}

/**
 * Binary join between two tables. Stored with an orientation, but the
 * resolver treats it as undirected and may flip it when attaching.
 */
export interface JoinEdge {
  readonly leftTable: string;
  readonly leftAlias?: string;
  readonly rightTable: string;
  readonly rightAlias?: string;
  readonly predicate: string;
  /** Explicit ordering hint; edges with a key are processed before edges without one */
  readonly orderKey?: string;
  /** Defaults to INNER */
  readonly joinType?: JoinType;
}

export interface OrderTerm {
  readonly expression: string;
  readonly direction?: SortDirection;
}

export interface QueryModel {
  readonly distinct: boolean;
  readonly selections: readonly Selection[];
  readonly tables: readonly TableRef[];
  readonly joins: readonly JoinEdge[];
  /** Free-standing predicates, rendered after any predicates deferred from joins */
  readonly where?: readonly string[];
  readonly groupBy?: readonly string[];
  readonly having?: readonly string[];
  readonly orderBy?: readonly OrderTerm[];
  readonly limit?: number;
}
