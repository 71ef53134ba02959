/**
 * Query Model Builder
 *
 * Fluent helper for assembling a QueryModel by hand. The builder does not
 * validate anything; the generator does that at render time.
 *
 * @example
 * ```typescript
 * const model = new QueryModelBuilder()
 *   .select('o.id')
 *   .select('c.name', 'customer')
 *   .from('orders', 'o')
 *   .from('customers', 'c')
 *   .join({ table: 'orders', alias: 'o' }, { table: 'customers', alias: 'c' }, 'o.customer_id = c.id')
 *   .where("c.country = 'NL'")
 *   .build();
 * ```
 */

import type {
  JoinEdge,
  JoinType,
  OrderTerm,
  QueryModel,
  Selection,
  SortDirection,
  TableRef,
} from './types';

export interface JoinEndpoint {
  table: string;
  alias?: string;
}

export interface JoinOptions {
  orderKey?: string;
}

export class QueryModelBuilder {
  private _distinct = false;
  private _selections: Selection[] = [];
  private _tables: TableRef[] = [];
  private _joins: JoinEdge[] = [];
  private _where: string[] = [];
  private _groupBy: string[] = [];
  private _having: string[] = [];
  private _orderBy: OrderTerm[] = [];
  private _limit?: number;

  // ============ Selection ============

  select(expression: string, alias?: string): this {
    this._selections.push(alias === undefined ? { expression } : { expression, alias });
    return this;
  }

  distinct(value = true): this {
    this._distinct = value;
    return this;
  }

  // ============ Tables and Joins ============

  from(name: string, alias?: string): this {
    this._tables.push(alias === undefined ? { name } : { name, alias });
    return this;
  }

  join(left: JoinEndpoint, right: JoinEndpoint, predicate: string, options: JoinOptions = {}): this {
    return this.addJoin('INNER', left, right, predicate, options);
  }

  leftJoin(left: JoinEndpoint, right: JoinEndpoint, predicate: string, options: JoinOptions = {}): this {
    return this.addJoin('LEFT OUTER', left, right, predicate, options);
  }

  rightJoin(left: JoinEndpoint, right: JoinEndpoint, predicate: string, options: JoinOptions = {}): this {
    return this.addJoin('RIGHT OUTER', left, right, predicate, options);
  }

  fullJoin(left: JoinEndpoint, right: JoinEndpoint, predicate: string, options: JoinOptions = {}): this {
    return this.addJoin('FULL OUTER', left, right, predicate, options);
  }

  // ============ Filtering, Grouping, Ordering ============

  where(...predicates: string[]): this {
    this._where.push(...predicates);
    return this;
  }

  groupBy(...expressions: string[]): this {
    this._groupBy.push(...expressions);
    return this;
  }

  having(...predicates: string[]): this {
    this._having.push(...predicates);
    return this;
  }

  orderBy(expression: string, direction?: SortDirection): this {
    this._orderBy.push(direction === undefined ? { expression } : { expression, direction });
    return this;
  }

  limit(count: number): this {
    this._limit = count;
    return this;
  }

  /**
   * Snapshot the builder into an immutable model
   */
  build(): QueryModel {
    const model: QueryModel = {
      distinct: this._distinct,
      selections: Object.freeze(this._selections.map((s) => Object.freeze({ ...s }))),
      tables: Object.freeze(this._tables.map((t) => Object.freeze({ ...t }))),
      joins: Object.freeze(this._joins.map((j) => Object.freeze({ ...j }))),
      ...(this._where.length > 0 && { where: Object.freeze([...this._where]) }),
      ...(this._groupBy.length > 0 && { groupBy: Object.freeze([...this._groupBy]) }),
      ...(this._having.length > 0 && { having: Object.freeze([...this._having]) }),
      ...(this._orderBy.length > 0 && {
        orderBy: Object.freeze(this._orderBy.map((o) => Object.freeze({ ...o }))),
      }),
      ...(this._limit !== undefined && { limit: this._limit }),
    };
    return Object.freeze(model);
  }

  private addJoin(
    joinType: JoinType,
    left: JoinEndpoint,
    right: JoinEndpoint,
    predicate: string,
    options: JoinOptions,
  ): this {
    this._joins.push({
      leftTable: left.table,
      ...(left.alias !== undefined && { leftAlias: left.alias }),
      rightTable: right.table,
      ...(right.alias !== undefined && { rightAlias: right.alias }),
      predicate,
      ...(options.orderKey !== undefined && { orderKey: options.orderKey }),
      joinType,
    });
    return this;
  }
}
