import { describe, it, expect } from 'vitest';

import { QueryModelBuilder } from '../query-model-builder';
import { flipJoinType, isOuterJoin, tableKey } from '../table-ref';

describe('QueryModelBuilder', () => {
  it('should build a minimal model', () => {
    const model = new QueryModelBuilder().select('id').from('users').build();

    expect(model).toEqual({
      distinct: false,
      selections: [{ expression: 'id' }],
      tables: [{ name: 'users' }],
      joins: [],
    });
  });

  it('should record joins with their type and order key', () => {
    const model = new QueryModelBuilder()
      .select('o.id')
      .from('orders', 'o')
      .from('customers', 'c')
      .from('regions')
      .join({ table: 'orders', alias: 'o' }, { table: 'customers', alias: 'c' }, 'o.customer_id = c.id', {
        orderKey: '1',
      })
      .leftJoin({ table: 'customers', alias: 'c' }, { table: 'regions' }, 'c.region_id = regions.id')
      .build();

    expect(model.joins).toEqual([
      {
        leftTable: 'orders',
        leftAlias: 'o',
        rightTable: 'customers',
        rightAlias: 'c',
        predicate: 'o.customer_id = c.id',
        orderKey: '1',
        joinType: 'INNER',
      },
      {
        leftTable: 'customers',
        leftAlias: 'c',
        rightTable: 'regions',
        predicate: 'c.region_id = regions.id',
        joinType: 'LEFT OUTER',
      },
    ]);
  });

  it('should set right and full outer join types', () => {
    const model = new QueryModelBuilder()
      .select('a.id')
      .from('a')
      .from('b')
      .from('c')
      .rightJoin({ table: 'a' }, { table: 'b' }, 'a.id = b.id')
      .fullJoin({ table: 'b' }, { table: 'c' }, 'b.id = c.id')
      .build();

    expect(model.joins.map((j) => j.joinType)).toEqual(['RIGHT OUTER', 'FULL OUTER']);
  });

  it('should collect the pass-through clauses', () => {
    const model = new QueryModelBuilder()
      .distinct()
      .select('region')
      .select('COUNT(*)', 'total')
      .from('sales')
      .where('amount > 0', "status = 'PAID'")
      .groupBy('region')
      .having('COUNT(*) > 5')
      .orderBy('total', 'DESC')
      .orderBy('region')
      .limit(20)
      .build();

    expect(model.distinct).toBe(true);
    expect(model.selections).toEqual([{ expression: 'region' }, { expression: 'COUNT(*)', alias: 'total' }]);
    expect(model.where).toEqual(['amount > 0', "status = 'PAID'"]);
    expect(model.groupBy).toEqual(['region']);
    expect(model.having).toEqual(['COUNT(*) > 5']);
    expect(model.orderBy).toEqual([{ expression: 'total', direction: 'DESC' }, { expression: 'region' }]);
    expect(model.limit).toBe(20);
  });

  it('should return a frozen snapshot', () => {
    const builder = new QueryModelBuilder().select('id').from('users');
    const model = builder.build();

    builder.select('name');

    expect(Object.isFrozen(model)).toBe(true);
    expect(Object.isFrozen(model.selections)).toBe(true);
    expect(Object.isFrozen(model.selections[0])).toBe(true);
    expect(model.selections).toHaveLength(1);
  });
});

describe('table references', () => {
  it('should key tables by name and alias', () => {
    expect(tableKey('orders')).toBe('orders');
    expect(tableKey('orders', 'o')).toBe('orders o');
    expect(tableKey('orders', '')).toBe('orders');
  });

  it('should flip only one-sided outer joins', () => {
    expect(flipJoinType('LEFT OUTER')).toBe('RIGHT OUTER');
    expect(flipJoinType('RIGHT OUTER')).toBe('LEFT OUTER');
    expect(flipJoinType('FULL OUTER')).toBe('FULL OUTER');
    expect(flipJoinType('INNER')).toBe('INNER');
  });

  it('should treat a missing join type as inner', () => {
    expect(isOuterJoin({ leftTable: 'a', rightTable: 'b', predicate: 'a.id = b.id' })).toBe(false);
    expect(
      isOuterJoin({ leftTable: 'a', rightTable: 'b', predicate: 'a.id = b.id', joinType: 'FULL OUTER' }),
    ).toBe(true);
  });
});
