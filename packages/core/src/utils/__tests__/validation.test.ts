import { describe, it, expect } from 'vitest';

import { catchError } from '../../__tests__/helpers';
import { InvalidQueryModelError } from '../../errors';
import { validateQueryModel } from '../validation';

import type { QueryModel } from '../../model/types';

function baseModel(overrides: Partial<QueryModel> = {}): QueryModel {
  return {
    distinct: false,
    selections: [{ expression: 'o.id' }],
    tables: [
      { name: 'orders', alias: 'o' },
      { name: 'customers', alias: 'c' },
    ],
    joins: [
      {
        leftTable: 'orders',
        leftAlias: 'o',
        rightTable: 'customers',
        rightAlias: 'c',
        predicate: 'o.customer_id = c.id',
      },
    ],
    ...overrides,
  };
}

function fieldOf(model: QueryModel): string | undefined {
  return catchError(() => validateQueryModel(model), InvalidQueryModelError).field;
}

describe('validateQueryModel', () => {
  it('should accept a well-formed model', () => {
    expect(() => validateQueryModel(baseModel())).not.toThrow();
  });

  it('should accept a single table without joins', () => {
    expect(() =>
      validateQueryModel(baseModel({ tables: [{ name: 'orders' }], joins: [] })),
    ).not.toThrow();
  });

  it('should require at least one table', () => {
    expect(fieldOf(baseModel({ tables: [], joins: [] }))).toBe('tables');
  });

  it('should require at least one selection', () => {
    expect(fieldOf(baseModel({ selections: [] }))).toBe('selections');
  });

  it('should reject blank selection expressions', () => {
    expect(fieldOf(baseModel({ selections: [{ expression: 'o.id' }, { expression: ' ' }] }))).toBe(
      'selections[1].expression',
    );
  });

  it('should reject blank table names', () => {
    expect(fieldOf(baseModel({ tables: [{ name: '' }], joins: [] }))).toBe('tables[0].name');
  });

  it('should reject duplicate table aliases', () => {
    const model = baseModel({
      tables: [
        { name: 'orders', alias: 'x' },
        { name: 'customers', alias: 'x' },
      ],
      joins: [],
    });

    const error = catchError(() => validateQueryModel(model), InvalidQueryModelError);

    expect(error.field).toBe('tables[1].alias');
    expect(error.message).toBe('Table alias "x" is used more than once');
  });

  it('should reject the same unaliased table twice', () => {
    expect(fieldOf(baseModel({ tables: [{ name: 'orders' }, { name: 'orders' }], joins: [] }))).toBe(
      'tables[1]',
    );
  });

  it('should allow the same table under different aliases', () => {
    const model = baseModel({
      tables: [
        { name: 'employees', alias: 'e' },
        { name: 'employees', alias: 'm' },
      ],
      joins: [
        {
          leftTable: 'employees',
          leftAlias: 'e',
          rightTable: 'employees',
          rightAlias: 'm',
          predicate: 'e.manager_id = m.id',
        },
      ],
    });

    expect(() => validateQueryModel(model)).not.toThrow();
  });

  it('should reject joins to unknown tables', () => {
    const model = baseModel({
      joins: [
        { leftTable: 'orders', leftAlias: 'o', rightTable: 'payments', predicate: 'o.id = payments.order_id' },
      ],
    });

    const error = catchError(() => validateQueryModel(model), InvalidQueryModelError);

    expect(error.field).toBe('joins[0].rightTable');
    expect(error.message).toBe('Join #0 references unknown table "payments"');
  });

  it('should match join endpoints on alias as well as name', () => {
    const model = baseModel({
      joins: [
        { leftTable: 'orders', rightTable: 'customers', rightAlias: 'c', predicate: 'orders.customer_id = c.id' },
      ],
    });

    expect(fieldOf(model)).toBe('joins[0].leftTable');
  });

  it('should reject a join from a table to itself', () => {
    const model = baseModel({
      joins: [
        { leftTable: 'orders', leftAlias: 'o', rightTable: 'orders', rightAlias: 'o', predicate: 'o.a = o.b' },
      ],
    });

    expect(fieldOf(model)).toBe('joins[0]');
  });

  it('should reject empty join predicates', () => {
    const model = baseModel({
      joins: [{ leftTable: 'orders', leftAlias: 'o', rightTable: 'customers', rightAlias: 'c', predicate: '' }],
    });

    expect(fieldOf(model)).toBe('joins[0].predicate');
  });

  it('should reject empty WHERE and HAVING predicates', () => {
    expect(fieldOf(baseModel({ where: ['o.total > 0', ''] }))).toBe('where[1]');
    expect(fieldOf(baseModel({ having: [' '] }))).toBe('having[0]');
  });

  it('should reject negative or fractional limits', () => {
    expect(fieldOf(baseModel({ limit: -1 }))).toBe('limit');
    expect(fieldOf(baseModel({ limit: 2.5 }))).toBe('limit');
    expect(() => validateQueryModel(baseModel({ limit: 0 }))).not.toThrow();
  });

  it('should leave duplicate join edges to the resolver', () => {
    const [join] = baseModel().joins;

    expect(() => validateQueryModel(baseModel({ joins: [join, join] }))).not.toThrow();
  });
});
