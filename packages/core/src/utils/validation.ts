import { InvalidQueryModelError } from '../errors';
import { refKey, tableKey } from '../model/table-ref';

import type { JoinEdge, QueryModel } from '../model/types';

function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim().length === 0;
}

/**
 * Structural checks on a query model. Fails on the first problem found.
 *
 * Duplicate edges between the same pair of tables are left to the join
 * resolver, which reports them with both table names.
 */
export function validateQueryModel(model: QueryModel): void {
  if (!model) {
    throw new InvalidQueryModelError('Query model is required');
  }

  if (model.tables.length === 0) {
    throw new InvalidQueryModelError('Query model must reference at least one table', 'tables');
  }

  if (model.selections.length === 0) {
    throw new InvalidQueryModelError('Query model must select at least one expression', 'selections');
  }

  model.selections.forEach((selection, index) => {
    if (isBlank(selection.expression)) {
      throw new InvalidQueryModelError(
        `Selection #${index} has an empty expression`,
        `selections[${index}].expression`,
      );
    }
  });

  const keys = validateTables(model);

  model.joins.forEach((edge, index) => validateJoinEdge(edge, index, keys));

  model.where?.forEach((predicate, index) => {
    if (isBlank(predicate)) {
      throw new InvalidQueryModelError(`WHERE predicate #${index} is empty`, `where[${index}]`);
    }
  });

  model.having?.forEach((predicate, index) => {
    if (isBlank(predicate)) {
      throw new InvalidQueryModelError(`HAVING predicate #${index} is empty`, `having[${index}]`);
    }
  });

  if (model.limit !== undefined && (!Number.isInteger(model.limit) || model.limit < 0)) {
    throw new InvalidQueryModelError('Limit must be a non-negative integer', 'limit');
  }
}

function validateTables(model: QueryModel): Set<string> {
  const keys = new Set<string>();
  const aliases = new Set<string>();

  model.tables.forEach((table, index) => {
    if (isBlank(table.name)) {
      throw new InvalidQueryModelError(`Table #${index} has an empty name`, `tables[${index}].name`);
    }

    if (table.alias !== undefined && table.alias !== '') {
      if (aliases.has(table.alias)) {
        throw new InvalidQueryModelError(
          `Table alias "${table.alias}" is used more than once`,
          `tables[${index}].alias`,
        );
      }
      aliases.add(table.alias);
    }

    const key = refKey(table);
    if (keys.has(key)) {
      throw new InvalidQueryModelError(`Table "${key}" is referenced more than once`, `tables[${index}]`);
    }
    keys.add(key);
  });

  return keys;
}

function validateJoinEdge(edge: JoinEdge, index: number, keys: Set<string>): void {
  const left = tableKey(edge.leftTable, edge.leftAlias);
  const right = tableKey(edge.rightTable, edge.rightAlias);

  if (!keys.has(left)) {
    throw new InvalidQueryModelError(
      `Join #${index} references unknown table "${left}"`,
      `joins[${index}].leftTable`,
    );
  }

  if (!keys.has(right)) {
    throw new InvalidQueryModelError(
      `Join #${index} references unknown table "${right}"`,
      `joins[${index}].rightTable`,
    );
  }

  if (left === right) {
    throw new InvalidQueryModelError(
      `Join #${index} connects table "${left}" to itself`,
      `joins[${index}]`,
    );
  }

  if (isBlank(edge.predicate)) {
    throw new InvalidQueryModelError(`Join #${index} has an empty predicate`, `joins[${index}].predicate`);
  }
}
