/**
 * Clause Compiler
 *
 * Builds the lines of each SELECT clause. Every function returns the lines
 * of one clause (or none) and never touches the model.
 */

import { RENDER_DEFAULTS } from '../constants';
import { UnreachableJoinPathError } from '../errors';
import { resolveJoinGraph } from '../join/join-graph-resolver';
import { refKey } from '../model/table-ref';

import type { DialectPolicy } from '../dialect/dialect-policy';
import type { JoinPlan, JoinStep } from '../join/types';
import type { OrderTerm, QueryModel, Selection, TableRef } from '../model/types';

const { INDENT, CONTINUATION, AND_PREFIX } = RENDER_DEFAULTS;

/**
 * Lines of the FROM clause plus the join predicates that must go to WHERE
 */
export interface FromClause {
  lines: string[];
  deferredPredicates: readonly string[];
}

// ============ Shared Layout ============

function listBlock(keyword: string, items: readonly string[]): string[] {
  if (items.length === 0) {
    return [];
  }
  return [keyword, ...items.map((item, index) => `${index === 0 ? INDENT : CONTINUATION}${item}`)];
}

function predicateBlock(keyword: string, predicates: readonly string[]): string[] {
  if (predicates.length === 0) {
    return [];
  }
  return [
    keyword,
    ...predicates.map((predicate, index) => `${index === 0 ? INDENT : AND_PREFIX}( ${predicate} )`),
  ];
}

// ============ SELECT ============

function renderSelection(selection: Selection, policy: DialectPolicy): string {
  if (selection.alias && policy.supportsAliasedSelection) {
    return `${selection.expression} AS ${selection.alias}`;
  }
  return selection.expression;
}

export function compileSelect(model: QueryModel, policy: DialectPolicy): string[] {
  const keyword = model.distinct ? 'SELECT DISTINCT' : 'SELECT';
  return listBlock(
    keyword,
    model.selections.map((selection) => renderSelection(selection, policy)),
  );
}

// ============ FROM / JOIN ============

function renderJoinStep(step: JoinStep): string {
  const kind = step.joinType === 'INNER' ? 'JOIN' : `${step.joinType} JOIN`;
  const on = step.onPredicate === undefined ? '' : ` ON ( ${step.onPredicate} )`;
  return `${INDENT}${kind} ${refKey(step.table)}${on}`;
}

function compileTableList(tables: readonly TableRef[], policy: DialectPolicy): string[] {
  const [first, ...rest] = tables;
  const lines = [`${INDENT}${refKey(first)}`];

  for (const table of rest) {
    lines.push(
      policy.supportsMultiTableCommaFrom
        ? `${CONTINUATION}${refKey(table)}`
        : `${INDENT}JOIN ${refKey(table)}`,
    );
  }
  return lines;
}

/**
 * Every model table must be part of the resolved chain; a table no edge
 * touches is a component of its own.
 */
function assertAllTablesJoined(tables: readonly TableRef[], plan: JoinPlan): void {
  const joined = new Set([refKey(plan.anchor), ...plan.steps.map((step) => refKey(step.table))]);
  const isolated = tables.find((table) => !joined.has(refKey(table)));
  if (isolated) {
    throw new UnreachableJoinPathError(refKey(plan.anchor), refKey(isolated));
  }
}

export function compileFrom(model: QueryModel, policy: DialectPolicy): FromClause {
  if (model.joins.length === 0) {
    return {
      lines: ['FROM', ...compileTableList(model.tables, policy)],
      deferredPredicates: [],
    };
  }

  const plan = resolveJoinGraph(model.joins, policy);
  assertAllTablesJoined(model.tables, plan);

  return {
    lines: ['FROM', `${INDENT}${refKey(plan.anchor)}`, ...plan.steps.map(renderJoinStep)],
    deferredPredicates: plan.deferredPredicates,
  };
}

// ============ WHERE / GROUP BY / HAVING / ORDER BY / LIMIT ============

export function compileWhere(
  deferredPredicates: readonly string[],
  where: readonly string[] = [],
): string[] {
  return predicateBlock('WHERE', [...deferredPredicates, ...where]);
}

export function compileGroupBy(groupBy: readonly string[] = []): string[] {
  return listBlock('GROUP BY', groupBy);
}

export function compileHaving(having: readonly string[] = []): string[] {
  return predicateBlock('HAVING', having);
}

function renderOrderTerm(term: OrderTerm): string {
  return term.direction ? `${term.expression} ${term.direction}` : term.expression;
}

export function compileOrderBy(orderBy: readonly OrderTerm[] = []): string[] {
  return listBlock('ORDER BY', orderBy.map(renderOrderTerm));
}

export function compileLimit(limit?: number): string[] {
  return limit === undefined ? [] : [`LIMIT ${limit}`];
}
