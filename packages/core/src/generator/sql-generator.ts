/**
 * SQL Generator
 *
 * Renders a QueryModel into SQL text for one dialect policy. Clauses are
 * assembled in order (SELECT, FROM/JOIN, WHERE, GROUP BY, HAVING, ORDER BY,
 * LIMIT) and every capability check runs before any text is returned, so a
 * failed render never yields partial SQL.
 *
 * @example
 * ```typescript
 * const generator = new SqlGenerator({ logger: consoleLogger });
 * generator.on('failed', ({ error }) => report(error));
 *
 * const sql = generator.render(model, 'hive');
 * ```
 */

import { EventEmitter } from 'eventemitter3';

import {
  compileFrom,
  compileGroupBy,
  compileHaving,
  compileLimit,
  compileOrderBy,
  compileSelect,
  compileWhere,
} from './clause-compiler';
import { resolveGeneratorOptions, resolvePolicy } from './options';
import { FEATURES } from '../constants';
import { UnsupportedConstructError } from '../errors';
import { truncateSql } from '../logging';
import { isOuterJoin } from '../model/table-ref';
import { validateQueryModel } from '../utils/validation';

import type { GeneratorOptions, ResolvedGeneratorOptions } from './options';
import type { DialectPolicy } from '../dialect/dialect-policy';
import type { QueryModel } from '../model/types';

export interface GeneratedEvent {
  policy: string;
  sql: string;
  durationMs: number;
}

export interface FailedEvent {
  policy: string;
  error: Error;
}

export interface SqlGeneratorEvents {
  generated: (event: GeneratedEvent) => void;
  failed: (event: FailedEvent) => void;
}

// ============ Capability Checks ============

function assertOuterJoinSupport(model: QueryModel, policy: DialectPolicy): void {
  if (!policy.supportsOuterJoin && model.joins.some(isOuterJoin)) {
    throw new UnsupportedConstructError(FEATURES.OUTER_JOIN, policy.name);
  }
}

function assertStrictCapabilities(model: QueryModel, policy: DialectPolicy): void {
  if (!policy.supportsAliasedSelection && model.selections.some((s) => Boolean(s.alias))) {
    throw new UnsupportedConstructError(FEATURES.ALIASED_SELECTION, policy.name);
  }

  if (
    !policy.supportsMultiTableCommaFrom &&
    model.joins.length === 0 &&
    model.tables.length > 1
  ) {
    throw new UnsupportedConstructError(FEATURES.COMMA_FROM, policy.name);
  }
}

// ============ Rendering ============

function compileQuery(
  model: QueryModel,
  policy: DialectPolicy,
  options: ResolvedGeneratorOptions,
): string {
  // checked first so the outcome does not depend on the rest of the model
  assertOuterJoinSupport(model, policy);
  validateQueryModel(model);

  if (options.strictCapabilities) {
    assertStrictCapabilities(model, policy);
  }

  const from = compileFrom(model, policy);
  const lines = [
    ...compileSelect(model, policy),
    ...from.lines,
    ...compileWhere(from.deferredPredicates, model.where),
    ...compileGroupBy(model.groupBy),
    ...compileHaving(model.having),
    ...compileOrderBy(model.orderBy),
    ...compileLimit(model.limit),
  ];

  return lines.join(options.lineSeparator);
}

/**
 * One-shot render. Logs only when a logger is passed in the options.
 */
export function renderSql(
  model: QueryModel,
  policy: DialectPolicy | string,
  options: GeneratorOptions = {},
): string {
  const resolvedPolicy = resolvePolicy(policy);
  const resolved = resolveGeneratorOptions(options);
  const sql = compileQuery(model, resolvedPolicy, resolved);
  resolved.logger.debug(`Rendered SQL for ${resolvedPolicy.name}`, truncateSql(sql));
  return sql;
}

export class SqlGenerator extends EventEmitter<SqlGeneratorEvents> {
  private readonly options: ResolvedGeneratorOptions;

  constructor(options: GeneratorOptions = {}) {
    super();
    this.options = resolveGeneratorOptions(options);
  }

  get defaultPolicy(): DialectPolicy {
    return this.options.defaultPolicy;
  }

  /**
   * Render a model with the given policy, or the default policy
   */
  render(model: QueryModel, policy?: DialectPolicy | string): string {
    const resolved = policy === undefined ? this.options.defaultPolicy : resolvePolicy(policy);
    const { logger } = this.options;
    const startTime = Date.now();

    let sql: string;
    try {
      sql = compileQuery(model, resolved, this.options);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.warn(`Render failed for dialect ${resolved.name}: ${err.message}`);
      this.emit('failed', { policy: resolved.name, error: err });
      throw err;
    }

    const durationMs = Date.now() - startTime;
    logger.debug(
      `Rendered ${model.tables.length} table(s), ${model.joins.length} join(s) for ${resolved.name} in ${durationMs}ms`,
      truncateSql(sql),
    );
    this.emit('generated', { policy: resolved.name, sql, durationMs });
    return sql;
  }
}
