export {
  SqlGenerator,
  renderSql,
  type GeneratedEvent,
  type FailedEvent,
  type SqlGeneratorEvents,
} from './sql-generator';
export {
  compileSelect,
  compileFrom,
  compileWhere,
  compileGroupBy,
  compileHaving,
  compileOrderBy,
  compileLimit,
  type FromClause,
} from './clause-compiler';
export {
  resolveGeneratorOptions,
  resolvePolicy,
  type GeneratorOptions,
  type ResolvedGeneratorOptions,
} from './options';
