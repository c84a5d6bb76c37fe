import { ColumnSpec, SemanticType } from '../types/schema';
import { Expr, Literal, Query, Select, SelectItem, Source } from './ast';

export type QualifiedName = {
  schema: string;
  name: string;
};

export interface Dialect {
  readonly name: 'postgres' | 'sqlite';
  /** Type used inside CAST expressions. */
  castType(type: SemanticType): string;
  /** Declared column type for CREATE TABLE. */
  columnType(type: SemanticType): string;
  boolean(value: boolean): string;
  yearOf(expr: string): string;
  dateFromYear(year: string, month: number, day: number): string;
  daysBetween(end: string, start: string): string;
  placeholder(index: number): string;
  /** Statements that replace `target` with the result of `selectSql`, keyed on `primaryKey`. */
  materialize(target: QualifiedName, columns: ColumnSpec[], selectSql: string, primaryKey: readonly string[]): string[];
}

export const quoteIdent = (name: string) => `"${name.replace(/"/g, '""')}"`;
export const qualified = (target: QualifiedName) => `${quoteIdent(target.schema)}.${quoteIdent(target.name)}`;

const quoteString = (value: string) => `'${value.replace(/'/g, "''")}'`;
const quoteList = (names: readonly string[]) => names.map(quoteIdent).join(', ');

export const createTableSql = (
  dialect: Dialect,
  target: QualifiedName,
  columns: ColumnSpec[],
  primaryKey: readonly string[]
) => {
  const defs = columns.map(
    c => `${quoteIdent(c.name)} ${dialect.columnType(c.type)}${primaryKey.includes(c.name) ? ' NOT NULL' : ''}`
  );
  defs.push(`PRIMARY KEY (${quoteList(primaryKey)})`);
  return `CREATE TABLE ${qualified(target)} (${defs.join(', ')})`;
};

const POSTGRES_TYPES: Record<SemanticType, string> = {
  integer: 'INTEGER',
  boolean: 'BOOLEAN',
  date: 'DATE',
  float: 'DOUBLE PRECISION',
  string: 'TEXT'
};

export const postgresDialect: Dialect = {
  name: 'postgres',
  castType: type => POSTGRES_TYPES[type],
  columnType: type => POSTGRES_TYPES[type],
  boolean: value => (value ? 'TRUE' : 'FALSE'),
  yearOf: expr => `CAST(EXTRACT(YEAR FROM ${expr}) AS INTEGER)`,
  dateFromYear: (year, month, day) => `MAKE_DATE(CAST(${year} AS INTEGER), ${month}, ${day})`,
  daysBetween: (end, start) => `(${end} - ${start})`,
  placeholder: index => `$${index}`,
  materialize: (target, _columns, selectSql, primaryKey) => [
    `DROP TABLE IF EXISTS ${qualified(target)}`,
    `CREATE TABLE ${qualified(target)} AS ${selectSql}`,
    `ALTER TABLE ${qualified(target)} ADD PRIMARY KEY (${quoteList(primaryKey)})`
  ]
};

// SQLite keeps dates as ISO text, so date casts stay TEXT to avoid numeric affinity.
const SQLITE_CAST_TYPES: Record<SemanticType, string> = {
  integer: 'INTEGER',
  boolean: 'INTEGER',
  date: 'TEXT',
  float: 'REAL',
  string: 'TEXT'
};

const SQLITE_COLUMN_TYPES: Record<SemanticType, string> = {
  integer: 'INTEGER',
  boolean: 'BOOLEAN',
  date: 'DATE',
  float: 'REAL',
  string: 'TEXT'
};

export const sqliteDialect: Dialect = {
  name: 'sqlite',
  castType: type => SQLITE_CAST_TYPES[type],
  columnType: type => SQLITE_COLUMN_TYPES[type],
  boolean: value => (value ? '1' : '0'),
  yearOf: expr => `CAST(strftime('%Y', ${expr}) AS INTEGER)`,
  dateFromYear: (year, month, day) => `printf('%04d-%02d-%02d', ${year}, ${month}, ${day})`,
  daysBetween: (end, start) => `(julianday(${end}) - julianday(${start}))`,
  placeholder: () => '?',
  // SQLite cannot add a primary key to an existing table, so the keyed table is created first.
  materialize: (target, columns, selectSql, primaryKey) => [
    `DROP TABLE IF EXISTS ${qualified(target)}`,
    createTableSql(sqliteDialect, target, columns, primaryKey),
    `INSERT INTO ${qualified(target)} (${quoteList(columns.map(c => c.name))}) ${selectSql}`
  ]
};

const renderLiteral = (value: Literal, dialect: Dialect) => {
  if (value === null) return 'NULL';
  if (typeof value === 'boolean') return dialect.boolean(value);
  if (typeof value === 'number') return String(value);
  return quoteString(value);
};

export const renderExpr = (expr: Expr, dialect: Dialect): string => {
  const r = (e: Expr) => renderExpr(e, dialect);
  switch (expr.kind) {
    case 'column':
      return expr.table ? `${quoteIdent(expr.table)}.${quoteIdent(expr.name)}` : quoteIdent(expr.name);
    case 'literal':
      return renderLiteral(expr.value, dialect);
    case 'cast':
      return `CAST(${r(expr.expr)} AS ${dialect.castType(expr.to)})`;
    case 'binary':
      return `(${r(expr.left)} ${expr.op} ${r(expr.right)})`;
    case 'isNull':
      return `(${r(expr.expr)} IS ${expr.negated ? 'NOT NULL' : 'NULL'})`;
    case 'case': {
      const whens = expr.whens.map(w => `WHEN ${r(w.when)} THEN ${r(w.then)}`).join(' ');
      const otherwise = expr.otherwise ? ` ELSE ${r(expr.otherwise)}` : '';
      return `CASE ${whens}${otherwise} END`;
    }
    case 'nullIf':
      return `NULLIF(${r(expr.expr)}, ${r(expr.value)})`;
    case 'max':
      return `MAX(${r(expr.expr)})`;
    case 'yearOf':
      return dialect.yearOf(r(expr.expr));
    case 'dateFromYear':
      return dialect.dateFromYear(r(expr.year), expr.month, expr.day);
    case 'daysBetween':
      return dialect.daysBetween(r(expr.end), r(expr.start));
    case 'scalar':
      return `(${renderSelect(expr.query, dialect)})`;
  }
};

const renderItem = (selectItem: SelectItem, dialect: Dialect) =>
  selectItem.kind === 'star'
    ? `${quoteIdent(selectItem.table)}.*`
    : `${renderExpr(selectItem.expr, dialect)} AS ${quoteIdent(selectItem.alias)}`;

const renderSource = (source: Source, dialect: Dialect) =>
  source.kind === 'table'
    ? `${qualified(source)} AS ${quoteIdent(source.alias)}`
    : `(${renderQuery(source.query, dialect)}) AS ${quoteIdent(source.alias)}`;

export const renderSelect = (query: Select, dialect: Dialect): string => {
  const parts = [`SELECT ${query.items.map(i => renderItem(i, dialect)).join(', ')}`];
  if (query.from) parts.push(`FROM ${renderSource(query.from, dialect)}`);
  for (const join of query.joins) {
    parts.push(`${join.type} JOIN ${renderSource(join.source, dialect)} ON ${renderExpr(join.on, dialect)}`);
  }
  if (query.where) parts.push(`WHERE ${renderExpr(query.where, dialect)}`);
  if (query.orderBy?.length) parts.push(`ORDER BY ${query.orderBy.map(e => renderExpr(e, dialect)).join(', ')}`);
  return parts.join(' ');
};

export const renderQuery = (query: Query, dialect: Dialect): string =>
  query.kind === 'select'
    ? renderSelect(query, dialect)
    : query.selects.map(s => renderSelect(s, dialect)).join(query.all ? ' UNION ALL ' : ' UNION ');
