import { ColumnSpec, SemanticType } from '../types/schema';
import { AliasGenerator } from './aliases';
import { BinaryOp, CaseWhen, Expr, Join, Literal, Query, Select, SelectItem, Source } from './ast';

/** A query together with the metadata of the columns it yields, in output order. */
export type Relation = {
  query: Query;
  columns: ColumnSpec[];
};

export const col = (table: string | undefined, name: string): Expr => ({ kind: 'column', table, name });
export const lit = (value: Literal): Expr => ({ kind: 'literal', value });
export const cast = (expr: Expr, to: SemanticType): Expr => ({ kind: 'cast', expr, to });
export const nullOf = (type: SemanticType): Expr => cast(lit(null), type);

const binary = (op: BinaryOp) => (left: Expr, right: Expr): Expr => ({ kind: 'binary', op, left, right });
export const add = binary('+');
export const sub = binary('-');
export const mul = binary('*');
export const div = binary('/');
export const eq = binary('=');

export const and = (...exprs: Expr[]): Expr =>
  exprs.reduce((acc, expr) => ({ kind: 'binary', op: 'AND', left: acc, right: expr }));

export const product = (...exprs: Expr[]): Expr => exprs.reduce((acc, expr) => mul(acc, expr));

export const isNull = (expr: Expr): Expr => ({ kind: 'isNull', expr, negated: false });
export const isNotNull = (expr: Expr): Expr => ({ kind: 'isNull', expr, negated: true });
export const caseWhen = (whens: CaseWhen[], otherwise?: Expr): Expr => ({ kind: 'case', whens, otherwise });
export const nullIf = (expr: Expr, value: Expr): Expr => ({ kind: 'nullIf', expr, value });
export const max = (expr: Expr): Expr => ({ kind: 'max', expr });
export const yearOf = (expr: Expr): Expr => ({ kind: 'yearOf', expr });
export const dateFromYear = (year: Expr, month: number, day: number): Expr => ({ kind: 'dateFromYear', year, month, day });
export const daysBetween = (end: Expr, start: Expr): Expr => ({ kind: 'daysBetween', end, start });
export const scalar = (query: Select): Expr => ({ kind: 'scalar', query });

export const item = (expr: Expr, alias: string): SelectItem => ({ kind: 'expr', expr, alias });

export const table = (schema: string, name: string, alias: string): Source => ({ kind: 'table', schema, name, alias });
export const subquery = (query: Query, alias: string): Source => ({ kind: 'subquery', query, alias });
export const leftJoin = (source: Source, on: Expr): Join => ({ type: 'LEFT', source, on });

export const select = (parts: Partial<Omit<Select, 'kind'>> & { items: SelectItem[] }): Select => ({
  kind: 'select',
  joins: [],
  ...parts
});

/**
 * Wraps a relation as an aliased subquery so the next stage can reference its
 * columns. `ref` resolves a column name against the new alias.
 */
export const wrap = (relation: Relation, aliases: AliasGenerator, prefix = 's') => {
  const alias = aliases.next(prefix);
  return {
    alias,
    source: subquery(relation.query, alias),
    ref: (name: string) => col(alias, name)
  };
};

export const hasColumn = (columns: ColumnSpec[], name: string) => columns.some(c => c.name === name);
