import { SemanticType } from '../types/schema';

export type Literal = string | number | boolean | null;

export type BinaryOp = '+' | '-' | '*' | '/' | '=' | 'AND' | 'OR';

export type Expr =
  | { kind: 'column'; table?: string; name: string }
  | { kind: 'literal'; value: Literal }
  | { kind: 'cast'; expr: Expr; to: SemanticType }
  | { kind: 'binary'; op: BinaryOp; left: Expr; right: Expr }
  | { kind: 'isNull'; expr: Expr; negated: boolean }
  | { kind: 'case'; whens: CaseWhen[]; otherwise?: Expr }
  | { kind: 'nullIf'; expr: Expr; value: Expr }
  | { kind: 'max'; expr: Expr }
  | { kind: 'yearOf'; expr: Expr }
  | { kind: 'dateFromYear'; year: Expr; month: number; day: number }
  | { kind: 'daysBetween'; end: Expr; start: Expr }
  | { kind: 'scalar'; query: Select };

export type CaseWhen = {
  when: Expr;
  then: Expr;
};

export type SelectItem =
  | { kind: 'expr'; expr: Expr; alias: string }
  | { kind: 'star'; table: string };

export type Source =
  | { kind: 'table'; schema: string; name: string; alias: string }
  | { kind: 'subquery'; query: Query; alias: string };

export type Join = {
  type: 'LEFT' | 'INNER';
  source: Source;
  on: Expr;
};

export type Select = {
  kind: 'select';
  items: SelectItem[];
  from?: Source;
  joins: Join[];
  where?: Expr;
  orderBy?: Expr[];
};

export type Union = {
  kind: 'union';
  all: boolean;
  selects: Select[];
};

export type Query = Select | Union;
