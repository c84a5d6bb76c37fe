import { Dialect } from '../query/render';

export type SqlValue = string | number | boolean | null;

export type QueryRow = Record<string, unknown>;

export interface SqlExecutor {
  query(sql: string, params?: SqlValue[]): Promise<QueryRow[]>;
  execute(sql: string, params?: SqlValue[]): Promise<void>;
}

/**
 * The relational store the staging engine drives. Schemas group tables
 * (`raw_verified`, `stage_unverified`, `reference`, ...); DDL issued inside
 * `transaction` commits or rolls back as one unit.
 */
export interface SqlEngine extends SqlExecutor {
  readonly dialect: Dialect;
  transaction<T>(fn: (tx: SqlExecutor) => Promise<T>): Promise<T>;
  ensureSchema(schema: string): Promise<void>;
  listTables(schema: string): Promise<string[]>;
  /** Column names in ordinal order; empty when the table does not exist. */
  tableColumns(schema: string, table: string): Promise<string[]>;
  tableExists(schema: string, table: string): Promise<boolean>;
  ping(): Promise<void>;
  close(): Promise<void>;
}
