import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { quoteIdent, sqliteDialect } from '../query/render';
import { QueryRow, SqlEngine, SqlExecutor, SqlValue } from './engine';

export const IN_MEMORY = ':memory:';

type BindValue = string | number | null;

const bind = (params: SqlValue[]): BindValue[] =>
  params.map(p => (typeof p === 'boolean' ? (p ? 1 : 0) : p));

/**
 * SQLite engine with one attached database per schema. With the default
 * in-memory location every schema lives only as long as the engine.
 */
export class SqliteEngine implements SqlEngine {
  readonly dialect = sqliteDialect;
  private readonly db: Database.Database;
  private readonly attached = new Set<string>();

  constructor(private readonly directory: string = IN_MEMORY) {
    if (directory !== IN_MEMORY) fs.mkdirSync(directory, { recursive: true });
    this.db = new Database(directory === IN_MEMORY ? IN_MEMORY : path.join(directory, 'main.db'));
  }

  async query(sql: string, params: SqlValue[] = []): Promise<QueryRow[]> {
    return this.db.prepare<BindValue[], QueryRow>(sql).all(...bind(params));
  }

  async execute(sql: string, params: SqlValue[] = []): Promise<void> {
    this.db.prepare<BindValue[]>(sql).run(...bind(params));
  }

  async transaction<T>(fn: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    this.db.exec('BEGIN');
    try {
      const result = await fn(this);
      this.db.exec('COMMIT');
      return result;
    } catch (error) {
      if (this.db.inTransaction) this.db.exec('ROLLBACK');
      throw error;
    }
  }

  async ensureSchema(schema: string): Promise<void> {
    if (this.attached.has(schema)) return;
    const file = this.directory === IN_MEMORY ? IN_MEMORY : path.join(this.directory, `${schema}.db`);
    this.db.prepare<[string]>(`ATTACH DATABASE ? AS ${quoteIdent(schema)}`).run(file);
    this.attached.add(schema);
  }

  async listTables(schema: string): Promise<string[]> {
    await this.ensureSchema(schema);
    const rows = await this.query(
      `SELECT name FROM ${quoteIdent(schema)}.sqlite_master WHERE type = 'table' ORDER BY name`
    );
    return rows.map(r => String(r.name));
  }

  async tableColumns(schema: string, table: string): Promise<string[]> {
    await this.ensureSchema(schema);
    const rows = await this.query(`PRAGMA ${quoteIdent(schema)}.table_info(${quoteIdent(table)})`);
    return rows.map(r => String(r.name));
  }

  async tableExists(schema: string, table: string): Promise<boolean> {
    return (await this.listTables(schema)).includes(table);
  }

  async ping(): Promise<void> {
    this.db.prepare('SELECT 1').get();
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
