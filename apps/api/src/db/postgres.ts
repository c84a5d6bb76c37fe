import pg from 'pg';
import { postgresDialect, quoteIdent } from '../query/render';
import { QueryRow, SqlEngine, SqlExecutor, SqlValue } from './engine';

const DATE_OID = 1082;

// Keep DATE columns as YYYY-MM-DD strings instead of local-time Date objects.
pg.types.setTypeParser(DATE_OID, (value: string) => value);

const executorFor = (client: pg.PoolClient): SqlExecutor => ({
  query: async (sql, params = []) => (await client.query<QueryRow>(sql, params)).rows,
  execute: async (sql, params = []) => {
    await client.query(sql, params);
  }
});

export class PostgresEngine implements SqlEngine {
  readonly dialect = postgresDialect;
  private readonly pool: pg.Pool;

  constructor(config: pg.PoolConfig) {
    this.pool = new pg.Pool({ max: 4, ...config });
  }

  async query(sql: string, params: SqlValue[] = []): Promise<QueryRow[]> {
    const result = await this.pool.query<QueryRow>(sql, params);
    return result.rows;
  }

  async execute(sql: string, params: SqlValue[] = []): Promise<void> {
    await this.pool.query(sql, params);
  }

  async transaction<T>(fn: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('begin');
      const result = await fn(executorFor(client));
      await client.query('commit');
      return result;
    } catch (error) {
      await client.query('rollback');
      throw error;
    } finally {
      client.release();
    }
  }

  async ensureSchema(schema: string): Promise<void> {
    await this.pool.query(`CREATE SCHEMA IF NOT EXISTS ${quoteIdent(schema)}`);
  }

  async listTables(schema: string): Promise<string[]> {
    const rows = await this.query(
      `SELECT table_name FROM information_schema.tables
       WHERE table_schema = $1 AND table_type = 'BASE TABLE'
       ORDER BY table_name`,
      [schema]
    );
    return rows.map(r => String(r.table_name));
  }

  async tableColumns(schema: string, table: string): Promise<string[]> {
    const rows = await this.query(
      `SELECT column_name FROM information_schema.columns
       WHERE table_schema = $1 AND table_name = $2
       ORDER BY ordinal_position`,
      [schema, table]
    );
    return rows.map(r => String(r.column_name));
  }

  async tableExists(schema: string, table: string): Promise<boolean> {
    return (await this.listTables(schema)).includes(table);
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
