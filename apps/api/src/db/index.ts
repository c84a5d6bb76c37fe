import { AppConfig } from '../config';
import { SqlEngine } from './engine';
import { PostgresEngine } from './postgres';
import { SqliteEngine } from './sqlite';

export const createEngine = (config: AppConfig): SqlEngine => {
  if (config.db.driver === 'sqlite') return new SqliteEngine(config.db.sqliteDir);
  const { postgres } = config.db;
  return new PostgresEngine(
    postgres.connectionString
      ? { connectionString: postgres.connectionString }
      : {
          host: postgres.host,
          port: postgres.port,
          user: postgres.user,
          password: postgres.password,
          database: postgres.database
        }
  );
};
