import path from 'path';
import { z } from 'zod';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8080),
  DATA_DIR: z.string().min(1).optional(),
  DB_DRIVER: z.enum(['postgres', 'sqlite']).default('postgres'),
  DATABASE_URL: z.string().min(1).optional(),
  POSTGRES_HOST: z.string().default('localhost'),
  POSTGRES_PORT: z.coerce.number().int().positive().default(5432),
  POSTGRES_USER: z.string().default('postgres'),
  POSTGRES_PASSWORD: z.string().default('postgres'),
  POSTGRES_DB: z.string().default('projects'),
  SQLITE_DIR: z.string().default(':memory:'),
  REFERENCE_ANCHOR_COUNTRY: z
    .string()
    .trim()
    .regex(/^[A-Za-z]{3}$/, 'must be an ISO3 country code')
    .transform(value => value.toUpperCase())
    .default('USA'),
  WORLD_BANK_API_URL: z.string().url().default('https://api.worldbank.org/v2')
});

export type AppConfig = {
  port: number;
  dataDir: string;
  db: {
    driver: 'postgres' | 'sqlite';
    sqliteDir: string;
    postgres: {
      connectionString?: string;
      host: string;
      port: number;
      user: string;
      password: string;
      database: string;
    };
  };
  anchorCountry: string;
  worldBankUrl: string;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    dataDir: e.DATA_DIR || path.join(process.cwd(), 'data'),
    db: {
      driver: e.DB_DRIVER,
      sqliteDir: e.SQLITE_DIR,
      postgres: {
        connectionString: e.DATABASE_URL,
        host: e.POSTGRES_HOST,
        port: e.POSTGRES_PORT,
        user: e.POSTGRES_USER,
        password: e.POSTGRES_PASSWORD,
        database: e.POSTGRES_DB
      }
    },
    anchorCountry: e.REFERENCE_ANCHOR_COUNTRY,
    worldBankUrl: e.WORLD_BANK_API_URL
  };
};
