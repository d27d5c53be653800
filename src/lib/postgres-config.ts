import type { PoolConfig } from 'pg';
import { ValidationError } from './errors.js';

/**
 * Connection settings accepted by the DAL. Everything the pool understands
 * is passed through; `schema` qualifies generated table references.
 */
export interface PostgresConfig extends PoolConfig {
  schema?: string | null;
}

export const DEFAULT_POSTGRES_CONFIG = {
  host: 'localhost',
  port: 5432,
  database: 'postgres',
  user: 'postgres',
  password: '',
  max: 20,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 2000,
  schema: 'public',
} as const satisfies PostgresConfig;

export type PostgresEnvironment = Record<string, string | undefined>;

/**
 * Build a config from libpq-style environment variables. Unset variables
 * fall back to the defaults.
 */
export function resolvePostgresConfig(env: PostgresEnvironment = process.env): PostgresConfig {
  const config: PostgresConfig = { ...DEFAULT_POSTGRES_CONFIG };

  if (env.PGHOST) config.host = env.PGHOST;
  if (env.PGDATABASE) config.database = env.PGDATABASE;
  if (env.PGUSER) config.user = env.PGUSER;
  if (env.PGPASSWORD !== undefined) config.password = env.PGPASSWORD;
  if (env.PGSCHEMA !== undefined) config.schema = env.PGSCHEMA === '' ? null : env.PGSCHEMA;

  if (env.PGPORT) {
    const port = Number(env.PGPORT);
    if (!Number.isInteger(port) || port <= 0) {
      throw new ValidationError(`PGPORT must be a positive integer, got '${env.PGPORT}'`, 'port');
    }
    config.port = port;
  }

  return config;
}

/**
 * Explicit settings over the environment over the defaults.
 */
export function mergePostgresConfig(
  overrides: PostgresConfig = {},
  env: PostgresEnvironment = process.env
): PostgresConfig {
  return {
    ...resolvePostgresConfig(env),
    ...overrides,
  };
}
