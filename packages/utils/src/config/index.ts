/**
 * Configuration loading from environment variables
 *
 * Provides typed configuration objects for database connections and
 * runtime settings.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors.js';

export * from './yaml-config.js';

export interface PostgresConfig {
  connectionString?: string;
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  maxConnections: number;
}

const postgresEnvSchema = z.object({
  DATABASE_URL: z.string().url().optional(),
  POSTGRES_HOST: z.string().default('localhost'),
  POSTGRES_PORT: z.coerce.number().int().positive().default(5432),
  POSTGRES_USER: z.string().default('stratlab'),
  POSTGRES_PASSWORD: z.string().default(''),
  POSTGRES_DATABASE: z.string().default('stratlab'),
  POSTGRES_MAX_CONNECTIONS: z.coerce.number().int().positive().default(10),
});

/**
 * Load Postgres configuration from environment variables.
 *
 * DATABASE_URL wins over the individual POSTGRES_* settings when both are set.
 */
export function getPostgresConfig(env: NodeJS.ProcessEnv = process.env): PostgresConfig {
  const parsed = postgresEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue?.path.join('.') ?? 'POSTGRES';
    throw new ConfigurationError(`Invalid database configuration: ${issue?.message ?? 'unknown'}`, key);
  }

  const vars = parsed.data;
  return {
    connectionString: vars.DATABASE_URL,
    host: vars.POSTGRES_HOST,
    port: vars.POSTGRES_PORT,
    user: vars.POSTGRES_USER,
    password: vars.POSTGRES_PASSWORD,
    database: vars.POSTGRES_DATABASE,
    maxConnections: vars.POSTGRES_MAX_CONNECTIONS,
  };
}
