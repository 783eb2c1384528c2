import { Pool } from 'pg';
import { getPostgresConfig, type PostgresConfig } from '@stratlab/utils';
import { logger } from '../logger.js';

/**
 * The slice of a pg client the repositories use. Rows come back untyped and
 * are validated by the caller.
 */
export interface PostgresQueryable {
  query(text: string, params?: unknown[]): Promise<{ rows: unknown[] }>;
}

export interface PostgresSession extends PostgresQueryable {
  release(): void;
}

export interface PostgresConnector {
  connect(): Promise<PostgresSession>;
}

let pool: Pool | null = null;

export function createPostgresPool(config: PostgresConfig): Pool {
  const created = config.connectionString
    ? new Pool({
        connectionString: config.connectionString,
        max: config.maxConnections,
        idleTimeoutMillis: 30_000,
        connectionTimeoutMillis: 10_000,
      })
    : new Pool({
        host: config.host,
        port: config.port,
        user: config.user,
        password: config.password || undefined,
        database: config.database,
        max: config.maxConnections,
        idleTimeoutMillis: 30_000,
        connectionTimeoutMillis: 10_000,
      });

  created.on('error', (error: Error) => {
    logger.error('Postgres pool error', error, {
      host: config.host,
      database: config.database,
    });
  });

  return created;
}

/**
 * Process-wide pool built from the environment on first use
 */
export function getPostgresPool(): Pool {
  if (pool) {
    return pool;
  }

  const config = getPostgresConfig();
  pool = createPostgresPool(config);

  logger.info('Postgres pool created', {
    host: config.connectionString ? '(connection string)' : config.host,
    database: config.database,
  });

  return pool;
}

/**
 * Adapt a pg Pool to the connector interface
 */
export function poolConnector(source: Pool): PostgresConnector {
  return {
    connect: async () => {
      const client = await source.connect();
      return {
        query: (text, params) => client.query(text, params),
        release: () => client.release(),
      };
    },
  };
}

export async function queryPostgres(
  connector: PostgresConnector,
  text: string,
  params?: unknown[]
): Promise<unknown[]> {
  const client = await connector.connect();
  try {
    const result = await client.query(text, params);
    return result.rows;
  } finally {
    client.release();
  }
}

/**
 * Run `handler` inside BEGIN/COMMIT on one client. Any failure rolls back and
 * is rethrown; the client is always released.
 */
export async function withPostgresTransaction<T>(
  connector: PostgresConnector,
  handler: (client: PostgresQueryable) => Promise<T>
): Promise<T> {
  const client = await connector.connect();

  try {
    await client.query('BEGIN');
    const result = await handler(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK').catch((rollbackError: unknown) => {
      logger.error('Postgres rollback failed', rollbackError);
    });
    throw error;
  } finally {
    client.release();
  }
}

export async function closePostgresPool(): Promise<void> {
  if (!pool) {
    return;
  }

  await pool.end();
  pool = null;
  logger.info('Postgres pool closed');
}
