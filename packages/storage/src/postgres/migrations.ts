import { readdirSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { join } from 'node:path';
import { logger } from '../logger.js';
import { withPostgresTransaction, type PostgresConnector } from './postgres-client.js';

export const MIGRATIONS_DIR = fileURLToPath(new URL('../../migrations/', import.meta.url));

export interface Migration {
  name: string;
  sql: string;
}

/**
 * SQL migrations in file-name order
 */
export function loadMigrations(dir: string = MIGRATIONS_DIR): Migration[] {
  return readdirSync(dir)
    .filter((file) => file.endsWith('.sql'))
    .sort()
    .map((name) => ({ name, sql: readFileSync(join(dir, name), 'utf8') }));
}

/**
 * Apply every migration in one transaction. Statements are idempotent.
 */
export async function runMigrations(
  connector: PostgresConnector,
  migrations: Migration[] = loadMigrations()
): Promise<string[]> {
  await withPostgresTransaction(connector, async (client) => {
    for (const migration of migrations) {
      await client.query(migration.sql);
    }
  });

  const applied = migrations.map((m) => m.name);
  logger.info('Migrations applied', { migrations: applied });
  return applied;
}
