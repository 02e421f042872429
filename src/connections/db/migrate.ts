import { Pool } from 'pg';
import { pool } from './connection';
import { migrations } from './migrations';
import { Migration } from './migrations/types';
import { Queryable } from './types';
import { logger } from '../../utils/logging';

const createMigrationsTable = async (db: Queryable) => {
  await db.query(`
    CREATE TABLE IF NOT EXISTS migrations (
      id SERIAL PRIMARY KEY,
      name VARCHAR(255) UNIQUE NOT NULL,
      executed_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
    )
  `);
};

const isMigrationExecuted = async (db: Queryable, name: string): Promise<boolean> => {
  const result = await db.query('SELECT id FROM migrations WHERE name = $1', [name]);
  return result.rows.length > 0;
};

// Runs one migration step and its bookkeeping in a single transaction
const runInTransaction = async (
  db: Pool,
  name: string,
  step: (client: Queryable) => Promise<void>
) => {
  const client = await db.connect();
  try {
    await client.query('BEGIN');
    await step(client);
    await client.query('COMMIT');
  } catch (error) {
    await client.query('ROLLBACK');
    logger.error(`Migration ${name} failed`, { error: error instanceof Error ? error.message : String(error) });
    throw error;
  } finally {
    client.release();
  }
};

const runMigration = async (db: Pool, name: string, migration: Migration) => {
  await runInTransaction(db, name, async (client) => {
    await migration.up(client);
    await client.query('INSERT INTO migrations (name) VALUES ($1)', [name]);
  });
  logger.info(`Migration ${name} executed successfully`);
};

const rollbackMigration = async (db: Pool, name: string, migration: Migration) => {
  await runInTransaction(db, name, async (client) => {
    await migration.down(client);
    await client.query('DELETE FROM migrations WHERE name = $1', [name]);
  });
  logger.info(`Migration ${name} rolled back successfully`);
};

// Run all pending migrations
export const migrate = async (db: Pool = pool) => {
  logger.info('Starting database migrations...');

  await createMigrationsTable(db);

  logger.info(`Found ${migrations.length} migration files`);

  for (const { name, migration } of migrations) {
    if (await isMigrationExecuted(db, name)) {
      logger.info(`Migration ${name} already executed, skipping`);
      continue;
    }

    await runMigration(db, name, migration);
  }

  logger.info('All migrations completed successfully');
};

// Rollback last migration
export const rollback = async (db: Pool = pool) => {
  logger.info('Rolling back last migration...');

  await createMigrationsTable(db);

  const result = await db.query<{ name: string }>(
    'SELECT name FROM migrations ORDER BY executed_at DESC, id DESC LIMIT 1'
  );

  if (result.rows.length === 0) {
    logger.info('No migrations to rollback');
    return;
  }

  const lastMigrationName = result.rows[0].name;
  const migrationInfo = migrations.find(m => m.name === lastMigrationName);

  if (!migrationInfo) {
    throw new Error(`Migration ${lastMigrationName} not found in migrations list`);
  }

  await rollbackMigration(db, lastMigrationName, migrationInfo.migration);
};

if (require.main === module) {
  const command = process.argv[2];
  const task = command === 'rollback' ? rollback : migrate;

  task()
    .catch((error: unknown) => {
      logger.error('Migration error', { error: error instanceof Error ? error.stack : String(error) });
      process.exitCode = 1;
    })
    .finally(() => pool.end());
}
