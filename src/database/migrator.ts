import { Migrator, FileMigrationProvider, type MigrationResult } from 'kysely';
import { promises as fs } from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { db } from './index.js';
import logger from '../utils/logger.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Create migrator instance
export const migrator = new Migrator({
  db,
  provider: new FileMigrationProvider({
    fs,
    path,
    migrationFolder: path.join(__dirname, 'migrations'),
  }),
});

function logResults(results: MigrationResult[] | undefined, verb: string) {
  results?.forEach((it) => {
    if (it.status === 'Success') {
      logger.info(`Migration ${verb}`, { migration: it.migrationName });
    } else if (it.status === 'Error') {
      logger.error(`Migration failed to be ${verb}`, {
        migration: it.migrationName,
      });
    }
  });
}

/**
 * Run all pending migrations
 */
export async function migrateToLatest(): Promise<void> {
  const { error, results } = await migrator.migrateToLatest();

  logResults(results, 'executed');

  if (error) {
    logger.error('Failed to migrate', { error });
    throw error;
  }
}

/**
 * Rollback the last migration
 */
export async function migrateDown(): Promise<void> {
  const { error, results } = await migrator.migrateDown();

  logResults(results, 'rolled back');

  if (error) {
    logger.error('Failed to rollback migration', { error });
    throw error;
  }
}

/**
 * Get list of executed and pending migrations
 */
export async function getMigrationStatus() {
  const migrations = await migrator.getMigrations();

  for (const migration of migrations) {
    logger.info('Migration status', {
      migration: migration.name,
      status: migration.executedAt ? 'Executed' : 'Pending',
      executedAt: migration.executedAt?.toISOString(),
    });
  }

  return migrations;
}
