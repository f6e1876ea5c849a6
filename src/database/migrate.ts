#!/usr/bin/env node
import {
  migrateToLatest,
  migrateDown,
  getMigrationStatus,
} from './migrator.js';
import { closeDatabase } from './connection.js';
import logger from '../utils/logger.js';

async function main() {
  const command = process.argv[2];

  try {
    switch (command) {
      case 'up':
      case 'latest':
        logger.info('Running pending migrations...');
        await migrateToLatest();
        logger.info('Migrations completed successfully');
        break;

      case 'down':
        logger.info('Rolling back last migration...');
        await migrateDown();
        logger.info('Rollback completed successfully');
        break;

      case 'status':
        await getMigrationStatus();
        break;

      default:
        logger.error('Unknown migration command', {
          command,
          available: ['up', 'latest', 'down', 'status'],
        });
        process.exitCode = 1;
    }
  } catch (error) {
    logger.error('Migration failed', { error });
    process.exitCode = 1;
  } finally {
    await closeDatabase();
  }
}

void main();
