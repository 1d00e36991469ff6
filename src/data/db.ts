/**
 * SQLite Database initialization and management
 * Uses better-sqlite3 for synchronous operations
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync, readFileSync, readdirSync } from 'fs';
import { dirname, join } from 'path';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('db');

let db: Database.Database | null = null;

export const MEMORY_DATABASE = ':memory:';

export function migrationsDir(projectRoot: string = process.cwd()): string {
  return join(projectRoot, 'src', 'data', 'migrations');
}

/**
 * Open (or return) the process-wide connection. Pass ':memory:' for tests.
 */
export function initializeDatabase(dbPath: string): Database.Database {
  if (db) {
    return db;
  }

  const inMemory = dbPath === MEMORY_DATABASE;
  if (!inMemory) {
    const dir = dirname(dbPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const isNew = inMemory || !existsSync(dbPath);
  logger.info({ dbPath, isNew }, 'Initializing database');

  const connection = new Database(dbPath);
  if (!inMemory) {
    // Enable WAL mode for better concurrency
    connection.pragma('journal_mode = WAL');
  }
  connection.pragma('foreign_keys = ON');

  runMigrations(connection);
  db = connection;
  return connection;
}

function runMigrations(database: Database.Database): void {
  const dir = migrationsDir();
  if (!existsSync(dir)) {
    throw new Error(`Migrations directory not found: ${dir}`);
  }

  const files = readdirSync(dir)
    .filter((f) => f.endsWith('.sql'))
    .sort();

  logger.debug({ migrationsDir: dir, files }, 'Running database migrations');

  for (const file of files) {
    database.exec(readFileSync(join(dir, file), 'utf-8'));
  }
}

export function getDatabase(): Database.Database {
  if (!db) {
    throw new Error('Database not initialized; call initializeDatabase first');
  }
  return db;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
    logger.debug('Database connection closed');
  }
}
