/**
 * Database Connection Module
 *
 * Provides a singleton SQLite connection using better-sqlite3.
 * The database lives at ~/.studydesk/studydesk.db unless the config file or
 * the --db flag points elsewhere.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { getDefaultDbPath } from '../config/paths.js';

// Module-level singleton instance
let db: Database.Database | null = null;

// Path used by getDb(); set by configureDatabase() before first use
let activePath: string | null = null;

let exitHookRegistered = false;

/**
 * Open a database file with StudyDesk's connection settings.
 *
 * Creates the parent directory when needed. Pass ':memory:' for a
 * throwaway database (tests).
 */
export function openDatabase(path: string): Database.Database {
  const inMemory = path === ':memory:';

  if (!inMemory) {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const connection = new Database(path);

  // Enable foreign keys (OFF by default in SQLite!)
  connection.pragma('foreign_keys = ON');

  if (!inMemory) {
    connection.pragma('journal_mode = WAL');
  }

  return connection;
}

/**
 * Choose the database file for this process.
 *
 * Closes an open connection to a different file so the next getDb() call
 * opens the new one.
 */
export function configureDatabase(path: string): void {
  if (db && activePath !== path) {
    closeDb();
  }
  activePath = path;
}

/**
 * Get the singleton database instance.
 *
 * Opens the database on first call. Subsequent calls return the same instance.
 *
 * @example
 * ```ts
 * const db = getDb();
 * const users = db.prepare('SELECT id, username FROM users').all();
 * ```
 */
export function getDb(): Database.Database {
  if (db) {
    return db;
  }

  db = openDatabase(getDbPath());

  if (!exitHookRegistered) {
    exitHookRegistered = true;
    process.on('exit', () => closeDb());
  }

  return db;
}

/**
 * Make `connection` the singleton (after a restore reopened the file).
 */
export function replaceDb(connection: Database.Database): void {
  if (db && db !== connection && db.open) {
    db.close();
  }
  db = connection;
  activePath = connection.name;
}

/**
 * Close the database connection.
 *
 * Safe to call multiple times or when no connection exists.
 */
export function closeDb(): void {
  if (db) {
    if (db.open) {
      db.close();
    }
    db = null;
  }
}

/**
 * Get the database file path used by getDb().
 */
export function getDbPath(): string {
  return activePath ?? getDefaultDbPath();
}
