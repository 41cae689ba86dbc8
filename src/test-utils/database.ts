/**
 * Test databases: in-memory or temp-dir SQLite files built with the real
 * migrations.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type Database from 'better-sqlite3';
import { openDatabase } from '../database/connection.js';
import { runMigrations } from '../database/migrate.js';
import { insertDefaultCategories } from '../repository/categories.js';
import { createRepository, type DomainRepository } from '../repository/index.js';
import type { Clock } from '../utils/dates.js';

/** Local wall-clock time used by most tests: Friday 2024-03-15 10:00 */
export const FIXED_NOW = new Date(2024, 2, 15, 10, 0, 0);

/** A clock that can be moved by tests */
export function fixedClock(start: Date = FIXED_NOW): Clock & { set(date: Date): void } {
  let current = start;
  return Object.assign(() => current, {
    set(date: Date) {
      current = date;
    },
  });
}

function migrate(db: Database.Database): Database.Database {
  const result = runMigrations(db);
  const failure = result.failed[0];
  if (failure) {
    throw new Error(`Test migration ${failure.name} failed: ${failure.error}`);
  }
  return db;
}

export function createTestDb(): Database.Database {
  return migrate(openDatabase(':memory:'));
}

/**
 * Migrated database file at `<dir>/<name>`.
 */
export function createFileDb(dir: string, name = 'studydesk.db'): Database.Database {
  return migrate(openDatabase(path.join(dir, name)));
}

export function makeTempDir(prefix = 'studydesk-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Insert a user row directly (no bcrypt) with the starter categories.
 * Returns the new user's id.
 */
export function seedUser(db: Database.Database, username = 'ada', createdAt = '2024-03-01 09:00:00'): number {
  const result = db
    .prepare('INSERT INTO users (username, password_hash, created_at) VALUES (?, ?, ?)')
    .run(username, 'not-a-real-hash', createdAt);
  const id = Number(result.lastInsertRowid);
  insertDefaultCategories(db, id, createdAt);
  return id;
}

/**
 * Seeded user plus their repository on the fixed clock.
 */
export function seedRepository(
  db: Database.Database,
  username = 'ada',
  clock: Clock = fixedClock()
): DomainRepository {
  return createRepository(db, seedUser(db, username), { clock });
}
