/**
 * Database Migration Runner
 *
 * Applies SQL migrations in order, tracking which have been applied.
 * Every statement is create-if-not-exists, so running twice is harmless.
 */

import type Database from 'better-sqlite3';
import { getDb } from './connection.js';

/**
 * Connections already migrated in this process.
 *
 * Keyed by connection so tests with their own in-memory databases are
 * tracked separately. Cleared by resetMigrationState().
 */
let migratedConnections = new WeakSet<Database.Database>();

/**
 * Result of running migrations.
 *
 * Reports failures explicitly instead of throwing.
 */
export interface MigrationResult {
  /** Names of migrations that were successfully applied */
  applied: string[];
  /** Migrations that failed with their error messages */
  failed: Array<{ name: string; error: string }>;
}

// SQL is embedded so the built CLI needs no files beside it
const MIGRATIONS: Array<{ name: string; sql: string }> = [
  {
    name: '001-initial.sql',
    sql: `
-- Migration 001: Initial Schema
-- Users, categories, tasks, study logs, quiz results, AI archive, settings

CREATE TABLE IF NOT EXISTS users (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  username TEXT NOT NULL UNIQUE,
  password_hash TEXT NOT NULL,
  created_at TEXT NOT NULL DEFAULT (datetime('now', 'localtime'))
);

CREATE TABLE IF NOT EXISTS categories (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  owner_user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
  name TEXT NOT NULL CHECK (length(trim(name)) > 0),
  created_at TEXT NOT NULL DEFAULT (datetime('now', 'localtime')),
  UNIQUE (owner_user_id, name)
);

CREATE TABLE IF NOT EXISTS tasks (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  owner_user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
  title TEXT NOT NULL CHECK (length(trim(title)) > 0),
  category_id INTEGER REFERENCES categories(id) ON DELETE SET NULL,
  due_date TEXT,
  status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN ('pending', 'completed')),
  created_at TEXT NOT NULL DEFAULT (datetime('now', 'localtime')),
  completed_at TEXT
);

CREATE INDEX IF NOT EXISTS idx_tasks_owner ON tasks(owner_user_id, status);
CREATE INDEX IF NOT EXISTS idx_tasks_category ON tasks(category_id);

-- A task may only point at a category of the same owner
CREATE TRIGGER IF NOT EXISTS trg_tasks_category_owner_insert
BEFORE INSERT ON tasks
WHEN NEW.category_id IS NOT NULL
  AND NOT EXISTS (
    SELECT 1 FROM categories WHERE id = NEW.category_id AND owner_user_id = NEW.owner_user_id
  )
BEGIN
  SELECT RAISE(ABORT, 'task category belongs to another owner');
END;

CREATE TRIGGER IF NOT EXISTS trg_tasks_category_owner_update
BEFORE UPDATE OF category_id, owner_user_id ON tasks
WHEN NEW.category_id IS NOT NULL
  AND NOT EXISTS (
    SELECT 1 FROM categories WHERE id = NEW.category_id AND owner_user_id = NEW.owner_user_id
  )
BEGIN
  SELECT RAISE(ABORT, 'task category belongs to another owner');
END;

CREATE TABLE IF NOT EXISTS study_logs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  owner_user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
  subject TEXT NOT NULL CHECK (length(trim(subject)) > 0),
  duration_minutes INTEGER NOT NULL CHECK (duration_minutes > 0),
  notes TEXT,
  logged_at TEXT NOT NULL DEFAULT (datetime('now', 'localtime'))
);

CREATE INDEX IF NOT EXISTS idx_study_logs_owner ON study_logs(owner_user_id, logged_at);

CREATE TABLE IF NOT EXISTS quiz_results (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  owner_user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
  topic TEXT NOT NULL CHECK (length(trim(topic)) > 0),
  score INTEGER NOT NULL,
  total_questions INTEGER NOT NULL,
  questions_json TEXT,                -- JSON array of answered questions
  taken_at TEXT NOT NULL DEFAULT (datetime('now', 'localtime')),
  CHECK (total_questions > 0 AND score >= 0 AND score <= total_questions)
);

CREATE INDEX IF NOT EXISTS idx_quiz_results_owner ON quiz_results(owner_user_id, taken_at);

CREATE TABLE IF NOT EXISTS ai_content (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  owner_user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
  kind TEXT NOT NULL CHECK (kind IN ('explanation', 'summary', 'questions', 'chat_snapshot')),
  title TEXT NOT NULL,
  prompt TEXT NOT NULL,
  response_text TEXT NOT NULL,
  created_at TEXT NOT NULL DEFAULT (datetime('now', 'localtime'))
);

CREATE INDEX IF NOT EXISTS idx_ai_content_owner ON ai_content(owner_user_id, kind);

CREATE TABLE IF NOT EXISTS settings (
  owner_user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
  key TEXT NOT NULL,
  value TEXT NOT NULL,
  updated_at TEXT NOT NULL DEFAULT (datetime('now', 'localtime')),
  PRIMARY KEY (owner_user_id, key)
);

-- Migrations Tracking Table
CREATE TABLE IF NOT EXISTS _migrations (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT UNIQUE NOT NULL,
  applied_at TEXT NOT NULL DEFAULT (datetime('now'))
);
    `.trim(),
  },
  {
    name: '002-add-chat-history.sql',
    sql: `
-- Migration 002: Persistent AI chat history
CREATE TABLE IF NOT EXISTS chat_messages (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  owner_user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
  role TEXT NOT NULL CHECK (role IN ('user', 'model')),
  content TEXT NOT NULL,
  created_at TEXT NOT NULL DEFAULT (datetime('now', 'localtime'))
);

CREATE INDEX IF NOT EXISTS idx_chat_messages_owner ON chat_messages(owner_user_id, id);
    `.trim(),
  },
];

/**
 * Run all pending migrations.
 *
 * Failed migrations do not stop subsequent migrations from being attempted.
 *
 * @example
 * ```ts
 * const result = runMigrations();
 * for (const { name, error } of result.failed) {
 *   ctx.error(`Migration ${name} failed: ${error}`);
 * }
 * ```
 */
export function runMigrations(db: Database.Database = getDb()): MigrationResult {
  // Fast path: this connection was already migrated
  if (migratedConnections.has(db)) {
    return { applied: [], failed: [] };
  }

  const applied: string[] = [];
  const failed: Array<{ name: string; error: string }> = [];

  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT UNIQUE NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const appliedMigrations = new Set<string>(
    db
      .prepare('SELECT name FROM _migrations')
      .pluck()
      .all()
      .filter((name): name is string => typeof name === 'string')
  );

  for (const migration of MIGRATIONS) {
    if (appliedMigrations.has(migration.name)) {
      continue;
    }

    try {
      db.transaction(() => {
        db.exec(migration.sql);
        db.prepare('INSERT INTO _migrations (name) VALUES (?)').run(migration.name);
      })();

      applied.push(migration.name);
      appliedMigrations.add(migration.name);
    } catch (error) {
      failed.push({
        name: migration.name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  // Only remember success, so a failed run is retried next time
  if (failed.length === 0) {
    migratedConnections.add(db);
  }

  return { applied, failed };
}

/**
 * Check if migrations are needed.
 */
export function hasPendingMigrations(db: Database.Database = getDb()): boolean {
  return getAppliedMigrations(db).length < MIGRATIONS.length;
}

/**
 * Get list of applied migrations, oldest first.
 */
export function getAppliedMigrations(
  db: Database.Database = getDb()
): Array<{ name: string; applied_at: string }> {
  const tableExists = db
    .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='_migrations'")
    .get();

  if (!tableExists) {
    return [];
  }

  return db
    .prepare('SELECT name, applied_at FROM _migrations ORDER BY id')
    .all()
    .flatMap((row) => {
      if (
        typeof row === 'object' &&
        row !== null &&
        'name' in row &&
        'applied_at' in row &&
        typeof row.name === 'string' &&
        typeof row.applied_at === 'string'
      ) {
        return [{ name: row.name, applied_at: row.applied_at }];
      }
      return [];
    });
}

/**
 * Forget which connections were migrated (tests).
 */
export function resetMigrationState(): void {
  migratedConnections = new WeakSet<Database.Database>();
}

/**
 * Get count of available migrations.
 */
export function getMigrationCount(): number {
  return MIGRATIONS.length;
}
