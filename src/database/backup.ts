/**
 * Backup and Restore
 *
 * A backup is a byte copy of the SQLite file. Restore checks a staged copy
 * of the chosen file and swaps it in with a rename, so a bad file leaves
 * the live database as it was.
 */

import Database from 'better-sqlite3';
import { closeSync, copyFileSync, existsSync, mkdirSync, openSync, readSync, renameSync, rmSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { BackupError, FileNotFoundError } from '../errors/index.js';
import { openDatabase } from './connection.js';
import { runMigrations } from './migrate.js';
import { APPLICATION_TABLES, SUPPLEMENTARY_TABLES } from './schema.js';

const SQLITE_HEADER = 'SQLite format 3\u0000';

/**
 * Suggested file name for a backup taken at `now`,
 * e.g. `studydesk_backup_20240315_142501.db`.
 */
export function defaultBackupName(now: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  const stamp =
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_` +
    `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `studydesk_backup_${stamp}.db`;
}

/**
 * Copy the live database to `destination`.
 *
 * The WAL is checkpointed first so the copied file holds every committed
 * write. Returns the absolute destination path.
 *
 * @throws BackupError for in-memory databases, a destination equal to the
 *   live file, or a failed copy
 */
export function exportDatabase(db: Database.Database, destination: string): string {
  if (db.memory) {
    throw new BackupError('An in-memory database cannot be backed up', 'Start StudyDesk with a database file');
  }

  const source = resolve(db.name);
  const target = resolve(destination);

  if (source === target) {
    throw new BackupError('The backup path is the live database file', 'Choose a different file name');
  }

  db.pragma('wal_checkpoint(TRUNCATE)');

  try {
    mkdirSync(dirname(target), { recursive: true });
    copyFileSync(source, target);
  } catch (error) {
    throw new BackupError(
      `Could not write backup: ${error instanceof Error ? error.message : String(error)}`,
      'Check that the destination folder is writable'
    );
  }

  return target;
}

function hasSqliteHeader(path: string): boolean {
  const fd = openSync(path, 'r');
  try {
    const header = Buffer.alloc(SQLITE_HEADER.length);
    const bytesRead = readSync(fd, header, 0, header.length, 0);
    return bytesRead === header.length && header.toString('latin1') === SQLITE_HEADER;
  } finally {
    closeSync(fd);
  }
}

/**
 * Check that `path` is a StudyDesk database that can be restored.
 *
 * @throws FileNotFoundError when the file does not exist
 * @throws BackupError when it is not SQLite, is corrupt, or lacks tables
 */
export function verifyBackup(path: string): void {
  if (!existsSync(path)) {
    throw new FileNotFoundError(path);
  }

  if (!hasSqliteHeader(path)) {
    throw new BackupError(`Not a StudyDesk backup: ${path}`);
  }

  let candidate: Database.Database;
  try {
    candidate = new Database(path, { readonly: true, fileMustExist: true });
  } catch (error) {
    throw new BackupError(
      `Backup cannot be opened: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  try {
    const integrity: unknown = candidate.pragma('integrity_check', { simple: true });
    if (integrity !== 'ok') {
      throw new BackupError(`Backup failed the integrity check: ${String(integrity)}`);
    }

    const tables = new Set(
      candidate
        .prepare("SELECT name FROM sqlite_master WHERE type = 'table'")
        .pluck()
        .all()
        .filter((name): name is string => typeof name === 'string')
    );

    const missing = APPLICATION_TABLES.filter((table) => !tables.has(table));
    if (missing.length > 0) {
      throw new BackupError(`Backup is missing tables: ${missing.join(', ')}`);
    }
  } catch (error) {
    if (error instanceof BackupError) throw error;
    // SQLITE_CORRUPT and friends surface while reading
    throw new BackupError(
      `Backup cannot be read: ${error instanceof Error ? error.message : String(error)}`
    );
  } finally {
    candidate.close();
  }
}

/** Column names per application table, as the current migrations create them */
function expectedColumns(): Map<string, string[]> {
  const reference = new Database(':memory:');
  try {
    runMigrations(reference);
    return columnsOf(reference);
  } finally {
    reference.close();
  }
}

function columnsOf(db: Database.Database): Map<string, string[]> {
  const columns = new Map<string, string[]>();
  for (const table of [...APPLICATION_TABLES, ...SUPPLEMENTARY_TABLES]) {
    const names = db
      .prepare('SELECT name FROM pragma_table_info(?)')
      .pluck()
      .all(table)
      .filter((name): name is string => typeof name === 'string');
    columns.set(table, names);
  }
  return columns;
}

/**
 * Migrate the staged copy and compare its columns with a fresh database.
 *
 * @throws BackupError describing the first mismatch
 */
function checkStagedCopy(path: string): void {
  const staged = new Database(path, { fileMustExist: true });
  try {
    // The live file goes back to WAL when reopened; the staged file needs no side files
    staged.pragma('journal_mode = DELETE');
    staged.pragma('foreign_keys = ON');

    const result = runMigrations(staged);
    const failed = result.failed[0];
    if (failed) {
      throw new BackupError(`Backup could not be upgraded: ${failed.name} (${failed.error})`);
    }

    const actual = columnsOf(staged);
    for (const [table, expected] of expectedColumns()) {
      const present = new Set(actual.get(table) ?? []);
      const missing = expected.filter((column) => !present.has(column));
      if (missing.length > 0) {
        throw new BackupError(`Backup table ${table} is missing columns: ${missing.join(', ')}`);
      }
    }
  } catch (error) {
    if (error instanceof BackupError) throw error;
    throw new BackupError(
      `Backup cannot be read: ${error instanceof Error ? error.message : String(error)}`
    );
  } finally {
    staged.close();
  }
}

/**
 * Replace the live database with the backup at `source`.
 *
 * The backup is copied to a staging file beside the live one, migrated and
 * checked there, then renamed over the live file. Returns a fresh
 * connection; `live` is closed and the caller must drop every reference
 * to it.
 *
 * @throws BackupError if any check or the swap fails; `live` stays open
 *   and its file is unchanged
 */
export function restoreDatabase(source: string, live: Database.Database): Database.Database {
  if (live.memory) {
    throw new BackupError('Cannot restore into an in-memory database', 'Start StudyDesk with a database file');
  }

  const target = resolve(live.name);
  if (resolve(source) === target) {
    throw new BackupError('The backup path is the live database file', 'Choose a backup file');
  }

  verifyBackup(source);

  const staging = `${target}.restore-${process.pid}`;
  try {
    copyFileSync(source, staging);
    checkStagedCopy(staging);

    // An empty WAL has nothing to replay over the renamed file
    live.pragma('wal_checkpoint(TRUNCATE)');
    renameSync(staging, target);
  } catch (error) {
    removeStaging(staging);
    if (error instanceof BackupError) throw error;
    throw new BackupError(
      `Could not restore backup: ${error instanceof Error ? error.message : String(error)}`,
      'Check that the database folder is writable'
    );
  }

  live.close();

  // Stale side files would be replayed over the restored data
  rmSync(`${target}-wal`, { force: true });
  rmSync(`${target}-shm`, { force: true });

  const restored = openDatabase(target);
  runMigrations(restored);
  return restored;
}

function removeStaging(staging: string): void {
  for (const path of [staging, `${staging}-journal`, `${staging}-wal`, `${staging}-shm`]) {
    rmSync(path, { force: true });
  }
}
