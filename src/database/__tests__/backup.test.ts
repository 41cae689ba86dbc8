import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type Database from 'better-sqlite3';
import { existsSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { defaultBackupName, exportDatabase, verifyBackup, restoreDatabase } from '../backup.js';
import { openDatabase } from '../connection.js';
import { BackupError, FileNotFoundError } from '../../errors/index.js';
import { createFileDb, createTestDb, makeTempDir, removeDir, seedUser } from '../../test-utils/index.js';

function usernames(db: Database.Database): unknown[] {
  return db.prepare('SELECT username FROM users ORDER BY id').pluck().all();
}

describe('defaultBackupName', () => {
  it('stamps the local date and time', () => {
    expect(defaultBackupName(new Date(2024, 2, 15, 14, 25, 1))).toBe('studydesk_backup_20240315_142501.db');
  });
});

describe('backup and restore', () => {
  let dir: string;
  let live: Database.Database;

  beforeEach(() => {
    dir = makeTempDir();
    live = createFileDb(dir);
  });

  afterEach(() => {
    if (live.open) live.close();
    removeDir(dir);
  });

  it('exports a verifiable copy', () => {
    seedUser(live, 'ada');

    const target = exportDatabase(live, join(dir, 'backups', 'copy.db'));

    expect(target).toBe(join(dir, 'backups', 'copy.db'));
    expect(() => verifyBackup(target)).not.toThrow();
  });

  it('refuses to back up onto the live file', () => {
    expect(() => exportDatabase(live, join(dir, 'studydesk.db'))).toThrow(
      'The backup path is the live database file'
    );
  });

  it('refuses to back up an in-memory database', () => {
    const memory = createTestDb();
    expect(() => exportDatabase(memory, join(dir, 'x.db'))).toThrow(BackupError);
    memory.close();
  });

  describe('verifyBackup', () => {
    it('reports a missing file', () => {
      expect(() => verifyBackup(join(dir, 'nope.db'))).toThrow(FileNotFoundError);
    });

    it('rejects a file that is not SQLite', () => {
      const path = join(dir, 'notes.txt');
      writeFileSync(path, 'just some notes, not a database at all');

      expect(() => verifyBackup(path)).toThrow(`Not a StudyDesk backup: ${path}`);
    });

    it('rejects a SQLite file without the application tables', () => {
      const path = join(dir, 'other.db');
      const other = openDatabase(path);
      other.exec('CREATE TABLE users (id INTEGER PRIMARY KEY)');
      other.close();

      expect(() => verifyBackup(path)).toThrow(
        'Backup is missing tables: categories, tasks, study_logs, quiz_results, ai_content, settings'
      );
    });
  });

  it('restores the backup over the live file', () => {
    seedUser(live, 'ada');
    const backup = exportDatabase(live, join(dir, 'copy.db'));
    seedUser(live, 'bob');
    expect(usernames(live)).toEqual(['ada', 'bob']);

    const restored = restoreDatabase(backup, live);

    expect(live.open).toBe(false);
    expect(restored.name).toBe(join(dir, 'studydesk.db'));
    expect(usernames(restored)).toEqual(['ada']);
    restored.close();
  });

  it('leaves the live database untouched when the backup is bad', () => {
    seedUser(live, 'ada');
    const bad = join(dir, 'bad.db');
    writeFileSync(bad, 'garbage');

    expect(() => restoreDatabase(bad, live)).toThrow(BackupError);
    expect(live.open).toBe(true);
    expect(usernames(live)).toEqual(['ada']);
  });

  it('keeps the live data when the backup tables have the wrong columns', () => {
    seedUser(live, 'ada');
    const bad = join(dir, 'old-layout.db');
    const other = openDatabase(bad);
    other.exec(`
      CREATE TABLE users (id INTEGER PRIMARY KEY, username TEXT, password_hash TEXT, created_at TEXT);
      CREATE TABLE categories (id INTEGER PRIMARY KEY, owner_user_id INTEGER, name TEXT, created_at TEXT);
      CREATE TABLE tasks (id INTEGER PRIMARY KEY, owner_user_id INTEGER, title TEXT);
      CREATE TABLE study_logs (id INTEGER PRIMARY KEY);
      CREATE TABLE quiz_results (id INTEGER PRIMARY KEY);
      CREATE TABLE ai_content (id INTEGER PRIMARY KEY);
      CREATE TABLE settings (owner_user_id INTEGER, key TEXT, value TEXT);
    `);
    other.close();

    expect(() => verifyBackup(bad)).not.toThrow();
    expect(() => restoreDatabase(bad, live)).toThrow('Backup could not be upgraded: 001-initial.sql');
    expect(live.open).toBe(true);
    expect(usernames(live)).toEqual(['ada']);
    expect(existsSync(`${join(dir, 'studydesk.db')}.restore-${process.pid}`)).toBe(false);
  });

  it('rejects an upgraded backup that lacks a column', () => {
    seedUser(live, 'ada');
    const bad = join(dir, 'no-notes.db');
    const other = createFileDb(dir, 'no-notes.db');
    other.exec('ALTER TABLE study_logs DROP COLUMN notes');
    other.close();

    expect(() => restoreDatabase(bad, live)).toThrow('Backup table study_logs is missing columns: notes');
    expect(live.open).toBe(true);
    expect(usernames(live)).toEqual(['ada']);
  });

  it('refuses to restore the live file onto itself', () => {
    expect(() => restoreDatabase(join(dir, 'studydesk.db'), live)).toThrow(
      'The backup path is the live database file'
    );
    expect(existsSync(join(dir, 'studydesk.db'))).toBe(true);
  });
});
