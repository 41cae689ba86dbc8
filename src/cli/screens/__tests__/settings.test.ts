/**
 * Tests for the Settings screen
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { exportDatabase } from '../../../database/backup.js';
import { createScreenHarness, makeTempDir, removeDir } from '../../../test-utils/index.js';

describe('settings screen', () => {
  it('shows the overview with defaults', async () => {
    const harness = await createScreenHarness(['8']);

    await harness.run();

    const start = harness.term.output.indexOf('Settings');
    expect(harness.term.output.slice(start + 2, start + 4)).toEqual([
      '  Gemini API key: not set',
      '  Pomodoro: 25 min work, 5 min break, 15 min long break',
    ]);
  });

  it('saves, masks and removes the API key', async () => {
    const harness = await createScreenHarness(['8', 'key', 'test-key-value', 'show', 'key-remove', 'key-remove']);

    await harness.run();
    const lines = harness.lines();

    expect(harness.term.prompts[2]).toBe('Gemini API key: ');
    expect(lines).toContain(
      'Warning: Unusual Gemini API key format (keys usually start with "AIza" and are 39 characters long)'
    );
    expect(lines).toContain('Saved API key test…alue.');
    expect(lines).toContain('  Gemini API key: test…alue');
    expect(lines).toContain('API key removed.');
    expect(lines.at(-1)).toBe('No API key was saved.');
    // save + two removals + logout
    expect(harness.gateway.forgotten).toBe(4);
    expect(harness.repository().settings.get('gemini_api_key')).toBeUndefined();
  });

  it('rejects an empty API key', async () => {
    const harness = await createScreenHarness(['8', 'key', '   ']);

    await harness.run();

    expect(harness.term.output.slice(-2)).toEqual(['✗ Invalid setting value', '  API key cannot be empty']);
  });

  it('saves Pomodoro durations and keeps blanks unchanged', async () => {
    const harness = await createScreenHarness(['8', 'pomodoro', '50', '', '20', 'show', 'pomodoro', '0']);

    await harness.run();
    const lines = harness.lines();

    expect(harness.term.prompts.slice(2, 5)).toEqual(['Work minutes: ', 'Break minutes: ', 'Long break minutes: ']);
    expect(lines).toContain('Pomodoro durations saved.');
    expect(lines).toContain('  Pomodoro: 50 min work, 5 min break, 20 min long break');
    expect(harness.term.prompts.at(-2)).toBe('Work minutes [50]: ');
    expect(harness.term.output.slice(-2)).toEqual(['✗ Invalid setting value', '  Use 1-180 minutes']);
  });

  it('changes the password', async () => {
    const harness = await createScreenHarness(['8', 'password', 'test-secret', 'new-secret', 'new-secret']);

    await harness.run();

    expect(harness.lines()).toContain('Password changed.');
    await harness.app.login('ada', 'new-secret');
    expect(harness.app.screen).toBe('MainMenu');
  });

  it('refuses a password change with the wrong current password', async () => {
    const harness = await createScreenHarness(['8', 'password', 'wrong-secret', 'new-secret', 'new-secret']);

    await harness.run();

    expect(harness.term.output.at(-1)).toBe('✗ Invalid username or password');
    await harness.app.login('ada', 'test-secret');
    expect(harness.app.screen).toBe('MainMenu');
  });

  it('refuses mismatched new passwords', async () => {
    const harness = await createScreenHarness(['8', 'password', 'test-secret', 'new-secret', 'other-secret']);

    await harness.run();

    expect(harness.term.output.slice(-2)).toEqual([
      '✗ Passwords do not match',
      '  password: Type the same password twice',
    ]);
  });

  it('deletes the account and returns to the login screen', async () => {
    const harness = await createScreenHarness(['8', 'delete-account', 'y', 'test-secret']);

    await harness.run();

    expect(harness.lines()).toContain('This permanently deletes your account and everything in it.');
    expect(harness.lines()).toContain('Account deleted.');
    expect(harness.term.prompts.slice(-3)).toEqual(['Delete your account? (y/N) ', 'Password: ', '> ']);
    expect(harness.app.screen).toBe('LoggedOut');
    expect(harness.db.prepare('SELECT COUNT(*) AS n FROM users').get()).toEqual({ n: 0 });
  });

  it('cannot back up an in-memory database', async () => {
    const harness = await createScreenHarness(['8', 'backup /tmp/studydesk-never-written.db']);

    await harness.run();

    expect(harness.lines().slice(-4)).toEqual([
      '',
      'Error: An in-memory database cannot be backed up',
      'Hint: Start StudyDesk with a database file',
      '',
    ]);
    expect(harness.app.screen).toBe('LoggedOut');
  });
});

describe('settings screen backup and restore', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('writes a backup to the given file', async () => {
    const target = join(dir, 'copy.db');
    const harness = await createScreenHarness(['8', `backup ${target}`], { dbDir: dir });

    await harness.run();

    expect(harness.lines()).toContain(`Backup written to ${target}`);
    expect(existsSync(target)).toBe(true);
    harness.db.close();
  });

  it('restores a backup and signs the user out', async () => {
    const backup = join(dir, 'before.db');
    const harness = await createScreenHarness(['8', `restore ${backup}`, 'y'], { dbDir: dir });
    harness.repository().tasks.create({ title: 'Kept' });
    exportDatabase(harness.db, backup);
    harness.repository().tasks.create({ title: 'Lost' });

    await harness.run();
    const lines = harness.lines();

    expect(lines).toContain('Restoring replaces ALL current data, for every account, with the backup.');
    expect(lines).toContain('Backup restored. Log in again to continue.');
    expect(harness.app.screen).toBe('LoggedOut');
    expect(harness.restored).toHaveLength(1);
    expect(harness.restored[0]).toBe(harness.app.database);
    expect(harness.db.open).toBe(false);
    expect(harness.app.database.prepare('SELECT title FROM tasks').pluck().all()).toEqual(['Kept']);
    harness.app.database.close();
  });

  it('leaves data alone when the restore is declined', async () => {
    const backup = join(dir, 'before.db');
    const harness = await createScreenHarness(['8', `restore ${backup}`, 'n'], { dbDir: dir });
    exportDatabase(harness.db, backup);

    await harness.run();

    expect(harness.restored).toEqual([]);
    expect(harness.db.open).toBe(true);
    harness.db.close();
  });

  it('reports a missing backup file and stays on Settings', async () => {
    const missing = join(dir, 'missing.db');
    const harness = await createScreenHarness(['8', `restore ${missing}`, 'y'], { dbDir: dir });

    await harness.run();

    expect(harness.lines()).toContain(`Error: Path does not exist: ${missing}`);
    expect(harness.term.prompts.at(-1)).toBe('settings> ');
    expect(harness.db.open).toBe(true);
    harness.db.close();
  });
});
