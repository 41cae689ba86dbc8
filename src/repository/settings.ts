/**
 * Per-user Settings
 *
 * Key/value text pairs, upserted. The Gemini API key lives here; callers
 * that display settings must mask it.
 */

import type { Setting, SettingKey } from '../database/schema.js';
import { SettingRowSchema, validateRow, validateRows } from '../database/validation.js';
import { OwnedRepository, parseInput } from './base.js';
import { SETTING_VALUE_SCHEMAS, SettingKeySchema } from './inputs.js';

export interface PomodoroDurations {
  workMinutes: number;
  breakMinutes: number;
  longBreakMinutes: number;
}

export class SettingsRepository extends OwnedRepository {
  get(key: SettingKey): string | undefined {
    const settingKey = parseInput(SettingKeySchema, key, 'setting');

    return this.read('Load setting', () => {
      const row = this.db
        .prepare('SELECT key, value, updated_at FROM settings WHERE owner_user_id = ? AND key = ?')
        .get(this.ownerId, settingKey);
      return row ? validateRow(SettingRowSchema, row, `settings.key=${settingKey}`).value : undefined;
    });
  }

  set(key: SettingKey, value: string): void {
    const settingKey = parseInput(SettingKeySchema, key, 'setting');
    const cleanValue = parseInput(SETTING_VALUE_SCHEMAS[settingKey], value, 'setting value');

    this.write('Save setting', () => {
      this.db
        .prepare(
          `INSERT INTO settings (owner_user_id, key, value, updated_at) VALUES (?, ?, ?, ?)
           ON CONFLICT(owner_user_id, key) DO UPDATE SET
             value = excluded.value,
             updated_at = excluded.updated_at`
        )
        .run(this.ownerId, settingKey, cleanValue, this.now());
    });
  }

  /**
   * Returns true if the setting existed.
   */
  remove(key: SettingKey): boolean {
    const settingKey = parseInput(SettingKeySchema, key, 'setting');

    return this.write('Remove setting', () => {
      const result = this.db
        .prepare('DELETE FROM settings WHERE owner_user_id = ? AND key = ?')
        .run(this.ownerId, settingKey);
      return result.changes > 0;
    });
  }

  all(): Setting[] {
    return this.read('List settings', () => {
      const rows = this.db
        .prepare('SELECT key, value, updated_at FROM settings WHERE owner_user_id = ? ORDER BY key')
        .all(this.ownerId);
      return validateRows(SettingRowSchema, rows, 'settings');
    });
  }

  /**
   * The user's Pomodoro durations, falling back to `defaults` per field.
   */
  getPomodoroDurations(defaults: PomodoroDurations): PomodoroDurations {
    const minutes = (key: SettingKey, fallback: number): number => {
      const stored = Number(this.get(key));
      return Number.isInteger(stored) && stored > 0 ? stored : fallback;
    };

    return {
      workMinutes: minutes('pomodoro_work_minutes', defaults.workMinutes),
      breakMinutes: minutes('pomodoro_break_minutes', defaults.breakMinutes),
      longBreakMinutes: minutes('pomodoro_long_break_minutes', defaults.longBreakMinutes),
    };
  }
}
