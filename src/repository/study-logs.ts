/**
 * Study Logs
 *
 * Logs are immutable once written; the only change is delete. The aggregate
 * reads at the bottom feed the analytics screen.
 */

import { z } from 'zod';
import { NotFoundError } from '../errors/index.js';
import type { StudyLog } from '../database/schema.js';
import {
  CountRowSchema,
  DayRowSchema,
  StudyLogRowSchema,
  validateRow,
  validateRows,
} from '../database/validation.js';
import { toTimestamp } from '../utils/dates.js';
import { OwnedRepository, parseInput } from './base.js';
import {
  DateKeySchema,
  EntityIdSchema,
  ListLimitSchema,
  StudyLogInputSchema,
  type StudyLogInput,
} from './inputs.js';

export interface StudyTotals {
  sessions: number;
  totalMinutes: number;
}

export interface SubjectTotal {
  subject: string;
  minutes: number;
  sessions: number;
}

const TotalsRowSchema = z
  .object({
    sessions: z.number().int().nonnegative(),
    total_minutes: z.number().int().nonnegative(),
  })
  .transform((row): StudyTotals => ({ sessions: row.sessions, totalMinutes: row.total_minutes }));

const SubjectRowSchema = z.object({
  subject: z.string(),
  minutes: z.number().int().nonnegative(),
  sessions: z.number().int().positive(),
});

export class StudyLogRepository extends OwnedRepository {
  create(input: StudyLogInput): StudyLog {
    const data = parseInput(StudyLogInputSchema, input, 'study log');
    const loggedAt = data.loggedAt ? toTimestamp(data.loggedAt) : this.now();

    return this.write('Log study session', () => {
      const result = this.db
        .prepare(
          `INSERT INTO study_logs (owner_user_id, subject, duration_minutes, notes, logged_at)
           VALUES (?, ?, ?, ?, ?)`
        )
        .run(this.ownerId, data.subject, data.durationMinutes, data.notes, loggedAt);
      return this.get(Number(result.lastInsertRowid));
    });
  }

  get(id: number): StudyLog {
    return this.read('Load study log', () => {
      const row = this.db
        .prepare('SELECT * FROM study_logs WHERE id = ? AND owner_user_id = ?')
        .get(id, this.ownerId);
      if (!row) {
        throw new NotFoundError('Study log', id);
      }
      return validateRow(StudyLogRowSchema, row, `study_logs.id=${id}`);
    });
  }

  /**
   * Newest first.
   */
  list(options: { limit?: number } = {}): StudyLog[] {
    const { limit } = parseInput(ListLimitSchema, options, 'list options');

    return this.read('List study logs', () => {
      const rows = this.db
        .prepare(
          `SELECT * FROM study_logs WHERE owner_user_id = ?
           ORDER BY logged_at DESC, id DESC LIMIT ?`
        )
        .all(this.ownerId, limit ?? -1);
      return validateRows(StudyLogRowSchema, rows, 'study_logs');
    });
  }

  delete(id: number): void {
    const logId = parseInput(EntityIdSchema, id, 'study log id');

    this.write('Delete study log', () => {
      const result = this.db
        .prepare('DELETE FROM study_logs WHERE id = ? AND owner_user_id = ?')
        .run(logId, this.ownerId);
      if (result.changes === 0) {
        throw new NotFoundError('Study log', logId);
      }
    });
  }

  totals(): StudyTotals {
    return this.read('Sum study time', () => {
      const row = this.db
        .prepare(
          `SELECT COUNT(*) AS sessions, COALESCE(SUM(duration_minutes), 0) AS total_minutes
           FROM study_logs WHERE owner_user_id = ?`
        )
        .get(this.ownerId);
      return validateRow(TotalsRowSchema, row, 'study_logs.totals');
    });
  }

  /**
   * Distinct calendar days with at least one log, newest first.
   */
  studyDates(): string[] {
    return this.read('List study days', () => {
      const rows = this.db
        .prepare(
          `SELECT DISTINCT DATE(logged_at) AS day FROM study_logs
           WHERE owner_user_id = ? ORDER BY day DESC`
        )
        .all(this.ownerId);
      return validateRows(DayRowSchema, rows, 'study_logs.days').map((row) => row.day);
    });
  }

  /**
   * Number of distinct days studied on or after `date` (`YYYY-MM-DD`).
   */
  daysStudiedSince(date: string): number {
    const since = parseInput(DateKeySchema, date, 'date');

    return this.read('Count study days', () => {
      const row = this.db
        .prepare(
          `SELECT COUNT(DISTINCT DATE(logged_at)) AS count FROM study_logs
           WHERE owner_user_id = ? AND DATE(logged_at) >= ?`
        )
        .get(this.ownerId, since);
      return validateRow(CountRowSchema, row, 'study_logs.days_since').count;
    });
  }

  /**
   * Subjects by total minutes, most studied first.
   */
  topSubjects(limit = 3): SubjectTotal[] {
    const { limit: max } = parseInput(ListLimitSchema, { limit }, 'list options');

    return this.read('Rank subjects', () => {
      const rows = this.db
        .prepare(
          `SELECT subject, SUM(duration_minutes) AS minutes, COUNT(*) AS sessions
           FROM study_logs WHERE owner_user_id = ?
           GROUP BY subject ORDER BY minutes DESC, subject ASC LIMIT ?`
        )
        .all(this.ownerId, max ?? limit);
      return validateRows(SubjectRowSchema, rows, 'study_logs.subjects');
    });
  }
}
