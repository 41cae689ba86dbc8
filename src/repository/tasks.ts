/**
 * Tasks
 *
 * Status moves between pending and completed only; completed_at follows it.
 * Lists sort by due date (undated last), then newest first.
 */

import { z } from 'zod';
import { NotFoundError } from '../errors/index.js';
import { TASK_STATUSES, type Task, type TaskStatus } from '../database/schema.js';
import { TaskRowSchema, validateRow, validateRows } from '../database/validation.js';
import { addDays } from '../utils/dates.js';
import { OwnedRepository, parseInput } from './base.js';
import { assertCategoryOwned } from './categories.js';
import {
  DateKeySchema,
  EntityIdSchema,
  TaskFilterSchema,
  TaskInputSchema,
  TaskPatchSchema,
  type TaskFilter,
  type TaskInput,
  type TaskPatch,
} from './inputs.js';

/** Days ahead counted as "upcoming" */
export const UPCOMING_WINDOW_DAYS = 7;

const TASK_SELECT = `
  SELECT t.id, t.owner_user_id, t.title, t.category_id, c.name AS category_name,
         t.due_date, t.status, t.created_at, t.completed_at
  FROM tasks t
  LEFT JOIN categories c ON c.id = t.category_id
`;

const CompletionRowSchema = z.object({
  total: z.number().int().nonnegative(),
  completed: z.number().int().nonnegative(),
});

export interface TaskReminders {
  dueToday: Task[];
  overdue: Task[];
}

/**
 * Inclusive `YYYY-MM-DD` bounds on created_at
 */
export interface DateRange {
  from?: string;
  to?: string;
}

const DateRangeSchema = z
  .object({ from: DateKeySchema.optional(), to: DateKeySchema.optional() })
  .refine((range) => !range.from || !range.to || range.from <= range.to, {
    message: 'Start date must not be after end date',
    path: ['from'],
  });

export class TaskRepository extends OwnedRepository {
  create(input: TaskInput): Task {
    const data = parseInput(TaskInputSchema, input, 'task');

    return this.write('Create task', () => {
      if (data.categoryId != null) {
        assertCategoryOwned(this.db, this.ownerId, data.categoryId);
      }
      const result = this.db
        .prepare(
          `INSERT INTO tasks (owner_user_id, title, category_id, due_date, status, created_at)
           VALUES (?, ?, ?, ?, 'pending', ?)`
        )
        .run(this.ownerId, data.title, data.categoryId ?? null, data.dueDate ?? null, this.now());
      return this.get(Number(result.lastInsertRowid));
    });
  }

  get(id: number): Task {
    return this.read('Load task', () => {
      const row = this.db
        .prepare(`${TASK_SELECT} WHERE t.id = ? AND t.owner_user_id = ?`)
        .get(id, this.ownerId);
      if (!row) {
        throw new NotFoundError('Task', id);
      }
      return validateRow(TaskRowSchema, row, `tasks.id=${id}`);
    });
  }

  list(filter: TaskFilter = {}): Task[] {
    const f = parseInput(TaskFilterSchema, filter, 'task filter');

    const where: string[] = ['t.owner_user_id = @owner'];
    const params: Record<string, string | number> = { owner: this.ownerId };

    if (f.status !== 'all') {
      where.push('t.status = @status');
      params.status = f.status;
    }

    if (f.categoryId !== undefined) {
      where.push('t.category_id = @categoryId');
      params.categoryId = f.categoryId;
    } else if (f.uncategorized) {
      where.push('t.category_id IS NULL');
    }

    const today = this.today();
    switch (f.due) {
      case 'today':
        where.push('t.due_date = @today');
        params.today = today;
        break;
      case 'upcoming':
        where.push('t.due_date > @today AND t.due_date <= @horizon');
        params.today = today;
        params.horizon = addDays(today, UPCOMING_WINDOW_DAYS);
        break;
      case 'overdue':
        where.push("t.status = 'pending' AND t.due_date < @today");
        params.today = today;
        break;
      case undefined:
        break;
    }

    let sql =
      `${TASK_SELECT} WHERE ${where.join(' AND ')} ` +
      'ORDER BY t.due_date IS NULL, t.due_date, t.created_at DESC, t.id DESC';
    if (f.limit !== undefined) {
      sql += ' LIMIT @limit';
      params.limit = f.limit;
    }

    return this.read('List tasks', () => {
      const rows = this.db.prepare(sql).all(params);
      return validateRows(TaskRowSchema, rows, 'tasks');
    });
  }

  update(id: number, patch: TaskPatch): Task {
    const taskId = parseInput(EntityIdSchema, id, 'task id');
    const data = parseInput(TaskPatchSchema, patch, 'task');

    return this.write('Update task', () => {
      this.get(taskId);

      const sets: string[] = [];
      const params: Record<string, string | number | null> = { id: taskId, owner: this.ownerId };

      if (data.title !== undefined) {
        sets.push('title = @title');
        params.title = data.title;
      }
      if (data.categoryId !== undefined) {
        if (data.categoryId !== null) {
          assertCategoryOwned(this.db, this.ownerId, data.categoryId);
        }
        sets.push('category_id = @categoryId');
        params.categoryId = data.categoryId;
      }
      if (data.dueDate !== undefined) {
        sets.push('due_date = @dueDate');
        params.dueDate = data.dueDate;
      }

      this.db
        .prepare(`UPDATE tasks SET ${sets.join(', ')} WHERE id = @id AND owner_user_id = @owner`)
        .run(params);
      return this.get(taskId);
    });
  }

  setStatus(id: number, status: TaskStatus): Task {
    const taskId = parseInput(EntityIdSchema, id, 'task id');
    const nextStatus = parseInput(z.enum(TASK_STATUSES), status, 'task status');

    return this.write('Update task status', () => {
      const current = this.get(taskId);
      if (current.status === nextStatus) {
        return current;
      }
      const completedAt = nextStatus === 'completed' ? this.now() : null;
      this.db
        .prepare(
          'UPDATE tasks SET status = ?, completed_at = ? WHERE id = ? AND owner_user_id = ?'
        )
        .run(nextStatus, completedAt, taskId, this.ownerId);
      return this.get(taskId);
    });
  }

  /**
   * Flip pending <-> completed.
   */
  toggle(id: number): Task {
    const current = this.get(id);
    return this.setStatus(id, current.status === 'pending' ? 'completed' : 'pending');
  }

  delete(id: number): void {
    const taskId = parseInput(EntityIdSchema, id, 'task id');

    this.write('Delete task', () => {
      const result = this.db
        .prepare('DELETE FROM tasks WHERE id = ? AND owner_user_id = ?')
        .run(taskId, this.ownerId);
      if (result.changes === 0) {
        throw new NotFoundError('Task', taskId);
      }
    });
  }

  /**
   * Pending tasks due today and pending tasks past due, shown after login.
   */
  reminders(): TaskReminders {
    return {
      dueToday: this.list({ status: 'pending', due: 'today' }),
      overdue: this.list({ status: 'pending', due: 'overdue' }),
    };
  }

  /**
   * Task counts for the completion rate, optionally limited to tasks
   * created inside `range`.
   */
  completionCounts(range: DateRange = {}): { total: number; completed: number } {
    const bounds = parseInput(DateRangeSchema, range, 'date range');

    const where: string[] = ['owner_user_id = @owner'];
    const params: Record<string, string | number> = { owner: this.ownerId };
    if (bounds.from) {
      where.push('DATE(created_at) >= @from');
      params.from = bounds.from;
    }
    if (bounds.to) {
      where.push('DATE(created_at) <= @to');
      params.to = bounds.to;
    }

    return this.read('Count tasks', () => {
      const row = this.db
        .prepare(
          `SELECT COUNT(*) AS total,
                  COALESCE(SUM(CASE WHEN status = 'completed' THEN 1 ELSE 0 END), 0) AS completed
           FROM tasks WHERE ${where.join(' AND ')}`
        )
        .get(params);
      return validateRow(CompletionRowSchema, row, 'tasks.completion');
    });
  }
}
