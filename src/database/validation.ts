/**
 * Database Row Validation
 *
 * Zod schemas for validating database reads at runtime. Each schema checks
 * the snake_case row SQLite returns and transforms it into the camelCase
 * domain object from schema.ts, so repositories never cast.
 *
 * Usage:
 * ```ts
 * const row = db.prepare('SELECT * FROM study_logs WHERE id = ?').get(id);
 * return row ? validateRow(StudyLogRowSchema, row, `study_logs.id=${id}`) : undefined;
 * ```
 */

import { z, type ZodIssue } from 'zod';
import { CLIError } from '../errors/types.js';
import { safeJsonParse } from '../utils/json.js';
import {
  AI_CONTENT_KINDS,
  CHAT_ROLES,
  TASK_STATUSES,
  type AIContent,
  type AnsweredQuestion,
  type Category,
  type ChatMessage,
  type QuizResult,
  type Setting,
  type StudyLog,
  type Task,
} from './schema.js';

// ============================================================================
// Users
// ============================================================================

/**
 * Full user row, including the hash. Only the auth service reads this.
 */
export const UserRowSchema = z.object({
  id: z.number().int().positive(),
  username: z.string(),
  password_hash: z.string(),
  created_at: z.string(),
});

export type UserRow = z.infer<typeof UserRowSchema>;

// ============================================================================
// Categories
// ============================================================================

export const CategoryRowSchema = z
  .object({
    id: z.number().int().positive(),
    owner_user_id: z.number().int().positive(),
    name: z.string(),
    created_at: z.string(),
  })
  .transform(
    (row): Category => ({
      id: row.id,
      ownerUserId: row.owner_user_id,
      name: row.name,
      createdAt: row.created_at,
    })
  );

// ============================================================================
// Tasks
// ============================================================================

/**
 * Task rows are read joined with categories, so `category_name` is present
 * (NULL for Uncategorized).
 */
export const TaskRowSchema = z
  .object({
    id: z.number().int().positive(),
    owner_user_id: z.number().int().positive(),
    title: z.string(),
    category_id: z.number().int().positive().nullable(),
    category_name: z.string().nullable(),
    due_date: z.string().nullable(),
    status: z.enum(TASK_STATUSES),
    created_at: z.string(),
    completed_at: z.string().nullable(),
  })
  .transform(
    (row): Task => ({
      id: row.id,
      ownerUserId: row.owner_user_id,
      title: row.title,
      categoryId: row.category_id,
      categoryName: row.category_name,
      dueDate: row.due_date,
      status: row.status,
      createdAt: row.created_at,
      completedAt: row.completed_at,
    })
  );

// ============================================================================
// Study Logs
// ============================================================================

export const StudyLogRowSchema = z
  .object({
    id: z.number().int().positive(),
    owner_user_id: z.number().int().positive(),
    subject: z.string(),
    duration_minutes: z.number().int().positive(),
    notes: z.string().nullable(),
    logged_at: z.string(),
  })
  .transform(
    (row): StudyLog => ({
      id: row.id,
      ownerUserId: row.owner_user_id,
      subject: row.subject,
      durationMinutes: row.duration_minutes,
      notes: row.notes,
      loggedAt: row.logged_at,
    })
  );

// ============================================================================
// Quiz Results
// ============================================================================

/**
 * A stored question. Shared with the repository's input validation.
 */
export const AnsweredQuestionSchema = z.object({
  question: z.string().min(1),
  choices: z.array(z.string()).length(4),
  correctIndex: z.number().int().min(0).max(3),
  explanation: z.string(),
  selectedIndex: z.number().int().min(0).max(3).nullable(),
});

const StoredQuestionsSchema = z.array(AnsweredQuestionSchema);

/**
 * Parse `questions_json`. Unreadable JSON yields no questions rather than
 * failing the whole result, since score and total are still valid.
 */
function parseStoredQuestions(json: string | null): AnsweredQuestion[] {
  const parsed = StoredQuestionsSchema.safeParse(safeJsonParse(json, []));
  return parsed.success ? parsed.data : [];
}

export const QuizResultRowSchema = z
  .object({
    id: z.number().int().positive(),
    owner_user_id: z.number().int().positive(),
    topic: z.string(),
    score: z.number().int().nonnegative(),
    total_questions: z.number().int().positive(),
    questions_json: z.string().nullable(),
    taken_at: z.string(),
  })
  .transform(
    (row): QuizResult => ({
      id: row.id,
      ownerUserId: row.owner_user_id,
      topic: row.topic,
      score: row.score,
      totalQuestions: row.total_questions,
      questions: parseStoredQuestions(row.questions_json),
      takenAt: row.taken_at,
    })
  );

// ============================================================================
// AI Content
// ============================================================================

export const AIContentRowSchema = z
  .object({
    id: z.number().int().positive(),
    owner_user_id: z.number().int().positive(),
    kind: z.enum(AI_CONTENT_KINDS),
    title: z.string(),
    prompt: z.string(),
    response_text: z.string(),
    created_at: z.string(),
  })
  .transform(
    (row): AIContent => ({
      id: row.id,
      ownerUserId: row.owner_user_id,
      kind: row.kind,
      title: row.title,
      prompt: row.prompt,
      responseText: row.response_text,
      createdAt: row.created_at,
    })
  );

// ============================================================================
// Chat Messages
// ============================================================================

export const ChatMessageRowSchema = z
  .object({
    id: z.number().int().positive(),
    owner_user_id: z.number().int().positive(),
    role: z.enum(CHAT_ROLES),
    content: z.string(),
    created_at: z.string(),
  })
  .transform(
    (row): ChatMessage => ({
      id: row.id,
      ownerUserId: row.owner_user_id,
      role: row.role,
      content: row.content,
      createdAt: row.created_at,
    })
  );

// ============================================================================
// Settings
// ============================================================================

export const SettingRowSchema = z
  .object({
    key: z.string(),
    value: z.string(),
    updated_at: z.string(),
  })
  .transform(
    (row): Setting => ({
      key: row.key,
      value: row.value,
      updatedAt: row.updated_at,
    })
  );

// ============================================================================
// Aggregates
// ============================================================================

/** `SELECT COUNT(*) AS count ...` */
export const CountRowSchema = z.object({ count: z.number().int().nonnegative() });

/** `SELECT DISTINCT DATE(...) AS day ...` */
export const DayRowSchema = z.object({ day: z.string() });

// ============================================================================
// Schema Validation Error
// ============================================================================

/**
 * Thrown when a database row fails Zod schema validation.
 *
 * This indicates schema drift - the database has data that doesn't match
 * what the code expects. Common causes:
 * - Failed migration
 * - A restored backup from a newer version
 * - Manual database modification
 *
 * Exit code 5: Database error (same as StoreError)
 */
export class SchemaValidationError extends CLIError {
  /** Individual validation issues from Zod */
  public readonly issues: Array<{ path: string; message: string }>;

  constructor(message: string, zodIssues: ZodIssue[]) {
    const formattedIssues = zodIssues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));

    const issuesSummary = formattedIssues
      .slice(0, 3)
      .map((i) => `  - ${i.path}: ${i.message}`)
      .join('\n');

    const hint =
      `Schema validation failed:\n${issuesSummary}` +
      (formattedIssues.length > 3 ? `\n  ... and ${formattedIssues.length - 3} more` : '') +
      `\n\nThis may indicate a database/code version mismatch.\n` +
      `Try restoring a recent backup from Settings`;

    super(message, hint, 5);
    this.name = 'SchemaValidationError';
    this.issues = formattedIssues;
  }
}

// ============================================================================
// Validation Utilities
// ============================================================================

/**
 * Validate a single database row against a Zod schema.
 *
 * @param context - Context string for error messages (e.g., "tasks.id=4")
 * @throws SchemaValidationError if validation fails
 */
export function validateRow<T extends z.ZodTypeAny>(
  schema: T,
  row: unknown,
  context: string
): z.output<T> {
  const result = schema.safeParse(row);

  if (result.success) {
    return result.data;
  }

  throw new SchemaValidationError(`Database schema mismatch in ${context}`, result.error.issues);
}

/**
 * Validate an array of database rows against a Zod schema.
 *
 * @throws SchemaValidationError naming the index of the first invalid row
 */
export function validateRows<T extends z.ZodTypeAny>(
  schema: T,
  rows: unknown[],
  context: string
): z.output<T>[] {
  return rows.map((row, i) => validateRow(schema, row, `${context}[${i}]`));
}
