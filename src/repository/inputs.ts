/**
 * Input schemas for repository writes.
 *
 * Everything a caller passes in is validated here before it reaches SQL.
 * Store constraints repeat the important rules as a backstop.
 */

import { z } from 'zod';
import { AI_CONTENT_KINDS, CHAT_ROLES, SETTING_KEYS, type SettingKey } from '../database/schema.js';
import { AnsweredQuestionSchema } from '../database/validation.js';
import { isValidDateKey } from '../utils/dates.js';

export const MAX_NAME_LENGTH = 200;
export const MAX_DURATION_MINUTES = 1440;

/**
 * Trimmed, non-empty, bounded text field.
 */
function requiredText(label: string) {
  return z
    .string({ required_error: `${label} is required`, invalid_type_error: `${label} must be text` })
    .trim()
    .min(1, `${label} cannot be empty`)
    .max(MAX_NAME_LENGTH, `${label} must be at most ${MAX_NAME_LENGTH} characters`);
}

export const EntityIdSchema = z.number().int().positive();

export const DateKeySchema = z
  .string()
  .trim()
  .refine(isValidDateKey, 'Use a real date in YYYY-MM-DD form');

// ============================================================================
// Accounts
// ============================================================================

export const UsernameSchema = z
  .string({ required_error: 'Username is required' })
  .trim()
  .min(3, 'Username must be at least 3 characters')
  .max(32, 'Username must be at most 32 characters')
  .regex(/^[A-Za-z0-9_.-]+$/, 'Use letters, digits, underscore, dot or dash');

// bcrypt only looks at the first 72 bytes
export const PasswordSchema = z
  .string({ required_error: 'Password is required' })
  .min(4, 'Password must be at least 4 characters')
  .max(72, 'Password must be at most 72 characters');

export const CredentialsSchema = z.object({
  username: UsernameSchema,
  password: PasswordSchema,
});

// ============================================================================
// Categories and tasks
// ============================================================================

export const CategoryNameSchema = requiredText('Name');

export const TaskInputSchema = z.object({
  title: requiredText('Title'),
  categoryId: EntityIdSchema.nullable().optional(),
  dueDate: DateKeySchema.nullable().optional(),
});

export type TaskInput = z.input<typeof TaskInputSchema>;

/**
 * `undefined` leaves a field alone, `null` clears it.
 */
export const TaskPatchSchema = z
  .object({
    title: requiredText('Title').optional(),
    categoryId: EntityIdSchema.nullable().optional(),
    dueDate: DateKeySchema.nullable().optional(),
  })
  .refine(
    (patch) => patch.title !== undefined || patch.categoryId !== undefined || patch.dueDate !== undefined,
    'Nothing to update'
  );

export type TaskPatch = z.input<typeof TaskPatchSchema>;

export const TaskStatusFilterSchema = z.enum(['pending', 'completed', 'all']);

export const TaskFilterSchema = z.object({
  status: TaskStatusFilterSchema.default('pending'),
  categoryId: EntityIdSchema.optional(),
  uncategorized: z.boolean().optional(),
  /** today: due today; upcoming: due in the next 7 days; overdue: pending and past due */
  due: z.enum(['today', 'upcoming', 'overdue']).optional(),
  limit: z.number().int().min(1).max(1000).optional(),
});

export type TaskFilter = z.input<typeof TaskFilterSchema>;

// ============================================================================
// Study logs
// ============================================================================

export const StudyLogInputSchema = z.object({
  subject: requiredText('Subject'),
  durationMinutes: z
    .number({ required_error: 'Duration is required', invalid_type_error: 'Duration must be a number' })
    .int('Duration must be whole minutes')
    .min(1, 'Duration must be at least 1 minute')
    .max(MAX_DURATION_MINUTES, `Duration cannot exceed ${MAX_DURATION_MINUTES} minutes`),
  notes: z
    .string()
    .trim()
    .max(2000, 'Notes must be at most 2000 characters')
    .nullable()
    .optional()
    .transform((notes) => (notes ? notes : null)),
  /** Backdated entries; defaults to now */
  loggedAt: z.date().optional(),
});

export type StudyLogInput = z.input<typeof StudyLogInputSchema>;

export const ListLimitSchema = z
  .object({ limit: z.number().int().min(1).max(1000).optional() })
  .default({});

// ============================================================================
// Quiz results
// ============================================================================

export const QuizRecordSchema = z
  .object({
    topic: requiredText('Topic'),
    score: z.number().int('Score must be a whole number').min(0, 'Score cannot be negative'),
    totalQuestions: z
      .number()
      .int('Question count must be a whole number')
      .min(1, 'A quiz needs at least one question')
      .max(100, 'A quiz has at most 100 questions'),
    questions: z.array(AnsweredQuestionSchema).optional(),
  })
  .refine((quiz) => quiz.score <= quiz.totalQuestions, {
    message: 'Score cannot exceed the number of questions',
    path: ['score'],
  })
  .refine((quiz) => quiz.questions === undefined || quiz.questions.length === quiz.totalQuestions, {
    message: 'Question list does not match the question count',
    path: ['questions'],
  });

export type QuizRecordInput = z.input<typeof QuizRecordSchema>;

// ============================================================================
// AI archive and chat
// ============================================================================

export const AIContentInputSchema = z.object({
  kind: z.enum(AI_CONTENT_KINDS),
  title: z.string().trim().max(MAX_NAME_LENGTH).optional(),
  prompt: z.string().trim().min(1, 'Prompt cannot be empty'),
  responseText: z.string().trim().min(1, 'Response cannot be empty'),
});

export type AIContentInput = z.input<typeof AIContentInputSchema>;

export const ChatMessageInputSchema = z.object({
  role: z.enum(CHAT_ROLES),
  content: z.string().trim().min(1, 'Message cannot be empty'),
});

// ============================================================================
// Settings
// ============================================================================

export const SettingKeySchema = z.enum(SETTING_KEYS, {
  errorMap: () => ({ message: `Unknown setting (expected one of: ${SETTING_KEYS.join(', ')})` }),
});

const minutesSetting = z
  .string()
  .trim()
  .regex(/^\d+$/, 'Enter whole minutes')
  .refine((value) => Number(value) >= 1 && Number(value) <= 180, 'Use 1-180 minutes');

/**
 * Value rules per setting key. Values are stored as text.
 */
export const SETTING_VALUE_SCHEMAS: Record<SettingKey, z.ZodType<string, z.ZodTypeDef, string>> = {
  gemini_api_key: z.string().trim().min(1, 'API key cannot be empty'),
  pomodoro_work_minutes: minutesSetting,
  pomodoro_break_minutes: minutesSetting,
  pomodoro_long_break_minutes: minutesSetting,
};
