/**
 * Database Module
 *
 * SQLite storage for everything StudyDesk keeps.
 *
 * @example
 * ```ts
 * import { getDb, runMigrations } from './database/index.js';
 *
 * // Run migrations on startup
 * const db = getDb();
 * runMigrations(db);
 * ```
 */

// Connection management
export {
  openDatabase,
  configureDatabase,
  getDb,
  replaceDb,
  closeDb,
  getDbPath,
} from './connection.js';

// Migration utilities
export {
  runMigrations,
  hasPendingMigrations,
  getAppliedMigrations,
  resetMigrationState,
  getMigrationCount,
  type MigrationResult,
} from './migrate.js';

// Schema types
export {
  TASK_STATUSES,
  AI_CONTENT_KINDS,
  CHAT_ROLES,
  SETTING_KEYS,
  APPLICATION_TABLES,
  DEFAULT_CATEGORIES,
  type TaskStatus,
  type AIContentKind,
  type ChatRole,
  type SettingKey,
  type User,
  type Category,
  type Task,
  type StudyLog,
  type QuizQuestion,
  type AnsweredQuestion,
  type QuizResult,
  type AIContent,
  type ChatMessage,
  type Setting,
} from './schema.js';

// Row validation
export {
  UserRowSchema,
  CategoryRowSchema,
  TaskRowSchema,
  StudyLogRowSchema,
  QuizResultRowSchema,
  AIContentRowSchema,
  ChatMessageRowSchema,
  SettingRowSchema,
  AnsweredQuestionSchema,
  CountRowSchema,
  DayRowSchema,
  type UserRow,
  SchemaValidationError,
  validateRow,
  validateRows,
} from './validation.js';

// Backup and restore
export { defaultBackupName, exportDatabase, verifyBackup, restoreDatabase } from './backup.js';
