/**
 * Domain Repository
 *
 * Owner-scoped access to everything a signed-in user owns. Another user's
 * rows behave exactly like missing rows.
 *
 * @example
 * ```ts
 * const repo = createRepository(db, session.userId);
 * const task = repo.tasks.create({ title: 'Read chapter 3', dueDate: '2024-03-15' });
 * repo.tasks.toggle(task.id);
 * ```
 */

import type Database from 'better-sqlite3';
import { NotFoundError } from '../errors/index.js';
import { runStore, type RepositoryOptions } from './base.js';
import { CategoryRepository } from './categories.js';
import { TaskRepository } from './tasks.js';
import { StudyLogRepository } from './study-logs.js';
import { QuizResultRepository } from './quizzes.js';
import { AIContentRepository } from './ai-content.js';
import { ChatHistoryRepository } from './chat-history.js';
import { SettingsRepository } from './settings.js';

export interface DomainRepository {
  readonly ownerId: number;
  readonly categories: CategoryRepository;
  readonly tasks: TaskRepository;
  readonly studyLogs: StudyLogRepository;
  readonly quizzes: QuizResultRepository;
  readonly aiContent: AIContentRepository;
  readonly chat: ChatHistoryRepository;
  readonly settings: SettingsRepository;
}

/**
 * Build the repository for one user.
 *
 * @throws NotFoundError if the user does not exist
 */
export function createRepository(
  db: Database.Database,
  userId: number,
  options: RepositoryOptions = {}
): DomainRepository {
  const exists = runStore('Load user', () => db.prepare('SELECT 1 FROM users WHERE id = ?').get(userId));
  if (!exists) {
    throw new NotFoundError('User', userId);
  }

  return {
    ownerId: userId,
    categories: new CategoryRepository(db, userId, options),
    tasks: new TaskRepository(db, userId, options),
    studyLogs: new StudyLogRepository(db, userId, options),
    quizzes: new QuizResultRepository(db, userId, options),
    aiContent: new AIContentRepository(db, userId, options),
    chat: new ChatHistoryRepository(db, userId, options),
    settings: new SettingsRepository(db, userId, options),
  };
}

export { AuthService, DEFAULT_BCRYPT_ROUNDS, type AuthServiceOptions } from './auth.js';
export { CategoryRepository, type CategoryDeletion } from './categories.js';
export {
  TaskRepository,
  UPCOMING_WINDOW_DAYS,
  type TaskReminders,
  type DateRange,
} from './tasks.js';
export { StudyLogRepository, type StudyTotals, type SubjectTotal } from './study-logs.js';
export { QuizResultRepository, type QuizTotals } from './quizzes.js';
export { AIContentRepository, AI_CONTENT_LABELS, defaultContentTitle } from './ai-content.js';
export { ChatHistoryRepository } from './chat-history.js';
export { SettingsRepository, type PomodoroDurations } from './settings.js';
export { parseInput, runStore, type RepositoryOptions } from './base.js';
export type {
  TaskInput,
  TaskPatch,
  TaskFilter,
  StudyLogInput,
  QuizRecordInput,
  AIContentInput,
} from './inputs.js';
