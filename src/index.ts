/**
 * StudyDesk - Library Entry Point
 *
 * The CLI (`studydesk`) is the main way to use StudyDesk. This module
 * exports the pieces underneath it for scripts and integrations: the store,
 * the owner-scoped repository, the Gemini gateway, analytics, the Pomodoro
 * timer and the session controller.
 *
 * @example Repository access
 * ```typescript
 * import { openDatabase, runMigrations, AuthService, createRepository } from 'studydesk';
 *
 * const db = openDatabase('/tmp/study.db');
 * runMigrations(db);
 * const user = await new AuthService(db).register('ada', 'secret-pass');
 * const repo = createRepository(db, user.id);
 * repo.studyLogs.create({ subject: 'Calculus', durationMinutes: 45 });
 * ```
 *
 * @packageDocumentation
 */

export type { GlobalOptions, CommandContext } from './cli/types.js';

export * from './database/index.js';
export * from './repository/index.js';
export * from './providers/index.js';
export * from './analytics/index.js';
export * from './pomodoro/index.js';
export * from './session/index.js';
export * from './errors/index.js';
export {
  loadConfig,
  resolveDbPath,
  DEFAULT_CONFIG,
  ConfigSchema,
  type Config,
} from './config/index.js';
export {
  formatTable,
  silentLogger,
  prefixLogger,
  systemClock,
  toDateKey,
  type Column,
  type Logger,
  type Clock,
} from './utils/index.js';
