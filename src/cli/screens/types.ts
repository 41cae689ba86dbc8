import type Database from 'better-sqlite3';
import type { AppController } from '../../session/controller.js';
import type { Terminal } from '../io.js';
import type { CommandContext } from '../types.js';

/**
 * What a screen handler works with.
 */
export interface ScreenContext {
  app: AppController;
  term: Terminal;
  ctx: CommandContext;
  /** True on the first step after arriving on the screen */
  entering: boolean;
  /** Called with the reopened connection after a restore */
  onDatabaseRestored?: (db: Database.Database) => void;
}

/** `quit` ends the interactive loop */
export type ScreenOutcome = 'continue' | 'quit';

/**
 * Runs one step of a screen: render if entering, read one command, act.
 */
export type ScreenHandler = (context: ScreenContext) => Promise<ScreenOutcome>;
