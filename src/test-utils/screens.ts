/**
 * Screen harness: a migrated in-memory database, an AppController on the
 * fixed clock with a FakeGateway, and a ScriptedTerminal fed with `lines`.
 */

import type Database from 'better-sqlite3';
import { runScreens } from '../cli/screens/index.js';
import type { CommandContext } from '../cli/types.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import type { Config } from '../config/schema.js';
import { AppController } from '../session/controller.js';
import type { Session } from '../session/session.js';
import type { DomainRepository } from '../repository/index.js';
import { createFileDb, createTestDb, fixedClock } from './database.js';
import { FakeGateway } from './gateway.js';
import { ScriptedTerminal, type ScriptedTerminalOptions } from './terminal.js';

export const TEST_USERNAME = 'ada';
export const TEST_PASSWORD = 'test-secret';

/** Default config with the cheapest bcrypt cost */
export const TEST_CONFIG: Config = { ...DEFAULT_CONFIG, auth: { bcrypt_rounds: 4 } };

export interface ScreenHarness {
  db: Database.Database;
  app: AppController;
  gateway: FakeGateway;
  term: ScriptedTerminal;
  ctx: CommandContext;
  /** Signed-in session (when created with `signedIn`) */
  session?: Session;
  /** Connections handed over by a restore */
  restored: Database.Database[];
  /** Repository of the signed-in session */
  repository(): DomainRepository;
  /** Runs the screens until the script runs out */
  run(): Promise<void>;
  /** Printed output split into single lines */
  lines(): string[];
}

export interface ScreenHarnessOptions {
  /** Register and sign in as ada before the script starts (default true) */
  signedIn?: boolean;
  clock?: Date;
  /** Use a database file in this directory instead of memory */
  dbDir?: string;
  terminal?: ScriptedTerminalOptions;
}

export async function createScreenHarness(script: string[], options: ScreenHarnessOptions = {}): Promise<ScreenHarness> {
  const db = options.dbDir ? createFileDb(options.dbDir) : createTestDb();
  const gateway = new FakeGateway();
  const app = new AppController({
    db,
    config: TEST_CONFIG,
    clock: fixedClock(options.clock),
    gatewayFactory: () => gateway,
  });
  const term = new ScriptedTerminal(script, options.terminal);
  const ctx: CommandContext = {
    options: { verbose: false, json: false },
    log: () => {},
    debug: () => {},
    warn: () => {},
    error: () => {},
  };

  const restored: Database.Database[] = [];
  let session: Session | undefined;
  if (options.signedIn ?? true) {
    await app.register(TEST_USERNAME, TEST_PASSWORD);
    session = await app.login(TEST_USERNAME, TEST_PASSWORD);
  }

  return {
    db,
    app,
    gateway,
    term,
    ctx,
    session,
    restored,
    repository: () => {
      if (!session) {
        throw new Error('Harness created without a session');
      }
      return session.repository;
    },
    run: () => runScreens({ app, term, ctx, onDatabaseRestored: (next) => restored.push(next) }),
    lines: () => term.text.split('\n'),
  };
}
