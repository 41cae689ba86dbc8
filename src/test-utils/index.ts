/**
 * Test Utilities Module
 *
 * Shared utilities for testing across the codebase.
 *
 * @example
 * ```typescript
 * import { createTestDb, seedRepository, resetAll } from '../test-utils/index.js';
 *
 * const db = createTestDb();
 * const repo = seedRepository(db);
 * ```
 */

export { resetAll } from './reset.js';
export {
  FIXED_NOW,
  fixedClock,
  createTestDb,
  createFileDb,
  makeTempDir,
  removeDir,
  seedUser,
  seedRepository,
} from './database.js';
export { ScriptedTerminal, type ScriptedTerminalOptions } from './terminal.js';
export { FakeGateway, type RecordedAsk } from './gateway.js';
export {
  TEST_CONFIG,
  TEST_USERNAME,
  TEST_PASSWORD,
  createScreenHarness,
  type ScreenHarness,
  type ScreenHarnessOptions,
} from './screens.js';
