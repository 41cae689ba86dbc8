/**
 * Test Utilities - Unified Reset
 *
 * Provides a single function to reset all singletons for test isolation.
 *
 * ORDER MATTERS:
 * 1. Close the database connection
 * 2. Forget which connections were migrated
 * 3. Drop the cached environment
 *
 * @example
 * ```typescript
 * import { resetAll } from '../test-utils/index.js';
 *
 * afterEach(() => {
 *   resetAll();
 *   vi.clearAllMocks();
 * });
 * ```
 */

import { closeDb, resetMigrationState } from '../database/index.js';
import { _clearEnvCache } from '../config/env.js';

/**
 * Reset all application singletons for test isolation.
 */
export function resetAll(): void {
  closeDb();
  resetMigrationState();
  _clearEnvCache();
}
