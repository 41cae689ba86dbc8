/**
 * Environment Variable Handler
 *
 * StudyDesk reads very little from the environment: where its home
 * directory lives and, optionally, which database file to open. Supports
 * .env files for local development via dotenv.
 *
 * The Gemini API key is NOT read from here; it is a per-user setting.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// Load .env file (for local development)
// No-op if .env doesn't exist
dotenvConfig();

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

export const EnvSchema = z.object({
  /** Replaces ~/.studydesk as the directory for config and data */
  STUDYDESK_HOME: z.string().trim().min(1).optional(),
  /** Database file, overrides [database] path in config.toml */
  STUDYDESK_DB: z.string().trim().min(1).optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

// ============================================================================
// PRIVATE STATE
// ============================================================================

/**
 * Cached environment variables (loaded once at first access).
 * Access through getEnv(); tests reset it with _clearEnvCache().
 */
let _envCache: EnvVars | null = null;

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load environment variables (called once, then cached).
 *
 * Blank values count as unset.
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  const result = EnvSchema.safeParse({
    STUDYDESK_HOME: process.env.STUDYDESK_HOME || undefined,
    STUDYDESK_DB: process.env.STUDYDESK_DB || undefined,
  });

  // Only whitespace values can fail; treat them as unset
  _envCache = result.success ? result.data : {};

  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  const env = loadEnv();
  return env[key];
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to stub different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}
