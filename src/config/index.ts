/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `studydesk config` commands.
 */

// Schema and types
export {
  ConfigSchema,
  PartialConfigSchema,
  DatabaseConfigSchema,
  AIConfigSchema,
  PomodoroConfigSchema,
  QuizConfigSchema,
  AuthConfigSchema,
} from './schema.js';
export type { Config, PartialConfig } from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export {
  loadConfig,
  resolveDbPath,
  getKnownKeys,
  getConfigValue,
  setConfigValue,
  listConfig,
  resetConfig,
  type ConfigLocation,
} from './loader.js';

// Paths
export {
  APP_DIR_NAME,
  DB_FILE_NAME,
  CONFIG_FILE_NAME,
  expandHome,
  getStudyDeskDir,
  getConfigPath,
  getDefaultDbPath,
  getBackupDir,
} from './paths.js';

// Environment variables
export { loadEnv, getEnv, EnvSchema, _clearEnvCache } from './env.js';
export type { EnvVars } from './env.js';
