/**
 * Centralized Path Definitions
 *
 * Single source of truth for StudyDesk's file locations.
 * All modules should import from here instead of computing paths locally.
 *
 * Directory structure:
 * ~/.studydesk/          (or $STUDYDESK_HOME)
 * ├── studydesk.db       (SQLite database)
 * ├── config.toml        (User configuration)
 * └── backups/           (Default backup destination)
 */

import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { getEnv } from './env.js';

export const APP_DIR_NAME = '.studydesk';
export const DB_FILE_NAME = 'studydesk.db';
export const CONFIG_FILE_NAME = 'config.toml';

/**
 * Expand a leading `~` to the user's home directory.
 */
export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

/**
 * Get the StudyDesk directory (~/.studydesk unless STUDYDESK_HOME is set)
 */
export function getStudyDeskDir(): string {
  const override = getEnv('STUDYDESK_HOME');
  return override ? resolve(expandHome(override)) : join(homedir(), APP_DIR_NAME);
}

/**
 * Get the config file path (<dir>/config.toml)
 */
export function getConfigPath(): string {
  return join(getStudyDeskDir(), CONFIG_FILE_NAME);
}

/**
 * Get the database path used when neither config nor flags choose one
 */
export function getDefaultDbPath(): string {
  return join(getStudyDeskDir(), DB_FILE_NAME);
}

/**
 * Get the folder offered for backups (<dir>/backups)
 */
export function getBackupDir(): string {
  return join(getStudyDeskDir(), 'backups');
}
