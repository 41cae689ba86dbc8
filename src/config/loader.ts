/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create the StudyDesk directory
 * 2. Load config.toml if it exists
 * 3. Validate with Zod schema
 * 4. Merge with defaults (user values override defaults)
 * 5. Provide type-safe access
 *
 * Every function takes an optional config path so tests can work in a
 * temp directory.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import TOML from '@iarna/toml';
import type { ZodIssue } from 'zod';
import { ConfigSchema, PartialConfigSchema, type Config } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { expandHome, getConfigPath, getDefaultDbPath } from './paths.js';
import { getEnv } from './env.js';
import { ConfigError } from '../errors/index.js';

export interface ConfigLocation {
  /** Defaults to getConfigPath() */
  configPath?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isJsonMap(value: TOML.AnyJson | undefined): value is TOML.JsonMap {
  return (
    typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)
  );
}

/**
 * Deep merge two objects, with source values overriding target
 * This handles nested objects properly (unlike Object.assign or spread)
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

function formatIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

function readToml(configPath: string): TOML.JsonMap {
  const content = fs.readFileSync(configPath, 'utf-8');
  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or run: studydesk config reset`
    );
  }
}

/**
 * Merge parsed user settings over the defaults and validate the result.
 */
function mergeWithDefaults(userConfig: Record<string, unknown>, errorPrefix: string): Config {
  const merged = deepMerge({ ...DEFAULT_CONFIG }, userConfig);
  const result = ConfigSchema.safeParse(merged);

  if (!result.success) {
    throw new ConfigError(
      `${errorPrefix}:\n${formatIssues(result.error.issues)}`,
      'Run: studydesk config reset  to restore defaults'
    );
  }

  return result.data;
}

/**
 * Load and parse the config file
 * Returns the merged config (defaults + user overrides)
 *
 * @param createIfMissing - If true, writes the commented template on first run
 * @throws ConfigError if config file exists but is invalid
 */
export function loadConfig(createIfMissing = true, location: ConfigLocation = {}): Config {
  const configPath = location.configPath ?? getConfigPath();

  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      fs.mkdirSync(path.dirname(configPath), { recursive: true });
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return mergeWithDefaults({}, 'Invalid configuration');
  }

  const parsed = readToml(configPath);

  // Validate against the partial schema first for field-level messages
  const validationResult = PartialConfigSchema.safeParse(parsed);
  if (!validationResult.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(validationResult.error.issues)}`,
      'Run: studydesk config reset  to restore defaults'
    );
  }

  return mergeWithDefaults(validationResult.data, 'Invalid configuration');
}

/**
 * Decide which database file to open.
 *
 * Precedence: STUDYDESK_DB, then [database] path, then the default location.
 * The --db flag is applied by the CLI before this is consulted.
 */
export function resolveDbPath(config: Config): string {
  const fromEnv = getEnv('STUDYDESK_DB');
  if (fromEnv) return path.resolve(expandHome(fromEnv));
  if (config.database.path) return path.resolve(expandHome(config.database.path));
  return getDefaultDbPath();
}

/**
 * Every key config.toml understands, in dot notation (`ai.model`)
 */
export function getKnownKeys(): string[] {
  return Object.entries(ConfigSchema.shape).flatMap(([section, schema]) =>
    Object.keys(schema.shape).map((field) => `${section}.${field}`)
  );
}

/**
 * Get a specific config value by dot-notation path
 * Example: getConfigValue('ai.model') => 'gemini-2.0-flash'
 */
export function getConfigValue(key: string, location: ConfigLocation = {}): unknown {
  const config = loadConfig(true, location);
  const parts = key.split('.');

  let current: unknown = config;
  for (const part of parts) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Parse a string value into the appropriate type
 * Handles booleans, numbers, and strings
 */
function parseValue(value: string): string | number | boolean {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * Set a specific config value by dot-notation path
 * Writes the change back to the config file after validating the result
 */
export function setConfigValue(key: string, value: string, location: ConfigLocation = {}): void {
  const configPath = location.configPath ?? getConfigPath();

  if (!getKnownKeys().includes(key)) {
    throw new ConfigError(
      `Unknown config key '${key}'`,
      'Run: studydesk config list  to see available keys'
    );
  }

  const config: TOML.JsonMap = fs.existsSync(configPath) ? readToml(configPath) : {};

  const parts = key.split('.');
  const lastPart = parts.pop();
  if (lastPart === undefined) {
    throw new ConfigError('Invalid config key: empty key');
  }

  let current = config;
  for (const part of parts) {
    const next = current[part];
    if (isJsonMap(next)) {
      current = next;
    } else {
      const created: TOML.JsonMap = {};
      current[part] = created;
      current = created;
    }
  }
  current[lastPart] = parseValue(value);

  // Validate the complete config before saving
  mergeWithDefaults(config, `Invalid value for '${key}'`);

  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, TOML.stringify(config), 'utf-8');
}

/**
 * List all config values in a flat format
 * Returns entries like ['ai.model', 'gemini-2.0-flash']
 */
export function listConfig(location: ConfigLocation = {}): Array<[string, unknown]> {
  const config = loadConfig(true, location);
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: Record<string, unknown>, prefix = ''): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;

      if (isRecord(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(config);
  return entries;
}

/**
 * Overwrite config.toml with the commented defaults template
 */
export function resetConfig(location: ConfigLocation = {}): string {
  const configPath = location.configPath ?? getConfigPath();
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
  return configPath;
}
