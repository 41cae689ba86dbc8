/**
 * Configuration Schema
 *
 * Defines the shape of ~/.studydesk/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * Database location
 */
export const DatabaseConfigSchema = z.object({
  path: z
    .string()
    .min(1)
    .optional()
    .describe('SQLite file (default: <studydesk dir>/studydesk.db, ~ is expanded)'),
});

/**
 * Gemini settings. The API key itself is a per-user setting, not config.
 */
export const AIConfigSchema = z.object({
  model: z.string().min(1).describe('Gemini model name'),
  base_url: z.string().url().describe('Generative Language API base URL'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(120000)
    .describe('Request timeout in milliseconds (1000-120000, default 30000)'),
  chat_context_messages: z
    .number()
    .int()
    .min(1)
    .max(100)
    .describe('Chat turns sent as context with each message'),
  chat_history_limit: z
    .number()
    .int()
    .min(1)
    .max(500)
    .describe('Chat messages loaded when the chat screen opens'),
});

/**
 * Pomodoro fallbacks. Per-user settings override the first three.
 */
export const PomodoroConfigSchema = z.object({
  work_minutes: z.number().int().min(1).max(180),
  break_minutes: z.number().int().min(1).max(180),
  long_break_minutes: z.number().int().min(1).max(180),
  cycles_before_long_break: z
    .number()
    .int()
    .min(1)
    .max(12)
    .describe('Completed work phases before a long break'),
});

export const QuizConfigSchema = z.object({
  default_questions: z
    .number()
    .int()
    .min(3)
    .max(10)
    .describe('Questions per generated quiz (3-10)'),
});

export const AuthConfigSchema = z.object({
  bcrypt_rounds: z
    .number()
    .int()
    .min(4)
    .max(15)
    .describe('bcrypt cost factor for new password hashes (4-15)'),
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  database: DatabaseConfigSchema,
  ai: AIConfigSchema,
  pomodoro: PomodoroConfigSchema,
  quiz: QuizConfigSchema,
  auth: AuthConfigSchema,
});

/**
 * TypeScript type inferred from the schema
 * Use this for type-safe config access throughout the codebase
 */
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Partial config for merging user overrides with defaults
 * Every field becomes optional, allowing sparse config files
 */
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
