/**
 * Default Configuration Values
 *
 * These are used when:
 * 1. No config.toml exists (first run)
 * 2. User's config.toml is missing certain fields
 *
 * The loader merges user config ON TOP of these defaults.
 */

import type { Config } from './schema.js';

export const DEFAULT_CONFIG: Config = {
  // Resolved at startup when unset (see resolveDbPath)
  database: {},

  ai: {
    model: 'gemini-2.0-flash',
    base_url: 'https://generativelanguage.googleapis.com/v1beta',
    timeout_ms: 30000,
    chat_context_messages: 20,
    chat_history_limit: 50,
  },

  pomodoro: {
    work_minutes: 25,
    break_minutes: 5,
    long_break_minutes: 15,
    cycles_before_long_break: 4,
  },

  quiz: {
    default_questions: 5,
  },

  auth: {
    bcrypt_rounds: 12,
  },
};

/**
 * Config file template (TOML format)
 * Written to ~/.studydesk/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# StudyDesk Configuration
# Location: ~/.studydesk/config.toml

[database]
# path = "~/.studydesk/studydesk.db"

# Gemini settings
# The API key is saved per user from the Settings screen
[ai]
model = "${DEFAULT_CONFIG.ai.model}"
base_url = "${DEFAULT_CONFIG.ai.base_url}"
timeout_ms = ${DEFAULT_CONFIG.ai.timeout_ms}
chat_context_messages = ${DEFAULT_CONFIG.ai.chat_context_messages}
chat_history_limit = ${DEFAULT_CONFIG.ai.chat_history_limit}

# Fallback durations; each user can override them in Settings
[pomodoro]
work_minutes = ${DEFAULT_CONFIG.pomodoro.work_minutes}
break_minutes = ${DEFAULT_CONFIG.pomodoro.break_minutes}
long_break_minutes = ${DEFAULT_CONFIG.pomodoro.long_break_minutes}
cycles_before_long_break = ${DEFAULT_CONFIG.pomodoro.cycles_before_long_break}

[quiz]
default_questions = ${DEFAULT_CONFIG.quiz.default_questions}

[auth]
bcrypt_rounds = ${DEFAULT_CONFIG.auth.bcrypt_rounds}
`;
