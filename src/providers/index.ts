/**
 * AI Providers Module
 *
 * The Gemini gateway and the helpers around it.
 */

export {
  GeminiGateway,
  DEFAULT_GEMINI_MODEL,
  DEFAULT_GEMINI_BASE_URL,
  DEFAULT_GEMINI_TIMEOUT_MS,
  DEFAULT_CHAT_CONTEXT_MESSAGES,
  MIN_QUIZ_QUESTIONS,
  MAX_QUIZ_QUESTIONS,
  type ApiKeyResolver,
  type FetchLike,
  type GeminiGatewayOptions,
} from './gemini.js';

export {
  HELPER_MODES,
  HELPER_MODE_KINDS,
  type AIMode,
  type HelperMode,
  type AskOptions,
  type ChatTurn,
  type AIGateway,
} from './types.js';

export { SYSTEM_INSTRUCTIONS, QUIZ_RESPONSE_SCHEMA, buildQuizPrompt } from './templates.js';
export { parseQuizResponse, QuizQuestionSchema } from './quiz-parser.js';
export {
  GeminiKeySchema,
  checkGeminiKeyFormat,
  maskApiKey,
  type KeyCheckResult,
} from './validation.js';
