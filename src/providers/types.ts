/**
 * AI Gateway types
 *
 * Screens talk to the generative API only through AIGateway.
 */

import type { AIContentKind, ChatRole, QuizQuestion } from '../database/schema.js';

/** Selects the system instruction sent with a request */
export type AIMode = 'explain' | 'summarize' | 'questions' | 'quiz' | 'chat' | 'quote';

/** The three AI Helper actions, whose answers can be archived */
export const HELPER_MODES = ['explain', 'summarize', 'questions'] as const;
export type HelperMode = (typeof HELPER_MODES)[number];

/** Archive kind a helper answer is saved under */
export const HELPER_MODE_KINDS: Record<HelperMode, AIContentKind> = {
  explain: 'explanation',
  summarize: 'summary',
  questions: 'questions',
};

export interface AskOptions {
  /** Abort to stop waiting (RequestAbandonedError) */
  signal?: AbortSignal;
}

export interface ChatTurn {
  role: ChatRole;
  content: string;
}

export interface AIGateway {
  /** One prompt, one answer */
  ask(prompt: string, mode: AIMode, options?: AskOptions): Promise<string>;
  /** Answer the last user turn of a conversation */
  chat(history: ChatTurn[], options?: AskOptions): Promise<string>;
  /** Multiple-choice questions about `topic`, at most `count` */
  generateQuiz(topic: string, count: number, options?: AskOptions): Promise<QuizQuestion[]>;
  /** Drop the cached API key (logout, key change) */
  forgetApiKey(): void;
}
