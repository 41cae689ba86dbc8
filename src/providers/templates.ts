/**
 * System instructions per AI mode.
 */

import type { AIMode } from './types.js';

export const SYSTEM_INSTRUCTIONS: Record<AIMode, string> = {
  explain:
    'You are a patient tutor. Explain the given topic or text clearly for a student, ' +
    'starting from the core idea, then key details, then a short example.',
  summarize:
    'You are a study assistant. Summarize the given text into concise bullet points ' +
    'that keep every key fact, definition and conclusion.',
  questions:
    'You are a study assistant. Write practice questions with short answers that test ' +
    'understanding of the given topic or text. Number the questions.',
  quiz:
    'You write multiple-choice quizzes. Reply with JSON only: an array of objects with ' +
    '"question", "choices" (exactly 4 strings), "correct_index" (0-3) and "explanation".',
  chat: 'You are a friendly, knowledgeable study companion. Keep answers focused and practical.',
  quote:
    'You write one short, original motivational quote for a student. ' +
    'Reply with the quote only: no quotation marks, no attribution.',
};

export const QUOTE_PROMPT = 'A short, unique, inspiring motivational quote for a student. Concise.';

/** Main-menu line when no quote can be fetched */
export const FALLBACK_QUOTE = 'Keep going!';

export function buildQuizPrompt(topic: string, count: number): string {
  return (
    `Create ${count} multiple-choice questions about: ${topic}\n` +
    'Each question has exactly 4 choices and one correct answer.'
  );
}

/**
 * Response schema for quiz requests (Gemini's OpenAPI subset).
 */
export const QUIZ_RESPONSE_SCHEMA = {
  type: 'ARRAY',
  items: {
    type: 'OBJECT',
    properties: {
      question: { type: 'STRING' },
      choices: { type: 'ARRAY', items: { type: 'STRING' } },
      correct_index: { type: 'INTEGER' },
      explanation: { type: 'STRING' },
    },
    required: ['question', 'choices', 'correct_index', 'explanation'],
  },
} as const;
