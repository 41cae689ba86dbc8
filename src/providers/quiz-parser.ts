/**
 * Quiz Response Parser
 *
 * Turns model output into QuizQuestion items. Accepts:
 * - a JSON array, bare or inside a Markdown code fence
 * - an object with a `questions` array
 * - `question`/`question_text`, `choices`/`options`,
 *   `correct_index`/`correct_option_index`/`correctIndex`
 *
 * Items that do not make a valid four-choice question are dropped.
 */

import { z } from 'zod';
import { MalformedQuizResponseError } from '../errors/index.js';
import type { QuizQuestion } from '../database/schema.js';
import { extractJsonPayload, safeJsonParse } from '../utils/json.js';

const IndexSchema = z.union([
  z.number(),
  z
    .string()
    .regex(/^\s*\d\s*$/)
    .transform(Number),
]);

const RawQuestionSchema = z
  .object({
    question: z.string().optional(),
    question_text: z.string().optional(),
    choices: z.array(z.string()).optional(),
    options: z.array(z.string()).optional(),
    correct_index: IndexSchema.optional(),
    correct_option_index: IndexSchema.optional(),
    correctIndex: IndexSchema.optional(),
    explanation: z.string().optional(),
  })
  .transform((raw) => ({
    question: raw.question ?? raw.question_text,
    choices: raw.choices ?? raw.options,
    correctIndex: raw.correct_index ?? raw.correct_option_index ?? raw.correctIndex,
    explanation: raw.explanation ?? '',
  }));

export const QuizQuestionSchema = z.object({
  question: z.string().trim().min(1),
  choices: z.array(z.string().trim().min(1)).length(4),
  correctIndex: z.number().int().min(0).max(3),
  explanation: z.string().trim(),
});

const WrappedSchema = z.object({ questions: z.array(z.unknown()) });

function toItems(value: unknown): unknown[] | undefined {
  if (Array.isArray(value)) return value;
  const wrapped = WrappedSchema.safeParse(value);
  return wrapped.success ? wrapped.data.questions : undefined;
}

/**
 * Find the question list in `text`, trying the fenced/whole payload first
 * and then the outermost `[...]` span.
 */
function findItems(text: string): unknown[] | undefined {
  const payload = extractJsonPayload(text);
  const direct = toItems(safeJsonParse(payload, undefined));
  if (direct) return direct;

  const start = payload.indexOf('[');
  const end = payload.lastIndexOf(']');
  if (start !== -1 && end > start) {
    return toItems(safeJsonParse(payload.slice(start, end + 1), undefined));
  }
  return undefined;
}

/**
 * Parse up to `count` questions from a model response.
 *
 * @throws MalformedQuizResponseError when the text holds no usable question
 */
export function parseQuizResponse(text: string, count: number): QuizQuestion[] {
  if (!text.trim()) {
    throw new MalformedQuizResponseError('the response was empty');
  }

  const items = findItems(text);
  if (!items) {
    throw new MalformedQuizResponseError('the response was not a JSON list of questions');
  }

  const questions: QuizQuestion[] = [];
  for (const item of items) {
    const raw = RawQuestionSchema.safeParse(item);
    if (!raw.success) continue;
    const question = QuizQuestionSchema.safeParse(raw.data);
    if (question.success) {
      questions.push(question.data);
    }
    if (questions.length === count) break;
  }

  if (questions.length === 0) {
    throw new MalformedQuizResponseError('no valid questions');
  }

  return questions;
}
