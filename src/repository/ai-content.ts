/**
 * AI Content Archive
 *
 * Saved explanations, summaries, practice questions and chat snapshots,
 * browsed from the Review Hub. Append-only.
 */

import { z } from 'zod';
import { NotFoundError } from '../errors/index.js';
import { AI_CONTENT_KINDS, type AIContent, type AIContentKind } from '../database/schema.js';
import { AIContentRowSchema, validateRow, validateRows } from '../database/validation.js';
import { OwnedRepository, parseInput } from './base.js';
import { AIContentInputSchema, type AIContentInput } from './inputs.js';

/** Title prefixes, also used by the Review Hub */
export const AI_CONTENT_LABELS: Record<AIContentKind, string> = {
  explanation: 'Explanation',
  summary: 'Summary',
  questions: 'Practice Questions',
  chat_snapshot: 'Chat',
};

const TITLE_PREVIEW_LENGTH = 50;

/**
 * `"<Kind>: <first 50 characters of the prompt>..."`
 */
export function defaultContentTitle(kind: AIContentKind, prompt: string): string {
  const flat = prompt.replace(/\s+/g, ' ').trim();
  const preview =
    flat.length > TITLE_PREVIEW_LENGTH ? `${flat.slice(0, TITLE_PREVIEW_LENGTH)}...` : flat;
  return `${AI_CONTENT_LABELS[kind]}: ${preview}`;
}

const ContentListOptionsSchema = z
  .object({
    kind: z.enum(AI_CONTENT_KINDS).optional(),
    limit: z.number().int().min(1).max(1000).optional(),
  })
  .default({});

export class AIContentRepository extends OwnedRepository {
  save(input: AIContentInput): AIContent {
    const data = parseInput(AIContentInputSchema, input, 'saved content');
    const title = data.title ? data.title : defaultContentTitle(data.kind, data.prompt);

    return this.write('Save AI content', () => {
      const result = this.db
        .prepare(
          `INSERT INTO ai_content (owner_user_id, kind, title, prompt, response_text, created_at)
           VALUES (?, ?, ?, ?, ?, ?)`
        )
        .run(this.ownerId, data.kind, title, data.prompt, data.responseText, this.now());
      return this.get(Number(result.lastInsertRowid));
    });
  }

  get(id: number): AIContent {
    return this.read('Load AI content', () => {
      const row = this.db
        .prepare('SELECT * FROM ai_content WHERE id = ? AND owner_user_id = ?')
        .get(id, this.ownerId);
      if (!row) {
        throw new NotFoundError('Saved content', id);
      }
      return validateRow(AIContentRowSchema, row, `ai_content.id=${id}`);
    });
  }

  /**
   * Newest first, optionally one kind only.
   */
  list(options: { kind?: AIContentKind; limit?: number } = {}): AIContent[] {
    const { kind, limit } = parseInput(ContentListOptionsSchema, options, 'list options');

    return this.read('List AI content', () => {
      const rows = kind
        ? this.db
            .prepare(
              `SELECT * FROM ai_content WHERE owner_user_id = ? AND kind = ?
               ORDER BY created_at DESC, id DESC LIMIT ?`
            )
            .all(this.ownerId, kind, limit ?? -1)
        : this.db
            .prepare(
              `SELECT * FROM ai_content WHERE owner_user_id = ?
               ORDER BY created_at DESC, id DESC LIMIT ?`
            )
            .all(this.ownerId, limit ?? -1);
      return validateRows(AIContentRowSchema, rows, 'ai_content');
    });
  }
}
