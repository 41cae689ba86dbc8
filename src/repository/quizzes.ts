/**
 * Quiz Results
 *
 * Append-only: results are recorded once and never edited or deleted.
 */

import { z } from 'zod';
import { NotFoundError } from '../errors/index.js';
import type { QuizResult } from '../database/schema.js';
import { QuizResultRowSchema, validateRow, validateRows } from '../database/validation.js';
import { OwnedRepository, parseInput } from './base.js';
import { ListLimitSchema, QuizRecordSchema, type QuizRecordInput } from './inputs.js';

export interface QuizTotals {
  taken: number;
  /** Sum of scores across all results */
  totalCorrect: number;
  totalQuestions: number;
  /** Mean of score/total per result, 0-1; 0 when no quizzes */
  averageRatio: number;
}

const QuizTotalsRowSchema = z
  .object({
    taken: z.number().int().nonnegative(),
    total_correct: z.number().int().nonnegative(),
    total_questions: z.number().int().nonnegative(),
    average_ratio: z.number().min(0).max(1),
  })
  .transform(
    (row): QuizTotals => ({
      taken: row.taken,
      totalCorrect: row.total_correct,
      totalQuestions: row.total_questions,
      averageRatio: row.average_ratio,
    })
  );

export class QuizResultRepository extends OwnedRepository {
  record(input: QuizRecordInput): QuizResult {
    const data = parseInput(QuizRecordSchema, input, 'quiz result');
    const questionsJson = data.questions ? JSON.stringify(data.questions) : null;

    return this.write('Save quiz result', () => {
      const result = this.db
        .prepare(
          `INSERT INTO quiz_results (owner_user_id, topic, score, total_questions, questions_json, taken_at)
           VALUES (?, ?, ?, ?, ?, ?)`
        )
        .run(this.ownerId, data.topic, data.score, data.totalQuestions, questionsJson, this.now());
      return this.get(Number(result.lastInsertRowid));
    });
  }

  get(id: number): QuizResult {
    return this.read('Load quiz result', () => {
      const row = this.db
        .prepare('SELECT * FROM quiz_results WHERE id = ? AND owner_user_id = ?')
        .get(id, this.ownerId);
      if (!row) {
        throw new NotFoundError('Quiz result', id);
      }
      return validateRow(QuizResultRowSchema, row, `quiz_results.id=${id}`);
    });
  }

  /**
   * Newest first.
   */
  list(options: { limit?: number } = {}): QuizResult[] {
    const { limit } = parseInput(ListLimitSchema, options, 'list options');

    return this.read('List quiz results', () => {
      const rows = this.db
        .prepare(
          `SELECT * FROM quiz_results WHERE owner_user_id = ?
           ORDER BY taken_at DESC, id DESC LIMIT ?`
        )
        .all(this.ownerId, limit ?? -1);
      return validateRows(QuizResultRowSchema, rows, 'quiz_results');
    });
  }

  totals(): QuizTotals {
    return this.read('Sum quiz results', () => {
      const row = this.db
        .prepare(
          `SELECT COUNT(*) AS taken,
                  COALESCE(SUM(score), 0) AS total_correct,
                  COALESCE(SUM(total_questions), 0) AS total_questions,
                  COALESCE(AVG(CAST(score AS REAL) / total_questions), 0) AS average_ratio
           FROM quiz_results WHERE owner_user_id = ?`
        )
        .get(this.ownerId);
      return validateRow(QuizTotalsRowSchema, row, 'quiz_results.totals');
    });
  }
}
