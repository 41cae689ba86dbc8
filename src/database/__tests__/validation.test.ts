/**
 * Tests for database row validation
 */

import { describe, it, expect } from 'vitest';
import {
  TaskRowSchema,
  QuizResultRowSchema,
  StudyLogRowSchema,
  SchemaValidationError,
  validateRow,
  validateRows,
} from '../validation.js';

const taskRow = {
  id: 4,
  owner_user_id: 1,
  title: 'Read chapter 3',
  category_id: null,
  category_name: null,
  due_date: '2024-03-20',
  status: 'pending',
  created_at: '2024-03-15 10:00:00',
  completed_at: null,
};

const question = {
  question: 'What is 2 + 2?',
  choices: ['3', '4', '5', '6'],
  correctIndex: 1,
  explanation: 'Two pairs make four.',
  selectedIndex: 1,
};

describe('Row schemas', () => {
  it('turns a task row into a camelCase task', () => {
    expect(validateRow(TaskRowSchema, taskRow, 'tasks.id=4')).toEqual({
      id: 4,
      ownerUserId: 1,
      title: 'Read chapter 3',
      categoryId: null,
      categoryName: null,
      dueDate: '2024-03-20',
      status: 'pending',
      createdAt: '2024-03-15 10:00:00',
      completedAt: null,
    });
  });

  it('rejects an unknown task status', () => {
    expect(TaskRowSchema.safeParse({ ...taskRow, status: 'archived' }).success).toBe(false);
  });

  describe('quiz results', () => {
    const row = {
      id: 2,
      owner_user_id: 1,
      topic: 'Arithmetic',
      score: 1,
      total_questions: 1,
      questions_json: JSON.stringify([question]),
      taken_at: '2024-03-15 10:00:00',
    };

    it('parses stored questions', () => {
      const result = validateRow(QuizResultRowSchema, row, 'quiz_results.id=2');
      expect(result.questions).toEqual([question]);
      expect(result.totalQuestions).toBe(1);
    });

    it('yields no questions for NULL or unreadable JSON', () => {
      expect(validateRow(QuizResultRowSchema, { ...row, questions_json: null }, 'q').questions).toEqual([]);
      expect(validateRow(QuizResultRowSchema, { ...row, questions_json: '[{' }, 'q').questions).toEqual([]);
      expect(
        validateRow(QuizResultRowSchema, { ...row, questions_json: '[{"question":"x"}]' }, 'q').questions
      ).toEqual([]);
    });
  });
});

describe('validateRow', () => {
  it('throws SchemaValidationError with the context', () => {
    const bad = { ...taskRow, id: 'four' };

    expect(() => validateRow(TaskRowSchema, bad, 'tasks.id=4')).toThrow(SchemaValidationError);
    expect(() => validateRow(TaskRowSchema, bad, 'tasks.id=4')).toThrow(
      'Database schema mismatch in tasks.id=4'
    );
  });

  it('lists issue paths', () => {
    try {
      validateRow(StudyLogRowSchema, { id: 1 }, 'study_logs.id=1');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SchemaValidationError);
      if (error instanceof SchemaValidationError) {
        expect(error.issues.map((i) => i.path)).toEqual([
          'owner_user_id',
          'subject',
          'duration_minutes',
          'notes',
          'logged_at',
        ]);
        expect(error.code).toBe(5);
        expect(error.hint).toContain('... and 2 more');
      }
    }
  });
});

describe('validateRows', () => {
  it('validates every row', () => {
    const rows = validateRows(TaskRowSchema, [taskRow, { ...taskRow, id: 5 }], 'tasks');
    expect(rows.map((t) => t.id)).toEqual([4, 5]);
  });

  it('names the index of the first bad row', () => {
    expect(() => validateRows(TaskRowSchema, [taskRow, { ...taskRow, status: 'x' }], 'tasks')).toThrow(
      'Database schema mismatch in tasks[1]'
    );
  });
});
