/**
 * Analytics Aggregator
 *
 * Read-only aggregates over one user's tasks, study logs and quiz results,
 * shown on the Analytics screen.
 *
 * Public surface:
 * - computeStreak(dates, today) - pure streak walk over calendar days
 * - computeLearningPoints(counts) - fixed-weight points
 * - AnalyticsAggregator - repository-backed summaries
 */

import type { QuizResult } from '../database/schema.js';
import type { DateRange, DomainRepository, SubjectTotal } from '../repository/index.js';
import { addDays, systemClock, toDateKey, type Clock } from '../utils/dates.js';

// ============================================================================
// CONSTANTS
// ============================================================================

/**
 * Learning points per completed task, per logged study session and per
 * correct quiz answer. Not user-adjustable.
 */
export const LEARNING_POINTS_WEIGHTS = {
  completedTask: 10,
  studySession: 5,
  correctAnswer: 1,
} as const;

/** Quiz results listed under "recent" */
export const RECENT_QUIZ_COUNT = 5;

/** Subjects listed under "top subjects" */
export const TOP_SUBJECT_COUNT = 3;

// ============================================================================
// TYPES
// ============================================================================

export interface TaskCompletion {
  total: number;
  completed: number;
  pending: number;
  /** completed / total, 0-1; 0 when there are no tasks */
  rate: number;
}

export interface StudySummary {
  sessions: number;
  totalMinutes: number;
  /** Distinct days studied in the last 7 days, today included */
  daysLast7: number;
  /** Distinct days studied in the last 30 days, today included */
  daysLast30: number;
  topSubjects: SubjectTotal[];
}

export interface QuizPerformance {
  taken: number;
  /** Mean of score/total across results, 0-1 */
  averageScore: number;
  totalCorrect: number;
  recent: QuizResult[];
}

export interface LearningPointCounts {
  completedTasks: number;
  studySessions: number;
  correctAnswers: number;
}

export interface AnalyticsSummary {
  tasks: TaskCompletion;
  study: StudySummary;
  quizzes: QuizPerformance;
  streak: number;
  learningPoints: number;
}

export interface AnalyticsOptions {
  now?: Clock;
}

// ============================================================================
// PURE HELPERS
// ============================================================================

/**
 * Consecutive calendar days with study, ending today or yesterday.
 *
 * Walks backward from the most recent day until the first gap. A streak
 * whose latest day is older than yesterday has ended, so it counts as 0.
 *
 * @param dates - distinct `YYYY-MM-DD` days, any order
 * @param today - `YYYY-MM-DD`
 */
export function computeStreak(dates: readonly string[], today: string): number {
  const days = new Set(dates);
  const yesterday = addDays(today, -1);

  let cursor: string;
  if (days.has(today)) {
    cursor = today;
  } else if (days.has(yesterday)) {
    cursor = yesterday;
  } else {
    return 0;
  }

  let streak = 0;
  while (days.has(cursor)) {
    streak++;
    cursor = addDays(cursor, -1);
  }
  return streak;
}

export function computeLearningPoints(counts: LearningPointCounts): number {
  return (
    counts.completedTasks * LEARNING_POINTS_WEIGHTS.completedTask +
    counts.studySessions * LEARNING_POINTS_WEIGHTS.studySession +
    counts.correctAnswers * LEARNING_POINTS_WEIGHTS.correctAnswer
  );
}

// ============================================================================
// AGGREGATOR
// ============================================================================

export class AnalyticsAggregator {
  private readonly now: Clock;

  constructor(
    private readonly repository: DomainRepository,
    options: AnalyticsOptions = {}
  ) {
    this.now = options.now ?? systemClock;
  }

  taskCompletion(range?: DateRange): TaskCompletion {
    const { total, completed } = this.repository.tasks.completionCounts(range);
    return {
      total,
      completed,
      pending: total - completed,
      rate: total === 0 ? 0 : completed / total,
    };
  }

  studyTotals(): StudySummary {
    const today = this.today();
    const totals = this.repository.studyLogs.totals();
    return {
      sessions: totals.sessions,
      totalMinutes: totals.totalMinutes,
      daysLast7: this.repository.studyLogs.daysStudiedSince(addDays(today, -6)),
      daysLast30: this.repository.studyLogs.daysStudiedSince(addDays(today, -29)),
      topSubjects: this.repository.studyLogs.topSubjects(TOP_SUBJECT_COUNT),
    };
  }

  quizPerformance(): QuizPerformance {
    const totals = this.repository.quizzes.totals();
    return {
      taken: totals.taken,
      averageScore: totals.averageRatio,
      totalCorrect: totals.totalCorrect,
      recent: this.repository.quizzes.list({ limit: RECENT_QUIZ_COUNT }),
    };
  }

  studyStreak(): number {
    return computeStreak(this.repository.studyLogs.studyDates(), this.today());
  }

  learningPoints(): number {
    return computeLearningPoints({
      completedTasks: this.repository.tasks.completionCounts().completed,
      studySessions: this.repository.studyLogs.totals().sessions,
      correctAnswers: this.repository.quizzes.totals().totalCorrect,
    });
  }

  summary(): AnalyticsSummary {
    const tasks = this.taskCompletion();
    const study = this.studyTotals();
    const quizzes = this.quizPerformance();

    return {
      tasks,
      study,
      quizzes,
      streak: this.studyStreak(),
      learningPoints: computeLearningPoints({
        completedTasks: tasks.completed,
        studySessions: study.sessions,
        correctAnswers: quizzes.totalCorrect,
      }),
    };
  }

  private today(): string {
    return toDateKey(this.now());
  }
}
