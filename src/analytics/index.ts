export {
  AnalyticsAggregator,
  computeStreak,
  computeLearningPoints,
  LEARNING_POINTS_WEIGHTS,
  RECENT_QUIZ_COUNT,
  TOP_SUBJECT_COUNT,
  type TaskCompletion,
  type StudySummary,
  type QuizPerformance,
  type LearningPointCounts,
  type AnalyticsSummary,
  type AnalyticsOptions,
} from './aggregator.js';
