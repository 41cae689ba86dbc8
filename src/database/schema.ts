/**
 * Database Schema Types
 *
 * Domain shapes for the rows StudyDesk stores. Repositories hand these out
 * (camelCase); the snake_case row shapes live in validation.ts.
 */

// ============================================================================
// Enumerations
// ============================================================================

export const TASK_STATUSES = ['pending', 'completed'] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export const AI_CONTENT_KINDS = ['explanation', 'summary', 'questions', 'chat_snapshot'] as const;
export type AIContentKind = (typeof AI_CONTENT_KINDS)[number];

export const CHAT_ROLES = ['user', 'model'] as const;
export type ChatRole = (typeof CHAT_ROLES)[number];

export const SETTING_KEYS = [
  'gemini_api_key',
  'pomodoro_work_minutes',
  'pomodoro_break_minutes',
  'pomodoro_long_break_minutes',
] as const;
export type SettingKey = (typeof SETTING_KEYS)[number];

/** Tables a usable StudyDesk database (or backup) must contain */
export const APPLICATION_TABLES = [
  'users',
  'categories',
  'tasks',
  'study_logs',
  'quiz_results',
  'ai_content',
  'settings',
] as const;

/** Tables later migrations add; a restored backup gains them when upgraded */
export const SUPPLEMENTARY_TABLES = ['chat_messages'] as const;

/** Categories every new account starts with */
export const DEFAULT_CATEGORIES = ['General', 'Academic', 'Personal', 'Project', 'Urgent'] as const;

// ============================================================================
// Users Table
// ============================================================================

/**
 * A registered account. The password hash never leaves the auth service.
 */
export interface User {
  id: number;
  /** Unique, case-sensitive */
  username: string;
  createdAt: string;
}

// ============================================================================
// Categories Table
// ============================================================================

export interface Category {
  id: number;
  ownerUserId: number;
  name: string;
  createdAt: string;
}

// ============================================================================
// Tasks Table
// ============================================================================

export interface Task {
  id: number;
  ownerUserId: number;
  title: string;
  /** NULL means Uncategorized */
  categoryId: number | null;
  /** Joined from categories for display */
  categoryName: string | null;
  /** `YYYY-MM-DD` */
  dueDate: string | null;
  status: TaskStatus;
  createdAt: string;
  /** Set while status is completed, NULL otherwise */
  completedAt: string | null;
}

// ============================================================================
// Study Logs Table
// ============================================================================

export interface StudyLog {
  id: number;
  ownerUserId: number;
  subject: string;
  durationMinutes: number;
  notes: string | null;
  loggedAt: string;
}

// ============================================================================
// Quiz Results Table
// ============================================================================

/**
 * One multiple-choice question as produced by the quiz parser.
 */
export interface QuizQuestion {
  question: string;
  /** Always four choices */
  choices: string[];
  /** 0-3 */
  correctIndex: number;
  explanation: string;
}

/**
 * A question together with the user's answer (null when skipped).
 */
export interface AnsweredQuestion extends QuizQuestion {
  selectedIndex: number | null;
}

export interface QuizResult {
  id: number;
  ownerUserId: number;
  topic: string;
  score: number;
  totalQuestions: number;
  /** Empty when the result was stored without its questions */
  questions: AnsweredQuestion[];
  takenAt: string;
}

// ============================================================================
// AI Content Table
// ============================================================================

export interface AIContent {
  id: number;
  ownerUserId: number;
  kind: AIContentKind;
  title: string;
  prompt: string;
  responseText: string;
  createdAt: string;
}

// ============================================================================
// Chat Messages Table
// ============================================================================

export interface ChatMessage {
  id: number;
  ownerUserId: number;
  role: ChatRole;
  content: string;
  createdAt: string;
}

// ============================================================================
// Settings Table
// ============================================================================

export interface Setting {
  key: string;
  value: string;
  updatedAt: string;
}
