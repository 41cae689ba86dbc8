/**
 * Error handling module for StudyDesk
 *
 * This module exports:
 * - Custom error classes for different error types
 * - Error formatting, exit codes and screen dispositions
 *
 * Usage:
 *   import { ValidationError, formatError } from './errors/index.js';
 *
 *   throw new ValidationError('Invalid task', ['title: Title cannot be empty']);
 */

// Error types
export {
  CLIError,
  FileNotFoundError,
  ConfigError,
  MissingAPIKeyError,
  StoreError,
  BackupError,
  ValidationError,
  NotFoundError,
  InvalidCredentialsError,
  DuplicateUsernameError,
  NetworkError,
  AIServiceError,
  MalformedQuizResponseError,
  RequestAbandonedError,
  InvalidTransitionError,
} from './types.js';

// Error handling utilities
export {
  formatError,
  getExitCode,
  getErrorDisposition,
  handleError,
  createGlobalErrorHandler,
  type ErrorDisposition,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
