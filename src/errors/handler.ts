/**
 * Error handler for StudyDesk
 *
 * This module provides:
 * - Colored error output for the terminal
 * - JSON output for programmatic use
 * - Verbose mode with stack traces
 * - The disposition table the interactive screens use to decide what a
 *   failure does to the current screen
 */

import chalk from 'chalk';
import {
  AIServiceError,
  BackupError,
  CLIError,
  DuplicateUsernameError,
  FileNotFoundError,
  InvalidCredentialsError,
  MalformedQuizResponseError,
  MissingAPIKeyError,
  NetworkError,
  NotFoundError,
  RequestAbandonedError,
  ValidationError,
} from './types.js';

/**
 * Options for error handling behavior
 */
export interface ErrorHandlerOptions {
  /** Show full stack traces */
  verbose?: boolean;
  /** Output as JSON instead of formatted text */
  json?: boolean;
}

/**
 * Structured error for JSON output
 */
export interface ErrorOutput {
  error: string;
  code: number;
  hint?: string;
  stack?: string;
}

/**
 * What an error does to the screen the user is on.
 *
 * - inline: show next to the input, stay on the screen
 * - form: authentication form error, stay on the login/register form
 * - settings-hint: tell the user to configure the API key in Settings
 * - dialog: dismissable error box, the screen stays usable for a retry
 * - notice: informational, nothing failed on the user's side
 * - not-found: log the details, show a generic message, stay
 * - recover: fatal to the operation, return to the main menu
 */
export type ErrorDisposition =
  | 'inline'
  | 'form'
  | 'settings-hint'
  | 'dialog'
  | 'notice'
  | 'not-found'
  | 'recover';

/**
 * Map an error to its disposition.
 *
 * Anything that is not a known application error is treated as a failed
 * operation and returns the user to the main menu.
 */
export function getErrorDisposition(error: unknown): ErrorDisposition {
  if (error instanceof ValidationError) return 'inline';
  if (error instanceof InvalidCredentialsError || error instanceof DuplicateUsernameError) {
    return 'form';
  }
  if (error instanceof MissingAPIKeyError) return 'settings-hint';
  if (
    error instanceof NetworkError ||
    error instanceof AIServiceError ||
    error instanceof MalformedQuizResponseError ||
    error instanceof BackupError ||
    error instanceof FileNotFoundError
  ) {
    return 'dialog';
  }
  if (error instanceof RequestAbandonedError) return 'notice';
  if (error instanceof NotFoundError) return 'not-found';
  // StoreError, SchemaValidationError, InvalidTransitionError and unknown errors
  return 'recover';
}

/**
 * Format an error for display.
 */
export function formatError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): string {
  const { verbose = false, json = false } = options;

  if (error instanceof CLIError) {
    if (json) {
      const output: ErrorOutput = {
        error: error.message,
        code: error.code,
        hint: error.hint,
        stack: verbose ? error.stack : undefined,
      };
      return JSON.stringify(output, null, 2);
    }

    const lines: string[] = [];
    lines.push(chalk.red('Error: ') + error.message);

    if (error.hint) {
      lines.push(chalk.dim('Hint: ') + error.hint);
    }

    if (verbose && error.stack) {
      lines.push('');
      lines.push(chalk.dim('Stack trace:'));
      lines.push(chalk.dim(error.stack));
    }

    return lines.join('\n');
  }

  if (error instanceof Error) {
    if (json) {
      const output: ErrorOutput = {
        error: error.message,
        code: 1,
        stack: verbose ? error.stack : undefined,
      };
      return JSON.stringify(output, null, 2);
    }

    const lines: string[] = [];
    lines.push(chalk.red('Error: ') + error.message);

    if (verbose && error.stack) {
      lines.push('');
      lines.push(chalk.dim('Stack trace:'));
      lines.push(chalk.dim(error.stack));
    } else {
      lines.push(chalk.dim('Hint: ') + 'Run with --verbose for more details');
    }

    return lines.join('\n');
  }

  if (json) {
    return JSON.stringify({ error: String(error), code: 1 }, null, 2);
  }

  return chalk.red('Error: ') + String(error);
}

/**
 * Get the exit code for an error.
 *
 * CLIError has a specific code, everything else is 1.
 */
export function getExitCode(error: unknown): number {
  if (error instanceof CLIError) {
    return error.code;
  }
  return 1;
}

/**
 * Handle an error by formatting and exiting.
 *
 * Only used outside the interactive loop (startup, config subcommands).
 */
export function handleError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): never {
  const formatted = formatError(error, options);
  const code = getExitCode(error);

  console.error(formatted);

  process.exit(code);
}

/**
 * Create a global error handler that can be attached to process events.
 *
 * Usage:
 *   const handler = createGlobalErrorHandler({ verbose: true });
 *   process.on('uncaughtException', handler);
 *   process.on('unhandledRejection', handler);
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
