/**
 * Error type definitions for StudyDesk
 *
 * Every failure the application surfaces is one of these classes. Each one
 * carries:
 * - a message for the user
 * - an optional recovery hint
 * - an exit code, used when a failure ends a non-interactive command
 *
 * The interactive screens never exit on these errors; they map them to a
 * disposition instead (see getErrorDisposition in handler.ts).
 */

/**
 * Base class for all StudyDesk errors.
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when a file or directory doesn't exist.
 *
 * Exit code 3: File not found
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(`Path does not exist: ${path}`, 'Check the path and try again', 3);
    this.name = 'FileNotFoundError';
  }
}

/**
 * Thrown for configuration-related errors (bad TOML, bad values).
 *
 * Exit code 2: Configuration error
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Run: studydesk config list  to see valid options', 2);
    this.name = 'ConfigError';
  }
}

/**
 * Thrown by the AI gateway when no Gemini API key is configured.
 *
 * Raised before any network traffic happens.
 *
 * Exit code 4: API key error
 */
export class MissingAPIKeyError extends CLIError {
  constructor() {
    super(
      'Gemini API key not configured',
      'Open Settings from the main menu and save your Gemini API key',
      4
    );
    this.name = 'MissingAPIKeyError';
  }
}

/**
 * Thrown for database I/O failures.
 *
 * Wraps the underlying SQLite error. Fatal to the current operation only.
 *
 * Exit code 5: Database error
 */
export class StoreError extends CLIError {
  /** The original database error for debugging */
  public readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message, 'Check that the database file is writable and not corrupted', 5);
    this.name = 'StoreError';
    this.cause = cause;
  }
}

/**
 * Thrown when a backup file cannot be restored (wrong format, corrupt,
 * or missing application tables).
 *
 * Exit code 5: Database error
 */
export class BackupError extends CLIError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Choose a file created with the Settings backup action', 5);
    this.name = 'BackupError';
  }
}

/**
 * Thrown when input validation fails.
 *
 * Used with Zod schemas to provide field-level errors.
 *
 * Exit code 1: General error
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Thrown when a referenced entity does not exist for the current owner.
 *
 * Another user's rows are reported exactly like missing rows.
 *
 * Exit code 6: Not found
 */
export class NotFoundError extends CLIError {
  public readonly entity: string;
  public readonly id: number | string;

  constructor(entity: string, id: number | string) {
    super(`${entity} #${id} not found`, 'Refresh the list and try again', 6);
    this.name = 'NotFoundError';
    this.entity = entity;
    this.id = id;
  }
}

/**
 * Thrown when a username/password pair does not match.
 *
 * Unknown usernames and wrong passwords share this message.
 *
 * Exit code 7: Authentication error
 */
export class InvalidCredentialsError extends CLIError {
  constructor() {
    super('Invalid username or password', 'Check your credentials or register a new account', 7);
    this.name = 'InvalidCredentialsError';
  }
}

/**
 * Thrown when registering a username that is already taken.
 *
 * Exit code 7: Authentication error
 */
export class DuplicateUsernameError extends CLIError {
  constructor(username: string) {
    super(`Username "${username}" is already taken`, 'Pick another username or log in', 7);
    this.name = 'DuplicateUsernameError';
  }
}

/**
 * Thrown when the AI service could not be reached (DNS, connection reset,
 * timeout).
 *
 * Exit code 8: AI error
 */
export class NetworkError extends CLIError {
  public readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message, 'Check your internet connection and try again', 8);
    this.name = 'NetworkError';
    this.cause = cause;
  }
}

/**
 * Thrown when the AI service answered with an error status or a response
 * that cannot be read. Carries the upstream message when there is one.
 *
 * Exit code 8: AI error
 */
export class AIServiceError extends CLIError {
  /** HTTP status, when the failure came from a non-success response */
  public readonly status?: number;

  constructor(message: string, status?: number) {
    super(
      message,
      status === 400 || status === 403
        ? 'Check the Gemini API key saved in Settings'
        : 'Try again in a moment',
      8
    );
    this.name = 'AIServiceError';
    this.status = status;
  }
}

/**
 * Thrown when a quiz response cannot be turned into questions.
 *
 * Exit code 8: AI error
 */
export class MalformedQuizResponseError extends CLIError {
  constructor(reason: string) {
    super(`The AI returned a quiz that could not be read: ${reason}`, 'Generate the quiz again', 8);
    this.name = 'MalformedQuizResponseError';
  }
}

/**
 * Thrown when the user stops waiting for an AI response.
 *
 * Exit code 8: AI error
 */
export class RequestAbandonedError extends CLIError {
  constructor() {
    super('Stopped waiting for the AI response', undefined, 8);
    this.name = 'RequestAbandonedError';
  }
}

/**
 * Thrown when navigation is asked for a move the screen table does not allow.
 *
 * Exit code 1: General error
 */
export class InvalidTransitionError extends CLIError {
  constructor(from: string, action: string) {
    super(`Cannot ${action} from ${from}`, undefined, 1);
    this.name = 'InvalidTransitionError';
  }
}
