/**
 * Tests for the error taxonomy
 *
 * Tests cover:
 * - Error class properties (message, hint, code, name)
 * - Error formatting (text and JSON)
 * - Exit code extraction
 * - Screen dispositions
 */

import { describe, it, expect } from 'vitest';
import {
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
  formatError,
  getExitCode,
  getErrorDisposition,
} from '../index.js';
import { SchemaValidationError } from '../../database/validation.js';

describe('Error Classes', () => {
  describe('CLIError', () => {
    it('creates error with message only', () => {
      const error = new CLIError('Something went wrong');

      expect(error.message).toBe('Something went wrong');
      expect(error.hint).toBeUndefined();
      expect(error.code).toBe(1);
      expect(error.name).toBe('CLIError');
    });

    it('creates error with custom exit code', () => {
      const error = new CLIError('Critical failure', 'Reboot', 99);

      expect(error.hint).toBe('Reboot');
      expect(error.code).toBe(99);
    });

    it('is instanceof Error', () => {
      const error = new CLIError('test');

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(CLIError);
    });
  });

  describe('ConfigError', () => {
    it('creates error with default hint', () => {
      const error = new ConfigError('Invalid option');

      expect(error.hint).toBe('Run: studydesk config list  to see valid options');
      expect(error.code).toBe(2);
      expect(error.name).toBe('ConfigError');
    });
  });

  describe('MissingAPIKeyError', () => {
    it('points the user at Settings', () => {
      const error = new MissingAPIKeyError();

      expect(error.message).toBe('Gemini API key not configured');
      expect(error.hint).toBe('Open Settings from the main menu and save your Gemini API key');
      expect(error.code).toBe(4);
    });
  });

  describe('StoreError', () => {
    it('stores cause error', () => {
      const cause = new Error('SQLITE_BUSY');
      const error = new StoreError('Database locked', cause);

      expect(error.cause).toBe(cause);
      expect(error.code).toBe(5);
      expect(error.name).toBe('StoreError');
    });
  });

  describe('ValidationError', () => {
    it('lists issues in the hint', () => {
      const error = new ValidationError('Invalid task', [
        'title: Title cannot be empty',
        'dueDate: Use YYYY-MM-DD',
      ]);

      expect(error.hint).toBe('Issues:\n  title: Title cannot be empty\n  dueDate: Use YYYY-MM-DD');
      expect(error.issues).toHaveLength(2);
      expect(error.code).toBe(1);
    });

    it('creates error without issues', () => {
      const error = new ValidationError('Invalid input');

      expect(error.hint).toBe('Check your input and try again');
      expect(error.issues).toHaveLength(0);
    });
  });

  describe('NotFoundError', () => {
    it('names the entity and id', () => {
      const error = new NotFoundError('Task', 42);

      expect(error.message).toBe('Task #42 not found');
      expect(error.entity).toBe('Task');
      expect(error.id).toBe(42);
      expect(error.code).toBe(6);
    });
  });

  describe('authentication errors', () => {
    it('uses one message for unknown user and wrong password', () => {
      expect(new InvalidCredentialsError().message).toBe('Invalid username or password');
    });

    it('names the taken username', () => {
      expect(new DuplicateUsernameError('alice').message).toBe('Username "alice" is already taken');
    });
  });

  describe('AIServiceError', () => {
    it('keeps the upstream status', () => {
      const error = new AIServiceError('API key not valid', 400);

      expect(error.status).toBe(400);
      expect(error.hint).toBe('Check the Gemini API key saved in Settings');
    });

    it('suggests a retry for server errors', () => {
      expect(new AIServiceError('overloaded', 503).hint).toBe('Try again in a moment');
    });
  });

  describe('MalformedQuizResponseError', () => {
    it('includes the reason', () => {
      const error = new MalformedQuizResponseError('no valid questions');

      expect(error.message).toBe('The AI returned a quiz that could not be read: no valid questions');
    });
  });
});

describe('formatError', () => {
  describe('text output', () => {
    it('formats CLIError with hint', () => {
      const output = formatError(new CLIError('Failed', 'Try again'));

      expect(output).toContain('Failed');
      expect(output).toContain('Hint:');
      expect(output).toContain('Try again');
    });

    it('formats CLIError without hint', () => {
      const output = formatError(new CLIError('Failed'));

      expect(output).toContain('Failed');
      expect(output).not.toContain('Hint:');
    });

    it('formats standard Error with verbose hint', () => {
      const output = formatError(new Error('Something broke'));

      expect(output).toContain('Something broke');
      expect(output).toContain('--verbose');
    });

    it('shows stack trace in verbose mode', () => {
      const output = formatError(new CLIError('Failed', 'Try again'), { verbose: true });

      expect(output).toContain('Stack trace:');
    });

    it('formats unknown error types', () => {
      expect(formatError('string error')).toContain('string error');
    });
  });

  describe('JSON output', () => {
    it('formats CLIError as JSON', () => {
      const output = formatError(new ConfigError('Bad config', 'Fix it'), { json: true });
      const parsed = JSON.parse(output);

      expect(parsed).toEqual({ error: 'Bad config', code: 2, hint: 'Fix it' });
    });

    it('formats unknown error as JSON', () => {
      const parsed = JSON.parse(formatError(42, { json: true }));

      expect(parsed).toEqual({ error: '42', code: 1 });
    });
  });
});

describe('getExitCode', () => {
  it('returns code from CLIError', () => {
    expect(getExitCode(new FileNotFoundError('/x'))).toBe(3);
    expect(getExitCode(new ConfigError('bad'))).toBe(2);
    expect(getExitCode(new MissingAPIKeyError())).toBe(4);
    expect(getExitCode(new StoreError('locked'))).toBe(5);
    expect(getExitCode(new NetworkError('offline'))).toBe(8);
  });

  it('returns 1 for anything else', () => {
    expect(getExitCode(new Error('test'))).toBe(1);
    expect(getExitCode('string')).toBe(1);
    expect(getExitCode(undefined)).toBe(1);
  });
});

describe('getErrorDisposition', () => {
  it('keeps validation errors inline', () => {
    expect(getErrorDisposition(new ValidationError('bad'))).toBe('inline');
  });

  it('shows auth errors on the form', () => {
    expect(getErrorDisposition(new InvalidCredentialsError())).toBe('form');
    expect(getErrorDisposition(new DuplicateUsernameError('bob'))).toBe('form');
  });

  it('sends a missing key to Settings', () => {
    expect(getErrorDisposition(new MissingAPIKeyError())).toBe('settings-hint');
  });

  it('shows AI and backup failures in a dialog', () => {
    expect(getErrorDisposition(new NetworkError('offline'))).toBe('dialog');
    expect(getErrorDisposition(new AIServiceError('quota'))).toBe('dialog');
    expect(getErrorDisposition(new MalformedQuizResponseError('empty'))).toBe('dialog');
    expect(getErrorDisposition(new FileNotFoundError('/tmp/missing.db'))).toBe('dialog');
    expect(getErrorDisposition(new BackupError('not a database'))).toBe('dialog');
  });

  it('treats an abandoned request as a notice', () => {
    expect(getErrorDisposition(new RequestAbandonedError())).toBe('notice');
  });

  it('logs missing entities', () => {
    expect(getErrorDisposition(new NotFoundError('Task', 1))).toBe('not-found');
  });

  it('recovers to the main menu for store and unknown failures', () => {
    expect(getErrorDisposition(new StoreError('disk full'))).toBe('recover');
    expect(getErrorDisposition(new SchemaValidationError('drift', []))).toBe('recover');
    expect(getErrorDisposition(new InvalidTransitionError('LoggedOut', 'open Settings'))).toBe('recover');
    expect(getErrorDisposition(new TypeError('boom'))).toBe('recover');
  });
});
