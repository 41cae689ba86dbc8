/**
 * Repository plumbing shared by every owner-scoped accessor.
 *
 * - `parseInput` turns zod failures into ValidationError with one issue per field
 * - `runStore` wraps SQLite failures in StoreError and lets application
 *   errors through untouched
 * - `OwnedRepository.write` runs a unit of work in one transaction, so any
 *   throw rolls the whole call back
 */

import type Database from 'better-sqlite3';
import type { z } from 'zod';
import { CLIError, StoreError, ValidationError } from '../errors/index.js';
import { systemClock, toDateKey, toTimestamp, type Clock } from '../utils/dates.js';

/**
 * Validate caller input against a schema.
 *
 * @param what - Noun for the error message ("task", "study log")
 * @throws ValidationError listing every failing field
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.output<S> {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
  throw new ValidationError(`Invalid ${what}`, issues);
}

/**
 * SQLite error code, when `error` came from better-sqlite3
 */
export function sqliteCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Run a store call, converting driver failures into StoreError.
 */
export function runStore<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof CLIError) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new StoreError(`${operation} failed: ${message}`, error instanceof Error ? error : undefined);
  }
}

export interface RepositoryOptions {
  /** Source of "now" for timestamps and date filters */
  clock?: Clock;
}

/**
 * Base class for repositories whose every query is filtered by owner.
 */
export abstract class OwnedRepository {
  protected readonly clock: Clock;

  constructor(
    protected readonly db: Database.Database,
    protected readonly ownerId: number,
    options: RepositoryOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
  }

  /** Local `YYYY-MM-DD HH:MM:SS` */
  protected now(): string {
    return toTimestamp(this.clock());
  }

  /** Local `YYYY-MM-DD` */
  protected today(): string {
    return toDateKey(this.clock());
  }

  protected read<T>(operation: string, fn: () => T): T {
    return runStore(operation, fn);
  }

  protected write<T>(operation: string, fn: () => T): T {
    return runStore(operation, () => this.db.transaction(fn)());
  }
}
