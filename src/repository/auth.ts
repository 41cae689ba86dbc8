/**
 * Account registration and login.
 *
 * Passwords are hashed with bcrypt; plaintext is never stored or compared.
 * An unknown username and a wrong password produce the same error.
 */

import type Database from 'better-sqlite3';
import bcrypt from 'bcrypt';
import {
  DuplicateUsernameError,
  InvalidCredentialsError,
  NotFoundError,
  StoreError,
} from '../errors/index.js';
import type { User } from '../database/schema.js';
import { UserRowSchema, validateRow, type UserRow } from '../database/validation.js';
import { systemClock, toTimestamp, type Clock } from '../utils/dates.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { parseInput, runStore, sqliteCode } from './base.js';
import { insertDefaultCategories } from './categories.js';
import { CredentialsSchema, PasswordSchema } from './inputs.js';

/** bcrypt cost used when none is configured */
export const DEFAULT_BCRYPT_ROUNDS = 12;

export interface AuthServiceOptions {
  /** bcrypt cost factor (config: auth.bcrypt_rounds) */
  bcryptRounds?: number;
  clock?: Clock;
  logger?: Logger;
}

function toUser(row: UserRow): User {
  return { id: row.id, username: row.username, createdAt: row.created_at };
}

export class AuthService {
  private readonly rounds: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(
    private readonly db: Database.Database,
    options: AuthServiceOptions = {}
  ) {
    this.rounds = options.bcryptRounds ?? DEFAULT_BCRYPT_ROUNDS;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Create an account with the starter categories.
   *
   * @throws ValidationError for a malformed username or short password
   * @throws DuplicateUsernameError when the name is taken
   */
  async register(username: string, password: string): Promise<User> {
    const credentials = parseInput(CredentialsSchema, { username, password }, 'registration');

    if (this.findByUsername(credentials.username)) {
      throw new DuplicateUsernameError(credentials.username);
    }

    const passwordHash = await bcrypt.hash(credentials.password, this.rounds);

    try {
      const user = runStore('Register account', () =>
        this.db.transaction(() => {
          const createdAt = toTimestamp(this.clock());
          const result = this.db
            .prepare('INSERT INTO users (username, password_hash, created_at) VALUES (?, ?, ?)')
            .run(credentials.username, passwordHash, createdAt);
          const userId = Number(result.lastInsertRowid);
          insertDefaultCategories(this.db, userId, createdAt);
          return this.getUser(userId);
        })()
      );
      this.logger.debug?.(`Registered user #${user.id}`);
      return user;
    } catch (error) {
      // Another registration won the race between the check and the insert
      if (error instanceof StoreError && sqliteCode(error.cause) === 'SQLITE_CONSTRAINT_UNIQUE') {
        throw new DuplicateUsernameError(credentials.username);
      }
      throw error;
    }
  }

  /**
   * Check a username/password pair.
   *
   * @throws InvalidCredentialsError for an unknown user or a wrong password
   */
  async authenticate(username: string, password: string): Promise<User> {
    const row = this.findByUsername(username.trim());
    if (!row) {
      throw new InvalidCredentialsError();
    }

    const matches = await bcrypt.compare(password, row.password_hash);
    if (!matches) {
      throw new InvalidCredentialsError();
    }

    return toUser(row);
  }

  /**
   * @throws InvalidCredentialsError when `currentPassword` is wrong
   */
  async changePassword(userId: number, currentPassword: string, nextPassword: string): Promise<void> {
    const row = this.requireRow(userId);
    const newPassword = parseInput(PasswordSchema, nextPassword, 'password');

    if (!(await bcrypt.compare(currentPassword, row.password_hash))) {
      throw new InvalidCredentialsError();
    }

    const passwordHash = await bcrypt.hash(newPassword, this.rounds);
    runStore('Change password', () =>
      this.db.transaction(() => {
        this.db.prepare('UPDATE users SET password_hash = ? WHERE id = ?').run(passwordHash, userId);
      })()
    );
  }

  /**
   * Delete the account and everything it owns (foreign keys cascade).
   *
   * @throws InvalidCredentialsError when `password` is wrong
   */
  async deleteAccount(userId: number, password: string): Promise<void> {
    const row = this.requireRow(userId);

    if (!(await bcrypt.compare(password, row.password_hash))) {
      throw new InvalidCredentialsError();
    }

    runStore('Delete account', () =>
      this.db.transaction(() => {
        this.db.prepare('DELETE FROM users WHERE id = ?').run(userId);
      })()
    );
    this.logger.debug?.(`Deleted user #${userId}`);
  }

  getUser(userId: number): User {
    return toUser(this.requireRow(userId));
  }

  private requireRow(userId: number): UserRow {
    const row = runStore('Load user', () =>
      this.db.prepare('SELECT * FROM users WHERE id = ?').get(userId)
    );
    if (!row) {
      throw new NotFoundError('User', userId);
    }
    return validateRow(UserRowSchema, row, `users.id=${userId}`);
  }

  private findByUsername(username: string): UserRow | undefined {
    return runStore('Load user', () => {
      const row = this.db.prepare('SELECT * FROM users WHERE username = ?').get(username);
      return row ? validateRow(UserRowSchema, row, 'users.username') : undefined;
    });
  }
}
