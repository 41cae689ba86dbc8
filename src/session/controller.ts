/**
 * App Controller
 *
 * Owns the navigation state and the signed-in Session. Screens call it to
 * authenticate, move between screens and recover from failures; nothing
 * else holds the current user.
 *
 * @example
 * ```typescript
 * const app = new AppController({ db: getDb(), config: loadConfig() });
 * await app.login('ada', 'secret');
 * app.open('TaskManager');
 * app.session.repository.tasks.create({ title: 'Read chapter 3' });
 * app.back();
 * app.logout();
 * ```
 */

import type Database from 'better-sqlite3';
import type { Config } from '../config/schema.js';
import type { User } from '../database/schema.js';
import { getErrorDisposition, InvalidTransitionError, type ErrorDisposition } from '../errors/index.js';
import { AnalyticsAggregator } from '../analytics/index.js';
import { PomodoroTimer } from '../pomodoro/index.js';
import { GeminiGateway, type FetchLike } from '../providers/gemini.js';
import { FALLBACK_QUOTE, QUOTE_PROMPT } from '../providers/templates.js';
import type { AIGateway } from '../providers/types.js';
import { AuthService, createRepository, type DomainRepository } from '../repository/index.js';
import { systemClock, type Clock } from '../utils/dates.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import {
  INITIAL_NAV_STATE,
  transition,
  type MenuScreen,
  type NavAction,
  type NavState,
  type Screen,
} from './navigation.js';
import { Session } from './session.js';

export type GatewayFactory = (repository: DomainRepository) => AIGateway;

export interface AppControllerOptions {
  db: Database.Database;
  config: Config;
  logger?: Logger;
  clock?: Clock;
  /** Replaces fetch inside the default Gemini gateway */
  fetch?: FetchLike;
  /** Replaces the Gemini gateway entirely */
  gatewayFactory?: GatewayFactory;
}

export class AppController {
  private state: NavState = INITIAL_NAV_STATE;
  private db: Database.Database;
  private auth: AuthService;

  private readonly config: Config;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly gatewayFactory: GatewayFactory;

  constructor(options: AppControllerOptions) {
    this.db = options.db;
    this.config = options.config;
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? systemClock;
    this.gatewayFactory = options.gatewayFactory ?? ((repository) => this.createGateway(repository, options.fetch));
    this.auth = this.createAuth();
  }

  get screen(): Screen {
    return this.state.screen;
  }

  get navState(): NavState {
    return this.state;
  }

  get database(): Database.Database {
    return this.db;
  }

  get settings(): Config {
    return this.config;
  }

  now(): Date {
    return this.clock();
  }

  /** The signed-in session, if any */
  get session(): Session | undefined {
    return this.state.screen === 'LoggedOut' ? undefined : this.state.session;
  }

  /**
   * @throws InvalidTransitionError when nobody is signed in
   */
  requireSession(): Session {
    if (this.state.screen === 'LoggedOut') {
      throw new InvalidTransitionError('LoggedOut', 'use a signed-in screen');
    }
    return this.state.session;
  }

  // --------------------------------------------------------------------------
  // Authentication
  // --------------------------------------------------------------------------

  /** Creates the account; the user signs in separately */
  async register(username: string, password: string): Promise<User> {
    const user = await this.auth.register(username, password);
    this.logger.debug?.(`Registered user ${user.id}`);
    return user;
  }

  async login(username: string, password: string): Promise<Session> {
    if (this.state.screen !== 'LoggedOut') {
      throw new InvalidTransitionError(this.state.screen, 'login');
    }

    const user = await this.auth.authenticate(username, password);
    const repository = createRepository(this.db, user.id, { clock: this.clock });
    const session = new Session(user, repository, this.gatewayFactory(repository), this.clock());

    this.apply({ type: 'login', session });
    this.logger.debug?.(`User ${user.id} signed in`);
    return session;
  }

  async changePassword(currentPassword: string, nextPassword: string): Promise<void> {
    const session = this.requireSession();
    await this.auth.changePassword(session.userId, currentPassword, nextPassword);
  }

  /** Deletes the signed-in account and everything it owns, then signs out */
  async deleteAccount(password: string): Promise<void> {
    const session = this.requireSession();
    await this.auth.deleteAccount(session.userId, password);
    this.signOut();
  }

  // --------------------------------------------------------------------------
  // Navigation
  // --------------------------------------------------------------------------

  open(screen: MenuScreen): void {
    this.apply({ type: 'open', screen });
  }

  back(): void {
    this.apply({ type: 'back' });
  }

  /** Signs out from the main menu */
  logout(): void {
    const session = this.requireSession();
    this.apply({ type: 'logout' });
    session.end();
    this.logger.debug?.(`User ${session.userId} signed out`);
  }

  recover(): void {
    this.apply({ type: 'recover' });
  }

  /**
   * Apply the disposition of a failure caught by a screen.
   *
   * `recover` returns a signed-in user to the main menu; every other
   * disposition leaves the screen in place.
   */
  handleError(error: unknown): ErrorDisposition {
    const disposition = getErrorDisposition(error);
    const message = error instanceof Error ? error.message : String(error);

    if (disposition === 'not-found') {
      this.logger.debug?.(`Lookup failed: ${message}`);
    }

    if (disposition === 'recover') {
      this.logger.warn(`Operation failed on ${this.state.screen}: ${message}`);
      if (this.state.screen !== 'LoggedOut') {
        this.recover();
      }
    }

    return disposition;
  }

  // --------------------------------------------------------------------------
  // Services for the signed-in user
  // --------------------------------------------------------------------------

  analytics(): AnalyticsAggregator {
    return new AnalyticsAggregator(this.requireSession().repository, { now: this.clock });
  }

  /** Timer with the user's durations, falling back to config */
  createTimer(): PomodoroTimer {
    const { pomodoro } = this.config;
    const durations = this.requireSession().repository.settings.getPomodoroDurations({
      workMinutes: pomodoro.work_minutes,
      breakMinutes: pomodoro.break_minutes,
      longBreakMinutes: pomodoro.long_break_minutes,
    });
    return new PomodoroTimer({ ...durations, cyclesBeforeLongBreak: pomodoro.cycles_before_long_break });
  }

  /**
   * Switch to another connection (after a restore). Whoever is signed in
   * is signed out, since their session reads the old connection.
   */
  replaceDatabase(db: Database.Database): void {
    this.signOut();
    this.db = db;
    this.auth = this.createAuth();
  }

  /** Whether the signed-in user has saved a Gemini API key */
  hasApiKey(): boolean {
    return this.requireSession().repository.settings.get('gemini_api_key') !== undefined;
  }

  /**
   * A short motivational line for the main menu.
   *
   * Resolves to FALLBACK_QUOTE when no key is saved or the request fails;
   * the failure is logged at debug level only.
   */
  async motivationalQuote(signal?: AbortSignal): Promise<string> {
    const session = this.requireSession();
    if (!this.hasApiKey()) {
      return FALLBACK_QUOTE;
    }

    try {
      const text = await session.gateway.ask(QUOTE_PROMPT, 'quote', { signal });
      const quote = text.trim().replace(/^["“]+|["”]+$/g, '').trim();
      return quote || FALLBACK_QUOTE;
    } catch (error) {
      this.logger.debug?.(`Quote unavailable: ${error instanceof Error ? error.message : String(error)}`);
      return FALLBACK_QUOTE;
    }
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private apply(action: NavAction): void {
    this.state = transition(this.state, action);
  }

  /** Sign out from any screen through the main menu */
  private signOut(): void {
    if (this.state.screen === 'LoggedOut') {
      return;
    }
    if (this.state.screen !== 'MainMenu') {
      this.back();
    }
    this.logout();
  }

  private createAuth(): AuthService {
    return new AuthService(this.db, {
      bcryptRounds: this.config.auth.bcrypt_rounds,
      clock: this.clock,
      logger: this.logger,
    });
  }

  private createGateway(repository: DomainRepository, fetchImpl: FetchLike | undefined): AIGateway {
    const { ai } = this.config;
    return new GeminiGateway({
      apiKey: () => repository.settings.get('gemini_api_key'),
      model: ai.model,
      baseUrl: ai.base_url,
      timeoutMs: ai.timeout_ms,
      chatContextMessages: ai.chat_context_messages,
      fetch: fetchImpl,
      logger: this.logger,
    });
  }
}
