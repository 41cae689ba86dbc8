/**
 * Signed-in session.
 *
 * Created at login and held by the controller; the only route from a screen
 * to the user's data and to the AI gateway.
 */

import type { User } from '../database/schema.js';
import type { AIGateway } from '../providers/types.js';
import type { DomainRepository } from '../repository/index.js';

export class Session {
  readonly userId: number;
  readonly username: string;
  private ended = false;

  constructor(
    user: User,
    readonly repository: DomainRepository,
    readonly gateway: AIGateway,
    readonly startedAt: Date
  ) {
    this.userId = user.id;
    this.username = user.username;
  }

  get active(): boolean {
    return !this.ended;
  }

  /** Drops the gateway's cached API key */
  end(): void {
    this.gateway.forgetApiKey();
    this.ended = true;
  }
}
