/**
 * In-process AI gateway for controller and screen tests.
 *
 * Answers come from queues filled by the test; an empty queue fails the
 * call so a missing stub shows up as an error.
 */

import type { QuizQuestion } from '../database/schema.js';
import { RequestAbandonedError } from '../errors/index.js';
import type { AIGateway, AIMode, AskOptions, ChatTurn } from '../providers/types.js';

type Answer<T> = T | Error | 'hang';

export interface RecordedAsk {
  prompt: string;
  mode: AIMode;
}

export class FakeGateway implements AIGateway {
  readonly asks: RecordedAsk[] = [];
  readonly chats: ChatTurn[][] = [];
  readonly quizzes: Array<{ topic: string; count: number }> = [];
  forgotten = 0;

  private readonly answers: Array<Answer<string>> = [];
  private readonly quizAnswers: Array<Answer<QuizQuestion[]>> = [];

  /** Queue the next ask/chat answer; 'hang' waits until aborted */
  reply(...answers: Array<Answer<string>>): this {
    this.answers.push(...answers);
    return this;
  }

  replyQuiz(...answers: Array<Answer<QuizQuestion[]>>): this {
    this.quizAnswers.push(...answers);
    return this;
  }

  ask(prompt: string, mode: AIMode, options: AskOptions = {}): Promise<string> {
    this.asks.push({ prompt, mode });
    return settle(this.answers.shift(), options.signal);
  }

  chat(history: ChatTurn[], options: AskOptions = {}): Promise<string> {
    this.chats.push(history.map((turn) => ({ ...turn })));
    return settle(this.answers.shift(), options.signal);
  }

  generateQuiz(topic: string, count: number, options: AskOptions = {}): Promise<QuizQuestion[]> {
    this.quizzes.push({ topic, count });
    return settle(this.quizAnswers.shift(), options.signal);
  }

  forgetApiKey(): void {
    this.forgotten++;
  }
}

function settle<T>(answer: Answer<T> | undefined, signal: AbortSignal | undefined): Promise<T> {
  if (answer === undefined) {
    return Promise.reject(new Error('FakeGateway: no answer queued'));
  }
  if (answer instanceof Error) {
    return Promise.reject(answer);
  }
  if (answer === 'hang') {
    return new Promise<T>((_, reject) => {
      if (signal?.aborted) {
        reject(new RequestAbandonedError());
        return;
      }
      signal?.addEventListener('abort', () => reject(new RequestAbandonedError()), { once: true });
    });
  }
  return Promise.resolve(answer);
}
