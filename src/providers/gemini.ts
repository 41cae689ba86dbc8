/**
 * Gemini Gateway
 *
 * The only component that calls the generative API. One request per call,
 * no retries, no caching.
 *
 * Failure mapping:
 * - no key saved           -> MissingAPIKeyError (before any request)
 * - fetch failed / timeout -> NetworkError
 * - non-2xx                -> AIServiceError with the upstream message
 * - unreadable or blocked  -> AIServiceError
 * - caller aborted         -> RequestAbandonedError
 *
 * @example
 * ```ts
 * const gateway = new GeminiGateway({
 *   apiKey: () => repo.settings.get('gemini_api_key'),
 *   timeoutMs: config.ai.timeout_ms,
 * });
 * const text = await gateway.ask('Photosynthesis', 'explain');
 * ```
 */

import { z } from 'zod';
import {
  AIServiceError,
  CLIError,
  MissingAPIKeyError,
  NetworkError,
  RequestAbandonedError,
  ValidationError,
} from '../errors/index.js';
import type { QuizQuestion } from '../database/schema.js';
import { safeJsonParse } from '../utils/json.js';
import { prefixLogger, silentLogger, type Logger } from '../utils/logger.js';
import { parseQuizResponse } from './quiz-parser.js';
import { QUIZ_RESPONSE_SCHEMA, SYSTEM_INSTRUCTIONS, buildQuizPrompt } from './templates.js';
import type { AIGateway, AIMode, AskOptions, ChatTurn } from './types.js';

// ============================================================================
// DEFAULTS
// ============================================================================

export const DEFAULT_GEMINI_MODEL = 'gemini-2.0-flash';
export const DEFAULT_GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta';
export const DEFAULT_GEMINI_TIMEOUT_MS = 30000;
export const DEFAULT_CHAT_CONTEXT_MESSAGES = 20;

export const MIN_QUIZ_QUESTIONS = 3;
export const MAX_QUIZ_QUESTIONS = 10;

// ============================================================================
// TYPES
// ============================================================================

/** Reads the saved key; called lazily, at most once per cache lifetime */
export type ApiKeyResolver = () => string | undefined;

/** Subset of fetch the gateway uses (injected in tests) */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface GeminiGatewayOptions {
  apiKey: ApiKeyResolver;
  model?: string;
  baseUrl?: string;
  timeoutMs?: number;
  /** Most recent chat turns sent with each chat request */
  chatContextMessages?: number;
  fetch?: FetchLike;
  logger?: Logger;
}

interface Content {
  role: 'user' | 'model';
  parts: Array<{ text: string }>;
}

// ============================================================================
// RESPONSE SCHEMAS
// ============================================================================

const GenerateContentResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({ parts: z.array(z.object({ text: z.string().optional() })).optional() })
          .optional(),
        finishReason: z.string().optional(),
      })
    )
    .optional(),
  promptFeedback: z.object({ blockReason: z.string().optional() }).optional(),
});

const ErrorResponseSchema = z.object({
  error: z.object({ message: z.string(), status: z.string().optional() }),
});

const QuizRequestSchema = z.object({
  topic: z.string().trim().min(1, 'Topic cannot be empty').max(200),
  count: z
    .number()
    .int()
    .min(MIN_QUIZ_QUESTIONS, `Ask for at least ${MIN_QUIZ_QUESTIONS} questions`)
    .max(MAX_QUIZ_QUESTIONS, `Ask for at most ${MAX_QUIZ_QUESTIONS} questions`),
});

// ============================================================================
// GATEWAY
// ============================================================================

export class GeminiGateway implements AIGateway {
  private readonly resolveApiKey: ApiKeyResolver;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly chatContextMessages: number;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  /** Held only here after the settings read */
  private cachedKey: string | undefined;

  constructor(options: GeminiGatewayOptions) {
    this.resolveApiKey = options.apiKey;
    this.model = options.model ?? DEFAULT_GEMINI_MODEL;
    this.baseUrl = (options.baseUrl ?? DEFAULT_GEMINI_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_GEMINI_TIMEOUT_MS;
    this.chatContextMessages = options.chatContextMessages ?? DEFAULT_CHAT_CONTEXT_MESSAGES;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.logger = prefixLogger(options.logger ?? silentLogger, 'gemini');
  }

  async ask(prompt: string, mode: AIMode, options: AskOptions = {}): Promise<string> {
    const text = prompt.trim();
    if (!text) {
      throw new ValidationError('Invalid prompt', ['prompt: Prompt cannot be empty']);
    }
    return this.generate(mode, [{ role: 'user', parts: [{ text }] }], undefined, options.signal);
  }

  async chat(history: ChatTurn[], options: AskOptions = {}): Promise<string> {
    const turns = history
      .filter((turn) => turn.content.trim().length > 0)
      .slice(-this.chatContextMessages);

    const last = turns[turns.length - 1];
    if (!last || last.role !== 'user') {
      throw new ValidationError('Invalid chat', ['history: The last message must be from the user']);
    }

    const contents: Content[] = turns.map((turn) => ({
      role: turn.role,
      parts: [{ text: turn.content }],
    }));
    return this.generate('chat', contents, undefined, options.signal);
  }

  async generateQuiz(topic: string, count: number, options: AskOptions = {}): Promise<QuizQuestion[]> {
    const request = QuizRequestSchema.safeParse({ topic, count });
    if (!request.success) {
      throw new ValidationError(
        'Invalid quiz request',
        request.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      );
    }

    const text = await this.generate(
      'quiz',
      [{ role: 'user', parts: [{ text: buildQuizPrompt(request.data.topic, request.data.count) }] }],
      { responseMimeType: 'application/json', responseSchema: QUIZ_RESPONSE_SCHEMA },
      options.signal
    );
    return parseQuizResponse(text, request.data.count);
  }

  forgetApiKey(): void {
    this.cachedKey = undefined;
  }

  private getApiKey(): string {
    if (this.cachedKey) {
      return this.cachedKey;
    }
    const key = this.resolveApiKey()?.trim();
    if (!key) {
      throw new MissingAPIKeyError();
    }
    this.cachedKey = key;
    return key;
  }

  private async generate(
    mode: AIMode,
    contents: Content[],
    generationConfig: Record<string, unknown> | undefined,
    signal: AbortSignal | undefined
  ): Promise<string> {
    const apiKey = this.getApiKey();

    if (signal?.aborted) {
      throw new RequestAbandonedError();
    }

    const url = `${this.baseUrl}/models/${encodeURIComponent(this.model)}:generateContent`;
    const body = JSON.stringify({
      systemInstruction: { parts: [{ text: SYSTEM_INSTRUCTIONS[mode] }] },
      contents,
      ...(generationConfig ? { generationConfig } : {}),
    });

    this.logger.debug?.(`POST models/${this.model}:generateContent (${mode}, ${contents.length} turn(s))`);
    const startedAt = Date.now();

    const text = await this.withDeadline(async (requestSignal) => {
      const response = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', 'x-goog-api-key': apiKey },
        body,
        signal: requestSignal,
      });
      const raw = await response.text();

      if (!response.ok) {
        throw new AIServiceError(upstreamMessage(raw, response.status), response.status);
      }
      return extractText(raw);
    }, signal);

    this.logger.debug?.(`Answered in ${Date.now() - startedAt}ms`);
    return text;
  }

  /**
   * Race `work` against the timeout and the caller's signal.
   *
   * The caller stops waiting even if the request itself ignores the abort.
   */
  private async withDeadline<T>(
    work: (signal: AbortSignal) => Promise<T>,
    callerSignal: AbortSignal | undefined
  ): Promise<T> {
    const controller = new AbortController();
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onCallerAbort = (): void => controller.abort();
    callerSignal?.addEventListener('abort', onCallerAbort, { once: true });

    const stopped = new Promise<never>((_, reject) => {
      controller.signal.addEventListener(
        'abort',
        () => reject(timedOut ? this.timeoutError() : new RequestAbandonedError()),
        { once: true }
      );
    });

    try {
      return await Promise.race([work(controller.signal), stopped]);
    } catch (error) {
      if (error instanceof CLIError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw timedOut ? this.timeoutError() : new RequestAbandonedError();
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new NetworkError(`Could not reach Gemini: ${message}`, error instanceof Error ? error : undefined);
    } finally {
      clearTimeout(timer);
      callerSignal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private timeoutError(): NetworkError {
    return new NetworkError(`Gemini did not answer within ${Math.round(this.timeoutMs / 1000)}s`);
  }
}

// ============================================================================
// RESPONSE HELPERS
// ============================================================================

function upstreamMessage(raw: string, status: number): string {
  const parsed = ErrorResponseSchema.safeParse(safeJsonParse(raw, undefined));
  if (parsed.success) {
    return parsed.data.error.message;
  }
  return `Gemini request failed with HTTP ${status}`;
}

function extractText(raw: string): string {
  const parsed = GenerateContentResponseSchema.safeParse(safeJsonParse(raw, undefined));
  if (!parsed.success) {
    throw new AIServiceError('Gemini returned a response that could not be read');
  }

  const blockReason = parsed.data.promptFeedback?.blockReason;
  if (blockReason) {
    throw new AIServiceError(`Gemini blocked the request (${blockReason})`);
  }

  const candidate = parsed.data.candidates?.[0];
  if (!candidate) {
    throw new AIServiceError('Gemini returned no answer');
  }

  const text = (candidate.content?.parts ?? []).map((part) => part.text ?? '').join('');
  if (!text.trim()) {
    const reason = candidate.finishReason ? ` (${candidate.finishReason})` : '';
    throw new AIServiceError(`Gemini returned an empty answer${reason}`);
  }

  return text;
}
