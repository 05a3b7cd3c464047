import { ITokenCounter } from '../interfaces/ITokenCounter.js';
import { ICompletionProvider } from '../interfaces/ICompletionProvider.js';
import { InvariantViolationError } from '../errors.js';
import {
  ChatMessage,
  ChatRequest,
  SamplingParams,
  createRequest,
  pickSamplingParams,
  requestLength,
} from './ChatRequest.js';

export const DEFAULT_MAX_TOKENS = 4097;

export interface ChatSessionDependencies {
  tokenCounter: ITokenCounter;
  completionProvider: ICompletionProvider;
}

export interface TokenBudget {
  maxTokens?: number;
  reserveTokens?: number;
}

export interface TrimOptions extends TokenBudget {
  model: string;
  prompt: string;
}

export interface CompletionOptions extends TrimOptions, SamplingParams {}

export interface ReconstructOptions {
  id?: number;
  title: string;
  systemMessage: string;
  dateStarted: string;
  history: readonly ChatRequest[];
}

function resolveBudget(budget: TokenBudget): { maxTokens: number; reserveTokens: number } {
  const maxTokens = budget.maxTokens ?? DEFAULT_MAX_TOKENS;
  const reserveTokens = budget.reserveTokens ?? Math.floor(maxTokens / 10);
  return { maxTokens, reserveTokens };
}

/**
 * A conversation with an append-only history and a trimmed context.
 *
 * `history` is the complete record of completed turns (the system message is
 * kept apart). `context` is the subset of history sent on the next
 * completion: it only loses entries from the front, is reset to empty, or
 * gains the newest completed turn.
 */
export class ChatSession {
  private readonly _history: ChatRequest[] = [];
  private _context: ChatRequest[] = [];
  private _id: number | undefined;

  private constructor(
    private readonly deps: ChatSessionDependencies,
    private readonly _systemMessage: string,
    private _title: string,
    private readonly _dateStarted: string
  ) {}

  static create(
    deps: ChatSessionDependencies,
    options: { systemMessage?: string; title?: string } = {}
  ): ChatSession {
    const dateStarted = new Date().toISOString();
    return new ChatSession(
      deps,
      options.systemMessage ?? '',
      options.title || dateStarted,
      dateStarted
    );
  }

  /**
   * Restore a stored session. History and context start with equal
   * contents but never share the same array.
   */
  static reconstruct(deps: ChatSessionDependencies, options: ReconstructOptions): ChatSession {
    const session = new ChatSession(
      deps,
      options.systemMessage,
      options.title,
      options.dateStarted
    );
    session._history.push(...options.history);
    session._context = [...options.history];
    if (options.id !== undefined) {
      session.assignId(options.id);
    }
    return session;
  }

  get id(): number | undefined {
    return this._id;
  }

  get isPersisted(): boolean {
    return this._id !== undefined;
  }

  /**
   * Record the store-assigned id. Happens once per session.
   */
  assignId(id: number): void {
    if (this._id !== undefined) {
      throw new InvariantViolationError(
        `Session already persisted as chat ${this._id}, cannot reassign to ${id}`
      );
    }
    this._id = id;
  }

  get title(): string {
    return this._title;
  }

  set title(title: string) {
    this._title = title;
  }

  get systemMessage(): string {
    return this._systemMessage;
  }

  get dateStarted(): string {
    return this._dateStarted;
  }

  get history(): readonly ChatRequest[] {
    return this._history;
  }

  get context(): readonly ChatRequest[] {
    return this._context;
  }

  get lastRequest(): ChatRequest | undefined {
    return this._history[this._history.length - 1];
  }

  get lastResponse(): string | undefined {
    return this.lastRequest?.response;
  }

  /**
   * Take back the most recent turn, e.g. when it could not be stored
   */
  discardLastTurn(request: ChatRequest): void {
    if (this.lastRequest !== request) {
      throw new InvariantViolationError('Only the most recent turn can be discarded');
    }
    this._history.pop();
    if (this._context[this._context.length - 1] === request) {
      this._context.pop();
    }
  }

  resetContext(): void {
    this._context = [];
  }

  tokensUsed(model: string): number {
    const inSystem = this.deps.tokenCounter.count(this._systemMessage, model);
    const inContext = this._context.reduce(
      (sum, request) => sum + requestLength(request, this.deps.tokenCounter),
      0
    );
    return inSystem + inContext;
  }

  /**
   * Drop the earliest context entries until system message, context, prompt
   * and reserve fit in `maxTokens`, or the context is empty.
   */
  trimContext(options: TrimOptions): void {
    const { maxTokens, reserveTokens } = resolveBudget(options);
    if (this._context.length === 0) {
      return;
    }

    const promptTokens = this.deps.tokenCounter.count(options.prompt, options.model);
    while (
      this._context.length > 0 &&
      this.tokensUsed(options.model) + promptTokens + reserveTokens > maxTokens
    ) {
      this._context.shift();
    }
  }

  /**
   * Stream a completion for `prompt`, yielding each fragment as it arrives.
   *
   * The turn is recorded in history and context only once the provider has
   * finished without error; the recorded request is the generator's return
   * value. If the provider fails, or the caller stops iterating early,
   * nothing is recorded.
   */
  async *createCompletion(options: CompletionOptions): AsyncGenerator<string, ChatRequest, void> {
    this.trimContext(options);

    const messages = this.buildMessages(options.prompt);
    const params = pickSamplingParams(options);

    const chunks: string[] = [];
    for await (const fragment of this.deps.completionProvider.stream(
      options.model,
      messages,
      params
    )) {
      chunks.push(fragment);
      yield fragment;
    }

    const request = createRequest({
      model: options.model,
      prompt: options.prompt,
      response: chunks.join(''),
      timestamp: new Date().toISOString(),
      ...params,
    });
    this._history.push(request);
    this._context.push(request);
    return request;
  }

  private buildMessages(prompt: string): ChatMessage[] {
    const messages: ChatMessage[] = [{ role: 'system', content: this._systemMessage }];
    for (const request of this._context) {
      messages.push({ role: 'user', content: request.prompt ?? '' });
      messages.push({ role: 'assistant', content: request.response ?? '' });
    }
    messages.push({ role: 'user', content: prompt });
    return messages;
  }
}
