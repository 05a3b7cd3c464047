import { IChatRepository } from '../../core/interfaces/IChatRepository.js';
import { ChatTitle } from '../../core/entities/ChatRecord.js';
import { ChatRequest, SamplingParams } from '../../core/entities/ChatRequest.js';
import {
  ChatSession,
  ChatSessionDependencies,
  DEFAULT_MAX_TOKENS,
} from '../../core/entities/ChatSession.js';
import {
  AlreadyGeneratingError,
  InvariantViolationError,
  NotFoundError,
} from '../../core/errors.js';
import { WaitingTicker } from '../../utils/WaitingTicker.js';
import { Logger, createLogger } from '../../utils/logger.js';
import { reconstructSessions } from './SessionLoader.js';

export const DEFAULT_WAITING_INTERVAL_MS = 500;

/**
 * Outward notifications of the session manager. Every callback is optional.
 */
export interface SessionObserver {
  /** Emitted periodically until the first fragment arrives */
  onWaiting?(): void;
  onWaitFinished?(): void;
  onFragment?(fragment: string): void;
  onCompletion?(response: string): void;
  onTokensUsed?(tokens: number): void;
  onChatPersisted?(chatId: number, title: string): void;
  onError?(error: unknown): void;
}

export interface GenerationSettings extends SamplingParams {
  model: string;
  maxTokens: number;
  reserveTokens: number;
}

export interface SessionManagerOptions {
  settings: Partial<GenerationSettings> & { model: string };
  waitingIntervalMs?: number;
  logger?: Logger;
}

/**
 * Tracks the active session, persists sessions the first time they complete
 * a generation, and allows one generation in flight at a time.
 */
export class SessionManager {
  settings: GenerationSettings;

  private active: ChatSession | null = null;
  private unsaved: ChatSession | null = null;
  private sessions: Map<number, ChatSession> = new Map();
  private generating = false;
  private observers: Set<SessionObserver> = new Set();
  private waitingIntervalMs: number;
  private logger: Logger;

  constructor(
    private chatRepo: IChatRepository,
    private deps: ChatSessionDependencies,
    options: SessionManagerOptions
  ) {
    const maxTokens = options.settings.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.settings = {
      ...options.settings,
      maxTokens,
      reserveTokens: options.settings.reserveTokens ?? Math.floor(maxTokens / 10),
    };
    this.waitingIntervalMs = options.waitingIntervalMs ?? DEFAULT_WAITING_INTERVAL_MS;
    this.logger = options.logger ?? createLogger('SessionManager');
  }

  addObserver(observer: SessionObserver): () => void {
    this.observers.add(observer);
    return () => {
      this.observers.delete(observer);
    };
  }

  /**
   * Register every stored chat. Returns the number of chats loaded.
   */
  loadSessions(): number {
    const rows = this.chatRepo.fetchFullHistory();
    const loaded = reconstructSessions(rows, this.deps);
    for (const [id, session] of loaded) {
      this.sessions.set(id, session);
    }
    this.logger.debug(`Loaded ${loaded.size} chats from ${rows.length} rows`);
    return loaded.size;
  }

  get activeSession(): ChatSession {
    if (this.active === null) {
      return this.newSession();
    }
    return this.active;
  }

  get unsavedSession(): ChatSession | null {
    return this.unsaved;
  }

  get isGenerating(): boolean {
    return this.generating;
  }

  newSession(systemMessage: string = '', title: string = ''): ChatSession {
    const session = ChatSession.create(this.deps, { systemMessage, title });
    this.active = session;
    this.unsaved = session;
    return session;
  }

  getSession(chatId: number): ChatSession {
    const session = this.sessions.get(chatId);
    if (!session) {
      throw new NotFoundError('Chat', chatId);
    }
    return session;
  }

  setActive(chatId: number): ChatSession {
    this.active = this.getSession(chatId);
    return this.active;
  }

  rename(chatId: number, title: string): void {
    const session = this.getSession(chatId);
    this.chatRepo.renameChat(chatId, title);
    session.title = title;
  }

  delete(chatId: number): void {
    const session = this.getSession(chatId);
    this.chatRepo.deleteChat(chatId);
    this.sessions.delete(chatId);
    if (this.active === session) {
      this.active = null;
    }
  }

  /**
   * Drop the never-persisted session without touching the store
   */
  discardUnsaved(): void {
    if (this.unsaved === null) {
      return;
    }
    if (this.active === this.unsaved) {
      this.active = null;
    }
    this.unsaved = null;
  }

  /**
   * Stored chats, newest first
   */
  listChats(): ChatTitle[] {
    return this.chatRepo.listChatTitles().reverse();
  }

  /**
   * Stream a completion for `prompt` on the active session and persist the
   * resulting turn. Observers see every fragment, and hear about the
   * completion only once it is stored. On failure they receive the error,
   * which is also rethrown, and the session is left without the turn.
   */
  async generate(prompt: string): Promise<ChatRequest> {
    if (this.generating) {
      throw new AlreadyGeneratingError();
    }
    this.generating = true;

    const session = this.activeSession;
    const wasUnsaved = session === this.unsaved;
    const ticker = new WaitingTicker(this.waitingIntervalMs, () =>
      this.notify((observer) => observer.onWaiting?.())
    );
    const stopWaiting = () => {
      if (ticker.stop()) {
        this.notify((observer) => observer.onWaitFinished?.());
      }
    };

    try {
      ticker.start();

      const completion = session.createCompletion({ ...this.settings, prompt });
      let step = await completion.next();
      while (!step.done) {
        stopWaiting();
        const fragment = step.value;
        this.notify((observer) => observer.onFragment?.(fragment));
        step = await completion.next();
      }
      stopWaiting();

      const request = step.value;
      const tokens = session.tokensUsed(this.settings.model);
      const { chatId, created } = this.persistTurn(session, request, wasUnsaved);
      this.logger.debug(`Saved request to chat ${chatId} (${tokens} tokens in context)`);

      this.notify((observer) => observer.onCompletion?.(request.response ?? ''));
      this.notify((observer) => observer.onTokensUsed?.(tokens));
      if (created) {
        this.notify((observer) => observer.onChatPersisted?.(chatId, session.title));
      }

      return request;
    } catch (error) {
      stopWaiting();
      this.logger.debug(`Generation failed: ${error instanceof Error ? error.message : error}`);
      this.notify((observer) => observer.onError?.(error));
      throw error;
    } finally {
      this.generating = false;
    }
  }

  /**
   * Store the completed turn, inserting the chat row with it if the session
   * was unsaved when the generation started. A turn that cannot be stored is
   * taken back out of the session.
   */
  private persistTurn(
    session: ChatSession,
    request: ChatRequest,
    wasUnsaved: boolean
  ): { chatId: number; created: boolean } {
    try {
      if (wasUnsaved) {
        const chatId = this.chatRepo.saveChat(session, request);
        session.assignId(chatId);
        this.sessions.set(chatId, session);
        if (this.unsaved === session) {
          this.unsaved = null;
        }
        return { chatId, created: true };
      }

      const chatId = this.registeredId(session);
      this.chatRepo.saveRequest(chatId, request);
      return { chatId, created: false };
    } catch (error) {
      session.discardLastTurn(request);
      this.logger.warn(
        `Turn not stored and removed from "${session.title}": ${error instanceof Error ? error.message : error}`
      );
      throw error;
    }
  }

  private registeredId(session: ChatSession): number {
    for (const [chatId, candidate] of this.sessions) {
      if (candidate === session) {
        return chatId;
      }
    }
    throw new InvariantViolationError(`Session "${session.title}" is neither unsaved nor registered`);
  }

  private notify(emit: (observer: SessionObserver) => void): void {
    for (const observer of this.observers) {
      emit(observer);
    }
  }
}
