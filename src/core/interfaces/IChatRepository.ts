import { ChatRequest } from '../entities/ChatRequest.js';
import { ChatHistoryRow, ChatTitle } from '../entities/ChatRecord.js';

/**
 * Fields of a session needed to create its chat row
 */
export interface ChatHeader {
  title: string;
  systemMessage: string;
  dateStarted: string;
}

/**
 * Interface for chat persistence
 */
export interface IChatRepository {
  /**
   * Insert a chat row, together with its first request when given, as a
   * single unit. Returns the new chat id.
   */
  saveChat(chat: ChatHeader, firstRequest?: ChatRequest): number;

  /**
   * Store one request and its user/assistant messages as a single unit
   */
  saveRequest(chatId: number, request: ChatRequest): void;

  renameChat(chatId: number, title: string): void;

  deleteChat(chatId: number): void;

  /**
   * Chats in ascending insertion order
   */
  listChatTitles(): ChatTitle[];

  /**
   * Every chat joined with its requests and messages, grouped by chat and
   * in request insertion order. Chats without requests yield one row whose
   * request fields are null.
   */
  fetchFullHistory(): ChatHistoryRow[];
}
