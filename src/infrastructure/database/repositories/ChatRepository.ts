import Database from 'better-sqlite3';
import { ChatHeader, IChatRepository } from '../../../core/interfaces/IChatRepository.js';
import { ChatRequest } from '../../../core/entities/ChatRequest.js';
import { ChatHistoryRow, ChatTitle, MessageRole } from '../../../core/entities/ChatRecord.js';
import { StorageFailureError } from '../../../core/errors.js';

/**
 * SQLite implementation of chat repository
 */
export class ChatRepository implements IChatRepository {
  constructor(private db: Database.Database) {}

  saveChat(chat: ChatHeader, firstRequest?: ChatRequest): number {
    return this.guard('saveChat', () =>
      this.db.transaction(() => {
        const result = this.db
          .prepare('INSERT INTO Chat (title, system_message, date_started) VALUES (?, ?, ?)')
          .run(chat.title, chat.systemMessage, chat.dateStarted);
        const chatId = Number(result.lastInsertRowid);
        if (firstRequest) {
          this.insertRequest(chatId, firstRequest);
        }
        return chatId;
      })()
    );
  }

  saveRequest(chatId: number, request: ChatRequest): void {
    this.guard('saveRequest', () => {
      this.db.transaction(() => this.insertRequest(chatId, request))();
    });
  }

  renameChat(chatId: number, title: string): void {
    this.guard('renameChat', () => {
      this.db.prepare('UPDATE Chat SET title = ? WHERE id = ?').run(title, chatId);
    });
  }

  deleteChat(chatId: number): void {
    this.guard('deleteChat', () => {
      this.db.prepare('DELETE FROM Chat WHERE id = ?').run(chatId);
    });
  }

  listChatTitles(): ChatTitle[] {
    return this.guard('listChatTitles', () =>
      this.db.prepare<[], ChatTitle>('SELECT id, title FROM Chat ORDER BY id').all()
    );
  }

  fetchFullHistory(): ChatHistoryRow[] {
    const sql = `
      SELECT
        Chat.id AS chat_id,
        Chat.title AS title,
        Chat.system_message AS system_message,
        Chat.date_started AS date_started,
        Request.model AS model,
        Prompt.content AS prompt,
        Response.content AS response,
        Request.timestamp AS timestamp,
        Request.temperature AS temperature,
        Request.top_p AS top_p,
        Request.presence_penalty AS presence_penalty,
        Request.frequency_penalty AS frequency_penalty
      FROM Chat
        LEFT JOIN Request ON Chat.id = Request.chat_id
        LEFT JOIN (SELECT request_id, content FROM Message WHERE role = 'user') AS Prompt
          ON Request.id = Prompt.request_id
        LEFT JOIN (SELECT request_id, content FROM Message WHERE role = 'assistant') AS Response
          ON Request.id = Response.request_id
      ORDER BY Chat.id, Request.id
    `;
    return this.guard('fetchFullHistory', () =>
      this.db.prepare<[], ChatHistoryRow>(sql).all()
    );
  }

  private insertRequest(chatId: number, request: ChatRequest): void {
    const result = this.db
      .prepare(`
        INSERT INTO Request (
          chat_id,
          model,
          timestamp,
          temperature,
          top_p,
          presence_penalty,
          frequency_penalty
        ) VALUES (?, ?, ?, ?, ?, ?, ?)
      `)
      .run(
        chatId,
        request.model,
        request.timestamp ?? new Date().toISOString(),
        request.temperature ?? null,
        request.topP ?? null,
        request.presencePenalty ?? null,
        request.frequencyPenalty ?? null
      );
    const requestId = Number(result.lastInsertRowid);
    this.insertMessage(requestId, 'user', request.prompt ?? '');
    this.insertMessage(requestId, 'assistant', request.response ?? '');
  }

  private insertMessage(requestId: number, role: MessageRole, content: string): void {
    this.db
      .prepare('INSERT INTO Message (request_id, role, content) VALUES (?, ?, ?)')
      .run(requestId, role, content);
  }

  /**
   * Run a statement, reporting any SQLite error as a storage failure
   */
  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw new StorageFailureError(operation, { cause: error });
    }
  }
}
