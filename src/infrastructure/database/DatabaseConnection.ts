import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { StorageFailureError } from '../../core/errors.js';

export const IN_MEMORY = ':memory:';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS Chat (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL,
    system_message TEXT NOT NULL,
    date_started TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS Request (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    chat_id INTEGER NOT NULL,
    model TEXT NOT NULL,
    timestamp TEXT NOT NULL,
    temperature REAL DEFAULT NULL,
    top_p REAL DEFAULT NULL,
    presence_penalty REAL DEFAULT NULL,
    frequency_penalty REAL DEFAULT NULL,
    FOREIGN KEY (chat_id) REFERENCES Chat(id) ON UPDATE CASCADE ON DELETE CASCADE
  );

  CREATE INDEX IF NOT EXISTS idx_request_chat_id ON Request(chat_id);

  CREATE TABLE IF NOT EXISTS Message (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    request_id INTEGER NOT NULL,
    role TEXT NOT NULL CHECK (role IN ('user', 'assistant')),
    content TEXT NOT NULL,
    FOREIGN KEY (request_id) REFERENCES Request(id) ON UPDATE CASCADE ON DELETE CASCADE
  );

  CREATE INDEX IF NOT EXISTS idx_message_request_id ON Message(request_id);
`;

/**
 * Database connection manager. Opened explicitly by the caller and closed
 * with `close()`; there is no process-wide instance.
 */
export class DatabaseConnection {
  private db: Database.Database;
  private dbPath: string;

  constructor(dbPath: string = 'chat_history.sqlite') {
    this.dbPath = dbPath === IN_MEMORY ? IN_MEMORY : path.resolve(dbPath);
    this.db = DatabaseConnection.open(this.dbPath);
    this.ensureSchema();
  }

  private static open(dbPath: string): Database.Database {
    try {
      if (dbPath !== IN_MEMORY) {
        // Ensure data directory exists
        const dataDir = path.dirname(dbPath);
        if (!fs.existsSync(dataDir)) {
          fs.mkdirSync(dataDir, { recursive: true });
        }
      }

      const db = new Database(dbPath);
      db.pragma('journal_mode = WAL');
      db.pragma('synchronous = NORMAL');
      db.pragma('foreign_keys = ON');
      return db;
    } catch (error) {
      throw new StorageFailureError('open', { cause: error });
    }
  }

  /**
   * Create the Chat, Request and Message tables if they do not exist
   */
  ensureSchema(): void {
    try {
      this.db.exec(SCHEMA);
    } catch (error) {
      throw new StorageFailureError('ensureSchema', { cause: error });
    }
  }

  getDatabase(): Database.Database {
    return this.db;
  }

  isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  getStatistics(): {
    totalChats: number;
    totalRequests: number;
    totalMessages: number;
    databaseSize: number;
  } {
    const count = (table: 'Chat' | 'Request' | 'Message'): number =>
      this.db.prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM ${table}`).get()
        ?.count ?? 0;

    // Get database file size
    let databaseSize = 0;
    if (this.dbPath !== IN_MEMORY && fs.existsSync(this.dbPath)) {
      databaseSize = fs.statSync(this.dbPath).size;
    }

    return {
      totalChats: count('Chat'),
      totalRequests: count('Request'),
      totalMessages: count('Message'),
      databaseSize,
    };
  }
}
