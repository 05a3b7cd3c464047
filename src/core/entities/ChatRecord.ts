/**
 * Row shapes returned by the chat store
 */
export interface ChatTitle {
  id: number;
  title: string;
}

export interface ChatHistoryRow {
  chat_id: number;
  title: string;
  system_message: string;
  date_started: string;
  model: string | null;
  prompt: string | null;
  response: string | null;
  timestamp: string | null;
  temperature: number | null;
  top_p: number | null;
  presence_penalty: number | null;
  frequency_penalty: number | null;
}

export type MessageRole = 'user' | 'assistant';
