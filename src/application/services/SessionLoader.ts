import { ChatHistoryRow } from '../../core/entities/ChatRecord.js';
import { ChatRequest, createRequest } from '../../core/entities/ChatRequest.js';
import { ChatSession, ChatSessionDependencies } from '../../core/entities/ChatSession.js';

interface ChatGroup {
  title: string;
  systemMessage: string;
  dateStarted: string;
  history: ChatRequest[];
}

function rowToRequest(row: ChatHistoryRow & { model: string }): ChatRequest {
  return createRequest({
    model: row.model,
    prompt: row.prompt ?? undefined,
    response: row.response ?? undefined,
    timestamp: row.timestamp ?? undefined,
    temperature: row.temperature ?? undefined,
    topP: row.top_p ?? undefined,
    presencePenalty: row.presence_penalty ?? undefined,
    frequencyPenalty: row.frequency_penalty ?? undefined,
  });
}

/**
 * Rebuild sessions from full-history rows.
 *
 * Rows are grouped by chat in the order each chat is first seen. A row with
 * a null model is the placeholder of a chat without requests and adds
 * nothing to its history.
 */
export function reconstructSessions(
  rows: readonly ChatHistoryRow[],
  deps: ChatSessionDependencies
): Map<number, ChatSession> {
  const groups = new Map<number, ChatGroup>();

  for (const row of rows) {
    let group = groups.get(row.chat_id);
    if (!group) {
      group = {
        title: row.title,
        systemMessage: row.system_message,
        dateStarted: row.date_started,
        history: [],
      };
      groups.set(row.chat_id, group);
    }

    if (row.model !== null) {
      group.history.push(rowToRequest({ ...row, model: row.model }));
    }
  }

  const sessions = new Map<number, ChatSession>();
  for (const [id, group] of groups) {
    sessions.set(id, ChatSession.reconstruct(deps, { id, ...group }));
  }
  return sessions;
}
