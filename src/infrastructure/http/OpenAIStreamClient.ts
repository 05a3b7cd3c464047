import fetch, { RequestInit, Response } from 'node-fetch';
import { z } from 'zod';
import { ICompletionProvider } from '../../core/interfaces/ICompletionProvider.js';
import { ChatMessage, SamplingParams } from '../../core/entities/ChatRequest.js';
import { ChatError, ProviderFailureError } from '../../core/errors.js';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

const StreamChunkSchema = z.object({
  choices: z
    .array(
      z.object({
        delta: z.object({ content: z.string().nullish() }).passthrough().optional(),
      })
    )
    .optional(),
  error: z.object({ message: z.string() }).passthrough().optional(),
});

/**
 * Map sampling parameters to the wire names, leaving out unsupplied ones
 */
export function toWireParams(params: SamplingParams): Record<string, number> {
  const wire: Record<string, number> = {};
  if (params.temperature !== undefined) wire.temperature = params.temperature;
  if (params.topP !== undefined) wire.top_p = params.topP;
  if (params.presencePenalty !== undefined) wire.presence_penalty = params.presencePenalty;
  if (params.frequencyPenalty !== undefined) wire.frequency_penalty = params.frequencyPenalty;
  return wire;
}

/**
 * Streaming client for OpenAI-compatible `/chat/completions` endpoints.
 * Reads the server-sent event stream and yields each content delta.
 */
export class OpenAIStreamClient implements ICompletionProvider {
  private apiBase: string;

  constructor(
    apiBase: string,
    private apiKey: string = '',
    private fetchImpl: FetchLike = fetch
  ) {
    this.apiBase = apiBase.replace(/\/+$/, '');
  }

  async *stream(
    model: string,
    messages: ChatMessage[],
    params: SamplingParams
  ): AsyncGenerator<string, void, void> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'text/event-stream',
    };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }

    try {
      const res = await this.fetchImpl(`${this.apiBase}/chat/completions`, {
        method: 'POST',
        headers,
        body: JSON.stringify({
          model,
          messages,
          stream: true,
          ...toWireParams(params),
        }),
      });

      if (!res.ok) {
        const detail = await res.text();
        throw new ProviderFailureError(
          `Completion request failed with status ${res.status}${detail ? `: ${detail}` : ''}`,
          { status: res.status }
        );
      }

      const decoder = new TextDecoder();
      let buffered = '';
      for await (const chunk of res.body) {
        buffered += typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });

        const lines = buffered.split('\n');
        buffered = lines.pop() ?? '';
        for (const line of lines) {
          const event = parseEventLine(line);
          if (!event) {
            continue;
          }
          if (event.kind === 'done') {
            return;
          }
          yield event.text;
        }
      }

      const tail = parseEventLine(buffered + decoder.decode());
      if (tail?.kind === 'text') {
        yield tail.text;
      }
    } catch (error) {
      if (error instanceof ChatError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new ProviderFailureError(`Completion stream failed: ${reason}`, { cause: error });
    }
  }
}

type StreamEvent = { kind: 'text'; text: string } | { kind: 'done' };

/**
 * Interpret one SSE line; undefined for lines carrying no text
 */
function parseEventLine(line: string): StreamEvent | undefined {
  const trimmed = line.trim();
  if (!trimmed.startsWith('data:')) {
    return undefined;
  }

  const data = trimmed.slice('data:'.length).trim();
  if (data === '[DONE]') {
    return { kind: 'done' };
  }

  const chunk = StreamChunkSchema.parse(JSON.parse(data));
  if (chunk.error) {
    throw new ProviderFailureError(`Provider error: ${chunk.error.message}`);
  }

  // Some chunks carry only a role or a finish reason
  const content = chunk.choices?.[0]?.delta?.content;
  return content ? { kind: 'text', text: content } : undefined;
}
