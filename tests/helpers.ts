import { ITokenCounter } from '../src/core/interfaces/ITokenCounter.js';
import { ICompletionProvider } from '../src/core/interfaces/ICompletionProvider.js';
import { ChatMessage, ChatRequest, SamplingParams } from '../src/core/entities/ChatRequest.js';

/**
 * Counts whitespace-separated words, unless a fixed cost is registered for the text
 */
export class FakeTokenCounter implements ITokenCounter {
  calls: Array<{ text: string; model: string }> = [];

  constructor(private costs: Map<string, number> = new Map()) {}

  count(text: string, model: string): number {
    this.calls.push({ text, model });
    const fixed = this.costs.get(text);
    if (fixed !== undefined) {
      return fixed;
    }
    const trimmed = text.trim();
    return trimmed ? trimmed.split(/\s+/).length : 0;
  }
}

interface ScriptedReply {
  fragments: string[];
  error?: Error;
}

/**
 * Replays scripted replies in order; falls back to a single "ok" fragment
 */
export class FakeCompletionProvider implements ICompletionProvider {
  calls: Array<{ model: string; messages: ChatMessage[]; params: SamplingParams }> = [];
  private replies: ScriptedReply[] = [];

  reply(fragments: string[]): this {
    this.replies.push({ fragments });
    return this;
  }

  failAfter(fragments: string[], error: Error): this {
    this.replies.push({ fragments, error });
    return this;
  }

  async *stream(
    model: string,
    messages: ChatMessage[],
    params: SamplingParams
  ): AsyncGenerator<string, void, void> {
    this.calls.push({ model, messages: [...messages], params });
    const next = this.replies.shift() ?? { fragments: ['ok'] };
    for (const fragment of next.fragments) {
      await Promise.resolve();
      yield fragment;
    }
    if (next.error) {
      throw next.error;
    }
  }
}

export async function collect(
  completion: AsyncGenerator<string, ChatRequest, void>
): Promise<{ fragments: string[]; request: ChatRequest }> {
  const fragments: string[] = [];
  let step = await completion.next();
  while (!step.done) {
    fragments.push(step.value);
    step = await completion.next();
  }
  return { fragments, request: step.value };
}
