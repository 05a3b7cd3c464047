import { encoding_for_model, type Tiktoken, type TiktokenModel } from 'tiktoken';
import { ITokenCounter } from '../../core/interfaces/ITokenCounter.js';
import { UnsupportedModelError } from '../../core/errors.js';

export const DEFAULT_TOKEN_CACHE_SIZE = 10_000;

/**
 * Reduce provider-prefixed ids ("openai/gpt-4o") to the bare model name
 */
export function normaliseModelId(modelId: string): string {
  const parts = modelId.split('/');
  return parts[parts.length - 1] || modelId;
}

/**
 * Token counter backed by tiktoken encodings.
 *
 * Counts are memoized per (text, model) in a least-recently-used cache so
 * repeated budget checks over the same context stay cheap; eviction only
 * costs a recount.
 */
export class TiktokenCounter implements ITokenCounter {
  private encoders: Map<string, Tiktoken> = new Map();
  private cache: Map<string, number> = new Map();

  constructor(private readonly maxEntries: number = DEFAULT_TOKEN_CACHE_SIZE) {}

  count(text: string, model: string): number {
    const key = `${model}\u0000${text}`;
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      // Refresh recency
      this.cache.delete(key);
      this.cache.set(key, cached);
      return cached;
    }

    const length = this.getEncoder(model).encode(text).length;
    this.cache.set(key, length);
    if (this.cache.size > this.maxEntries) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) {
        this.cache.delete(oldest.value);
      }
    }
    return length;
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  /**
   * Release the WASM encoders
   */
  dispose(): void {
    for (const encoder of this.encoders.values()) {
      encoder.free();
    }
    this.encoders.clear();
    this.cache.clear();
  }

  private getEncoder(model: string): Tiktoken {
    const existing = this.encoders.get(model);
    if (existing) {
      return existing;
    }

    let encoder: Tiktoken;
    try {
      // tiktoken rejects names outside its table at runtime
      encoder = encoding_for_model(normaliseModelId(model) as TiktokenModel);
    } catch (error) {
      throw new UnsupportedModelError(model, { cause: error });
    }
    this.encoders.set(model, encoder);
    return encoder;
  }
}
