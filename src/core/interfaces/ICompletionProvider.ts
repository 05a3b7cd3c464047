import { ChatMessage, SamplingParams } from '../entities/ChatRequest.js';

/**
 * Streaming text-completion provider
 */
export interface ICompletionProvider {
  /**
   * Stream the completion for `messages` one text fragment at a time.
   * The sequence is lazy, finite and not restartable; transport or provider
   * errors end it with a thrown `ProviderFailureError`.
   * Parameters left undefined in `params` must not be sent.
   */
  stream(model: string, messages: ChatMessage[], params: SamplingParams): AsyncIterable<string>;
}
