import { ITokenCounter } from '../interfaces/ITokenCounter.js';

/**
 * Chat message format sent to the completion provider
 */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Optional sampling parameters. An undefined field means "not supplied".
 */
export interface SamplingParams {
  temperature?: number;
  topP?: number;
  presencePenalty?: number;
  frequencyPenalty?: number;
}

/**
 * One completed prompt/response turn
 */
export interface ChatRequest extends Readonly<SamplingParams> {
  readonly model: string;
  readonly prompt?: string;
  readonly response?: string;
  readonly timestamp?: string;
}

/**
 * Build a frozen request, dropping sampling parameters that were not supplied
 */
export function createRequest(fields: ChatRequest): ChatRequest {
  const request: {
    -readonly [K in keyof ChatRequest]: ChatRequest[K];
  } = { model: fields.model };

  if (fields.prompt !== undefined) request.prompt = fields.prompt;
  if (fields.response !== undefined) request.response = fields.response;
  if (fields.timestamp !== undefined) request.timestamp = fields.timestamp;
  Object.assign(request, pickSamplingParams(fields));

  return Object.freeze(request);
}

export function pickSamplingParams(source: SamplingParams): SamplingParams {
  const params: SamplingParams = {};
  if (source.temperature !== undefined) params.temperature = source.temperature;
  if (source.topP !== undefined) params.topP = source.topP;
  if (source.presencePenalty !== undefined) params.presencePenalty = source.presencePenalty;
  if (source.frequencyPenalty !== undefined) params.frequencyPenalty = source.frequencyPenalty;
  return params;
}

/**
 * Token cost of a turn, always measured with the model that produced it so
 * historical turns keep a stable cost when the active model changes.
 */
export function requestLength(request: ChatRequest, tokenCounter: ITokenCounter): number {
  const promptLength = tokenCounter.count(request.prompt ?? '', request.model);
  const responseLength = tokenCounter.count(request.response ?? '', request.model);
  return promptLength + responseLength;
}
