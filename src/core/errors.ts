/**
 * Error taxonomy for chat sessions, completion providers and storage.
 * Callers discriminate on `code` (or `instanceof`); nothing here is retried.
 */
export abstract class ChatError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * No tokenizer can be resolved for the model. Fatal.
 */
export class UnsupportedModelError extends ChatError {
  readonly code = 'UNSUPPORTED_MODEL';

  constructor(readonly model: string, options?: { cause?: unknown }) {
    super(`No tokenizer available for model "${model}"`, options);
  }
}

/**
 * Network or provider-side failure while streaming a completion
 */
export class ProviderFailureError extends ChatError {
  readonly code = 'PROVIDER_FAILURE';
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options);
    this.status = options?.status;
  }
}

export class AlreadyGeneratingError extends ChatError {
  readonly code = 'ALREADY_GENERATING';

  constructor() {
    super('A generation is already in progress');
  }
}

export class NotFoundError extends ChatError {
  readonly code = 'NOT_FOUND';

  constructor(readonly entity: string, readonly id: number) {
    super(`${entity} ${id} not found`);
  }
}

/**
 * Internal bookkeeping is inconsistent. Indicates a programming error.
 */
export class InvariantViolationError extends ChatError {
  readonly code = 'INVARIANT_VIOLATION';
}

export class StorageFailureError extends ChatError {
  readonly code = 'STORAGE_FAILURE';

  constructor(readonly operation: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Storage operation "${operation}" failed${reason}`, options);
  }
}

export class ConfigurationError extends ChatError {
  readonly code = 'CONFIGURATION_ERROR';

  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  • ${issue}`).join('\n')}`);
  }
}
