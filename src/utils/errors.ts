export type PipelineErrorCode =
  | 'CHUNKING_ERROR'
  | 'EMBEDDING_UNAVAILABLE'
  | 'STORE_WRITE_ERROR'
  | 'STORE_READ_ERROR'
  | 'TRANSCRIPT_UNAVAILABLE'
  | 'GENERATION_FAILURE'
  | 'PROMPT_BUDGET_EXCEEDED'
  | 'CONVERSATION_STORE_ERROR'
  | 'INVALID_VIDEO_REF';

export class PipelineError extends Error {
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    public readonly code: PipelineErrorCode,
    options?: { cause?: unknown; details?: Record<string, unknown> }
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'PipelineError';
    this.details = options?.details;
  }
}

export class ChunkingError extends PipelineError {
  constructor(message: string) {
    super(message, 'CHUNKING_ERROR');
    this.name = 'ChunkingError';
  }
}

export class EmbeddingUnavailable extends PipelineError {
  constructor(message: string, public readonly modelName: string, cause?: unknown) {
    super(message, 'EMBEDDING_UNAVAILABLE', { cause, details: { modelName } });
    this.name = 'EmbeddingUnavailable';
  }
}

export class StoreWriteError extends PipelineError {
  constructor(message: string, public readonly collection: string, cause?: unknown) {
    super(message, 'STORE_WRITE_ERROR', { cause, details: { collection } });
    this.name = 'StoreWriteError';
  }
}

export class StoreReadError extends PipelineError {
  constructor(message: string, public readonly collection: string, cause?: unknown) {
    super(message, 'STORE_READ_ERROR', { cause, details: { collection } });
    this.name = 'StoreReadError';
  }
}

export interface TranscriptAttempt {
  language: string;
  error: string;
}

export class TranscriptUnavailable extends PipelineError {
  constructor(
    message: string,
    public readonly videoId: string,
    public readonly attempts: TranscriptAttempt[] = [],
    cause?: unknown
  ) {
    super(message, 'TRANSCRIPT_UNAVAILABLE', { cause, details: { videoId, attempts } });
    this.name = 'TranscriptUnavailable';
  }
}

export type GenerationFailureKind =
  | 'rate_limit' // 429
  | 'auth' // 401, 403
  | 'invalid_request' // 400
  | 'server_error' // 5xx
  | 'timeout'
  | 'network'
  | 'empty_response'
  | 'unknown';

export class GenerationFailure extends PipelineError {
  constructor(
    message: string,
    public readonly kind: GenerationFailureKind,
    public readonly statusCode?: number,
    public readonly retryable: boolean = false,
    public readonly retryAfterMs?: number,
    cause?: unknown
  ) {
    super(message, 'GENERATION_FAILURE', { cause, details: { kind, statusCode } });
    this.name = 'GenerationFailure';
  }
}

export class PromptBudgetExceeded extends PipelineError {
  constructor(message: string, public readonly budget: number, public readonly required: number) {
    super(message, 'PROMPT_BUDGET_EXCEEDED', { details: { budget, required } });
    this.name = 'PromptBudgetExceeded';
  }
}

export class ConversationStoreError extends PipelineError {
  constructor(message: string, public readonly sessionId: string, public readonly notFound = false, cause?: unknown) {
    super(message, 'CONVERSATION_STORE_ERROR', { cause, details: { sessionId, notFound } });
    this.name = 'ConversationStoreError';
  }
}

export class InvalidVideoReference extends PipelineError {
  constructor(public readonly reference: string) {
    super(`Could not extract a video id from '${reference}'`, 'INVALID_VIDEO_REF', { details: { reference } });
    this.name = 'InvalidVideoReference';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}
