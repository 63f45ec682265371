import { ConfigError } from '../config/ConfigResolver.js';
import { ConversationStoreError, PipelineError } from '../utils/errors.js';

export interface HttpErrorMapping {
  status: number;
  code: string;
  recoverable: boolean;
}

/** Maps a failure from the pipeline to the HTTP status and error code the API reports. */
export function mapError(error: unknown): HttpErrorMapping {
  if (error instanceof PipelineError) {
    switch (error.code) {
      case 'INVALID_VIDEO_REF':
      case 'CHUNKING_ERROR':
        return { status: 400, code: error.code, recoverable: true };
      case 'TRANSCRIPT_UNAVAILABLE':
        return { status: 404, code: error.code, recoverable: true };
      case 'PROMPT_BUDGET_EXCEEDED':
        return { status: 422, code: error.code, recoverable: true };
      case 'CONVERSATION_STORE_ERROR':
        if (error instanceof ConversationStoreError && error.notFound) {
          return { status: 404, code: 'SESSION_NOT_FOUND', recoverable: true };
        }
        return { status: 503, code: error.code, recoverable: true };
      case 'EMBEDDING_UNAVAILABLE':
      case 'STORE_WRITE_ERROR':
      case 'STORE_READ_ERROR':
      case 'GENERATION_FAILURE':
        return { status: 503, code: error.code, recoverable: true };
    }
  }
  if (error instanceof ConfigError) {
    return { status: 500, code: 'CONFIG_ERROR', recoverable: false };
  }
  return { status: 500, code: 'INTERNAL_ERROR', recoverable: false };
}
