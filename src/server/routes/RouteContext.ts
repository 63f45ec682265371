import type { FastifyInstance, FastifyReply } from 'fastify';
import type { z } from 'zod';

import type { EmbeddingProviderRegistry } from '../../embedding/index.js';
import type { ConversationStore } from '../../conversation/index.js';
import type { IngestionService, QuestionService } from '../../pipeline/index.js';
import type { Retriever } from '../../retrieval/index.js';
import type { AppConfig, Logger } from '../../types/index.js';
import type { VectorStore } from '../../vector/index.js';

export interface ErrorOptions {
  code?: string;
  recoverable?: boolean;
  meta?: unknown;
}

export interface RouteServices {
  ingestion: IngestionService;
  questions: QuestionService;
  retriever: Retriever;
  conversations: ConversationStore;
  embeddings: EmbeddingProviderRegistry;
  vectorStore: VectorStore;
}

/**
 * Context shared across all route handlers
 */
export interface RouteContext extends RouteServices {
  server: FastifyInstance;
  logger: Logger;
  config: AppConfig;
  respondError: (reply: FastifyReply, status: number, message: string, opts?: ErrorOptions) => FastifyReply;
  respondFailure: (reply: FastifyReply, error: unknown) => FastifyReply;
}

/**
 * Base class for route handlers
 */
export abstract class BaseRouteHandler {
  constructor(protected ctx: RouteContext) {}

  abstract setupRoutes(): void;

  protected respondError(reply: FastifyReply, status: number, message: string, opts?: ErrorOptions): FastifyReply {
    return this.ctx.respondError(reply, status, message, opts);
  }

  protected respondFailure(reply: FastifyReply, error: unknown): FastifyReply {
    return this.ctx.respondFailure(reply, error);
  }

  /** Validates `input`; on failure replies 400 and returns undefined. */
  protected parse<S extends z.ZodTypeAny>(schema: S, input: unknown, reply: FastifyReply): z.output<S> | undefined {
    const result = schema.safeParse(input ?? {});
    if (result.success) return result.data;
    this.respondError(reply, 400, 'Invalid request', { code: 'BAD_REQUEST', recoverable: true, meta: result.error.issues });
    return undefined;
  }
}
