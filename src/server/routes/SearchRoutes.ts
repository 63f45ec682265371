import { z } from 'zod';
import { BaseRouteHandler } from './RouteContext.js';

const SearchBodySchema = z.object({
  query: z.string().min(1),
  videoId: z.string().min(1).optional(),
  topK: z.number().int().positive().max(100).optional(),
  embeddingModel: z.string().min(1).optional(),
  language: z.string().min(1).optional()
});

/** Raw similarity search, without prompting a model. */
export class SearchRoutes extends BaseRouteHandler {
  setupRoutes(): void {
    this.ctx.server.post('/api/search', async (request, reply) => {
      const body = this.parse(SearchBodySchema, request.body, reply);
      if (!body) return reply;
      try {
        const results = await this.ctx.retriever.retrieve(body.query, {
          embeddingModel: body.embeddingModel ?? this.ctx.embeddings.defaultModel,
          topK: body.topK ?? this.ctx.config.retrieval.topK,
          sourceId: body.videoId,
          language: body.language
        });
        return reply.send({ success: true, results });
      } catch (error) {
        return this.respondFailure(reply, error);
      }
    });
  }
}
