import { z } from 'zod';
import { BaseRouteHandler } from './RouteContext.js';

const CreateSessionSchema = z.object({
  videoId: z.string().min(1),
  metadata: z.record(z.unknown()).optional()
});

const SessionParamsSchema = z.object({ sessionId: z.string().min(1) });
const VideoParamsSchema = z.object({ videoId: z.string().min(1) });
const ListQuerySchema = z.object({ limit: z.coerce.number().int().positive().max(100).optional() });

const AskBodySchema = z.object({
  question: z.string().trim().min(1),
  topK: z.number().int().positive().max(100).optional(),
  model: z.string().min(1).optional(),
  embeddingModel: z.string().min(1).optional(),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().optional()
});

/**
 * Conversation sessions and questions asked within them
 */
export class SessionRoutes extends BaseRouteHandler {
  setupRoutes(): void {
    const { server } = this.ctx;

    server.post('/api/sessions', async (request, reply) => {
      const body = this.parse(CreateSessionSchema, request.body, reply);
      if (!body) return reply;
      try {
        const session = await this.ctx.questions.startSession(body.videoId, body.metadata);
        return reply.code(201).send({ success: true, sessionId: session.sessionId, session });
      } catch (error) {
        return this.respondFailure(reply, error);
      }
    });

    server.get('/api/sessions/:sessionId', async (request, reply) => {
      const params = this.parse(SessionParamsSchema, request.params, reply);
      if (!params) return reply;
      try {
        const session = await this.ctx.conversations.get(params.sessionId);
        if (!session) {
          return this.respondError(reply, 404, `Session not found: ${params.sessionId}`, { code: 'SESSION_NOT_FOUND', recoverable: true });
        }
        return reply.send({ success: true, session });
      } catch (error) {
        return this.respondFailure(reply, error);
      }
    });

    server.delete('/api/sessions/:sessionId', async (request, reply) => {
      const params = this.parse(SessionParamsSchema, request.params, reply);
      if (!params) return reply;
      try {
        const deleted = await this.ctx.conversations.delete(params.sessionId);
        if (!deleted) {
          return this.respondError(reply, 404, `Session not found: ${params.sessionId}`, { code: 'SESSION_NOT_FOUND', recoverable: true });
        }
        return reply.send({ success: true, sessionId: params.sessionId });
      } catch (error) {
        return this.respondFailure(reply, error);
      }
    });

    server.get('/api/videos/:videoId/sessions', async (request, reply) => {
      const params = this.parse(VideoParamsSchema, request.params, reply);
      if (!params) return reply;
      const query = this.parse(ListQuerySchema, request.query, reply);
      if (!query) return reply;
      try {
        const sessions = await this.ctx.conversations.listByVideo(params.videoId, query.limit);
        return reply.send({ success: true, sessions });
      } catch (error) {
        return this.respondFailure(reply, error);
      }
    });

    server.post('/api/sessions/:sessionId/messages', async (request, reply) => {
      const params = this.parse(SessionParamsSchema, request.params, reply);
      if (!params) return reply;
      const body = this.parse(AskBodySchema, request.body, reply);
      if (!body) return reply;
      try {
        const { question, ...options } = body;
        const result = await this.ctx.questions.ask(params.sessionId, question, options);
        return reply.send({ success: true, ...result });
      } catch (error) {
        return this.respondFailure(reply, error);
      }
    });
  }
}
