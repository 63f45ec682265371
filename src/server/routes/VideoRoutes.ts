import { z } from 'zod';
import { LanguageCodeSchema } from '../../types/index.js';
import { BaseRouteHandler } from './RouteContext.js';

const IngestBodySchema = z.object({
  video: z.string().min(1),
  languages: z.array(LanguageCodeSchema).min(1).optional(),
  embeddingModel: z.string().min(1).optional(),
  force: z.boolean().optional()
});

const TranscriptBodySchema = z.object({
  text: z.string(),
  language: LanguageCodeSchema.optional(),
  embeddingModel: z.string().min(1).optional(),
  force: z.boolean().optional()
});

const VideoParamsSchema = z.object({ videoId: z.string().min(1) });
const StatusQuerySchema = z.object({ embeddingModel: z.string().min(1).optional() });

/**
 * Transcript ingestion and per-video status
 */
export class VideoRoutes extends BaseRouteHandler {
  setupRoutes(): void {
    const { server } = this.ctx;

    server.post('/api/videos/ingest', async (request, reply) => {
      const body = this.parse(IngestBodySchema, request.body, reply);
      if (!body) return reply;
      try {
        const result = await this.ctx.ingestion.ingestVideo(body.video, {
          languages: body.languages,
          embeddingModel: body.embeddingModel,
          force: body.force
        });
        return reply.code(result.status === 'ingested' ? 201 : 200).send({ success: true, result });
      } catch (error) {
        return this.respondFailure(reply, error);
      }
    });

    server.post('/api/videos/:videoId/transcript', async (request, reply) => {
      const params = this.parse(VideoParamsSchema, request.params, reply);
      if (!params) return reply;
      const body = this.parse(TranscriptBodySchema, request.body, reply);
      if (!body) return reply;
      try {
        const result = await this.ctx.ingestion.ingestText(params.videoId, body.text, {
          language: body.language,
          embeddingModel: body.embeddingModel,
          force: body.force
        });
        return reply.code(result.status === 'ingested' ? 201 : 200).send({ success: true, result });
      } catch (error) {
        return this.respondFailure(reply, error);
      }
    });

    server.get('/api/videos/:videoId/status', async (request, reply) => {
      const params = this.parse(VideoParamsSchema, request.params, reply);
      if (!params) return reply;
      const query = this.parse(StatusQuerySchema, request.query, reply);
      if (!query) return reply;
      try {
        const status = await this.ctx.ingestion.status(params.videoId, query.embeddingModel);
        return reply.send({ success: true, status });
      } catch (error) {
        return this.respondFailure(reply, error);
      }
    });
  }
}
