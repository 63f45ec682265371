import { BaseRouteHandler } from './RouteContext.js';

export class HealthRoutes extends BaseRouteHandler {
  setupRoutes(): void {
    const { server } = this.ctx;

    server.get('/api/health', async () => ({
      status: 'ok',
      vectorStore: this.ctx.vectorStore.backend,
      collection: this.ctx.config.vectorStore.collection,
      conversationStore: this.ctx.conversations.backend,
      embeddingModels: this.ctx.embeddings.list(),
      defaultEmbeddingModel: this.ctx.embeddings.defaultModel,
      completion: { provider: this.ctx.config.completion.provider, model: this.ctx.config.completion.model },
      timestamp: new Date().toISOString()
    }));
  }
}
