import type { EmbeddingProviderRegistry } from '../embedding/index.js';
import type { DistanceMetric, Logger, PayloadFilters, RetrievedResult } from '../types/index.js';
import type { VectorStore } from '../vector/index.js';

export interface RetrieveOptions {
  /** Registered embedding model; also scopes the search to passages it produced. */
  embeddingModel: string;
  topK: number;
  sourceId?: string;
  language?: string;
}

/**
 * Embeds a query and runs a filtered similarity search. Results are returned as the store
 * ranked them. A collection nothing was ingested into yet, or a query whose embedding is
 * the zero vector (no word the model can represent), yields no results.
 */
export class Retriever {
  constructor(
    private readonly embeddings: EmbeddingProviderRegistry,
    private readonly store: VectorStore,
    private readonly collection: string,
    private readonly logger: Logger,
    private readonly distance: DistanceMetric = 'cosine'
  ) {}

  async retrieve(query: string, options: RetrieveOptions): Promise<RetrievedResult[]> {
    const provider = this.embeddings.get(options.embeddingModel);
    const vector = await provider.embedOne(query);
    if (vector.every((v) => v === 0)) {
      this.logger.debug('Query has no representable terms; skipping search', { embeddingModel: options.embeddingModel });
      return [];
    }
    await this.store.ensureCollection(this.collection, provider.dimensions, this.distance);

    const filters: PayloadFilters = { embedding_model: options.embeddingModel };
    if (options.sourceId !== undefined) filters.source_id = options.sourceId;
    if (options.language !== undefined) filters.language = options.language;

    const results = await this.store.search(this.collection, vector, { topK: options.topK, filters });
    this.logger.debug('Retrieved passages', {
      collection: this.collection,
      count: results.length,
      topScore: results[0]?.score,
      ...filters
    });
    return results;
  }
}
