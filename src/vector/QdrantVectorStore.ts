import { QdrantClient } from '@qdrant/js-client-rest';
import type { Schemas } from '@qdrant/js-client-rest';

import {
  PassagePayloadSchema,
  toRetrievedResult,
  type DistanceMetric,
  type EmbeddingRecord,
  type Logger,
  type PayloadFilters,
  type RetrievedResult,
  type VectorStoreConfig
} from '../types/index.js';
import { withDeadline } from '../utils/async.js';
import { errorMessage, PipelineError, StoreReadError, StoreWriteError } from '../utils/errors.js';
import { filterEntries, INDEXED_FIELDS, type SearchOptions, type VectorStore } from './types.js';

type Env = Readonly<Record<string, string | undefined>>;

const DISTANCES: Record<DistanceMetric, Schemas['Distance']> = {
  cosine: 'Cosine',
  dot: 'Dot'
};

export function toQdrantFilter(filters: PayloadFilters | undefined): Schemas['Filter'] {
  return {
    must: filterEntries(filters).map(([key, value]) => ({ key, match: { value } }))
  };
}

function isAlreadyExists(error: unknown): boolean {
  return /already exists/i.test(errorMessage(error));
}

function vectorSize(vectors: unknown): number | undefined {
  if (typeof vectors === 'object' && vectors !== null && 'size' in vectors && typeof vectors.size === 'number') {
    return vectors.size;
  }
  return undefined;
}

/**
 * Qdrant-backed store. Every call runs under the configured deadline; failures surface as
 * StoreWriteError for mutations and StoreReadError for reads.
 */
export class QdrantVectorStore implements VectorStore {
  readonly backend = 'qdrant';
  private readonly client: QdrantClient;
  private readonly ready = new Set<string>();

  constructor(
    private readonly config: VectorStoreConfig,
    private readonly logger: Logger,
    env: Env = process.env
  ) {
    const apiKey = env[config.apiKeyEnv] || undefined;
    this.client = new QdrantClient({ url: config.url, apiKey, timeout: config.timeoutMs, checkCompatibility: false });
  }

  async ensureCollection(name: string, dimensions: number, distance: DistanceMetric = 'cosine'): Promise<void> {
    if (this.ready.has(name)) return;

    await this.write(name, 'ensureCollection', async () => {
      const { exists } = await this.client.collectionExists(name);
      if (exists) {
        const info = await this.client.getCollection(name);
        const size = vectorSize(info.config.params.vectors);
        if (size !== undefined && size !== dimensions) {
          throw new StoreWriteError(`Collection ${name} has ${size} dimensions, requested ${dimensions}`, name);
        }
      } else {
        this.logger.info('Creating vector collection', { collection: name, dimensions, distance });
        try {
          await this.client.createCollection(name, { vectors: { size: dimensions, distance: DISTANCES[distance] } });
        } catch (error) {
          if (!isAlreadyExists(error)) throw error;
        }
      }

      for (const field of INDEXED_FIELDS) {
        try {
          await this.client.createPayloadIndex(name, { field_name: field, field_schema: 'keyword', wait: true });
        } catch (error) {
          if (!isAlreadyExists(error)) throw error;
          this.logger.debug('Payload index already present', { collection: name, field });
        }
      }
    });
    this.ready.add(name);
  }

  async upsert(name: string, records: readonly EmbeddingRecord[]): Promise<void> {
    if (records.length === 0) return;

    const points: Schemas['PointStruct'][] = [];
    for (const record of records) {
      const parsed = PassagePayloadSchema.safeParse(record.payload);
      if (!parsed.success) {
        throw new StoreWriteError(`Point ${record.id} has an invalid payload: ${parsed.error.message}`, name, parsed.error);
      }
      points.push({ id: record.id, vector: record.vector, payload: parsed.data });
    }

    await this.write(name, 'upsert', async () => {
      await this.client.upsert(name, { wait: true, points });
    });
    this.logger.debug('Upserted points', { collection: name, count: points.length });
  }

  async exists(name: string, sourceId: string, filters?: PayloadFilters): Promise<boolean> {
    return (await this.count(name, { ...filters, source_id: sourceId })) > 0;
  }

  async count(name: string, filters: PayloadFilters): Promise<number> {
    return this.read(name, 'count', async () => {
      const result = await this.client.count(name, { filter: toQdrantFilter(filters), exact: true });
      return result.count;
    });
  }

  async search(name: string, vector: readonly number[], options: SearchOptions): Promise<RetrievedResult[]> {
    if (!Number.isInteger(options.topK) || options.topK <= 0) {
      throw new StoreReadError(`topK must be a positive integer, got ${options.topK}`, name);
    }

    const hits = await this.read(name, 'search', () =>
      this.client.search(name, {
        vector: [...vector],
        filter: toQdrantFilter(options.filters),
        limit: options.topK,
        with_payload: true,
        with_vector: false
      })
    );

    return hits.map((hit) => {
      const parsed = PassagePayloadSchema.safeParse(hit.payload);
      if (!parsed.success) {
        throw new StoreReadError(`Point ${String(hit.id)} has an invalid payload: ${parsed.error.message}`, name, parsed.error);
      }
      return toRetrievedResult(hit.score, parsed.data);
    });
  }

  async deleteBySource(name: string, sourceId: string, filters?: PayloadFilters): Promise<void> {
    await this.write(name, 'deleteBySource', async () => {
      await this.client.delete(name, { wait: true, filter: toQdrantFilter({ ...filters, source_id: sourceId }) });
    });
    this.logger.info('Deleted points by source', { collection: name, sourceId, ...filters });
  }

  async close(): Promise<void> {
    this.ready.clear();
  }

  private async write<T>(collection: string, op: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withDeadline(fn, this.config.timeoutMs, `qdrant ${op}`);
    } catch (error) {
      if (error instanceof PipelineError) throw error;
      this.logger.error('Vector store write failed', { collection, op, error: errorMessage(error) });
      throw new StoreWriteError(`Qdrant ${op} on ${collection} failed: ${errorMessage(error)}`, collection, error);
    }
  }

  private async read<T>(collection: string, op: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withDeadline(fn, this.config.timeoutMs, `qdrant ${op}`);
    } catch (error) {
      if (error instanceof PipelineError) throw error;
      this.logger.error('Vector store read failed', { collection, op, error: errorMessage(error) });
      throw new StoreReadError(`Qdrant ${op} on ${collection} failed: ${errorMessage(error)}`, collection, error);
    }
  }
}
