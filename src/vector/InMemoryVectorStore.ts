import {
  PassagePayloadSchema,
  toRetrievedResult,
  type DistanceMetric,
  type EmbeddingRecord,
  type PassagePayload,
  type PayloadFilters,
  type RetrievedResult
} from '../types/index.js';
import { StoreReadError, StoreWriteError } from '../utils/errors.js';
import { score } from './similarity.js';
import { filterEntries, type SearchOptions, type VectorStore } from './types.js';

type Stored = { vector: number[]; payload: PassagePayload };

interface Collection {
  dimensions: number;
  distance: DistanceMetric;
  byId: Map<string, Stored>;
}

function matches(payload: PassagePayload, filters: PayloadFilters | undefined): boolean {
  return filterEntries(filters).every(([field, value]) => payload[field] === value);
}

/**
 * Process-local vector store. Points live in insertion order, which is also the
 * tie-breaking order for equal scores.
 */
export class InMemoryVectorStore implements VectorStore {
  readonly backend = 'in-memory';
  private readonly collections = new Map<string, Collection>();

  async ensureCollection(name: string, dimensions: number, distance: DistanceMetric = 'cosine'): Promise<void> {
    const existing = this.collections.get(name);
    if (existing) {
      if (existing.dimensions !== dimensions) {
        throw new StoreWriteError(
          `Collection ${name} has ${existing.dimensions} dimensions, requested ${dimensions}`,
          name
        );
      }
      return;
    }
    this.collections.set(name, { dimensions, distance, byId: new Map() });
  }

  async upsert(name: string, records: readonly EmbeddingRecord[]): Promise<void> {
    const collection = this.collections.get(name);
    if (!collection) throw new StoreWriteError(`Collection ${name} does not exist`, name);

    const staged: Array<[string, Stored]> = [];
    for (const record of records) {
      if (record.vector.length !== collection.dimensions) {
        throw new StoreWriteError(
          `Point ${record.id} has ${record.vector.length} dimensions, collection ${name} expects ${collection.dimensions}`,
          name
        );
      }
      const parsed = PassagePayloadSchema.safeParse(record.payload);
      if (!parsed.success) {
        throw new StoreWriteError(`Point ${record.id} has an invalid payload: ${parsed.error.message}`, name, parsed.error);
      }
      staged.push([record.id, { vector: [...record.vector], payload: parsed.data }]);
    }
    for (const [id, stored] of staged) collection.byId.set(id, stored);
  }

  async exists(name: string, sourceId: string, filters?: PayloadFilters): Promise<boolean> {
    return (await this.count(name, { ...filters, source_id: sourceId })) > 0;
  }

  async count(name: string, filters: PayloadFilters): Promise<number> {
    const collection = this.read(name);
    let n = 0;
    for (const stored of collection.byId.values()) {
      if (matches(stored.payload, filters)) n++;
    }
    return n;
  }

  async search(name: string, vector: readonly number[], options: SearchOptions): Promise<RetrievedResult[]> {
    const collection = this.read(name);
    if (!Number.isInteger(options.topK) || options.topK <= 0) {
      throw new StoreReadError(`topK must be a positive integer, got ${options.topK}`, name);
    }
    if (vector.length !== collection.dimensions) {
      throw new StoreReadError(
        `Query vector has ${vector.length} dimensions, collection ${name} expects ${collection.dimensions}`,
        name
      );
    }

    const results: RetrievedResult[] = [];
    for (const stored of collection.byId.values()) {
      if (!matches(stored.payload, options.filters)) continue;
      results.push(toRetrievedResult(score(collection.distance, vector, stored.vector), stored.payload));
    }

    results.sort((a, b) => b.score - a.score);
    return results.slice(0, options.topK);
  }

  async deleteBySource(name: string, sourceId: string, filters?: PayloadFilters): Promise<void> {
    const collection = this.collections.get(name);
    if (!collection) return;
    const scope: PayloadFilters = { ...filters, source_id: sourceId };
    for (const [id, stored] of collection.byId) {
      if (matches(stored.payload, scope)) collection.byId.delete(id);
    }
  }

  async close(): Promise<void> {
    this.collections.clear();
  }

  stats(): { collections: number; points: number } {
    let points = 0;
    for (const c of this.collections.values()) points += c.byId.size;
    return { collections: this.collections.size, points };
  }

  private read(name: string): Collection {
    const collection = this.collections.get(name);
    if (!collection) throw new StoreReadError(`Collection ${name} does not exist`, name);
    return collection;
  }
}
