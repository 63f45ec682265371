import type { DistanceMetric, EmbeddingRecord, PayloadField, PayloadFilters, RetrievedResult } from '../types/index.js';

/** Payload fields indexed (as keywords) on every collection. */
export const INDEXED_FIELDS: readonly PayloadField[] = ['source_id', 'embedding_model', 'language'];

export interface SearchOptions {
  topK: number;
  filters?: PayloadFilters;
}

/**
 * Vector database adapter. Collections are created lazily; upserts are all-or-error;
 * search returns at most `topK` results by descending score, all matching every filter.
 * Equal scores come back in the backend's native order.
 */
export interface VectorStore {
  readonly backend: string;
  ensureCollection(name: string, dimensions: number, distance?: DistanceMetric): Promise<void>;
  upsert(name: string, records: readonly EmbeddingRecord[]): Promise<void>;
  exists(name: string, sourceId: string, filters?: PayloadFilters): Promise<boolean>;
  count(name: string, filters: PayloadFilters): Promise<number>;
  search(name: string, vector: readonly number[], options: SearchOptions): Promise<RetrievedResult[]>;
  deleteBySource(name: string, sourceId: string, filters?: PayloadFilters): Promise<void>;
  close(): Promise<void>;
}

export function filterEntries(filters: PayloadFilters | undefined): Array<[PayloadField, string]> {
  const entries: Array<[PayloadField, string]> = [];
  if (!filters) return entries;
  for (const field of INDEXED_FIELDS) {
    const value = filters[field];
    if (value !== undefined) entries.push([field, value]);
  }
  return entries;
}
