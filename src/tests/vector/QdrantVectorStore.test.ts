import { beforeEach, describe, expect, it, vi } from 'vitest';

import type { EmbeddingRecord, Logger, VectorStoreConfig } from '../../types/index.js';
import { StoreReadError, StoreWriteError } from '../../utils/errors.js';
import { QdrantVectorStore, toQdrantFilter } from '../../vector/QdrantVectorStore.js';

const { client, QdrantClient } = vi.hoisted(() => {
  const client = {
    collectionExists: vi.fn(),
    getCollection: vi.fn(),
    createCollection: vi.fn(),
    createPayloadIndex: vi.fn(),
    upsert: vi.fn(),
    count: vi.fn(),
    search: vi.fn(),
    delete: vi.fn()
  };
  return { client, QdrantClient: vi.fn(function QdrantClient() { return client; }) };
});

vi.mock('@qdrant/js-client-rest', () => ({ QdrantClient }));

function makeLogger(): Logger {
  return { trace: vi.fn(), debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const config: VectorStoreConfig = {
  provider: 'qdrant',
  url: 'http://qdrant.test:6333',
  apiKeyEnv: 'QDRANT_API_KEY',
  collection: 'transcripts',
  distance: 'cosine',
  timeoutMs: 1000,
  upsertBatchSize: 10
};

const point: EmbeddingRecord = {
  id: '00000000-0000-4000-8000-000000000001',
  vector: [0.6, 0.8],
  payload: { source_id: 'X', chunk_index: 0, text: 'hello', embedding_model: 'm1' }
};

describe('toQdrantFilter', () => {
  it('builds keyword matches in field order', () => {
    expect(toQdrantFilter({ language: 'en', source_id: 'X', embedding_model: 'm1' })).toEqual({
      must: [
        { key: 'source_id', match: { value: 'X' } },
        { key: 'embedding_model', match: { value: 'm1' } },
        { key: 'language', match: { value: 'en' } }
      ]
    });
    expect(toQdrantFilter(undefined)).toEqual({ must: [] });
  });
});

describe('QdrantVectorStore', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('connects with the key read from the configured variable', () => {
    new QdrantVectorStore(config, makeLogger(), { QDRANT_API_KEY: 'test-secret' });
    expect(QdrantClient).toHaveBeenCalledWith({
      url: 'http://qdrant.test:6333',
      apiKey: 'test-secret',
      timeout: 1000,
      checkCompatibility: false
    });
  });

  it('creates a missing collection with keyword indexes once', async () => {
    client.collectionExists.mockResolvedValue({ exists: false });
    client.createCollection.mockResolvedValue(true);
    client.createPayloadIndex.mockResolvedValue({});
    const store = new QdrantVectorStore(config, makeLogger(), {});

    await store.ensureCollection('transcripts', 384);
    await store.ensureCollection('transcripts', 384);

    expect(client.collectionExists).toHaveBeenCalledTimes(1);
    expect(client.createCollection).toHaveBeenCalledWith('transcripts', { vectors: { size: 384, distance: 'Cosine' } });
    expect(client.createPayloadIndex.mock.calls.map((call) => call[1])).toEqual([
      { field_name: 'source_id', field_schema: 'keyword', wait: true },
      { field_name: 'embedding_model', field_schema: 'keyword', wait: true },
      { field_name: 'language', field_schema: 'keyword', wait: true }
    ]);
  });

  it('tolerates indexes that already exist', async () => {
    client.collectionExists.mockResolvedValue({ exists: true });
    client.getCollection.mockResolvedValue({ config: { params: { vectors: { size: 2, distance: 'Cosine' } } } });
    client.createPayloadIndex.mockRejectedValue(new Error('Index already exists'));
    const store = new QdrantVectorStore(config, makeLogger(), {});

    await expect(store.ensureCollection('transcripts', 2)).resolves.toBeUndefined();
    expect(client.createCollection).not.toHaveBeenCalled();
  });

  it('rejects an existing collection of another size', async () => {
    client.collectionExists.mockResolvedValue({ exists: true });
    client.getCollection.mockResolvedValue({ config: { params: { vectors: { size: 5, distance: 'Cosine' } } } });
    const store = new QdrantVectorStore(config, makeLogger(), {});

    await expect(store.ensureCollection('transcripts', 2)).rejects.toThrow(
      'Collection transcripts has 5 dimensions, requested 2'
    );
  });

  it('wraps client failures during setup', async () => {
    client.collectionExists.mockRejectedValue(new Error('ECONNREFUSED'));
    const store = new QdrantVectorStore(config, makeLogger(), {});

    const error = await store.ensureCollection('transcripts', 2).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(StoreWriteError);
    expect(error).toMatchObject({ message: 'Qdrant ensureCollection on transcripts failed: ECONNREFUSED' });
  });

  it('upserts all points and waits for the write', async () => {
    client.upsert.mockResolvedValue({ status: 'completed' });
    const store = new QdrantVectorStore(config, makeLogger(), {});

    await store.upsert('transcripts', [point]);
    expect(client.upsert).toHaveBeenCalledWith('transcripts', {
      wait: true,
      points: [{ id: point.id, vector: [0.6, 0.8], payload: point.payload }]
    });
  });

  it('validates payloads before writing', async () => {
    const store = new QdrantVectorStore(config, makeLogger(), {});
    const bad: EmbeddingRecord = { ...point, payload: { ...point.payload, source_id: '' } };

    await expect(store.upsert('transcripts', [point, bad])).rejects.toThrow(StoreWriteError);
    expect(client.upsert).not.toHaveBeenCalled();
  });

  it('searches with filters and maps hits', async () => {
    client.search.mockResolvedValue([{ id: point.id, version: 1, score: 0.9, payload: point.payload }]);
    const store = new QdrantVectorStore(config, makeLogger(), {});

    const results = await store.search('transcripts', [1, 0], { topK: 3, filters: { source_id: 'X', embedding_model: 'm1' } });

    expect(results).toEqual([{ score: 0.9, text: 'hello', sourceId: 'X', chunkIndex: 0, embeddingModel: 'm1' }]);
    expect(client.search).toHaveBeenCalledWith('transcripts', {
      vector: [1, 0],
      filter: {
        must: [
          { key: 'source_id', match: { value: 'X' } },
          { key: 'embedding_model', match: { value: 'm1' } }
        ]
      },
      limit: 3,
      with_payload: true,
      with_vector: false
    });
  });

  it('reports hits without a usable payload as read errors', async () => {
    client.search.mockResolvedValue([{ id: 7, version: 1, score: 0.5, payload: { text: 'orphan' } }]);
    const store = new QdrantVectorStore(config, makeLogger(), {});

    await expect(store.search('transcripts', [1, 0], { topK: 1 })).rejects.toThrow(StoreReadError);
  });

  it('counts exactly and derives existence from the count', async () => {
    client.count.mockResolvedValueOnce({ count: 4 }).mockResolvedValueOnce({ count: 0 });
    const store = new QdrantVectorStore(config, makeLogger(), {});

    await expect(store.exists('transcripts', 'X', { embedding_model: 'm1' })).resolves.toBe(true);
    await expect(store.exists('transcripts', 'Y')).resolves.toBe(false);
    expect(client.count).toHaveBeenNthCalledWith(1, 'transcripts', {
      filter: {
        must: [
          { key: 'source_id', match: { value: 'X' } },
          { key: 'embedding_model', match: { value: 'm1' } }
        ]
      },
      exact: true
    });
  });

  it('wraps read failures', async () => {
    client.count.mockRejectedValue(new Error('timeout'));
    const store = new QdrantVectorStore(config, makeLogger(), {});

    await expect(store.count('transcripts', {})).rejects.toThrow(StoreReadError);
  });

  it('deletes by source filter', async () => {
    client.delete.mockResolvedValue({ status: 'completed' });
    const store = new QdrantVectorStore(config, makeLogger(), {});

    await store.deleteBySource('transcripts', 'X', { embedding_model: 'm1' });
    expect(client.delete).toHaveBeenCalledWith('transcripts', {
      wait: true,
      filter: {
        must: [
          { key: 'source_id', match: { value: 'X' } },
          { key: 'embedding_model', match: { value: 'm1' } }
        ]
      }
    });
  });
});
