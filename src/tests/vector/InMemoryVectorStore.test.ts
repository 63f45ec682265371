import type { EmbeddingRecord } from '../../types/index.js';
import { StoreReadError, StoreWriteError } from '../../utils/errors.js';
import { cosineSimilarity } from '../../vector/similarity.js';
import { InMemoryVectorStore } from '../../vector/InMemoryVectorStore.js';

function record(id: string, vector: number[], sourceId: string, chunkIndex: number, embeddingModel = 'm1'): EmbeddingRecord {
  return {
    id,
    vector,
    payload: { source_id: sourceId, chunk_index: chunkIndex, text: `${sourceId}#${chunkIndex}`, embedding_model: embeddingModel }
  };
}

async function seeded(): Promise<InMemoryVectorStore> {
  const store = new InMemoryVectorStore();
  await store.ensureCollection('c', 3);
  await store.upsert('c', [
    record('p1', [0, 1, 0], 'X', 0),
    record('p2', [1, 0, 0], 'X', 1),
    record('p3', [1, 1, 0], 'X', 2),
    record('p4', [1, 0, 0], 'Z', 0)
  ]);
  return store;
}

describe('cosineSimilarity', () => {
  it('is zero when a vector has no length', () => {
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
    expect(cosineSimilarity([2, 0], [3, 0])).toBeCloseTo(1, 10);
  });
});

describe('InMemoryVectorStore', () => {
  it('ranks by descending score and honours topK', async () => {
    const store = await seeded();
    const results = await store.search('c', [1, 0, 0], { topK: 2, filters: { source_id: 'X' } });

    expect(results.map((r) => r.chunkIndex)).toEqual([1, 2]);
    expect(results[0]?.score).toBeCloseTo(1, 10);
    expect(results[1]?.score).toBeCloseTo(Math.SQRT1_2, 10);
    expect(results[0]).toMatchObject({ text: 'X#1', sourceId: 'X', embeddingModel: 'm1' });
  });

  it('returns only points matching every filter', async () => {
    const store = await seeded();

    expect(await store.search('c', [1, 0, 0], { topK: 5, filters: { source_id: 'Y' } })).toEqual([]);
    const fromZ = await store.search('c', [1, 0, 0], { topK: 5, filters: { source_id: 'Z' } });
    expect(fromZ.map((r) => r.sourceId)).toEqual(['Z']);
    expect(await store.search('c', [1, 0, 0], { topK: 5, filters: { source_id: 'X', embedding_model: 'm2' } })).toEqual([]);
  });

  it('keeps insertion order for equal scores', async () => {
    const store = await seeded();
    const results = await store.search('c', [1, 0, 0], { topK: 2 });
    expect(results.map((r) => `${r.sourceId}#${r.chunkIndex}`)).toEqual(['X#1', 'Z#0']);
  });

  it('scores by dot product when configured', async () => {
    const store = new InMemoryVectorStore();
    await store.ensureCollection('d', 2, 'dot');
    await store.upsert('d', [record('a', [2, 0], 'S', 0), record('b', [1, 1], 'S', 1)]);

    const results = await store.search('d', [3, 1], { topK: 2 });
    expect(results.map((r) => r.score)).toEqual([6, 4]);
  });

  it('replaces a point upserted twice under the same id', async () => {
    const store = await seeded();
    await store.upsert('c', [record('p1', [0, 0, 1], 'X', 0)]);

    expect(await store.count('c', { source_id: 'X' })).toBe(3);
    const [top] = await store.search('c', [0, 0, 1], { topK: 1 });
    expect(top?.chunkIndex).toBe(0);
  });

  it('rejects a collection re-created with another size', async () => {
    const store = await seeded();
    await expect(store.ensureCollection('c', 3)).resolves.toBeUndefined();
    await expect(store.ensureCollection('c', 4)).rejects.toThrow('Collection c has 3 dimensions, requested 4');
  });

  it('writes nothing when one record in a batch is invalid', async () => {
    const store = new InMemoryVectorStore();
    await store.ensureCollection('c', 3);

    await expect(store.upsert('c', [record('ok', [1, 0, 0], 'X', 0), record('bad', [1, 0], 'X', 1)])).rejects.toThrow(
      StoreWriteError
    );
    await expect(
      store.upsert('c', [{ id: 'neg', vector: [1, 0, 0], payload: { ...record('neg', [], 'X', 0).payload, chunk_index: -1 } }])
    ).rejects.toThrow(StoreWriteError);
    expect(await store.count('c', {})).toBe(0);
  });

  it('fails on a missing collection except for deletes', async () => {
    const store = new InMemoryVectorStore();

    await expect(store.upsert('nope', [])).rejects.toThrow(StoreWriteError);
    await expect(store.count('nope', {})).rejects.toThrow(StoreReadError);
    await expect(store.search('nope', [1], { topK: 1 })).rejects.toThrow(StoreReadError);
    await expect(store.deleteBySource('nope', 'X')).resolves.toBeUndefined();
  });

  it('validates search arguments', async () => {
    const store = await seeded();

    await expect(store.search('c', [1, 0, 0], { topK: 0 })).rejects.toThrow('topK must be a positive integer, got 0');
    await expect(store.search('c', [1, 0], { topK: 1 })).rejects.toThrow(
      'Query vector has 2 dimensions, collection c expects 3'
    );
  });

  it('counts and deletes by source and model', async () => {
    const store = await seeded();
    await store.upsert('c', [record('p5', [0, 0, 1], 'X', 0, 'm2')]);

    expect(await store.exists('c', 'X', { embedding_model: 'm2' })).toBe(true);
    await store.deleteBySource('c', 'X', { embedding_model: 'm1' });

    expect(await store.count('c', { source_id: 'X' })).toBe(1);
    expect(await store.exists('c', 'X', { embedding_model: 'm1' })).toBe(false);
    expect(await store.exists('c', 'Z')).toBe(true);
    expect(store.stats()).toEqual({ collections: 1, points: 2 });
  });
});
