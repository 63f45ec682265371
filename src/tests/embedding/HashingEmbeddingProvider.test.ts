import { HashingEmbeddingProvider } from '../../embedding/HashingEmbeddingProvider.js';
import { hashEmbed, tokenize } from '../../embedding/hashing.js';
import { checkVectors } from '../../embedding/types.js';
import { EmbeddingUnavailable } from '../../utils/errors.js';

function norm(vector: number[]): number {
  return Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
}

describe('hashing embeddings', () => {
  it('tokenizes lowercase letters and digits', () => {
    expect(tokenize('Hello, World! RAG-2024 ça va')).toEqual(['hello', 'world', 'rag', '2024', 'ça', 'va']);
  });

  it('produces unit vectors of the requested size', () => {
    const vector = hashEmbed('vector search over video transcripts', 64);
    expect(vector).toHaveLength(64);
    expect(norm(vector)).toBeCloseTo(1, 10);
  });

  it('maps text without words to the zero vector', () => {
    expect(hashEmbed('  ...  ', 16)).toEqual(new Array(16).fill(0));
  });

  it('puts a single token in one signed bucket', () => {
    const vector = hashEmbed('transcript', 32);
    const nonZero = vector.filter((v) => v !== 0);

    expect(nonZero).toHaveLength(1);
    expect(Math.abs(nonZero[0] ?? 0)).toBe(1);
  });

  it('ignores case and punctuation', () => {
    expect(hashEmbed('Hello, world!', 32)).toEqual(hashEmbed('hello world', 32));
  });
});

describe('HashingEmbeddingProvider', () => {
  it('rejects too few dimensions', () => {
    expect(() => new HashingEmbeddingProvider('tiny', 4)).toThrow(EmbeddingUnavailable);
    expect(() => new HashingEmbeddingProvider('fractional', 12.5)).toThrow(EmbeddingUnavailable);
  });

  it('embeds passages and queries through the same function', async () => {
    const provider = new HashingEmbeddingProvider('hashing-64', 64);
    const [passage] = await provider.embedMany(['the speaker talks about embeddings']);
    const query = await provider.embedOne('the speaker talks about embeddings');

    expect(query).toEqual(passage);
    expect(query).toEqual(hashEmbed('the speaker talks about embeddings', 64));
  });

  it('returns one vector per input, in order', async () => {
    const provider = new HashingEmbeddingProvider('hashing-32', 32);
    const vectors = await provider.embedMany(['alpha', 'beta', 'gamma']);

    expect(vectors).toHaveLength(3);
    expect(vectors[1]).toEqual(hashEmbed('beta', 32));
  });
});

describe('checkVectors', () => {
  const provider = { modelName: 'm', dimensions: 2 };

  it('copies valid vectors', () => {
    const input = [[1, 0]];
    const out = checkVectors(input, 1, provider);
    expect(out).toEqual([[1, 0]]);
    expect(out[0]).not.toBe(input[0]);
  });

  it('rejects a count mismatch', () => {
    expect(() => checkVectors([[1, 0]], 2, provider)).toThrow('Model m returned 1 vectors for 2 inputs');
  });

  it('rejects a dimension mismatch', () => {
    expect(() => checkVectors([[1, 0, 0]], 1, provider)).toThrow(
      'Model m returned a 3-dimensional vector at position 0, expected 2'
    );
  });

  it('rejects non-finite components', () => {
    expect(() => checkVectors([[1, Number.NaN]], 1, provider)).toThrow(EmbeddingUnavailable);
  });
});
