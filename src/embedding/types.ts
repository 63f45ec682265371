import { EmbeddingUnavailable } from '../utils/errors.js';

/**
 * Maps text to fixed-length vectors. `embedMany` and `embedOne` go through the same
 * model instance, so passage and query vectors are comparable.
 */
export interface EmbeddingProvider {
  readonly modelName: string;
  readonly dimensions: number;
  embedMany(texts: string[]): Promise<number[][]>;
  embedOne(text: string): Promise<number[]>;
}

export function checkVectors(
  vectors: readonly (readonly number[])[],
  expectedCount: number,
  provider: Pick<EmbeddingProvider, 'modelName' | 'dimensions'>
): number[][] {
  if (vectors.length !== expectedCount) {
    throw new EmbeddingUnavailable(
      `Model ${provider.modelName} returned ${vectors.length} vectors for ${expectedCount} inputs`,
      provider.modelName
    );
  }

  return vectors.map((vector, i) => {
    if (vector.length !== provider.dimensions) {
      throw new EmbeddingUnavailable(
        `Model ${provider.modelName} returned a ${vector.length}-dimensional vector at position ${i}, expected ${provider.dimensions}`,
        provider.modelName
      );
    }
    if (!vector.every((v) => Number.isFinite(v))) {
      throw new EmbeddingUnavailable(`Model ${provider.modelName} returned a non-finite component at position ${i}`, provider.modelName);
    }
    return [...vector];
  });
}
