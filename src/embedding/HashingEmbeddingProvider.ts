import { EmbeddingUnavailable } from '../utils/errors.js';
import { hashEmbed } from './hashing.js';
import { checkVectors, type EmbeddingProvider } from './types.js';

export const MIN_HASHING_DIMENSIONS = 8;

/**
 * Local, deterministic embedding model. Needs no network or model download; similarity
 * reflects shared vocabulary only, so it suits development and tests rather than production.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
  constructor(readonly modelName: string, readonly dimensions: number) {
    if (!Number.isInteger(dimensions) || dimensions < MIN_HASHING_DIMENSIONS) {
      throw new EmbeddingUnavailable(
        `Hashing model ${modelName} needs at least ${MIN_HASHING_DIMENSIONS} integer dimensions, got ${dimensions}`,
        modelName
      );
    }
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    return checkVectors(texts.map((t) => hashEmbed(t, this.dimensions)), texts.length, this);
  }

  async embedOne(text: string): Promise<number[]> {
    const [vector] = await this.embedMany([text]);
    if (!vector) throw new EmbeddingUnavailable(`Model ${this.modelName} returned no vector`, this.modelName);
    return vector;
  }
}
