import { embed, embedMany, type EmbeddingModel } from 'ai';
import { createOpenAI } from '@ai-sdk/openai';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { createMistral } from '@ai-sdk/mistral';

import type { EmbeddingModelConfig, Logger } from '../types/index.js';
import { EmbeddingUnavailable, errorMessage } from '../utils/errors.js';
import { checkVectors, type EmbeddingProvider } from './types.js';

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Embedding model served through the Vercel AI SDK. The provider model handle is created
 * on first use and reused for every later call.
 */
export class AiSdkEmbeddingProvider implements EmbeddingProvider {
  private model: EmbeddingModel<string> | null = null;

  constructor(
    private readonly config: EmbeddingModelConfig,
    private readonly logger: Logger,
    private readonly env: Env = process.env
  ) {}

  get modelName(): string {
    return this.config.name;
  }

  get dimensions(): number {
    return this.config.dimensions;
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    const model = this.load();

    let embeddings: number[][];
    try {
      const result = await embedMany({ model, values: texts, maxParallelCalls: this.config.maxParallelCalls });
      embeddings = result.embeddings;
    } catch (error) {
      this.logger.error('Embedding call failed', { model: this.modelName, count: texts.length, error: errorMessage(error) });
      throw new EmbeddingUnavailable(`Embedding with ${this.modelName} failed: ${errorMessage(error)}`, this.modelName, error);
    }

    return checkVectors(embeddings, texts.length, this);
  }

  async embedOne(text: string): Promise<number[]> {
    const model = this.load();

    let embedding: number[];
    try {
      const result = await embed({ model, value: text });
      embedding = result.embedding;
    } catch (error) {
      this.logger.error('Embedding call failed', { model: this.modelName, count: 1, error: errorMessage(error) });
      throw new EmbeddingUnavailable(`Embedding with ${this.modelName} failed: ${errorMessage(error)}`, this.modelName, error);
    }

    const [vector] = checkVectors([embedding], 1, this);
    if (!vector) throw new EmbeddingUnavailable(`Model ${this.modelName} returned no vector`, this.modelName);
    return vector;
  }

  private load(): EmbeddingModel<string> {
    if (this.model) return this.model;

    const { provider, baseUrl, apiKeyEnv } = this.config;
    const modelId = this.config.model ?? this.config.name;
    const apiKey = apiKeyEnv ? this.env[apiKeyEnv] : undefined;
    if (apiKeyEnv && !apiKey) {
      throw new EmbeddingUnavailable(
        `Cannot load ${this.modelName}: environment variable ${apiKeyEnv} is not set`,
        this.modelName
      );
    }

    this.logger.info('Loading embedding model', { model: this.modelName, provider, modelId });
    switch (provider) {
      case 'openai':
        this.model = createOpenAI({ apiKey, baseURL: baseUrl }).textEmbeddingModel(modelId);
        break;
      case 'google':
        this.model = createGoogleGenerativeAI({ apiKey, baseURL: baseUrl }).textEmbeddingModel(modelId);
        break;
      case 'mistral':
        this.model = createMistral({ apiKey, baseURL: baseUrl }).textEmbeddingModel(modelId);
        break;
      case 'hashing':
        throw new EmbeddingUnavailable(`Model ${this.modelName} is a local hashing model, not an AI SDK model`, this.modelName);
      default: {
        const _exhaustive: never = provider;
        return _exhaustive;
      }
    }
    return this.model;
  }
}
