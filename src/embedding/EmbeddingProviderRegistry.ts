import type { EmbeddingModelConfig, Logger } from '../types/index.js';
import { EmbeddingUnavailable } from '../utils/errors.js';
import { AiSdkEmbeddingProvider } from './AiSdkEmbeddingProvider.js';
import { HashingEmbeddingProvider } from './HashingEmbeddingProvider.js';
import type { EmbeddingProvider } from './types.js';

export type EmbeddingProviderFactory = (config: EmbeddingModelConfig) => EmbeddingProvider;

export interface EmbeddingModelInfo {
  name: string;
  provider: EmbeddingModelConfig['provider'];
  dimensions: number;
}

/**
 * Owns one provider per configured model for the lifetime of the process.
 * Providers are created on first request and then reused.
 */
export class EmbeddingProviderRegistry {
  private readonly configs = new Map<string, EmbeddingModelConfig>();
  private readonly providers = new Map<string, EmbeddingProvider>();
  private readonly factory: EmbeddingProviderFactory;

  constructor(
    configs: readonly EmbeddingModelConfig[],
    readonly defaultModel: string,
    private readonly logger: Logger,
    factory?: EmbeddingProviderFactory
  ) {
    for (const config of configs) {
      if (this.configs.has(config.name)) {
        throw new EmbeddingUnavailable(`Embedding model ${config.name} is configured twice`, config.name);
      }
      this.configs.set(config.name, config);
    }
    if (!this.configs.has(defaultModel)) {
      throw new EmbeddingUnavailable(`Default embedding model ${defaultModel} is not configured`, defaultModel);
    }
    this.factory = factory ?? ((config) => createEmbeddingProvider(config, this.logger));
  }

  get(name: string = this.defaultModel): EmbeddingProvider {
    const existing = this.providers.get(name);
    if (existing) return existing;

    const config = this.configs.get(name);
    if (!config) {
      throw new EmbeddingUnavailable(`Unknown embedding model '${name}'`, name);
    }

    const provider = this.factory(config);
    if (provider.dimensions !== config.dimensions) {
      throw new EmbeddingUnavailable(
        `Embedding model ${name} reports ${provider.dimensions} dimensions, configured ${config.dimensions}`,
        name
      );
    }
    this.providers.set(name, provider);
    this.logger.debug('Embedding provider ready', { model: name, dimensions: provider.dimensions });
    return provider;
  }

  has(name: string): boolean {
    return this.configs.has(name);
  }

  list(): EmbeddingModelInfo[] {
    return Array.from(this.configs.values(), (c) => ({ name: c.name, provider: c.provider, dimensions: c.dimensions }));
  }
}

export function createEmbeddingProvider(config: EmbeddingModelConfig, logger: Logger): EmbeddingProvider {
  if (config.provider === 'hashing') {
    return new HashingEmbeddingProvider(config.name, config.dimensions);
  }
  return new AiSdkEmbeddingProvider(config, logger);
}
