export type { EmbeddingProvider } from './types.js';
export { checkVectors } from './types.js';
export { HashingEmbeddingProvider } from './HashingEmbeddingProvider.js';
export { AiSdkEmbeddingProvider } from './AiSdkEmbeddingProvider.js';
export { EmbeddingProviderRegistry, createEmbeddingProvider, type EmbeddingModelInfo } from './EmbeddingProviderRegistry.js';
