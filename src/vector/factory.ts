import type { Logger, VectorStoreConfig } from '../types/index.js';
import { InMemoryVectorStore } from './InMemoryVectorStore.js';
import { QdrantVectorStore } from './QdrantVectorStore.js';
import type { VectorStore } from './types.js';

export function createVectorStoreFromConfig(config: VectorStoreConfig, logger: Logger): VectorStore {
  switch (config.provider) {
    case 'qdrant':
      logger.info('Using Qdrant vector store', { url: config.url, collection: config.collection });
      return new QdrantVectorStore(config, logger);
    case 'in-memory':
      logger.warn('Using in-memory vector store; passages are lost on restart');
      return new InMemoryVectorStore();
  }
}
