export * from './types.js';
export * from './similarity.js';
export { InMemoryVectorStore } from './InMemoryVectorStore.js';
export { QdrantVectorStore, toQdrantFilter } from './QdrantVectorStore.js';
export { createVectorStoreFromConfig } from './factory.js';
