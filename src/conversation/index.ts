export * from './types.js';
export { InMemoryConversationStore } from './InMemoryConversationStore.js';
export { RedisConversationStore, type RedisConversationStoreOptions } from './RedisConversationStore.js';
export { createConversationStoreFromConfig } from './factory.js';
