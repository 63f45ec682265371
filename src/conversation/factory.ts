import type { ConversationConfig, Logger } from '../types/index.js';
import { InMemoryConversationStore } from './InMemoryConversationStore.js';
import { RedisConversationStore } from './RedisConversationStore.js';
import type { ConversationStore } from './types.js';

export function createConversationStoreFromConfig(config: ConversationConfig, logger: Logger): ConversationStore {
  switch (config.provider) {
    case 'redis':
      logger.info('Using Redis conversation store', { keyPrefix: config.keyPrefix });
      return new RedisConversationStore({ url: config.url, keyPrefix: config.keyPrefix }, logger);
    case 'memory':
      return new InMemoryConversationStore();
  }
}
