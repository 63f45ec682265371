export * from './types/index.js';
export * from './utils/errors.js';

export { chunkTranscript, splitText, DEFAULT_SEPARATORS, type ChunkingOptions } from './ingest/chunker.js';
export * from './embedding/index.js';
export * from './vector/index.js';
export * from './retrieval/index.js';
export * from './prompt/index.js';
export * from './ai/index.js';
export * from './answer/index.js';
export * from './conversation/index.js';
export * from './transcript/index.js';
export * from './pipeline/index.js';

export { ConfigResolver, ConfigError, loadAppConfig } from './config/ConfigResolver.js';
export { AppBootstrapper, type AppRuntime, type AppBootstrapperOptions } from './bootstrap/AppBootstrapper.js';
export { HttpApiServer } from './server/HttpApiServer.js';
export { PinoLogger } from './utils/PinoLogger.js';
export { SimpleLogger } from './utils/SimpleLogger.js';
