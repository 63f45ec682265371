import { z } from 'zod';

export * from './passage.js';
export * from './conversation.js';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

export interface Logger {
  trace(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

// ===== Transcripts =====
/** Language tag such as `en`, `pt-BR` or `zh-Hans`. */
export const LANGUAGE_CODE = /^[A-Za-z]{2,3}(-[A-Za-z0-9]{2,8})*$/;
export const LanguageCodeSchema = z.string().regex(LANGUAGE_CODE, 'Expected a language code such as en or pt-BR');

// ===== Vector store =====
export const VECTOR_STORE_PROVIDERS = ['qdrant', 'in-memory'] as const;
export type VectorStoreProvider = typeof VECTOR_STORE_PROVIDERS[number];

export const DISTANCE_METRICS = ['cosine', 'dot'] as const;
export type DistanceMetric = typeof DISTANCE_METRICS[number];

const VectorStoreConfigSchema = z.object({
  provider: z.enum(VECTOR_STORE_PROVIDERS).default('qdrant'),
  url: z.string().default('http://127.0.0.1:6333'),
  // Name of the environment variable holding the API key, never the key itself
  apiKeyEnv: z.string().default('QDRANT_API_KEY'),
  collection: z.string().min(1).default('youtube_transcripts'),
  distance: z.enum(DISTANCE_METRICS).default('cosine'),
  timeoutMs: z.number().int().positive().default(120_000),
  upsertBatchSize: z.number().int().positive().default(256)
});

// ===== Embedding =====
export const EMBEDDING_PROVIDERS = ['hashing', 'openai', 'google', 'mistral'] as const;
export type EmbeddingProviderId = typeof EMBEDDING_PROVIDERS[number];

export const EmbeddingModelConfigSchema = z.object({
  // Name stored in the `embedding_model` payload field
  name: z.string().min(1),
  provider: z.enum(EMBEDDING_PROVIDERS),
  // Provider-side model id; defaults to `name`
  model: z.string().min(1).optional(),
  dimensions: z.number().int().positive(),
  apiKeyEnv: z.string().optional(),
  baseUrl: z.string().optional(),
  maxParallelCalls: z.number().int().positive().default(4)
});
export type EmbeddingModelConfig = z.infer<typeof EmbeddingModelConfigSchema>;

const EmbeddingConfigSchema = z.object({
  defaultModel: z.string().min(1).default('hashing-384'),
  models: z.array(EmbeddingModelConfigSchema).default([
    { name: 'hashing-384', provider: 'hashing', dimensions: 384, maxParallelCalls: 4 }
  ])
});

// ===== Completion =====
export const COMPLETION_PROVIDERS = ['groq', 'openai', 'anthropic', 'google', 'mistral', 'deepseek'] as const;
export type CompletionProviderId = typeof COMPLETION_PROVIDERS[number];

const CompletionConfigSchema = z.object({
  provider: z.enum(COMPLETION_PROVIDERS).default('groq'),
  model: z.string().min(1).default('openai/gpt-oss-120b'),
  apiKeyEnv: z.string().default('GROQ_API_KEY'),
  baseUrl: z.string().optional(),
  temperature: z.number().min(0).max(2).default(0.2),
  maxTokens: z.number().int().positive().default(1000),
  timeoutMs: z.number().int().positive().default(60_000),
  retryAttempts: z.number().int().min(0).default(1),
  retryDelayMs: z.number().int().min(0).default(500)
});

// ===== Conversation store =====
export const CONVERSATION_PROVIDERS = ['memory', 'redis'] as const;
export type ConversationProvider = typeof CONVERSATION_PROVIDERS[number];

const ConversationConfigSchema = z.object({
  provider: z.enum(CONVERSATION_PROVIDERS).default('memory'),
  url: z.string().default('redis://127.0.0.1:6379'),
  keyPrefix: z.string().default('tqa:')
});

export const AppConfigSchema = z.object({
  server: z.object({
    host: z.string().default('127.0.0.1'),
    port: z.number().int().min(0).max(65535).default(8700),
    corsOrigins: z.array(z.string()).default([]),
    bodyLimit: z.number().int().positive().default(5 * 1024 * 1024)
  }).default({}),
  logLevel: z.enum(LOG_LEVELS).default('info'),
  vectorStore: VectorStoreConfigSchema.default({}),
  embedding: EmbeddingConfigSchema.default({}),
  chunking: z.object({
    maxSize: z.number().int().positive().default(700),
    overlap: z.number().int().min(0).default(100)
  }).refine((c) => c.overlap < c.maxSize, { message: 'chunking.overlap must be smaller than chunking.maxSize' }).default({}),
  retrieval: z.object({
    topK: z.number().int().positive().default(5)
  }).default({}),
  prompt: z.object({
    historyWindow: z.number().int().min(0).default(3),
    maxPromptChars: z.number().int().positive().default(12_000)
  }).default({}),
  completion: CompletionConfigSchema.default({}),
  conversation: ConversationConfigSchema.default({}),
  transcripts: z.object({
    directory: z.string().default('./downloads'),
    languages: z.array(LanguageCodeSchema).min(1).default(['en'])
  }).default({})
}).refine(
  (c) => c.embedding.models.some((m) => m.name === c.embedding.defaultModel),
  { message: 'embedding.defaultModel must name one of embedding.models', path: ['embedding', 'defaultModel'] }
);

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type AppConfigInput = z.input<typeof AppConfigSchema>;
export type CompletionConfig = AppConfig['completion'];
export type VectorStoreConfig = AppConfig['vectorStore'];
export type ConversationConfig = AppConfig['conversation'];
