import { readFile } from 'node:fs/promises';

import {
  AppConfigSchema,
  COMPLETION_PROVIDERS,
  LOG_LEVELS,
  VECTOR_STORE_PROVIDERS,
  type AppConfig
} from '../types/index.js';
import { deepMerge, isObject, type ConfigRecord } from './merge.js';

export const DEFAULT_CONFIG_PATH = 'config/app.json';

type Env = Readonly<Record<string, string | undefined>>;

export interface ConfigLayer {
  name: string;
  priority: number;
  config: ConfigRecord;
}

type InternalLayer = ConfigLayer & { index: number };

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = 'ConfigError';
  }
}

function oneOf<T extends string>(values: readonly T[], raw: string | undefined): T | undefined {
  return values.find((v) => v === raw);
}

function section(out: ConfigRecord, key: string): ConfigRecord {
  const existing = out[key];
  if (isObject(existing)) return existing;
  const created: ConfigRecord = {};
  out[key] = created;
  return created;
}

/**
 * Layered configuration: layers are merged in ascending priority (insertion order breaks
 * ties) and the result is validated against AppConfigSchema, which also fills defaults.
 */
export class ConfigResolver {
  private layers: InternalLayer[] = [];
  private nextIndex = 0;

  addLayer(layer: ConfigLayer): void {
    this.layers.push({ ...layer, index: this.nextIndex });
    this.nextIndex += 1;
  }

  resolve(): AppConfig {
    const ordered = [...this.layers].sort((a, b) => {
      const byPriority = a.priority - b.priority;
      return byPriority !== 0 ? byPriority : a.index - b.index;
    });

    const merged = deepMerge({}, ...ordered.map((l) => l.config));
    const parsed = AppConfigSchema.safeParse(merged);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
      throw new ConfigError(`Invalid configuration (${ordered.map((l) => l.name).join(' < ')}): ${issues.join('; ')}`, issues);
    }
    return parsed.data;
  }

  static loadDefault(): AppConfig {
    return AppConfigSchema.parse({});
  }

  static async loadFromFile(path: string): Promise<ConfigRecord | null> {
    let data: string;
    try {
      data = await readFile(path, 'utf-8');
    } catch (error) {
      if (isObject(error) && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
    if (!data.trim()) {
      return null;
    }

    const parsed: unknown = JSON.parse(data);
    if (!isObject(parsed)) {
      throw new ConfigError(`Invalid config JSON at ${path}: expected an object`);
    }
    return parsed;
  }

  static loadFromEnv(env: Env = process.env): ConfigRecord {
    const out: ConfigRecord = {};

    if (env.TQA_HOST) {
      section(out, 'server').host = env.TQA_HOST;
    }

    if (env.TQA_PORT) {
      const port = Number.parseInt(env.TQA_PORT, 10);
      if (Number.isInteger(port) && port >= 1 && port <= 65535) {
        section(out, 'server').port = port;
      }
    }

    const level = oneOf(LOG_LEVELS, env.TQA_LOG_LEVEL);
    if (level) out.logLevel = level;

    if (env.QDRANT_URL) section(out, 'vectorStore').url = env.QDRANT_URL;
    const vectorProvider = oneOf(VECTOR_STORE_PROVIDERS, env.TQA_VECTOR_PROVIDER);
    if (vectorProvider) section(out, 'vectorStore').provider = vectorProvider;
    if (env.TQA_COLLECTION) section(out, 'vectorStore').collection = env.TQA_COLLECTION;

    if (env.TQA_EMBEDDING_MODEL) section(out, 'embedding').defaultModel = env.TQA_EMBEDDING_MODEL;

    const completionProvider = oneOf(COMPLETION_PROVIDERS, env.TQA_COMPLETION_PROVIDER);
    if (completionProvider) section(out, 'completion').provider = completionProvider;
    if (env.TQA_COMPLETION_MODEL) section(out, 'completion').model = env.TQA_COMPLETION_MODEL;

    if (env.REDIS_URL) {
      const conversation = section(out, 'conversation');
      conversation.url = env.REDIS_URL;
      conversation.provider = 'redis';
    }

    if (env.TQA_TRANSCRIPT_DIR) section(out, 'transcripts').directory = env.TQA_TRANSCRIPT_DIR;

    return out;
  }
}

/** defaults < config file < environment */
export async function loadAppConfig(options: { path?: string; env?: Env } = {}): Promise<AppConfig> {
  const resolver = new ConfigResolver();
  const file = await ConfigResolver.loadFromFile(options.path ?? DEFAULT_CONFIG_PATH);
  if (file) resolver.addLayer({ name: 'file', priority: 10, config: file });
  resolver.addLayer({ name: 'env', priority: 20, config: ConfigResolver.loadFromEnv(options.env) });
  return resolver.resolve();
}
