import { Redis } from 'ioredis';
import { z } from 'zod';

import { ConversationSchema, ConversationTurnSchema, type Conversation, type ConversationTurn, type Logger } from '../types/index.js';
import { ConversationStoreError, errorMessage } from '../utils/errors.js';
import { DEFAULT_LIST_LIMIT, type Clock, type ConversationStore, type ConversationSummary } from './types.js';

export interface RedisConversationStoreOptions {
  url: string;
  keyPrefix: string;
  clock?: Clock;
}

const SessionRecordSchema = ConversationSchema.omit({ turns: true });
type SessionRecord = z.infer<typeof SessionRecordSchema>;

/**
 * Keys, under `keyPrefix`:
 * - `session:<id>`        session record (JSON)
 * - `session:<id>:turns`  list of turns (JSON each), oldest first
 * - `video:<videoId>`     sorted set of session ids scored by last update
 */
export class RedisConversationStore implements ConversationStore {
  readonly backend = 'redis';
  private readonly client: Redis;
  private readonly clock: Clock;

  constructor(private readonly options: RedisConversationStoreOptions, private readonly logger: Logger) {
    this.client = new Redis(options.url, { lazyConnect: true, maxRetriesPerRequest: 2 });
    this.clock = options.clock ?? (() => new Date());
  }

  async create(sessionId: string, videoId: string, metadata: Record<string, unknown> = {}): Promise<Conversation> {
    const at = this.clock();
    const record: SessionRecord = { sessionId, videoId, createdAt: at.toISOString(), updatedAt: at.toISOString(), metadata };

    const created = await this.run(sessionId, 'create', () =>
      this.client.set(this.sessionKey(sessionId), JSON.stringify(record), 'NX')
    );
    if (created === null) {
      throw new ConversationStoreError(`Session ${sessionId} already exists`, sessionId);
    }
    await this.run(sessionId, 'create', () => this.client.zadd(this.videoKey(videoId), at.getTime(), sessionId));
    this.logger.debug('Conversation created', { sessionId, videoId });
    return { ...record, turns: [] };
  }

  async append(sessionId: string, turns: readonly ConversationTurn[]): Promise<void> {
    const record = await this.readRecord(sessionId);
    if (!record) throw new ConversationStoreError(`Session ${sessionId} does not exist`, sessionId, true);
    if (turns.length === 0) return;

    const at = this.clock();
    const updated: SessionRecord = { ...record, updatedAt: at.toISOString() };
    const results = await this.run(sessionId, 'append', () =>
      this.client
        .multi()
        .rpush(this.turnsKey(sessionId), ...turns.map((t) => JSON.stringify(t)))
        .set(this.sessionKey(sessionId), JSON.stringify(updated))
        .zadd(this.videoKey(record.videoId), at.getTime(), sessionId)
        .exec()
    );
    const failed = results?.find(([error]) => error !== null);
    if (!results || failed) {
      throw new ConversationStoreError(
        `Appending to session ${sessionId} failed: ${failed ? errorMessage(failed[0]) : 'transaction aborted'}`,
        sessionId
      );
    }
  }

  async get(sessionId: string): Promise<Conversation | undefined> {
    const record = await this.readRecord(sessionId);
    if (!record) return undefined;

    const raw = await this.run(sessionId, 'get', () => this.client.lrange(this.turnsKey(sessionId), 0, -1));
    const turns = raw.map((item) => this.parse(sessionId, item, ConversationTurnSchema));
    return { ...record, turns };
  }

  async listByVideo(videoId: string, limit: number = DEFAULT_LIST_LIMIT): Promise<ConversationSummary[]> {
    if (limit <= 0) return [];
    const ids = await this.run(videoId, 'listByVideo', () => this.client.zrevrange(this.videoKey(videoId), 0, limit - 1));

    const summaries: ConversationSummary[] = [];
    for (const id of ids) {
      const record = await this.readRecord(id);
      if (!record) continue;
      const turnCount = await this.run(id, 'listByVideo', () => this.client.llen(this.turnsKey(id)));
      summaries.push({ ...record, turnCount });
    }
    return summaries;
  }

  async delete(sessionId: string): Promise<boolean> {
    const record = await this.readRecord(sessionId);
    if (!record) return false;
    await this.run(sessionId, 'delete', async () => {
      await this.client.del(this.sessionKey(sessionId), this.turnsKey(sessionId));
      await this.client.zrem(this.videoKey(record.videoId), sessionId);
    });
    return true;
  }

  async close(): Promise<void> {
    await this.client.quit();
  }

  private async readRecord(sessionId: string): Promise<SessionRecord | undefined> {
    const raw = await this.run(sessionId, 'get', () => this.client.get(this.sessionKey(sessionId)));
    return raw === null ? undefined : this.parse(sessionId, raw, SessionRecordSchema);
  }

  private parse<T>(sessionId: string, raw: string, schema: z.ZodType<T>): T {
    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch (error) {
      throw new ConversationStoreError(`Session ${sessionId} holds malformed JSON`, sessionId, false, error);
    }
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
      throw new ConversationStoreError(`Session ${sessionId} holds invalid data: ${parsed.error.message}`, sessionId, false, parsed.error);
    }
    return parsed.data;
  }

  private async run<T>(sessionId: string, op: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof ConversationStoreError) throw error;
      this.logger.error('Conversation store call failed', { op, sessionId, error: errorMessage(error) });
      throw new ConversationStoreError(`Redis ${op} failed: ${errorMessage(error)}`, sessionId, false, error);
    }
  }

  private sessionKey(sessionId: string): string {
    return `${this.options.keyPrefix}session:${sessionId}`;
  }

  private turnsKey(sessionId: string): string {
    return `${this.options.keyPrefix}session:${sessionId}:turns`;
  }

  private videoKey(videoId: string): string {
    return `${this.options.keyPrefix}video:${videoId}`;
  }
}
