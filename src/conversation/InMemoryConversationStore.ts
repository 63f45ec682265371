import type { Conversation, ConversationTurn } from '../types/index.js';
import { ConversationStoreError } from '../utils/errors.js';
import { DEFAULT_LIST_LIMIT, type Clock, type ConversationStore, type ConversationSummary } from './types.js';

type Entry = { conversation: Conversation; touched: number };

export class InMemoryConversationStore implements ConversationStore {
  readonly backend = 'memory';
  private readonly sessions = new Map<string, Entry>();
  private sequence = 0;

  constructor(private readonly clock: Clock = () => new Date()) {}

  async create(sessionId: string, videoId: string, metadata: Record<string, unknown> = {}): Promise<Conversation> {
    if (this.sessions.has(sessionId)) {
      throw new ConversationStoreError(`Session ${sessionId} already exists`, sessionId);
    }
    const now = this.clock().toISOString();
    const conversation: Conversation = { sessionId, videoId, createdAt: now, updatedAt: now, metadata: { ...metadata }, turns: [] };
    this.sessions.set(sessionId, { conversation, touched: ++this.sequence });
    return structuredClone(conversation);
  }

  async append(sessionId: string, turns: readonly ConversationTurn[]): Promise<void> {
    const entry = this.sessions.get(sessionId);
    if (!entry) throw new ConversationStoreError(`Session ${sessionId} does not exist`, sessionId, true);
    entry.conversation.turns.push(...turns.map((t) => ({ ...t })));
    entry.conversation.updatedAt = this.clock().toISOString();
    entry.touched = ++this.sequence;
  }

  async get(sessionId: string): Promise<Conversation | undefined> {
    const entry = this.sessions.get(sessionId);
    return entry ? structuredClone(entry.conversation) : undefined;
  }

  async listByVideo(videoId: string, limit: number = DEFAULT_LIST_LIMIT): Promise<ConversationSummary[]> {
    return Array.from(this.sessions.values())
      .filter((e) => e.conversation.videoId === videoId)
      .sort((a, b) => b.touched - a.touched)
      .slice(0, Math.max(0, limit))
      .map(({ conversation: { turns, ...rest } }) => ({ ...structuredClone(rest), turnCount: turns.length }));
  }

  async delete(sessionId: string): Promise<boolean> {
    return this.sessions.delete(sessionId);
  }

  async close(): Promise<void> {
    this.sessions.clear();
  }
}
