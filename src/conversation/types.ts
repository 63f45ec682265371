import type { Conversation, ConversationTurn } from '../types/index.js';

export type ConversationSummary = Omit<Conversation, 'turns'> & { turnCount: number };

export type Clock = () => Date;

/**
 * Session history keyed by session id. `append` only extends an existing session;
 * a duplicate `create` or an `append` to an unknown session raises ConversationStoreError.
 */
export interface ConversationStore {
  readonly backend: string;
  create(sessionId: string, videoId: string, metadata?: Record<string, unknown>): Promise<Conversation>;
  append(sessionId: string, turns: readonly ConversationTurn[]): Promise<void>;
  get(sessionId: string): Promise<Conversation | undefined>;
  /** Sessions of a video, most recently updated first. */
  listByVideo(videoId: string, limit?: number): Promise<ConversationSummary[]>;
  delete(sessionId: string): Promise<boolean>;
  close(): Promise<void>;
}

export const DEFAULT_LIST_LIMIT = 20;
