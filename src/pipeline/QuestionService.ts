import { randomUUID } from 'node:crypto';

import type { AnswerSynthesizer } from '../answer/index.js';
import type { ConversationStore } from '../conversation/index.js';
import type { PromptAssembler } from '../prompt/index.js';
import type { Retriever } from '../retrieval/index.js';
import { turn, type Conversation, type Logger, type RetrievedResult } from '../types/index.js';
import { ConversationStoreError, errorMessage } from '../utils/errors.js';

export interface QuestionDefaults {
  topK: number;
  embeddingModel: string;
  maxTokens: number;
  temperature: number;
}

export interface AskOptions {
  topK?: number;
  embeddingModel?: string;
  /** Completion model override. */
  model?: string;
  maxTokens?: number;
  temperature?: number;
  language?: string;
}

export interface AskResult {
  sessionId: string;
  videoId: string;
  answer: string;
  sources: RetrievedResult[];
  fallback: boolean;
  usedPassages: number;
  historyTurns: number;
}

/**
 * Answers questions about one video within a session: retrieve, assemble, generate,
 * then record the question and answer as one pair of turns.
 */
export class QuestionService {
  constructor(
    private readonly retriever: Retriever,
    private readonly assembler: PromptAssembler,
    private readonly synthesizer: AnswerSynthesizer,
    private readonly conversations: ConversationStore,
    private readonly defaults: QuestionDefaults,
    private readonly logger: Logger
  ) {}

  async startSession(videoId: string, metadata: Record<string, unknown> = {}): Promise<Conversation> {
    const conversation = await this.conversations.create(randomUUID(), videoId, metadata);
    this.logger.info('Session started', { sessionId: conversation.sessionId, videoId });
    return conversation;
  }

  async ask(sessionId: string, question: string, options: AskOptions = {}): Promise<AskResult> {
    const conversation = await this.conversations.get(sessionId);
    if (!conversation) {
      throw new ConversationStoreError(`Session ${sessionId} does not exist`, sessionId, true);
    }
    const { videoId } = conversation;

    const sources = await this.retriever.retrieve(question, {
      embeddingModel: options.embeddingModel ?? this.defaults.embeddingModel,
      topK: options.topK ?? this.defaults.topK,
      sourceId: videoId,
      language: options.language
    });

    const assembled = this.assembler.assemble(question, sources, conversation.turns);
    if (assembled.droppedPassages > 0) {
      this.logger.debug('Passages dropped to fit the prompt budget', { sessionId, dropped: assembled.droppedPassages });
    }

    const answer = await this.synthesizer.generate(assembled.prompt, {
      model: options.model,
      maxTokens: options.maxTokens ?? this.defaults.maxTokens,
      temperature: options.temperature ?? this.defaults.temperature
    });

    try {
      await this.conversations.append(sessionId, [turn('user', question), turn('assistant', answer)]);
    } catch (error) {
      this.logger.error('Failed to record conversation turns', { sessionId, error: errorMessage(error) });
      throw error;
    }

    return {
      sessionId,
      videoId,
      answer,
      sources: sources.slice(0, assembled.usedPassages),
      fallback: assembled.fallback,
      usedPassages: assembled.usedPassages,
      historyTurns: assembled.historyTurns
    };
  }
}
