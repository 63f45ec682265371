import { randomUUID } from 'node:crypto';

import type { EmbeddingProviderRegistry } from '../embedding/index.js';
import { chunkTranscript, type ChunkingOptions } from '../ingest/chunker.js';
import { extractVideoId, fetchTranscript, transcriptToText, type TranscriptSource } from '../transcript/index.js';
import { toPayload, type DistanceMetric, type EmbeddingRecord, type Logger, type PayloadFilters } from '../types/index.js';
import { errorMessage, PipelineError, StoreWriteError } from '../utils/errors.js';
import type { VectorStore } from '../vector/index.js';

export interface IngestionSettings {
  collection: string;
  distance: DistanceMetric;
  upsertBatchSize: number;
  chunking: ChunkingOptions;
  languages: readonly string[];
}

export interface IngestOptions {
  embeddingModel?: string;
  language?: string;
  /** Replace passages already stored for this source and model. */
  force?: boolean;
}

export interface IngestVideoOptions extends Omit<IngestOptions, 'language'> {
  languages?: readonly string[];
}

export type IngestStatus = 'ingested' | 'skipped' | 'empty';

export interface IngestResult {
  sourceId: string;
  embeddingModel: string;
  language?: string;
  status: IngestStatus;
  /** Passages written by this call, or already stored when skipped. */
  passages: number;
  collection: string;
}

export interface SourceStatus {
  sourceId: string;
  embeddingModel: string;
  ingested: boolean;
  passages: number;
}

export class IngestionService {
  private readonly inFlight = new Map<string, Promise<IngestResult>>();

  constructor(
    private readonly embeddings: EmbeddingProviderRegistry,
    private readonly store: VectorStore,
    private readonly transcripts: TranscriptSource,
    private readonly settings: IngestionSettings,
    private readonly logger: Logger
  ) {}

  async ingestVideo(reference: string, options: IngestVideoOptions = {}): Promise<IngestResult> {
    const videoId = extractVideoId(reference);
    const languages = options.languages && options.languages.length > 0 ? options.languages : this.settings.languages;
    const embeddingModel = options.embeddingModel ?? this.embeddings.defaultModel;

    return this.once(videoId, embeddingModel, async () => {
      if (!options.force) {
        const skipped = await this.skipIfStored(videoId, embeddingModel);
        if (skipped) return skipped;
      }

      const transcript = await fetchTranscript(this.transcripts, videoId, languages, this.logger);
      return this.write(videoId, transcriptToText(transcript.segments), {
        embeddingModel,
        language: transcript.language,
        force: options.force
      });
    });
  }

  /**
   * Chunks, embeds and stores `text` under `sourceId`. Without `force` an already ingested
   * `(sourceId, embeddingModel)` pair is left untouched. A failed write removes every
   * passage of the pair before the error is rethrown.
   * Calls for a pair that is already being ingested share that run.
   */
  async ingestText(sourceId: string, text: string, options: IngestOptions = {}): Promise<IngestResult> {
    const embeddingModel = options.embeddingModel ?? this.embeddings.defaultModel;
    return this.once(sourceId, embeddingModel, () => this.write(sourceId, text, { ...options, embeddingModel }));
  }

  private once(sourceId: string, embeddingModel: string, run: () => Promise<IngestResult>): Promise<IngestResult> {
    const key = `${sourceId}\u0000${embeddingModel}`;
    const running = this.inFlight.get(key);
    if (running) {
      this.logger.debug('Joining running ingestion', { sourceId, embeddingModel });
      return running;
    }

    const started = run().finally(() => this.inFlight.delete(key));
    this.inFlight.set(key, started);
    return started;
  }

  private async write(sourceId: string, text: string, options: IngestOptions & { embeddingModel: string }): Promise<IngestResult> {
    const { embeddingModel } = options;
    const provider = this.embeddings.get(embeddingModel);
    const { collection } = this.settings;
    const scope: PayloadFilters = { embedding_model: embeddingModel };

    if (options.force) {
      await this.store.ensureCollection(collection, provider.dimensions, this.settings.distance);
      if (await this.store.exists(collection, sourceId, scope)) {
        this.logger.info('Replacing stored passages', { sourceId, embeddingModel });
        await this.store.deleteBySource(collection, sourceId, scope);
      }
    } else {
      const skipped = await this.skipIfStored(sourceId, embeddingModel);
      if (skipped) return skipped;
    }

    const passages = chunkTranscript(text, sourceId, { embeddingModel, language: options.language }, this.settings.chunking);
    const base = { sourceId, embeddingModel, language: options.language, collection };
    if (passages.length === 0) {
      this.logger.warn('Nothing to ingest: transcript text is empty', { sourceId });
      return { ...base, status: 'empty', passages: 0 };
    }

    const vectors = await provider.embedMany(passages.map((p) => p.text));
    const records: EmbeddingRecord[] = passages.map((passage, i) => ({
      id: randomUUID(),
      vector: vectors[i] ?? [],
      payload: toPayload(passage)
    }));

    try {
      for (let i = 0; i < records.length; i += this.settings.upsertBatchSize) {
        await this.store.upsert(collection, records.slice(i, i + this.settings.upsertBatchSize));
      }
    } catch (error) {
      await this.rollback(sourceId, scope, error);
      if (error instanceof StoreWriteError) throw error;
      throw new StoreWriteError(`Storing passages of ${sourceId} failed: ${errorMessage(error)}`, collection, error);
    }

    this.logger.info('Transcript ingested', { ...base, passages: records.length });
    return { ...base, status: 'ingested', passages: records.length };
  }

  async status(sourceId: string, embeddingModel: string = this.embeddings.defaultModel): Promise<SourceStatus> {
    const provider = this.embeddings.get(embeddingModel);
    await this.store.ensureCollection(this.settings.collection, provider.dimensions, this.settings.distance);
    const passages = await this.store.count(this.settings.collection, { source_id: sourceId, embedding_model: embeddingModel });
    return { sourceId, embeddingModel, ingested: passages > 0, passages };
  }

  private async skipIfStored(sourceId: string, embeddingModel: string): Promise<IngestResult | undefined> {
    const current = await this.status(sourceId, embeddingModel);
    if (!current.ingested) return undefined;
    this.logger.info('Transcript already ingested; skipping', { sourceId, embeddingModel, passages: current.passages });
    return { sourceId, embeddingModel, status: 'skipped', passages: current.passages, collection: this.settings.collection };
  }

  private async rollback(sourceId: string, scope: PayloadFilters, cause: unknown): Promise<void> {
    this.logger.error('Upsert failed; removing partial passages', { sourceId, ...scope, error: errorMessage(cause) });
    try {
      await this.store.deleteBySource(this.settings.collection, sourceId, scope);
    } catch (error) {
      this.logger.error('Rollback failed', {
        sourceId,
        ...scope,
        error: errorMessage(error),
        code: error instanceof PipelineError ? error.code : undefined
      });
    }
  }
}
