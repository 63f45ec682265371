import { AiSdkCompletionClient, type CompletionClient } from '../ai/index.js';
import { AnswerSynthesizer } from '../answer/index.js';
import { loadAppConfig } from '../config/ConfigResolver.js';
import { createConversationStoreFromConfig, type ConversationStore } from '../conversation/index.js';
import { EmbeddingProviderRegistry } from '../embedding/index.js';
import { IngestionService, QuestionService } from '../pipeline/index.js';
import { PromptAssembler } from '../prompt/index.js';
import { Retriever } from '../retrieval/index.js';
import { HttpApiServer } from '../server/HttpApiServer.js';
import { FileTranscriptSource, type TranscriptSource } from '../transcript/index.js';
import type { AppConfig, Logger } from '../types/index.js';
import { PinoLogger } from '../utils/PinoLogger.js';
import { errorMessage } from '../utils/errors.js';
import { createVectorStoreFromConfig, type VectorStore } from '../vector/index.js';
import { Container, token } from './Container.js';

export type AppRuntime = {
  config: AppConfig;
  logger: Logger;
  embeddings: EmbeddingProviderRegistry;
  vectorStore: VectorStore;
  completion: CompletionClient;
  conversations: ConversationStore;
  transcripts: TranscriptSource;
  retriever: Retriever;
  assembler: PromptAssembler;
  synthesizer: AnswerSynthesizer;
  ingestion: IngestionService;
  questions: QuestionService;
  httpServer: HttpApiServer;
};

export type AppBootstrapperOverrides = Partial<Omit<AppRuntime, 'config' | 'logger'>>;

export type AppBootstrapperOptions = {
  config: AppConfig;
  logger?: Logger;
  container?: Container;
  overrides?: AppBootstrapperOverrides;
};

const TOKENS = {
  config: token<AppConfig>('tqa:config'),
  logger: token<Logger>('tqa:logger'),
  embeddings: token<EmbeddingProviderRegistry>('tqa:embeddings'),
  vectorStore: token<VectorStore>('tqa:vectorStore'),
  completion: token<CompletionClient>('tqa:completion'),
  conversations: token<ConversationStore>('tqa:conversations'),
  transcripts: token<TranscriptSource>('tqa:transcripts'),
  retriever: token<Retriever>('tqa:retriever'),
  assembler: token<PromptAssembler>('tqa:assembler'),
  synthesizer: token<AnswerSynthesizer>('tqa:synthesizer'),
  ingestion: token<IngestionService>('tqa:ingestion'),
  questions: token<QuestionService>('tqa:questions'),
  httpServer: token<HttpApiServer>('tqa:httpServer')
} as const;

/**
 * Builds every process-wide resource once and hands them out by reference.
 * `stop()` releases what was actually created.
 */
export class AppBootstrapper {
  static readonly TOKENS = TOKENS;

  readonly container: Container;
  private runtime: AppRuntime | null = null;
  private listening = false;

  constructor(options: AppBootstrapperOptions) {
    this.container = options.container ?? new Container();
    const logger = options.logger ?? new PinoLogger({ level: options.config.logLevel });

    this.container.register(TOKENS.config, options.config);
    this.container.register(TOKENS.logger, logger);
    this.registerDefaults();
    if (options.overrides) this.applyOverrides(options.overrides);
  }

  /** Loads configuration (defaults < file < environment) and builds a bootstrapper from it. */
  static async fromEnvironment(options: { configPath?: string; logger?: Logger } = {}): Promise<AppBootstrapper> {
    const config = await loadAppConfig({ path: options.configPath });
    return new AppBootstrapper({ config, logger: options.logger });
  }

  bootstrap(): AppRuntime {
    if (this.runtime) return this.runtime;

    const c = this.container;
    this.runtime = {
      config: c.resolve(TOKENS.config),
      logger: c.resolve(TOKENS.logger),
      embeddings: c.resolve(TOKENS.embeddings),
      vectorStore: c.resolve(TOKENS.vectorStore),
      completion: c.resolve(TOKENS.completion),
      conversations: c.resolve(TOKENS.conversations),
      transcripts: c.resolve(TOKENS.transcripts),
      retriever: c.resolve(TOKENS.retriever),
      assembler: c.resolve(TOKENS.assembler),
      synthesizer: c.resolve(TOKENS.synthesizer),
      ingestion: c.resolve(TOKENS.ingestion),
      questions: c.resolve(TOKENS.questions),
      httpServer: c.resolve(TOKENS.httpServer)
    };
    return this.runtime;
  }

  async start(): Promise<AppRuntime> {
    const runtime = this.bootstrap();
    const { config, logger } = runtime;

    logger.info('Starting transcript-qa', {
      vectorStore: config.vectorStore.provider,
      collection: config.vectorStore.collection,
      embeddingModel: config.embedding.defaultModel,
      completion: `${config.completion.provider}/${config.completion.model}`,
      conversations: config.conversation.provider
    });

    await runtime.httpServer.start();
    this.listening = true;
    return runtime;
  }

  async stop(): Promise<void> {
    if (!this.runtime) return;
    const { logger, httpServer, conversations, vectorStore } = this.runtime;

    logger.info('Stopping transcript-qa...');
    if (this.listening) {
      await httpServer.stop();
      this.listening = false;
    }

    const closers: Array<[string, () => Promise<void>]> = [
      ['conversation store', () => conversations.close()],
      ['vector store', () => vectorStore.close()]
    ];
    const failures: string[] = [];
    for (const [name, close] of closers) {
      try {
        await close();
      } catch (error) {
        logger.error(`Failed to close ${name}`, { error: errorMessage(error) });
        failures.push(name);
      }
    }

    this.runtime = null;
    if (failures.length > 0) {
      throw new Error(`Failed to close: ${failures.join(', ')}`);
    }
    logger.info('transcript-qa stopped');
  }

  private registerDefaults(): void {
    const c = this.container;

    c.singleton(TOKENS.embeddings, (k) => {
      const config = k.resolve(TOKENS.config);
      return new EmbeddingProviderRegistry(config.embedding.models, config.embedding.defaultModel, k.resolve(TOKENS.logger));
    });

    c.singleton(TOKENS.vectorStore, (k) => createVectorStoreFromConfig(k.resolve(TOKENS.config).vectorStore, k.resolve(TOKENS.logger)));

    c.singleton(TOKENS.completion, (k) => new AiSdkCompletionClient(k.resolve(TOKENS.config).completion, k.resolve(TOKENS.logger)));

    c.singleton(TOKENS.conversations, (k) =>
      createConversationStoreFromConfig(k.resolve(TOKENS.config).conversation, k.resolve(TOKENS.logger))
    );

    c.singleton(TOKENS.transcripts, (k) => new FileTranscriptSource(k.resolve(TOKENS.config).transcripts.directory));

    c.singleton(TOKENS.retriever, (k) =>
      new Retriever(
        k.resolve(TOKENS.embeddings),
        k.resolve(TOKENS.vectorStore),
        k.resolve(TOKENS.config).vectorStore.collection,
        k.resolve(TOKENS.logger),
        k.resolve(TOKENS.config).vectorStore.distance
      )
    );

    c.singleton(TOKENS.assembler, (k) => new PromptAssembler(k.resolve(TOKENS.config).prompt));

    c.singleton(TOKENS.synthesizer, (k) => new AnswerSynthesizer(k.resolve(TOKENS.completion), k.resolve(TOKENS.logger)));

    c.singleton(TOKENS.ingestion, (k) => {
      const config = k.resolve(TOKENS.config);
      return new IngestionService(
        k.resolve(TOKENS.embeddings),
        k.resolve(TOKENS.vectorStore),
        k.resolve(TOKENS.transcripts),
        {
          collection: config.vectorStore.collection,
          distance: config.vectorStore.distance,
          upsertBatchSize: config.vectorStore.upsertBatchSize,
          chunking: config.chunking,
          languages: config.transcripts.languages
        },
        k.resolve(TOKENS.logger)
      );
    });

    c.singleton(TOKENS.questions, (k) => {
      const config = k.resolve(TOKENS.config);
      return new QuestionService(
        k.resolve(TOKENS.retriever),
        k.resolve(TOKENS.assembler),
        k.resolve(TOKENS.synthesizer),
        k.resolve(TOKENS.conversations),
        {
          topK: config.retrieval.topK,
          embeddingModel: config.embedding.defaultModel,
          maxTokens: config.completion.maxTokens,
          temperature: config.completion.temperature
        },
        k.resolve(TOKENS.logger)
      );
    });

    c.singleton(TOKENS.httpServer, (k) =>
      new HttpApiServer(k.resolve(TOKENS.config), k.resolve(TOKENS.logger), {
        ingestion: k.resolve(TOKENS.ingestion),
        questions: k.resolve(TOKENS.questions),
        retriever: k.resolve(TOKENS.retriever),
        conversations: k.resolve(TOKENS.conversations),
        embeddings: k.resolve(TOKENS.embeddings),
        vectorStore: k.resolve(TOKENS.vectorStore)
      })
    );
  }

  private applyOverrides(overrides: AppBootstrapperOverrides): void {
    const c = this.container;
    if (overrides.embeddings) c.register(TOKENS.embeddings, overrides.embeddings);
    if (overrides.vectorStore) c.register(TOKENS.vectorStore, overrides.vectorStore);
    if (overrides.completion) c.register(TOKENS.completion, overrides.completion);
    if (overrides.conversations) c.register(TOKENS.conversations, overrides.conversations);
    if (overrides.transcripts) c.register(TOKENS.transcripts, overrides.transcripts);
    if (overrides.retriever) c.register(TOKENS.retriever, overrides.retriever);
    if (overrides.assembler) c.register(TOKENS.assembler, overrides.assembler);
    if (overrides.synthesizer) c.register(TOKENS.synthesizer, overrides.synthesizer);
    if (overrides.ingestion) c.register(TOKENS.ingestion, overrides.ingestion);
    if (overrides.questions) c.register(TOKENS.questions, overrides.questions);
    if (overrides.httpServer) c.register(TOKENS.httpServer, overrides.httpServer);
  }
}
