import { generateText } from 'ai';
import type { FinishReason, LanguageModel, LanguageModelUsage } from 'ai';
import { createAnthropic } from '@ai-sdk/anthropic';
import { createOpenAI } from '@ai-sdk/openai';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { createMistral } from '@ai-sdk/mistral';
import { createGroq } from '@ai-sdk/groq';
import { createDeepSeek } from '@ai-sdk/deepseek';

import type { CompletionConfig, Logger } from '../types/index.js';
import { sleep } from '../utils/async.js';
import { GenerationFailure, type GenerationFailureKind } from '../utils/errors.js';
import type { CompletionClient, CompletionRequest, CompletionResult, CompletionUsage } from './types.js';

type Env = Readonly<Record<string, string | undefined>>;

const FINISH_REASONS: Partial<Record<FinishReason, CompletionResult['finishReason']>> = {
  stop: 'stop',
  length: 'length',
  'content-filter': 'content_filter',
  error: 'error'
};

const NETWORK_CODES = new Set(['ENOTFOUND', 'ECONNRESET', 'ECONNREFUSED', 'EAI_AGAIN', 'ENETUNREACH']);

/** What a provider error tells us, whichever shape it came in. */
interface ErrorFacts {
  message: string;
  name?: string;
  code?: string;
  statusCode?: number;
  retryAfterMs?: number;
}

interface Verdict {
  kind: GenerationFailureKind;
  retryable: boolean;
}

function field(source: unknown, key: string): unknown {
  return typeof source === 'object' && source !== null ? Reflect.get(source, key) : undefined;
}

function finiteNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function text(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

// Retry-After is either delay-seconds or an HTTP date
function retryAfter(headers: unknown): number | undefined {
  const raw = text(field(headers, 'retry-after')) ?? text(field(headers, 'Retry-After'));
  if (!raw) return undefined;

  const seconds = Number(raw);
  if (Number.isFinite(seconds)) return Math.max(0, Math.floor(seconds * 1000));
  const at = Date.parse(raw);
  return Number.isNaN(at) ? undefined : Math.max(0, at - Date.now());
}

function factsOf(error: unknown): ErrorFacts {
  const response = field(error, 'response');
  return {
    message: error instanceof Error ? error.message : text(field(error, 'message')) ?? 'Unknown error',
    name: error instanceof Error ? error.name : undefined,
    code: text(field(error, 'code')),
    statusCode:
      finiteNumber(field(error, 'statusCode')) ??
      finiteNumber(field(error, 'status')) ??
      finiteNumber(field(response, 'status')) ??
      finiteNumber(field(response, 'statusCode')),
    retryAfterMs:
      retryAfter(field(error, 'responseHeaders')) ?? retryAfter(field(error, 'headers')) ?? retryAfter(field(response, 'headers'))
  };
}

function byStatus(statusCode: number | undefined): Verdict | undefined {
  if (statusCode === undefined) return undefined;
  if (statusCode === 429) return { kind: 'rate_limit', retryable: true };
  if (statusCode === 401 || statusCode === 403) return { kind: 'auth', retryable: false };
  if (statusCode === 400) return { kind: 'invalid_request', retryable: false };
  if (statusCode >= 500 && statusCode <= 599) return { kind: 'server_error', retryable: true };
  return undefined;
}

function byShape(error: unknown, facts: ErrorFacts): Verdict {
  const lower = facts.message.toLowerCase();
  const timedOut =
    facts.name === 'AbortError' ||
    facts.name === 'TimeoutError' ||
    facts.code === 'ETIMEDOUT' ||
    (error instanceof Error && /timeout|timed out/.test(lower));
  if (timedOut) return { kind: 'timeout', retryable: true };

  const unreachable =
    (facts.code !== undefined && NETWORK_CODES.has(facts.code)) ||
    (error instanceof TypeError && /fetch|network/.test(lower));
  if (unreachable) return { kind: 'network', retryable: true };

  return { kind: 'unknown', retryable: false };
}

function toUsage(usage: LanguageModelUsage | undefined): CompletionUsage {
  const promptTokens = usage?.inputTokens ?? 0;
  const completionTokens = usage?.outputTokens ?? 0;
  return { promptTokens, completionTokens, totalTokens: usage?.totalTokens ?? promptTokens + completionTokens };
}

/**
 * Normalizes anything a provider call can throw into a GenerationFailure. HTTP status
 * decides first; otherwise the error's name, code and message do.
 */
export function classifyError(error: unknown): GenerationFailure {
  if (error instanceof GenerationFailure) return error;

  const facts = factsOf(error);
  const { kind, retryable } = byStatus(facts.statusCode) ?? byShape(error, facts);
  return new GenerationFailure(
    facts.message,
    kind,
    facts.statusCode,
    retryable,
    retryable ? facts.retryAfterMs : undefined,
    error
  );
}

/**
 * Completion client over the Vercel AI SDK. One provider handle is created per client;
 * retryable failures (rate limits, 5xx, timeouts, network) are retried up to
 * `retryAttempts` times.
 */
export class AiSdkCompletionClient implements CompletionClient {
  private readonly models = new Map<string, LanguageModel>();

  constructor(
    private readonly config: CompletionConfig,
    private readonly logger: Logger,
    private readonly env: Env = process.env
  ) {}

  get provider(): CompletionConfig['provider'] {
    return this.config.provider;
  }

  get defaultModel(): string {
    return this.config.model;
  }

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    const modelId = request.model ?? this.config.model;
    const retryAttempts = Math.max(0, this.config.retryAttempts);

    let lastError: GenerationFailure | undefined;
    for (let attempt = 1; attempt <= retryAttempts + 1; attempt += 1) {
      const startedAt = Date.now();
      const abortController = new AbortController();
      const timeoutId = setTimeout(() => abortController.abort(), this.config.timeoutMs);

      try {
        const result = await generateText({
          model: this.getModel(modelId),
          prompt: request.prompt,
          temperature: request.temperature,
          maxOutputTokens: request.maxTokens,
          maxRetries: 0,
          abortSignal: abortController.signal
        });

        const latencyMs = Math.max(0, Date.now() - startedAt);
        const usage = toUsage(result.usage);
        this.logger.debug('Completion finished', { model: modelId, latencyMs, totalTokens: usage.totalTokens });

        return {
          text: result.text,
          model: modelId,
          provider: this.config.provider,
          finishReason: FINISH_REASONS[result.finishReason] ?? 'other',
          usage,
          latencyMs
        };
      } catch (error) {
        const classified = classifyError(error);
        lastError = classified;

        const shouldRetry = classified.retryable && attempt <= retryAttempts;
        this.logger.warn('Completion attempt failed', {
          model: modelId,
          attempt,
          kind: classified.kind,
          statusCode: classified.statusCode,
          willRetry: shouldRetry
        });
        if (!shouldRetry) throw classified;

        const waitMs = classified.retryAfterMs ?? this.config.retryDelayMs;
        if (waitMs > 0) await sleep(waitMs);
      } finally {
        clearTimeout(timeoutId);
      }
    }

    throw lastError ?? new GenerationFailure('Unknown error', 'unknown');
  }

  private getModel(modelId: string): LanguageModel {
    const cached = this.models.get(modelId);
    if (cached) return cached;

    const { provider, baseUrl, apiKeyEnv } = this.config;
    const apiKey = this.env[apiKeyEnv];
    if (!apiKey) {
      throw new GenerationFailure(`Environment variable ${apiKeyEnv} is not set`, 'auth');
    }
    const settings = { apiKey, baseURL: baseUrl };

    let model: LanguageModel;
    switch (provider) {
      case 'anthropic':
        model = createAnthropic(settings)(modelId);
        break;
      case 'openai':
        model = createOpenAI(settings)(modelId);
        break;
      case 'google':
        model = createGoogleGenerativeAI(settings)(modelId);
        break;
      case 'mistral':
        model = createMistral(settings)(modelId);
        break;
      case 'groq':
        model = createGroq(settings)(modelId);
        break;
      case 'deepseek':
        model = createDeepSeek(settings)(modelId);
        break;
      default: {
        const unsupported: never = provider;
        throw new GenerationFailure(`Unsupported completion provider ${String(unsupported)}`, 'invalid_request');
      }
    }
    this.models.set(modelId, model);
    return model;
  }
}
