import { beforeEach, describe, expect, it, vi } from 'vitest';

import { createAnthropic } from '@ai-sdk/anthropic';
import { createGroq } from '@ai-sdk/groq';
import { generateText } from 'ai';

import { AiSdkCompletionClient, classifyError } from '../../ai/index.js';
import type { CompletionConfig, Logger } from '../../types/index.js';
import { GenerationFailure } from '../../utils/errors.js';

vi.mock('ai', () => ({
  generateText: vi.fn()
}));

vi.mock('@ai-sdk/anthropic', () => ({
  createAnthropic: vi.fn(() => ((modelId: string) => ({ provider: 'anthropic', modelId })))
}));
vi.mock('@ai-sdk/openai', () => ({
  createOpenAI: vi.fn(() => ((modelId: string) => ({ provider: 'openai', modelId })))
}));
vi.mock('@ai-sdk/google', () => ({
  createGoogleGenerativeAI: vi.fn(() => ((modelId: string) => ({ provider: 'google', modelId })))
}));
vi.mock('@ai-sdk/mistral', () => ({
  createMistral: vi.fn(() => ((modelId: string) => ({ provider: 'mistral', modelId })))
}));
vi.mock('@ai-sdk/groq', () => ({
  createGroq: vi.fn(() => ((modelId: string) => ({ provider: 'groq', modelId })))
}));
vi.mock('@ai-sdk/deepseek', () => ({
  createDeepSeek: vi.fn(() => ((modelId: string) => ({ provider: 'deepseek', modelId })))
}));

type GenerateTextResult = Awaited<ReturnType<typeof generateText>>;

function makeLogger(): Logger {
  return { trace: vi.fn(), debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function makeConfig(overrides: Partial<CompletionConfig> = {}): CompletionConfig {
  return {
    provider: 'groq',
    model: 'test-model',
    apiKeyEnv: 'GROQ_API_KEY',
    temperature: 0.2,
    maxTokens: 1000,
    timeoutMs: 5000,
    retryAttempts: 1,
    retryDelayMs: 0,
    ...overrides
  };
}

function completion(text: string): GenerateTextResult {
  return {
    text,
    finishReason: 'stop',
    usage: { inputTokens: 12, outputTokens: 4, totalTokens: 16 }
  } as unknown as GenerateTextResult;
}

const env = { GROQ_API_KEY: 'test-secret', ANTHROPIC_API_KEY: 'test-secret' };

describe('classifyError', () => {
  it('maps status codes to failure kinds', () => {
    expect(classifyError({ statusCode: 429, message: 'slow down' })).toMatchObject({ kind: 'rate_limit', retryable: true });
    expect(classifyError({ status: 401 })).toMatchObject({ kind: 'auth', retryable: false });
    expect(classifyError({ response: { status: 403 } })).toMatchObject({ kind: 'auth', statusCode: 403 });
    expect(classifyError({ statusCode: 400 })).toMatchObject({ kind: 'invalid_request', retryable: false });
    expect(classifyError({ statusCode: 503 })).toMatchObject({ kind: 'server_error', retryable: true });
  });

  it('recognises timeouts and network errors', () => {
    const aborted = new Error('aborted');
    aborted.name = 'AbortError';
    expect(classifyError(aborted)).toMatchObject({ kind: 'timeout', retryable: true });
    expect(classifyError({ code: 'ECONNREFUSED', message: 'refused' })).toMatchObject({ kind: 'network', message: 'refused' });
    expect(classifyError(new TypeError('fetch failed'))).toMatchObject({ kind: 'network' });
    expect(classifyError(new Error('boom'))).toMatchObject({ kind: 'unknown', retryable: false, message: 'boom' });
  });

  it('reads retry-after headers in seconds', () => {
    const failure = classifyError({ statusCode: 429, responseHeaders: { 'retry-after': '2' } });
    expect(failure.retryAfterMs).toBe(2000);
  });

  it('keeps an existing failure unchanged', () => {
    const failure = new GenerationFailure('x', 'auth');
    expect(classifyError(failure)).toBe(failure);
  });
});

describe('AiSdkCompletionClient', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('returns text, usage and finish reason', async () => {
    vi.mocked(generateText).mockResolvedValueOnce(completion('Hello there'));
    const client = new AiSdkCompletionClient(makeConfig(), makeLogger(), env);

    const result = await client.complete({ prompt: 'Say hi', maxTokens: 100, temperature: 0.1 });

    expect(result).toMatchObject({
      text: 'Hello there',
      model: 'test-model',
      provider: 'groq',
      finishReason: 'stop',
      usage: { promptTokens: 12, completionTokens: 4, totalTokens: 16 }
    });
    expect(createGroq).toHaveBeenCalledWith({ apiKey: 'test-secret', baseURL: undefined });
    expect(generateText).toHaveBeenCalledWith(
      expect.objectContaining({
        model: { provider: 'groq', modelId: 'test-model' },
        prompt: 'Say hi',
        temperature: 0.1,
        maxOutputTokens: 100,
        maxRetries: 0
      })
    );
  });

  it('uses the requested model and caches its handle', async () => {
    vi.mocked(generateText).mockResolvedValue(completion('ok'));
    const client = new AiSdkCompletionClient(makeConfig(), makeLogger(), env);

    await client.complete({ prompt: 'a', model: 'other-model', maxTokens: 10, temperature: 0 });
    const result = await client.complete({ prompt: 'b', model: 'other-model', maxTokens: 10, temperature: 0 });

    expect(result.model).toBe('other-model');
    expect(createGroq).toHaveBeenCalledTimes(1);
    expect(generateText).toHaveBeenLastCalledWith(
      expect.objectContaining({ model: { provider: 'groq', modelId: 'other-model' } })
    );
  });

  it('builds the configured provider', async () => {
    vi.mocked(generateText).mockResolvedValueOnce(completion('ok'));
    const client = new AiSdkCompletionClient(
      makeConfig({ provider: 'anthropic', apiKeyEnv: 'ANTHROPIC_API_KEY', baseUrl: 'http://llm.test' }),
      makeLogger(),
      env
    );

    await client.complete({ prompt: 'a', maxTokens: 10, temperature: 0 });
    expect(createAnthropic).toHaveBeenCalledWith({ apiKey: 'test-secret', baseURL: 'http://llm.test' });
  });

  it('retries a rate-limited call once', async () => {
    vi.mocked(generateText)
      .mockRejectedValueOnce({ statusCode: 429, message: 'rate limited' })
      .mockResolvedValueOnce(completion('second time'));
    const logger = makeLogger();
    const client = new AiSdkCompletionClient(makeConfig(), logger, env);

    const result = await client.complete({ prompt: 'a', maxTokens: 10, temperature: 0 });

    expect(result.text).toBe('second time');
    expect(generateText).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledWith('Completion attempt failed', {
      model: 'test-model',
      attempt: 1,
      kind: 'rate_limit',
      statusCode: 429,
      willRetry: true
    });
  });

  it('gives up after the configured retries', async () => {
    vi.mocked(generateText).mockRejectedValue({ statusCode: 500, message: 'upstream down' });
    const client = new AiSdkCompletionClient(makeConfig({ retryAttempts: 2 }), makeLogger(), env);

    await expect(client.complete({ prompt: 'a', maxTokens: 10, temperature: 0 })).rejects.toMatchObject({
      kind: 'server_error',
      statusCode: 500
    });
    expect(generateText).toHaveBeenCalledTimes(3);
  });

  it('does not retry authentication failures', async () => {
    vi.mocked(generateText).mockRejectedValueOnce({ statusCode: 401, message: 'bad key' });
    const client = new AiSdkCompletionClient(makeConfig({ retryAttempts: 3 }), makeLogger(), env);

    await expect(client.complete({ prompt: 'a', maxTokens: 10, temperature: 0 })).rejects.toBeInstanceOf(GenerationFailure);
    expect(generateText).toHaveBeenCalledTimes(1);
  });

  it('fails without calling the provider when the key is missing', async () => {
    const client = new AiSdkCompletionClient(makeConfig(), makeLogger(), {});

    await expect(client.complete({ prompt: 'a', maxTokens: 10, temperature: 0 })).rejects.toThrow(
      'Environment variable GROQ_API_KEY is not set'
    );
    expect(generateText).not.toHaveBeenCalled();
  });
});
