import type { CompletionProviderId } from '../types/index.js';

export interface CompletionRequest {
  prompt: string;
  /** Overrides the configured model for this call. */
  model?: string;
  maxTokens: number;
  temperature: number;
}

export interface CompletionUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface CompletionResult {
  text: string;
  model: string;
  provider: CompletionProviderId;
  finishReason: 'stop' | 'length' | 'content_filter' | 'error' | 'other';
  usage: CompletionUsage;
  latencyMs: number;
}

/** Text-in, text-out capability behind the answer synthesizer. */
export interface CompletionClient {
  readonly provider: CompletionProviderId;
  readonly defaultModel: string;
  complete(request: CompletionRequest): Promise<CompletionResult>;
}
