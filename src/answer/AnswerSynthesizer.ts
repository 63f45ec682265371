import type { CompletionClient } from '../ai/index.js';
import type { Logger } from '../types/index.js';
import { errorMessage, GenerationFailure } from '../utils/errors.js';

export const APOLOGY_MESSAGE = 'Sorry, something went wrong while generating the answer. Please try again later.';

export interface GenerateOptions {
  maxTokens: number;
  temperature: number;
  model?: string;
}

const THINK_BLOCK = /<think>[\s\S]*?<\/think>/gi;

/** Removes reasoning blocks some models emit before the answer. */
export function stripReasoning(text: string): string {
  return text.replace(THINK_BLOCK, '').trim();
}

export class AnswerSynthesizer {
  constructor(
    private readonly client: CompletionClient,
    private readonly logger: Logger
  ) {}

  /**
   * Never rejects on completion failures: they are logged and replaced by APOLOGY_MESSAGE,
   * as is an answer that is empty once reasoning blocks are removed.
   */
  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    const model = options.model ?? this.client.defaultModel;
    try {
      const result = await this.client.complete({
        prompt,
        model,
        maxTokens: options.maxTokens,
        temperature: options.temperature
      });
      const answer = stripReasoning(result.text);
      if (answer.length === 0) {
        this.logger.error('Completion returned an empty answer', {
          model,
          provider: this.client.provider,
          finishReason: result.finishReason
        });
        return APOLOGY_MESSAGE;
      }
      this.logger.info('Answer generated', { model, chars: answer.length, latencyMs: result.latencyMs });
      return answer;
    } catch (error) {
      this.logger.error('Answer generation failed', {
        model,
        provider: this.client.provider,
        error: errorMessage(error),
        kind: error instanceof GenerationFailure ? error.kind : 'unknown'
      });
      return APOLOGY_MESSAGE;
    }
  }
}
