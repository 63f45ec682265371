import type { ConversationTurn, RetrievedResult } from '../types/index.js';
import { PromptBudgetExceeded } from '../utils/errors.js';
import { EMPTY_HISTORY, PASSAGE_DELIMITER, renderFallbackPrompt, renderRagPrompt } from './templates.js';

export interface PromptAssemblerOptions {
  /** Most recent turns considered for the conversation section. */
  historyWindow: number;
  /** Hard ceiling on the prompt length, in characters. */
  maxPromptChars: number;
}

export interface AssembledPrompt {
  prompt: string;
  usedPassages: number;
  droppedPassages: number;
  historyTurns: number;
  fallback: boolean;
}

type PassageText = Pick<RetrievedResult, 'text'>;
type HistoryTurn = Pick<ConversationTurn, 'role' | 'content'>;

function formatHistory(turns: readonly HistoryTurn[]): string {
  if (turns.length === 0) return EMPTY_HISTORY;
  return turns.map((t) => `${t.role}: ${t.content}`).join('\n');
}

/**
 * Builds the completion prompt under a character budget. The template and question always
 * go in; passages are then kept in rank order while they fit, and whatever room remains is
 * given to the most recent conversation turns.
 */
export class PromptAssembler {
  constructor(private readonly options: PromptAssemblerOptions) {}

  build(question: string, passages: readonly PassageText[], history: readonly HistoryTurn[] = []): string {
    return this.assemble(question, passages, history).prompt;
  }

  assemble(question: string, passages: readonly PassageText[], history: readonly HistoryTurn[] = []): AssembledPrompt {
    const budget = this.options.maxPromptChars;

    if (passages.length === 0) {
      const prompt = renderFallbackPrompt(question);
      this.check(prompt, 'the fallback prompt');
      return { prompt, usedPassages: 0, droppedPassages: 0, historyTurns: 0, fallback: true };
    }

    const render = (used: number, turns: readonly HistoryTurn[]): string =>
      renderRagPrompt({
        history: formatHistory(turns),
        context: passages.slice(0, used).map((p) => p.text).join(PASSAGE_DELIMITER),
        question
      });

    this.check(render(0, []), 'the prompt template and question');
    this.check(render(1, []), 'the prompt template, question and top-ranked passage');

    let used = 1;
    while (used < passages.length && render(used + 1, []).length <= budget) used++;

    const window = this.options.historyWindow > 0 ? history.slice(-this.options.historyWindow) : [];
    let prompt = render(used, []);
    let historyTurns = 0;
    for (let n = window.length; n > 0; n--) {
      const candidate = render(used, window.slice(-n));
      if (candidate.length <= budget) {
        prompt = candidate;
        historyTurns = n;
        break;
      }
    }

    return { prompt, usedPassages: used, droppedPassages: passages.length - used, historyTurns, fallback: false };
  }

  private check(prompt: string, what: string): void {
    if (prompt.length > this.options.maxPromptChars) {
      throw new PromptBudgetExceeded(
        `${what} needs ${prompt.length} characters, over the budget of ${this.options.maxPromptChars}`,
        this.options.maxPromptChars,
        prompt.length
      );
    }
  }
}
