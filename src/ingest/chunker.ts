import { ChunkingError } from '../utils/errors.js';
import type { Passage, PassageTags } from '../types/index.js';

export interface ChunkingOptions {
  /** Upper bound on chunk length, in characters. */
  maxSize: number;
  /** Upper bound on the text shared by neighbouring chunks, in characters. */
  overlap: number;
}

/**
 * Coarsest first: paragraph, line, sentence, word, character.
 */
export const DEFAULT_SEPARATORS: readonly string[] = ['\n\n', '\n', '. ', '? ', '! ', ' ', ''];

function validate(text: unknown, options: ChunkingOptions): asserts text is string {
  if (typeof text !== 'string') {
    throw new ChunkingError(`Expected text to be a string, got ${text === null ? 'null' : typeof text}`);
  }
  const { maxSize, overlap } = options;
  if (!Number.isInteger(maxSize) || maxSize <= 0) {
    throw new ChunkingError(`maxSize must be a positive integer, got ${maxSize}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= maxSize) {
    throw new ChunkingError(`overlap must be an integer in [0, maxSize), got ${overlap}`);
  }
}

/**
 * Splits on `separator`, keeping the separator at the end of the piece it terminates,
 * so joining the pieces gives back `text`.
 */
function splitKeepingSeparator(text: string, separator: string): string[] {
  if (separator === '') return Array.from(text);

  const pieces: string[] = [];
  let start = 0;
  let at = text.indexOf(separator, start);
  while (at !== -1) {
    const end = at + separator.length;
    pieces.push(text.slice(start, end));
    start = end;
    at = text.indexOf(separator, start);
  }
  if (start < text.length) pieces.push(text.slice(start));
  return pieces;
}

/**
 * Greedily packs pieces into chunks of at most `maxSize` characters. After each emitted
 * chunk, the trailing pieces totalling at most `overlap` characters open the next one.
 */
function mergePieces(pieces: readonly string[], { maxSize, overlap }: ChunkingOptions): string[] {
  const chunks: string[] = [];
  const window: string[] = [];
  let total = 0;

  for (const piece of pieces) {
    if (total + piece.length > maxSize && window.length > 0) {
      const chunk = window.join('').trim();
      if (chunk) chunks.push(chunk);

      while (total > overlap || (total > 0 && total + piece.length > maxSize)) {
        const dropped = window.shift();
        total -= dropped?.length ?? 0;
      }
    }
    window.push(piece);
    total += piece.length;
  }

  const last = window.join('').trim();
  if (last) chunks.push(last);
  return chunks;
}

function splitRecursive(text: string, separators: readonly string[], options: ChunkingOptions): string[] {
  let separator = separators[separators.length - 1] ?? '';
  let finer: readonly string[] = [];
  for (let i = 0; i < separators.length; i++) {
    const candidate = separators[i] ?? '';
    if (candidate === '' || text.includes(candidate)) {
      separator = candidate;
      finer = separators.slice(i + 1);
      break;
    }
  }

  const chunks: string[] = [];
  let fitting: string[] = [];

  for (const piece of splitKeepingSeparator(text, separator)) {
    if (piece.length <= options.maxSize) {
      fitting.push(piece);
      continue;
    }

    if (fitting.length > 0) {
      chunks.push(...mergePieces(fitting, options));
      fitting = [];
    }
    if (finer.length === 0) {
      // No finer separator left: cut at maxSize
      for (let i = 0; i < piece.length; i += options.maxSize) {
        chunks.push(piece.slice(i, i + options.maxSize));
      }
    } else {
      chunks.push(...splitRecursive(piece, finer, options));
    }
  }

  if (fitting.length > 0) chunks.push(...mergePieces(fitting, options));
  return chunks;
}

/**
 * Splits transcript text into overlapping chunks of at most `maxSize` characters,
 * preferring the coarsest separator that keeps chunks within bounds.
 * Output is in source order and deterministic for a given input and options.
 */
export function splitText(
  text: string,
  options: ChunkingOptions,
  separators: readonly string[] = DEFAULT_SEPARATORS
): string[] {
  validate(text, options);
  if (text.trim().length === 0) return [];
  return splitRecursive(text, separators, options);
}

export function chunkTranscript(
  text: string,
  sourceId: string,
  tags: PassageTags,
  options: ChunkingOptions
): Passage[] {
  return splitText(text, options).map((chunk, index) => ({
    text: chunk,
    index,
    sourceId,
    tags: { ...tags }
  }));
}
