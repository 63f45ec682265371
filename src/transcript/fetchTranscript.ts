import type { Logger } from '../types/index.js';
import { errorMessage, TranscriptUnavailable, type TranscriptAttempt } from '../utils/errors.js';
import type { FetchedTranscript, TranscriptSegment, TranscriptSource } from './types.js';

/**
 * Tries each candidate language in order and returns the first transcript found.
 * When every candidate fails, the error lists each attempt.
 */
export async function fetchTranscript(
  source: TranscriptSource,
  videoId: string,
  languages: readonly string[],
  logger?: Logger
): Promise<FetchedTranscript> {
  const attempts: TranscriptAttempt[] = [];

  for (const language of languages) {
    try {
      const segments = await source.fetch(videoId, language);
      if (segments.length === 0) {
        attempts.push({ language, error: 'transcript is empty' });
        logger?.warn('Transcript is empty', { videoId, language });
        continue;
      }
      logger?.info('Transcript fetched', { videoId, language, segments: segments.length });
      return { videoId, language, segments };
    } catch (error) {
      attempts.push({ language, error: errorMessage(error) });
      logger?.warn('Transcript attempt failed', { videoId, language, error: errorMessage(error) });
    }
  }

  const tried = languages.length > 0 ? languages.join(', ') : 'none';
  throw new TranscriptUnavailable(`No transcript available for ${videoId} (tried: ${tried})`, videoId, attempts);
}

export function transcriptToText(segments: readonly TranscriptSegment[]): string {
  return segments
    .map((s) => s.text.trim())
    .filter((t) => t.length > 0)
    .join('\n');
}
