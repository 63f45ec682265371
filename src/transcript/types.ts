import { z } from 'zod';

export const TranscriptSegmentSchema = z.object({
  text: z.string(),
  start: z.number().min(0).default(0),
  duration: z.number().min(0).default(0)
});
export type TranscriptSegment = z.infer<typeof TranscriptSegmentSchema>;

export interface FetchedTranscript {
  videoId: string;
  language: string;
  segments: TranscriptSegment[];
}

/** Fetches the timed segments of one video in one language, or fails with TranscriptUnavailable. */
export interface TranscriptSource {
  fetch(videoId: string, language: string): Promise<TranscriptSegment[]>;
}
