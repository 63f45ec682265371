import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';

import { errorMessage, TranscriptUnavailable } from '../utils/errors.js';
import { TranscriptSegmentSchema, type TranscriptSegment, type TranscriptSource } from './types.js';

const SegmentsFileSchema = z.array(TranscriptSegmentSchema);

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Reads transcripts saved on disk as `<videoId>.<language>.json` (an array of segments)
 * or `<videoId>.<language>.txt` (one segment per non-empty line). JSON wins when both exist.
 */
export class FileTranscriptSource implements TranscriptSource {
  constructor(private readonly directory: string) {}

  async fetch(videoId: string, language: string): Promise<TranscriptSegment[]> {
    const root = path.resolve(this.directory);
    const base = path.resolve(root, `${videoId}.${language}`);
    if (path.dirname(base) !== root) {
      throw new TranscriptUnavailable(`Refusing to read a transcript outside ${this.directory}`, videoId);
    }

    const json = await this.read(`${base}.json`, videoId, language);
    if (json !== undefined) return this.parseJson(json, videoId, language);

    const text = await this.read(`${base}.txt`, videoId, language);
    if (text !== undefined) {
      return text
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0)
        .map((line) => ({ text: line, start: 0, duration: 0 }));
    }

    throw new TranscriptUnavailable(`No ${language} transcript for ${videoId} in ${this.directory}`, videoId);
  }

  private async read(file: string, videoId: string, language: string): Promise<string | undefined> {
    try {
      return await readFile(file, 'utf8');
    } catch (error) {
      if (isNotFound(error)) return undefined;
      throw new TranscriptUnavailable(`Cannot read ${language} transcript for ${videoId}: ${errorMessage(error)}`, videoId, [], error);
    }
  }

  private parseJson(raw: string, videoId: string, language: string): TranscriptSegment[] {
    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch (error) {
      throw new TranscriptUnavailable(`Malformed ${language} transcript for ${videoId}`, videoId, [], error);
    }
    const parsed = SegmentsFileSchema.safeParse(value);
    if (!parsed.success) {
      throw new TranscriptUnavailable(
        `Invalid ${language} transcript for ${videoId}: ${parsed.error.message}`,
        videoId,
        [],
        parsed.error
      );
    }
    return parsed.data;
  }
}
