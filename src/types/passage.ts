import { z } from 'zod';

/**
 * Payload fields the vector store indexes and filters on.
 */
export const PAYLOAD_FIELDS = ['source_id', 'embedding_model', 'language'] as const;
export type PayloadField = typeof PAYLOAD_FIELDS[number];

/** Equality filters, combined with AND. */
export type PayloadFilters = Partial<Record<PayloadField, string>>;

export interface PassageTags {
  embeddingModel: string;
  language?: string;
}

/**
 * A bounded slice of a transcript. `(sourceId, index)` identifies it for traceability;
 * the storage key is generated separately.
 */
export interface Passage {
  readonly text: string;
  readonly index: number;
  readonly sourceId: string;
  readonly tags: Readonly<PassageTags>;
}

export const PassagePayloadSchema = z.object({
  source_id: z.string().min(1),
  chunk_index: z.number().int().min(0),
  text: z.string(),
  embedding_model: z.string().min(1),
  language: z.string().min(1).optional()
}).strict();

export type PassagePayload = z.infer<typeof PassagePayloadSchema>;

export interface EmbeddingRecord {
  id: string;
  vector: number[];
  payload: PassagePayload;
}

export interface RetrievedResult {
  score: number;
  text: string;
  sourceId: string;
  chunkIndex: number;
  embeddingModel: string;
  language?: string;
}

export function toPayload(passage: Passage): PassagePayload {
  const payload: PassagePayload = {
    source_id: passage.sourceId,
    chunk_index: passage.index,
    text: passage.text,
    embedding_model: passage.tags.embeddingModel
  };
  if (passage.tags.language) payload.language = passage.tags.language;
  return payload;
}

export function toRetrievedResult(score: number, payload: PassagePayload): RetrievedResult {
  const result: RetrievedResult = {
    score,
    text: payload.text,
    sourceId: payload.source_id,
    chunkIndex: payload.chunk_index,
    embeddingModel: payload.embedding_model
  };
  if (payload.language !== undefined) result.language = payload.language;
  return result;
}
