import type { DistanceMetric } from '../types/index.js';

export function dot(a: readonly number[], b: readonly number[]): number {
  const n = Math.min(a.length, b.length);
  let sum = 0;
  for (let i = 0; i < n; i++) sum += (a[i] ?? 0) * (b[i] ?? 0);
  return sum;
}

/** Cosine similarity; 0 when either vector has zero norm. */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const na = Math.sqrt(dot(a, a));
  const nb = Math.sqrt(dot(b, b));
  if (na === 0 || nb === 0) return 0;
  return dot(a, b) / (na * nb);
}

export function score(metric: DistanceMetric, a: readonly number[], b: readonly number[]): number {
  return metric === 'dot' ? dot(a, b) : cosineSimilarity(a, b);
}
