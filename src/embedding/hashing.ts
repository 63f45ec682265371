const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

/** 32-bit FNV-1a over UTF-16 code units, as an unsigned integer. */
function fnv1a(token: string): number {
  let h = FNV_OFFSET_BASIS;
  for (let i = 0; i < token.length; i++) {
    h = Math.imul(h ^ token.charCodeAt(i), FNV_PRIME);
  }
  return h >>> 0;
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().split(/[^\p{L}\p{N}]+/u).filter(Boolean);
}

/**
 * Signed feature hashing of lowercase word tokens, L2-normalized.
 * Text without any word token maps to the zero vector.
 */
export function hashEmbed(text: string, dim: number): number[] {
  const counts = new Array<number>(dim).fill(0);
  for (const token of tokenize(text)) {
    const h = fnv1a(token);
    const bucket = h % dim;
    // top bit sets the sign
    counts[bucket] = (counts[bucket] ?? 0) + (h >= 0x80000000 ? -1 : 1);
  }

  const length = Math.hypot(...counts);
  return length > 0 ? counts.map((c) => c / length) : counts;
}
