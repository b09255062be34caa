import type { Embedder } from "./embedder.js";

// ── Hashing Embedder: offline, no model weights ─────────
// Feature hashing over keywords: each keyword lands in one bucket with a
// +1/-1 sign, then the vector is L2-normalised. Texts sharing keywords
// score a positive cosine; unrelated texts score ~0.

const STOP_WORDS = new Set([
  "a", "an", "and", "are", "as", "at", "be", "by", "for", "from",
  "has", "he", "in", "is", "it", "its", "of", "on", "that", "the",
  "to", "was", "will", "with", "what", "when", "where", "who", "how",
  "about", "all", "any", "but", "can", "did", "do", "if", "no", "not",
  "or", "so", "than", "then", "there", "these", "they", "this",
  "those", "you", "your", "me", "tell",
]);

/** Lowercase keywords with punctuation and stop words removed. */
export function extractKeywords(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, " ")
    .split(/\s+/)
    .filter((word) => word.length > 2 && !STOP_WORDS.has(word))
    .map(stem);
}

/** Crude plural folding so "ships" and "ship" share a bucket. */
function stem(word: string): string {
  if (word.length > 3 && word.endsWith("s") && !word.endsWith("ss")) {
    return word.slice(0, -1);
  }
  return word;
}

/** 32-bit FNV-1a. */
function fnv1a(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export class HashingEmbedder implements Embedder {
  constructor(readonly dimension: number = 512) {
    if (!Number.isInteger(dimension) || dimension < 1) {
      throw new RangeError(`dimension must be a positive integer (got ${dimension})`);
    }
  }

  embed(text: string): number[] {
    const vector = new Array<number>(this.dimension).fill(0);
    for (const keyword of extractKeywords(text)) {
      const hash = fnv1a(keyword);
      const bucket = hash % this.dimension;
      const sign = hash & 0x80000000 ? -1 : 1;
      vector[bucket] = (vector[bucket] ?? 0) + sign;
    }

    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return norm === 0 ? vector : vector.map((v) => v / norm);
  }

  async embedDocuments(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.embed(text));
  }

  async embedQuery(text: string): Promise<number[]> {
    return this.embed(text);
  }
}
