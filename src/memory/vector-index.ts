import { RetrievalUnavailableError, errorMessage } from "../errors.js";
import { log } from "../logger.js";
import type { Embedder } from "./embedder.js";
import type { KnowledgeDocument } from "./types.js";

// ── Retrieval Index: in-process, linear-scan ────────────

/** Cosine similarity. 0 when either vector has zero length. */
export function cosineSimilarity(
  a: readonly number[],
  b: readonly number[],
): number {
  if (a.length !== b.length) {
    throw new RangeError(`dimension mismatch: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Knowledge-base facts with their embeddings. `load()` swaps in a whole new
 * document list; between loads the index is read-only, so one instance can
 * serve every session.
 */
export class RetrievalIndex {
  private docs: readonly KnowledgeDocument[] = [];

  constructor(private readonly embedder: Embedder) {}

  get size(): number {
    return this.docs.length;
  }

  documents(): readonly KnowledgeDocument[] {
    return this.docs;
  }

  /**
   * Embed and store `documents`, replacing the previous contents. An empty
   * list empties the index.
   *
   * @throws RetrievalUnavailableError if embedding fails; the previous
   *   contents stay in place.
   */
  async load(documents: readonly string[]): Promise<void> {
    if (documents.length === 0) {
      this.docs = [];
      log.info("📚 Retrieval index cleared (no documents)");
      return;
    }

    let embeddings: number[][];
    try {
      embeddings = await this.embedder.embedDocuments([...documents]);
    } catch (err) {
      throw new RetrievalUnavailableError(
        `failed to embed ${documents.length} documents: ${errorMessage(err)}`,
        { cause: err },
      );
    }
    if (embeddings.length !== documents.length) {
      throw new RetrievalUnavailableError(
        `embedder returned ${embeddings.length} vectors for ${documents.length} documents`,
      );
    }

    this.docs = documents.map((text, i) => ({
      id: `doc_${i}`,
      text,
      embedding: embeddings[i] ?? [],
    }));
    log.info({ count: this.docs.length }, "📚 Retrieval index loaded");
  }

  /**
   * Up to `k` document texts, most similar first. Equal scores keep
   * insertion order. An empty index returns `[]` without embedding.
   *
   * @throws RetrievalUnavailableError if the query cannot be embedded or
   *   compared.
   */
  async query(text: string, k: number): Promise<string[]> {
    const docs = this.docs;
    if (docs.length === 0 || k <= 0) return [];

    let queryVector: number[];
    try {
      queryVector = await this.embedder.embedQuery(text);
    } catch (err) {
      throw new RetrievalUnavailableError(
        `failed to embed query: ${errorMessage(err)}`,
        { cause: err },
      );
    }

    let scored: { position: number; score: number; text: string }[];
    try {
      scored = docs.map((doc, position) => ({
        position,
        score: cosineSimilarity(queryVector, doc.embedding),
        text: doc.text,
      }));
    } catch (err) {
      throw new RetrievalUnavailableError(errorMessage(err), { cause: err });
    }

    return scored
      .sort((a, b) => b.score - a.score || a.position - b.position)
      .slice(0, Math.floor(k))
      .map((s) => s.text);
  }
}
