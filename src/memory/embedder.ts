import type { Pinecone } from "@pinecone-database/pinecone";
import { withRetry } from "../llm/retry.js";
import { log } from "../logger.js";

// ── Embedder ─────────────────────────────────────────────

/** Turns text into fixed-length vectors. Same input, same vector. */
export interface Embedder {
  /** Embed knowledge-base passages, one vector per text, in order. */
  embedDocuments(texts: string[]): Promise<number[][]>;
  /** Embed a search query. */
  embedQuery(text: string): Promise<number[]>;
}

type InputType = "passage" | "query";

/** Pinecone inference accepts at most 96 inputs per call for e5-large. */
const BATCH_SIZE = 96;

/** Inputs longer than this are trimmed before they leave the process. */
const MAX_INPUT_CHARS = 2000;

/**
 * Embeddings from Pinecone's hosted inference API (multilingual-e5-large,
 * 1024 dimensions). Transient network and 5xx/429 failures are retried.
 */
export class PineconeEmbedder implements Embedder {
  constructor(
    private readonly client: Pinecone,
    private readonly model: string = "multilingual-e5-large",
  ) {}

  async embedDocuments(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);
      vectors.push(...(await this.embedBatch(batch, "passage")));
    }
    log.debug({ count: vectors.length, model: this.model }, "🧮 Passages embedded");
    return vectors;
  }

  async embedQuery(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text], "query");
    if (!vector) {
      throw new Error("Pinecone inference returned no embedding");
    }
    return vector;
  }

  private async embedBatch(
    inputs: string[],
    inputType: InputType,
  ): Promise<number[][]> {
    const result = await withRetry(
      () =>
        this.client.inference.embed({
          model: this.model,
          inputs: inputs.map((text) => text.slice(0, MAX_INPUT_CHARS)),
          parameters: {
            inputType,
            truncate: "END",
          },
        }),
      { label: `Pinecone embed (${inputType})` },
    );

    const vectors = (result.data ?? []).map((embedding) => {
      if (!("values" in embedding) || !Array.isArray(embedding.values)) {
        throw new Error("Pinecone inference returned a non-dense embedding");
      }
      return embedding.values;
    });

    if (vectors.length !== inputs.length) {
      throw new Error(
        `Pinecone inference returned ${vectors.length} embeddings for ${inputs.length} inputs`,
      );
    }
    return vectors;
  }
}
