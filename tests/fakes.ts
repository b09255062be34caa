import type { Embedder } from "../src/memory/embedder.js";
import type { ChatBackend } from "../src/llm/backend.js";

/** Looks vectors up by exact text; unknown text maps to `fallback`. */
export class TableEmbedder implements Embedder {
  queries: string[] = [];

  constructor(
    private readonly table: Record<string, number[]>,
    private readonly fallback: number[] = [0, 0, 0],
  ) {}

  async embedDocuments(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.table[text] ?? this.fallback);
  }

  async embedQuery(text: string): Promise<number[]> {
    this.queries.push(text);
    return this.table[text] ?? this.fallback;
  }
}

/** One dimension per keyword: 1 when the text contains it. */
export class KeywordEmbedder implements Embedder {
  constructor(private readonly keywords: string[]) {}

  private vector(text: string): number[] {
    const lowered = text.toLowerCase();
    return this.keywords.map((k) => (lowered.includes(k) ? 1 : 0));
  }

  async embedDocuments(texts: string[]): Promise<number[][]> {
    return texts.map((t) => this.vector(t));
  }

  async embedQuery(text: string): Promise<number[]> {
    return this.vector(text);
  }
}

export class FailingEmbedder implements Embedder {
  constructor(private readonly failDocuments = false) {}

  async embedDocuments(texts: string[]): Promise<number[][]> {
    if (this.failDocuments) throw new Error("embedding service down");
    return texts.map(() => [1, 0, 0]);
  }

  async embedQuery(): Promise<number[]> {
    throw new Error("embedding service down");
  }
}

type Generate = (prompt: string, systemInstruction: string) => Promise<string>;

export class FakeBackend implements ChatBackend {
  readonly model = "fake-model";
  calls: { prompt: string; systemInstruction: string }[] = [];

  constructor(private readonly impl: Generate = async () => "Ahoy from the backend") {}

  generate(prompt: string, systemInstruction: string): Promise<string> {
    this.calls.push({ prompt, systemInstruction });
    return this.impl(prompt, systemInstruction);
  }
}

/** Error carrying an HTTP status, shaped like SDK errors. */
export function httpError(status: number, message: string): Error {
  return Object.assign(new Error(message), { status });
}
