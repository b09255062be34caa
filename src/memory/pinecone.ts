import { Pinecone } from "@pinecone-database/pinecone";

// ── Pinecone Client ───────────────────────────────────────

let _pc: Pinecone | null = null;

/** Shared Pinecone client, created on first use. Only inference is used. */
export function getPineconeClient(apiKey: string): Pinecone {
  if (!_pc) {
    _pc = new Pinecone({ apiKey });
  }
  return _pc;
}
