import type { ChatSessionOptions } from "./agent/chat-session.js";
import { config } from "./config.js";
import { errorMessage } from "./errors.js";
import { OpenAIBackend, type ChatBackend } from "./llm/backend.js";
import { log } from "./logger.js";
import { PineconeEmbedder, type Embedder } from "./memory/embedder.js";
import { HashingEmbedder } from "./memory/hashing-embedder.js";
import { loadKnowledgeBase } from "./memory/knowledge-base.js";
import { getPineconeClient } from "./memory/pinecone.js";
import { RetrievalIndex } from "./memory/vector-index.js";
import { captain } from "./persona/captain.js";
import type { Persona } from "./persona/persona.js";
import { withSoul } from "./persona/soul.js";

// ── Runtime: shared pieces every session borrows ────────

export interface Runtime {
  persona: Persona;
  index: RetrievalIndex;
  backend: ChatBackend | null;
  /** Options for new ChatSessions. */
  sessionOptions: ChatSessionOptions;
}

function createEmbedder(): Embedder {
  if (config.pineconeApiKey) {
    log.info({ model: config.embeddingModel }, "🧮 Embeddings: Pinecone inference");
    return new PineconeEmbedder(
      getPineconeClient(config.pineconeApiKey),
      config.embeddingModel,
    );
  }
  log.info("🧮 Embeddings: local hashing embedder (no PINECONE_API_KEY)");
  return new HashingEmbedder();
}

function createBackend(): ChatBackend | null {
  if (!config.llmApiKey) {
    log.warn("⚠️ No LLM_API_KEY set, running in offline mode");
    return null;
  }
  return new OpenAIBackend({
    apiKey: config.llmApiKey,
    baseURL: config.llmBaseUrl,
    model: config.llmModel,
    temperature: config.llmTemperature,
    timeoutMs: config.llmTimeoutMs,
  });
}

/**
 * Build the persona, retrieval index and backend, and load the knowledge
 * base. A knowledge base that cannot be embedded leaves the index empty.
 */
export async function createRuntime(): Promise<Runtime> {
  const persona = withSoul(captain);
  const index = new RetrievalIndex(createEmbedder());

  const facts = loadKnowledgeBase(config.knowledgeBasePath);
  try {
    await index.load(facts);
  } catch (err) {
    log.warn({ err: errorMessage(err) }, "⚠️ Knowledge base could not be indexed, continuing without facts");
  }

  const backend = createBackend();
  log.info(
    {
      persona: persona.name,
      mode: backend ? "online" : "offline",
      model: backend?.model,
      facts: index.size,
    },
    "🏴‍☠️ Runtime ready",
  );

  return {
    persona,
    index,
    backend,
    sessionOptions: {
      persona,
      index,
      backend,
      maxTurns: config.memoryMaxTurns,
      topK: config.retrievalTopK,
      backendTimeoutMs: config.llmTimeoutMs,
    },
  };
}
