import dotenv from "dotenv";
import { join } from "path";

dotenv.config();

// ── Helpers ──────────────────────────────────────────────

/** Read a required variable. Only called by surfaces that need it. */
export function requireEnv(key: string): string {
  const value = process.env[key];
  if (!value) {
    console.error(`❌ Missing required environment variable: ${key}`);
    console.error(`   Copy .env.example to .env and fill in your values.`);
    process.exit(1);
  }
  return value;
}

/** Telegram user IDs allowed to talk to the bot. Only called with --telegram. */
export function requireAllowedUserIds(): number[] {
  if (config.allowedUserIds.length === 0) {
    console.error("❌ ALLOWED_USER_IDS must contain at least one valid Telegram user ID.");
    console.error("   Comma-separate several IDs: 123456789,987654321");
    process.exit(1);
  }
  return [...config.allowedUserIds];
}

function intEnv(key: string, fallback: number, min: number): number {
  const raw = process.env[key];
  if (!raw) return fallback;
  const value = parseInt(raw, 10);
  if (isNaN(value) || value < min) {
    console.error(`❌ ${key} must be an integer >= ${min} (got "${raw}")`);
    process.exit(1);
  }
  return value;
}

// ── Config ───────────────────────────────────────────────

export const config = {
  // ── Chat backend ──────────────────────────────────────
  // No key → offline mode (templated replies from the knowledge base).
  llmApiKey: process.env.LLM_API_KEY || process.env.OPENROUTER_API_KEY || "",
  llmBaseUrl: process.env.LLM_BASE_URL || "https://openrouter.ai/api/v1",
  llmModel: process.env.LLM_MODEL || "google/gemini-2.0-flash-001",
  llmTemperature: parseFloat(process.env.LLM_TEMPERATURE || "0.8"),
  llmTimeoutMs: intEnv("LLM_TIMEOUT_MS", 30_000, 1),

  // ── Retrieval ─────────────────────────────────────────
  // No key → local hashing embedder.
  pineconeApiKey: process.env.PINECONE_API_KEY || "",
  embeddingModel: process.env.EMBEDDING_MODEL || "multilingual-e5-large",
  knowledgeBasePath:
    process.env.KNOWLEDGE_BASE_PATH ||
    join(process.cwd(), "data", "captain_facts.txt"),
  retrievalTopK: intEnv("RETRIEVAL_TOP_K", 2, 1),

  // ── Memory ────────────────────────────────────────────
  memoryMaxTurns: intEnv("MEMORY_MAX_TURNS", 10, 1),

  // ── Telegram (only with --telegram) ───────────────────
  telegramMaxSessions: intEnv("TELEGRAM_MAX_SESSIONS", 1000, 1),
  allowedUserIds: (process.env.ALLOWED_USER_IDS || "")
    .split(",")
    .map((id) => parseInt(id.trim(), 10))
    .filter((id) => !isNaN(id)),
} as const;

// ── Validation ───────────────────────────────────────────

if (isNaN(config.llmTemperature)) {
  console.error("❌ LLM_TEMPERATURE must be a number.");
  process.exit(1);
}
