import {
  BackendAuthError,
  BackendQuotaError,
  errorMessage,
} from "../errors.js";
import type { ChatBackend } from "../llm/backend.js";
import { classifyBackendError } from "../llm/errors.js";
import { withTimeout } from "../llm/timeout.js";
import { log } from "../logger.js";
import { buildContextPrompt } from "../memory/context-builder.js";
import { ConversationMemory } from "../memory/conversation.js";
import type { RetrievalIndex } from "../memory/vector-index.js";
import { fillTemplate, pickRandom, type Persona } from "../persona/persona.js";
import { calculate, formatCalculation } from "../tools/calculator.js";
import type { ChatReply, ReplySource } from "./types.js";

export interface ChatSessionOptions {
  persona: Persona;
  /** Shared, read-only after load. */
  index: RetrievalIndex;
  /** Omit (or pass null) for offline mode. */
  backend?: ChatBackend | null;
  /** Memory turns kept for this session. Default 10. */
  maxTurns?: number;
  /** Facts retrieved for the backend prompt. Default 2. */
  topK?: number;
  /** Bound on a single backend call. Default 30s. */
  backendTimeoutMs?: number;
  /** Uniform [0, 1) source for offline replies. Default Math.random. */
  rng?: () => number;
}

/**
 * One conversation: owns its memory, borrows the shared retrieval index
 * and backend. Every call to `chat()` resolves to a reply; nothing a
 * single turn does can reject it.
 */
export class ChatSession {
  readonly memory: ConversationMemory;
  private readonly persona: Persona;
  private readonly index: RetrievalIndex;
  private readonly backend: ChatBackend | null;
  private readonly topK: number;
  private readonly backendTimeoutMs: number;
  private readonly rng: () => number;

  constructor(opts: ChatSessionOptions) {
    this.persona = opts.persona;
    this.index = opts.index;
    this.backend = opts.backend ?? null;
    this.topK = opts.topK ?? 2;
    this.backendTimeoutMs = opts.backendTimeoutMs ?? 30_000;
    this.rng = opts.rng ?? Math.random;
    this.memory = new ConversationMemory({
      maxTurns: opts.maxTurns,
      assistantLabel: opts.persona.shortName,
    });
  }

  get isOffline(): boolean {
    return this.backend === null;
  }

  async chat(userMessage: string): Promise<ChatReply> {
    const startTime = Date.now();
    this.memory.append("user", userMessage);

    const reply = (text: string, source: ReplySource): ChatReply => ({
      text,
      source,
      latencyMs: Date.now() - startTime,
    });

    // ── Arithmetic short-circuit ─────────────────────────
    const calculation = calculate(userMessage);
    if (calculation) {
      const text = formatCalculation(calculation, this.persona);
      this.memory.append("assistant", text);
      log.info({ success: calculation.success }, "🧮 Calculation answered");
      return reply(text, "calculator");
    }

    // ── Offline: templated reply around one fact ─────────
    if (!this.backend) {
      const text = await this.offlineReply(userMessage);
      this.memory.append("assistant", text);
      return reply(text, "offline");
    }

    // ── Online: facts + transcript → backend ─────────────
    const facts = await this.retrieve(userMessage, this.topK);
    const prompt = buildContextPrompt({
      facts,
      recentConversation:
        this.memory.turnCount() > 0 ? this.memory.contextString() : undefined,
      userMessage,
    });

    try {
      const text = await withTimeout(
        this.backend.generate(prompt, this.persona.systemInstruction),
        this.backendTimeoutMs,
        `Backend (${this.backend.model})`,
      );
      this.memory.append("assistant", text);
      log.info(
        { model: this.backend.model, facts: facts.length, latencyMs: Date.now() - startTime },
        "💬 Backend reply",
      );
      return reply(text, "backend");
    } catch (err) {
      return reply(this.apologise(err), "apology");
    }
  }

  /** Forget the conversation. Safe to call repeatedly. */
  resetConversation(): void {
    this.memory.clear();
    log.info("🧹 Conversation reset");
  }

  // ── Internals ──────────────────────────────────────────

  private async offlineReply(userMessage: string): Promise<string> {
    const [fact] = await this.retrieve(userMessage, 1);
    const text = fact
      ? fillTemplate(
          pickRandom(Object.values(this.persona.offlineTemplates), this.rng),
          { fact },
        )
      : pickRandom(this.persona.fallbackLines, this.rng);
    return text + this.persona.offlineTag;
  }

  /** Index lookup that degrades to no facts on failure. */
  private async retrieve(query: string, k: number): Promise<string[]> {
    try {
      return await this.index.query(query, k);
    } catch (err) {
      log.warn({ err: errorMessage(err) }, "⚠️ Retrieval unavailable, answering without facts");
      return [];
    }
  }

  private apologise(err: unknown): string {
    const failure = classifyBackendError(err);
    log.error({ err: failure.message, kind: failure.name }, "❌ Backend call failed");

    if (failure instanceof BackendAuthError) return this.persona.apologies.auth;
    if (failure instanceof BackendQuotaError) return this.persona.apologies.quota;
    return fillTemplate(this.persona.apologies.other, { detail: failure.message });
  }
}
