import type { Message, Role } from "./types.js";

// ── Conversation Memory: sliding window of turns ────────

export const EMPTY_CONVERSATION = "No previous conversation.";

export interface ConversationMemoryOptions {
  /** Turns to keep; each turn is a user + assistant message. Default 10. */
  maxTurns?: number;
  /** Label for assistant lines in `contextString()`. Default "Assistant". */
  assistantLabel?: string;
  /** Clock, replaceable in tests. */
  now?: () => number;
}

/**
 * Holds the last `2 × maxTurns` messages of one conversation, oldest
 * evicted first. Owned by a single session; never share an instance.
 */
export class ConversationMemory {
  readonly maxTurns: number;
  private readonly assistantLabel: string;
  private readonly now: () => number;
  private history: Message[] = [];

  constructor(opts: ConversationMemoryOptions = {}) {
    const maxTurns = opts.maxTurns ?? 10;
    if (!Number.isInteger(maxTurns) || maxTurns < 1) {
      throw new RangeError(`maxTurns must be a positive integer (got ${maxTurns})`);
    }
    this.maxTurns = maxTurns;
    this.assistantLabel = opts.assistantLabel ?? "Assistant";
    this.now = opts.now ?? Date.now;
  }

  get capacity(): number {
    return this.maxTurns * 2;
  }

  get length(): number {
    return this.history.length;
  }

  append(role: Role, content: string): void {
    this.history.push(Object.freeze({ role, content, timestamp: this.now() }));
    if (this.history.length > this.capacity) {
      this.history.splice(0, this.history.length - this.capacity);
    }
  }

  /** Number of complete user/assistant pairs. */
  turnCount(): number {
    return Math.floor(this.history.length / 2);
  }

  /** Chronological copy of the retained messages. */
  messages(): readonly Message[] {
    return [...this.history];
  }

  /** `"User: …"` / `"<label>: …"` lines, or a placeholder when empty. */
  contextString(): string {
    if (this.history.length === 0) return EMPTY_CONVERSATION;
    return this.history
      .map((m) => {
        const label = m.role === "user" ? "User" : this.assistantLabel;
        return `${label}: ${m.content}`;
      })
      .join("\n");
  }

  clear(): void {
    this.history = [];
  }
}
