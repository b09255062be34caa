import { ChatSession, type ChatSessionOptions } from "./chat-session.js";

// ── Session Store: one ChatSession per chat ─────────────

/**
 * Lazily creates a ChatSession per conversation key. Sessions share the
 * retrieval index and backend from `defaults`; each gets its own memory.
 * Holds at most `maxSessions`; the least recently used one is dropped
 * first.
 */
export class SessionStore<K = string> {
  private readonly sessions = new Map<K, ChatSession>();

  constructor(
    private readonly defaults: ChatSessionOptions,
    private readonly maxSessions: number = 1000,
  ) {
    if (!Number.isInteger(maxSessions) || maxSessions < 1) {
      throw new RangeError(`maxSessions must be a positive integer (got ${maxSessions})`);
    }
  }

  get(key: K): ChatSession {
    let session = this.sessions.get(key);
    if (session) {
      // Map keeps insertion order: re-inserting marks it most recent.
      this.sessions.delete(key);
    } else {
      session = new ChatSession(this.defaults);
      this.evictOldest();
    }
    this.sessions.set(key, session);
    return session;
  }

  /** Clear a session's memory. No-op for unknown keys. */
  reset(key: K): void {
    this.sessions.get(key)?.resetConversation();
  }

  get size(): number {
    return this.sessions.size;
  }

  private evictOldest(): void {
    while (this.sessions.size >= this.maxSessions) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) return;
      this.sessions.delete(oldest.value);
    }
  }
}
