// ── Memory Module: Shared Types ─────────────────────────

export type Role = "user" | "assistant";

export interface Message {
  readonly role: Role;
  readonly content: string;
  readonly timestamp: number; // Unix ms
}

/** Inputs for the prompt sent to the chat backend. */
export interface PromptContext {
  /** Retrieved knowledge-base facts, best match first */
  facts: string[];
  /** Rendered transcript, omitted when there is no complete turn yet */
  recentConversation?: string;
  /** The message being answered */
  userMessage: string;
}

export interface KnowledgeDocument {
  readonly id: string;
  readonly text: string;
  readonly embedding: readonly number[];
}
