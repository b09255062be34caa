/** Which path produced a reply. */
export type ReplySource = "calculator" | "backend" | "offline" | "apology";

export interface ChatReply {
  /** The text shown to the user. */
  text: string;
  source: ReplySource;
  /** Total latency in milliseconds. */
  latencyMs: number;
}
