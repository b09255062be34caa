import type { Context } from "grammy";

// ── Typing Indicator ─────────────────────────────────────

/** Telegram's per-message text limit. */
export const TELEGRAM_MAX_LENGTH = 4096;

/**
 * Keeps Telegram's "typing…" bubble visible while a reply is produced,
 * then sends the reply, split into chunks if it is too long.
 */
export class TypingIndicator {
  private intervalId: ReturnType<typeof setInterval> | null = null;

  /** Send the typing action now and every 4 seconds (Telegram clears it after ~5s). */
  async start(ctx: Context): Promise<void> {
    await ctx.replyWithChatAction("typing").catch(() => undefined);
    this.intervalId = setInterval(() => {
      ctx.replyWithChatAction("typing").catch(() => undefined);
    }, 4000);
  }

  /** Stop the indicator and send `text`, Markdown first, plain on failure. */
  async stop(ctx: Context, text: string): Promise<void> {
    this.clear();
    for (const chunk of splitMessage(text, TELEGRAM_MAX_LENGTH)) {
      await ctx
        .reply(chunk, { parse_mode: "Markdown" })
        .catch(() => ctx.reply(chunk));
    }
  }

  private clear(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
  }
}

// ── Helper ───────────────────────────────────────────────

/**
 * Split `text` into chunks of at most `maxLength`, preferring a newline,
 * then a space, in the second half of each chunk. Leading whitespace of
 * the next chunk is dropped.
 */
export function splitMessage(text: string, maxLength: number): string[] {
  if (text.length <= maxLength) return [text];

  const chunks: string[] = [];
  let remaining = text;

  while (remaining.length > maxLength) {
    let splitAt = remaining.lastIndexOf("\n", maxLength);
    if (splitAt < maxLength / 2) {
      splitAt = remaining.lastIndexOf(" ", maxLength);
    }
    if (splitAt < maxLength / 2) {
      splitAt = maxLength;
    }

    chunks.push(remaining.substring(0, splitAt));
    remaining = remaining.substring(splitAt).trimStart();
  }

  if (remaining.length > 0) chunks.push(remaining);
  return chunks;
}
