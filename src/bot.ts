import { Bot } from "grammy";
import type { SessionStore } from "./agent/sessions.js";
import { TypingIndicator } from "./bot/typing.js";
import { errorMessage } from "./errors.js";
import { log } from "./logger.js";
import type { Persona } from "./persona/persona.js";
import { usageTracker } from "./usage/tracker.js";

// ── Bot Factory ──────────────────────────────────────────

export interface BotOptions {
  token: string;
  persona: Persona;
  /** One session per Telegram chat id. */
  sessions: SessionStore<number>;
  /** Must not be empty. */
  allowedUserIds: readonly number[];
}

/** Whether a Telegram user may talk to the bot. Unknown senders never may. */
export function isAllowedUser(
  userId: number | undefined,
  allowedUserIds: readonly number[],
): boolean {
  return userId !== undefined && allowedUserIds.includes(userId);
}

export function createBot(opts: BotOptions): Bot {
  const { persona, sessions, allowedUserIds } = opts;
  if (allowedUserIds.length === 0) {
    throw new Error("createBot needs at least one allowed Telegram user ID");
  }
  const bot = new Bot(opts.token);

  // ── Security: user ID allow-list ─────────────────────
  bot.use(async (ctx, next) => {
    const userId = ctx.from?.id;
    if (!isAllowedUser(userId, allowedUserIds)) {
      log.debug({ userId }, "🚫 Ignoring message from user not on the allow-list");
      return;
    }
    await next();
  });

  // ── /start ──────────────────────────────────────────
  bot.command("start", async (ctx) => {
    const session = sessions.get(ctx.chat.id);
    const greeting = await session.chat("Hello!");
    await ctx.reply(
      `🏴‍☠️ ${persona.name}\n"${persona.surface.tagline}"\n\n${greeting.text}\n\nType /help for commands.`,
    );
  });

  // ── /help ───────────────────────────────────────────
  bot.command("help", async (ctx) => {
    await ctx.reply(
      "🏴‍☠️ Commands\n" +
        "────────────────────\n" +
        "/start — Say hello\n" +
        "/reset — Clear the conversation\n" +
        "/usage — Backend usage stats\n" +
        "/help — This message\n\n" +
        'Ask about the captain and his ship, or "calculate 25 * 4".',
    );
  });

  // ── /reset ──────────────────────────────────────────
  bot.command("reset", async (ctx) => {
    sessions.reset(ctx.chat.id);
    await ctx.reply(`✓ ${persona.surface.resetNotice}`);
  });

  // ── /usage ──────────────────────────────────────────
  bot.command("usage", async (ctx) => {
    await ctx.reply(usageTracker.getSummary());
  });

  // ── Text messages → chat session ─────────────────────
  bot.on("message:text", async (ctx) => {
    const typing = new TypingIndicator();
    await typing.start(ctx);

    let text: string;
    try {
      const reply = await sessions.get(ctx.chat.id).chat(ctx.message.text);
      log.info(
        { chatId: ctx.chat.id, source: reply.source, latencyMs: reply.latencyMs },
        "📨 Reply sent",
      );
      text = reply.text;
    } catch (err) {
      log.error({ err: errorMessage(err), chatId: ctx.chat.id }, "❌ Chat turn failed");
      text = "⚠️ Something went wrong. Check the logs.";
    }
    await typing.stop(ctx, text);
  });

  bot.catch((err) => {
    log.error({ err: errorMessage(err.error), update: err.ctx.update.update_id }, "❌ Bot error");
  });

  return bot;
}
