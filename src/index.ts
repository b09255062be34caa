#!/usr/bin/env node
import { ChatSession } from "./agent/chat-session.js";
import { SessionStore } from "./agent/sessions.js";
import { createBot } from "./bot.js";
import { runCli } from "./cli.js";
import { config, requireAllowedUserIds, requireEnv } from "./config.js";
import { log } from "./logger.js";
import { createRuntime } from "./runtime.js";

// ── Main ─────────────────────────────────────────────────

async function startTelegram(): Promise<void> {
  const token = requireEnv("TELEGRAM_BOT_TOKEN");
  const allowedUserIds = requireAllowedUserIds();
  const runtime = await createRuntime();
  const sessions = new SessionStore<number>(
    runtime.sessionOptions,
    config.telegramMaxSessions,
  );
  const bot = createBot({
    token,
    persona: runtime.persona,
    sessions,
    allowedUserIds,
  });

  const shutdown = async () => {
    log.info({ sessions: sessions.size }, "👋 Shutting down...");
    await bot.stop();
    process.exit(0);
  };
  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());

  log.info("🚀 Starting Telegram long-polling...");
  await bot.start({
    onStart: () => {
      log.info("✅ Bot is online. Waiting for messages...");
    },
  });
}

async function startCli(): Promise<void> {
  const runtime = await createRuntime();
  const session = new ChatSession(runtime.sessionOptions);
  process.on("SIGTERM", () => process.exit(0));
  await runCli(session, runtime.persona);
}

async function main() {
  if (process.argv.includes("--telegram")) {
    await startTelegram();
  } else {
    await startCli();
  }
}

main().catch((error) => {
  log.fatal(error, "💀 Fatal error");
  process.exit(1);
});
