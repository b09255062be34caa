import { existsSync, readFileSync } from "fs";
import { log } from "../logger.js";

// ── Knowledge Base: one fact per line ───────────────────

/**
 * Read facts from a plain-text file: one per line, trimmed, blank lines
 * skipped. A missing or unreadable file is not fatal: a warning is logged
 * and no facts are returned.
 */
export function loadKnowledgeBase(path: string): string[] {
  if (!existsSync(path)) {
    log.warn({ path }, "⚠️ Knowledge base not found, continuing with an empty index");
    return [];
  }

  try {
    const facts = readFileSync(path, "utf-8")
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
    log.info({ path, count: facts.length }, "📖 Knowledge base read");
    return facts;
  } catch (err) {
    log.warn({ err, path }, "⚠️ Failed to read knowledge base, continuing with an empty index");
    return [];
  }
}
