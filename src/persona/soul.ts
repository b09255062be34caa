import { readFileSync } from "fs";
import { join } from "path";
import { log } from "../logger.js";
import type { Persona } from "./persona.js";

// ── soul.md: optional system instruction override ──────

const SOUL_PATH = join(process.cwd(), "soul.md");

/**
 * Return `persona` with its system instruction replaced by the contents of
 * `soul.md`, when that file exists and is non-empty.
 */
export function withSoul(persona: Persona, path: string = SOUL_PATH): Persona {
  let soul = "";
  try {
    soul = readFileSync(path, "utf-8").trim();
  } catch {
    log.info({ path }, "🧬 No soul.md found, using the built-in persona");
    return persona;
  }

  if (!soul) {
    log.warn({ path }, "⚠️ soul.md is empty, using the built-in persona");
    return persona;
  }

  log.info({ path }, "🧬 Soul loaded from soul.md");
  return { ...persona, systemInstruction: soul };
}
