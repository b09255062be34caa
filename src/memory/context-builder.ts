import type { PromptContext } from "./types.js";

// ── Context Builder: assemble the backend prompt ────────

/**
 * Render retrieved facts, the recent transcript and the current message as
 * one prompt. Sections are separated by a blank line; empty sections are
 * left out.
 */
export function buildContextPrompt(ctx: PromptContext): string {
  const parts: string[] = [];

  if (ctx.facts.length > 0) {
    const factLines = ctx.facts.map((fact, i) => `${i + 1}. ${fact}`);
    parts.push(["Relevant facts from your memory:", ...factLines].join("\n"));
  }

  if (ctx.recentConversation) {
    parts.push(`Recent conversation:\n${ctx.recentConversation}`);
  }

  parts.push(`Current user message: ${ctx.userMessage}`);

  return parts.join("\n\n");
}
