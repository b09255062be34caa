import { createInterface } from "readline";
import type { ChatSession } from "./agent/chat-session.js";
import { errorMessage } from "./errors.js";
import type { Persona } from "./persona/persona.js";
import { usageTracker } from "./usage/tracker.js";

// ── Terminal Chat ────────────────────────────────────────

export type CliCommand =
  | { kind: "empty" }
  | { kind: "help" }
  | { kind: "reset" }
  | { kind: "usage" }
  | { kind: "quit" }
  | { kind: "chat"; text: string };

/** Classify one line of input. Reserved words are case-insensitive. */
export function parseCommand(line: string): CliCommand {
  const text = line.trim();
  switch (text.toLowerCase()) {
    case "":
      return { kind: "empty" };
    case "help":
    case "?":
      return { kind: "help" };
    case "reset":
      return { kind: "reset" };
    case "usage":
      return { kind: "usage" };
    case "quit":
    case "exit":
    case "bye":
      return { kind: "quit" };
    default:
      return { kind: "chat", text };
  }
}

export const HELP_TEXT = `
  Commands:
  - Type a message and press Enter to chat
  - help or ?        Show this help
  - reset            Clear the conversation
  - usage            Backend usage stats
  - quit, exit, bye  Leave

  Try:
  - Ask about the captain, his ship and his crew
  - "Calculate 25 * 4" or "what is (3 + 5) * 2"
`;

export function renderBanner(persona: Persona): string {
  const title = persona.name.toUpperCase();
  const width = Math.max(title.length, persona.surface.tagline.length + 2) + 8;
  const line = "═".repeat(width);
  const center = (text: string) => {
    const left = Math.floor((width - text.length) / 2);
    return " ".repeat(left) + text + " ".repeat(width - text.length - left);
  };
  return [
    `╔${line}╗`,
    `║${center(title)}║`,
    `║${center(`"${persona.surface.tagline}"`)}║`,
    `╚${line}╝`,
  ].join("\n");
}

export interface CliOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

/**
 * Run the read-chat-print loop until the user quits, input ends or
 * Ctrl-C. A failing line is reported and the loop carries on.
 */
export async function runCli(
  session: ChatSession,
  persona: Persona,
  opts: CliOptions = {},
): Promise<void> {
  const input = opts.input ?? process.stdin;
  const output = opts.output ?? process.stdout;
  const say = (text: string) => output.write(`${text}\n`);
  const speak = (text: string) => say(`\n🏴‍☠️ ${persona.shortName}: ${text}\n`);

  const rl = createInterface({ input, output });
  rl.on("SIGINT", () => {
    say(`\n⚓ Interrupted! ${persona.surface.signOff} ⚓`);
    rl.close();
  });

  say(renderBanner(persona));
  say(`Mode: ${session.isOffline ? "offline" : "online"}. Type 'help' for commands.`);
  speak((await session.chat("Hello!")).text);
  output.write("You: ");

  for await (const line of rl) {
    const command = parseCommand(line);
    try {
      switch (command.kind) {
        case "empty":
          break;
        case "help":
          say(HELP_TEXT);
          break;
        case "reset":
          session.resetConversation();
          say(`\n✓ ${persona.surface.resetNotice}\n`);
          break;
        case "usage":
          say(`\n${usageTracker.getSummary()}\n`);
          break;
        case "quit":
          speak((await session.chat("Goodbye!")).text);
          say(`⚓ ${persona.surface.signOff} ⚓\n`);
          rl.close();
          return;
        case "chat":
          speak((await session.chat(command.text)).text);
          break;
      }
    } catch (err) {
      say(`\n❌ Error: ${errorMessage(err)}\n`);
    }
    output.write("You: ");
  }
}
