import { Readable, Writable } from "stream";
import { describe, it, expect } from "vitest";
import { ChatSession } from "../src/agent/chat-session.js";
import { HELP_TEXT, parseCommand, renderBanner, runCli } from "../src/cli.js";
import { RetrievalIndex } from "../src/memory/vector-index.js";
import { captain } from "../src/persona/captain.js";
import { KeywordEmbedder } from "./fakes.js";

describe("parseCommand", () => {
  it.each([
    ["", { kind: "empty" }],
    ["   ", { kind: "empty" }],
    ["help", { kind: "help" }],
    ["?", { kind: "help" }],
    ["RESET", { kind: "reset" }],
    ["usage", { kind: "usage" }],
    ["quit", { kind: "quit" }],
    ["Exit", { kind: "quit" }],
    [" bye ", { kind: "quit" }],
    ["  calculate 2 + 2 ", { kind: "chat", text: "calculate 2 + 2" }],
    ["help me find the rum", { kind: "chat", text: "help me find the rum" }],
  ])("classifies %j", (line, expected) => {
    expect(parseCommand(line)).toEqual(expected);
  });
});

describe("renderBanner", () => {
  it("frames the name and tagline in a box of equal-width lines", () => {
    const lines = renderBanner(captain).split("\n");
    expect(lines).toHaveLength(4);
    expect(lines[1]).toContain("CAPTAIN ELIAS THORNE");
    expect(lines[2]).toContain('"Not all treasure is silver and gold"');
    const widths = new Set(lines.map((l) => l.length));
    expect(widths.size).toBe(1);
  });
});

function collect(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, text: () => chunks.join("") };
}

describe("runCli", () => {
  it("greets, answers, handles commands and signs off", async () => {
    const session = new ChatSession({
      persona: captain,
      index: new RetrievalIndex(new KeywordEmbedder([])),
      rng: () => 0,
    });
    const out = collect();

    await runCli(session, captain, {
      input: Readable.from(["what is 2 + 2\n", "help\n", "usage\n", "reset\n", "quit\n"]),
      output: out.stream,
    });

    const lines = out.text().split("\n");
    expect(lines).toContain("Mode: offline. Type 'help' for commands.");
    expect(lines).toContain("🏴‍☠️ Thorne: Arr! I be Captain Elias Thorne! [Offline Mode]");
    expect(lines).toContain("🏴‍☠️ Thorne: By me calculations, that be **4**, savvy?");
    expect(out.text()).toContain(HELP_TEXT);
    expect(lines).toContain("📊 No usage data yet. Send a message first!");
    expect(lines).toContain("✓ Logbook wiped clean. Starting fresh, savvy?");
    expect(lines).toContain("⚓ Fair winds and following seas! ⚓");
    expect(session.memory.length).toBe(2);
  });

  it("returns when input ends without quitting", async () => {
    const session = new ChatSession({
      persona: captain,
      index: new RetrievalIndex(new KeywordEmbedder([])),
      rng: () => 0,
    });
    const out = collect();

    await runCli(session, captain, { input: Readable.from([]), output: out.stream });

    expect(session.memory.length).toBe(2);
    expect(out.text()).not.toContain("Fair winds");
  });

  it("prints command output on its own line, after the prompt", async () => {
    const session = new ChatSession({
      persona: captain,
      index: new RetrievalIndex(new KeywordEmbedder([])),
      rng: () => 0,
    });
    const out = collect();

    await runCli(session, captain, {
      input: Readable.from(["usage\n", "reset\n"]),
      output: out.stream,
    });

    const lines = out.text().split("\n");
    const usage = lines.indexOf("📊 No usage data yet. Send a message first!");
    const reset = lines.indexOf("✓ Logbook wiped clean. Starting fresh, savvy?");
    expect(lines[usage - 1]).toBe("You: ");
    expect(lines[reset - 1]).toBe("You: ");
  });
});
