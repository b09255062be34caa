import { describe, it, expect } from "vitest";
import { ChatSession, type ChatSessionOptions } from "../src/agent/chat-session.js";
import { RetrievalIndex } from "../src/memory/vector-index.js";
import { captain } from "../src/persona/captain.js";
import { createSeededRandom } from "../src/persona/persona.js";
import { FailingEmbedder, FakeBackend, KeywordEmbedder, httpError } from "./fakes.js";

const SHIP = "The Gull is a fast ship.";
const RUM = "Thorne loves rum.";
const SPYGLASS = "The spyglass is brass.";

async function loadedIndex(): Promise<RetrievalIndex> {
  const index = new RetrievalIndex(new KeywordEmbedder(["ship", "rum", "spyglass"]));
  await index.load([SHIP, RUM, SPYGLASS]);
  return index;
}

async function session(overrides: Partial<ChatSessionOptions> = {}): Promise<ChatSession> {
  return new ChatSession({
    persona: captain,
    index: await loadedIndex(),
    rng: () => 0,
    ...overrides,
  });
}

const TAG = " [Offline Mode]";

describe("ChatSession", () => {
  // ── Calculator ─────────────────────────────────────────

  it("answers arithmetic without retrieval or backend", async () => {
    const backend = new FakeBackend();
    const s = await session({ backend });

    const reply = await s.chat("Can you calculate 25 * 4 for me?");

    expect(reply.text).toBe("By me calculations, that be **100**, savvy?");
    expect(reply.source).toBe("calculator");
    expect(backend.calls).toEqual([]);
    expect(s.memory.messages().map((m) => [m.role, m.content])).toEqual([
      ["user", "Can you calculate 25 * 4 for me?"],
      ["assistant", "By me calculations, that be **100**, savvy?"],
    ]);
  });

  it("formats a failed calculation in character", async () => {
    const s = await session();
    const reply = await s.chat("calculate 10 / 0");
    expect(reply.text).toBe("Arr, there be a problem with yer sum: division by zero");
    expect(reply.source).toBe("calculator");
  });

  // ── Offline mode ───────────────────────────────────────

  it("quotes the best fact through a template when offline", async () => {
    const s = await session();
    expect(s.isOffline).toBe(true);

    const reply = await s.chat("Tell me about your ship");

    expect(reply.text).toBe(`Arr, me spyglass spies this fact: ${SHIP}${TAG}`);
    expect(reply.source).toBe("offline");
    expect(s.memory.messages()[1]?.content).toBe(reply.text);
  });

  it("picks the template with the injected random source", async () => {
    const s = await session({ rng: () => 0.99 });
    const reply = await s.chat("any rum aboard?");
    expect(reply.text).toBe(`Aye, that reminds me. ${RUM}${TAG}`);
  });

  it("tags every offline reply", async () => {
    const s = await session({ rng: Math.random });
    for (const message of ["hello", "your ship?", "rum!", "spyglass", "bye"]) {
      const reply = await s.chat(message);
      expect(reply.text.endsWith(TAG)).toBe(true);
      expect(reply.source).toBe("offline");
    }
  });

  it("uses the generic fallback lines when the index is empty", async () => {
    const s = await session({
      index: new RetrievalIndex(new KeywordEmbedder(["ship"])),
      rng: Math.random,
    });
    for (const message of ["Tell me about your ship", "Who are you?", "Hello!"]) {
      const reply = await s.chat(message);
      expect(captain.fallbackLines).toContain(reply.text.slice(0, -TAG.length));
    }
  });

  it("repeats the same offline replies for the same seed", async () => {
    const messages = ["ship", "rum", "spyglass", "ship again"];
    const run = async () => {
      const s = await session({ rng: createSeededRandom(1234) });
      const texts: string[] = [];
      for (const m of messages) texts.push((await s.chat(m)).text);
      return texts;
    };
    expect(await run()).toEqual(await run());
  });

  it("falls back to a generic line when retrieval fails offline", async () => {
    const index = new RetrievalIndex(new FailingEmbedder());
    await index.load(["something"]);
    const s = await session({ index });

    const reply = await s.chat("Tell me about your ship");
    expect(reply.text).toBe(`Arr! I be Captain Elias Thorne!${TAG}`);
  });

  // ── Online mode ────────────────────────────────────────

  it("sends facts and the message to the backend with the persona instruction", async () => {
    const backend = new FakeBackend();
    const s = await session({ backend });

    const reply = await s.chat("Tell me about your ship");

    expect(reply).toMatchObject({ text: "Ahoy from the backend", source: "backend" });
    expect(backend.calls).toEqual([
      {
        prompt:
          "Relevant facts from your memory:\n" +
          `1. ${SHIP}\n` +
          `2. ${RUM}\n\n` +
          "Current user message: Tell me about your ship",
        systemInstruction: captain.systemInstruction,
      },
    ]);
    expect(s.memory.length).toBe(2);
  });

  it("includes the recent conversation once a turn is complete", async () => {
    const backend = new FakeBackend();
    const s = await session({ backend });

    await s.chat("Tell me about your ship");
    await s.chat("and the rum?");

    expect(backend.calls[1]?.prompt).toBe(
      "Relevant facts from your memory:\n" +
        `1. ${RUM}\n` +
        `2. ${SHIP}\n\n` +
        "Recent conversation:\n" +
        "User: Tell me about your ship\n" +
        "Thorne: Ahoy from the backend\n" +
        "User: and the rum?\n\n" +
        "Current user message: and the rum?",
    );
  });

  it("honours topK", async () => {
    const backend = new FakeBackend();
    const s = await session({ backend, topK: 1 });
    await s.chat("Tell me about your ship");
    expect(backend.calls[0]?.prompt).toBe(
      `Relevant facts from your memory:\n1. ${SHIP}\n\nCurrent user message: Tell me about your ship`,
    );
  });

  it("still calls the backend when retrieval fails", async () => {
    const index = new RetrievalIndex(new FailingEmbedder());
    await index.load(["something"]);
    const backend = new FakeBackend();
    const s = await session({ index, backend });

    const reply = await s.chat("hello there");

    expect(reply.source).toBe("backend");
    expect(backend.calls[0]?.prompt).toBe("Current user message: hello there");
  });

  // ── Backend failures ───────────────────────────────────

  it("apologises for authentication failures without storing the apology", async () => {
    const backend = new FakeBackend(async () => {
      throw httpError(401, "401 Incorrect API key provided");
    });
    const s = await session({ backend });

    const reply = await s.chat("Who are you?");

    expect(reply).toMatchObject({ text: captain.apologies.auth, source: "apology" });
    expect(s.memory.messages().map((m) => m.role)).toEqual(["user"]);
  });

  it("apologises for quota failures", async () => {
    const backend = new FakeBackend(async () => {
      throw httpError(429, "429 Too Many Requests");
    });
    const s = await session({ backend });
    expect((await s.chat("Who are you?")).text).toBe(captain.apologies.quota);
  });

  it("apologises for anything else with the detail", async () => {
    const backend = new FakeBackend(async () => {
      throw new Error("socket hang up");
    });
    const s = await session({ backend });
    expect((await s.chat("Who are you?")).text).toBe(
      "Curse the black spot! Something went wrong: socket hang up",
    );
  });

  it("treats a slow backend as an other failure", async () => {
    const backend = new FakeBackend(() => new Promise<string>(() => undefined));
    const s = await session({ backend, backendTimeoutMs: 20 });
    expect((await s.chat("Who are you?")).text).toBe(
      "Curse the black spot! Something went wrong: Backend (fake-model) timed out after 0.02s",
    );
  });

  it("keeps working after a failed turn", async () => {
    let fail = true;
    const backend = new FakeBackend(async () => {
      if (fail) {
        fail = false;
        throw new Error("boom");
      }
      return "Back on course";
    });
    const s = await session({ backend });

    expect((await s.chat("one")).source).toBe("apology");
    expect((await s.chat("two")).text).toBe("Back on course");
  });

  // ── Reset ──────────────────────────────────────────────

  it("resets idempotently", async () => {
    const s = await session();
    await s.chat("Hello!");
    s.resetConversation();
    expect(s.memory.length).toBe(0);
    s.resetConversation();
    expect(s.memory.length).toBe(0);
  });
});
