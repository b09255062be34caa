// ── Persona: everything the character says ─────────────

export interface Persona {
  /** Full name, used in the banner and logs. */
  name: string;
  /** Label for assistant turns in transcripts ("<shortName>: ..."). */
  shortName: string;
  /** System instruction sent with every backend call. */
  systemInstruction: string;
  /** Offline replies that quote a retrieved fact, keyed by template id. `{fact}` placeholder. */
  offlineTemplates: Record<string, string>;
  /** Offline replies when nothing was retrieved. */
  fallbackLines: string[];
  /** Appended to every offline reply. */
  offlineTag: string;
  calculation: {
    /** `{value}` placeholder. */
    success: string;
    /** `{error}` placeholder. */
    failure: string;
  };
  apologies: {
    auth: string;
    quota: string;
    /** `{detail}` placeholder. */
    other: string;
  };
  /** Presentation lines for the interactive surfaces. */
  surface: {
    tagline: string;
    resetNotice: string;
    signOff: string;
  };
}

/** Replace `{key}` placeholders. Unknown keys are left untouched. */
export function fillTemplate(
  template: string,
  vars: Record<string, string | number>,
): string {
  return template.replace(/\{(\w+)\}/g, (whole, key: string) => {
    const value = vars[key];
    return value === undefined ? whole : String(value);
  });
}

/** Uniform choice from a non-empty list, driven by `rng` in [0, 1). */
export function pickRandom<T>(items: readonly T[], rng: () => number): T {
  if (items.length === 0) {
    throw new Error("pickRandom called with an empty list");
  }
  const index = Math.min(Math.floor(rng() * items.length), items.length - 1);
  const item = items[index];
  if (item === undefined) {
    throw new Error(`pickRandom index ${index} out of range`);
  }
  return item;
}

/**
 * Deterministic PRNG (mulberry32) for reproducible offline replies.
 * Returns floats in [0, 1).
 */
export function createSeededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
