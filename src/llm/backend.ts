import OpenAI from "openai";
import type { ChatCompletion } from "openai/resources/chat/completions.js";
import { BackendOtherError } from "../errors.js";
import { log } from "../logger.js";
import { usageTracker, type UsageTracker } from "../usage/tracker.js";
import { classifyBackendError } from "./errors.js";

// ── Chat Backend ─────────────────────────────────────────

/** A persona-capable language model. */
export interface ChatBackend {
  /** Model identifier, for logs and usage stats. */
  readonly model: string;
  /**
   * Generate a reply to `prompt` under `systemInstruction`.
   * Rejects with BackendAuthError, BackendQuotaError or BackendOtherError.
   */
  generate(prompt: string, systemInstruction: string): Promise<string>;
}

export interface OpenAIBackendOptions {
  apiKey: string;
  model: string;
  /** OpenAI-compatible endpoint; OpenRouter by default. */
  baseURL?: string;
  temperature?: number;
  timeoutMs?: number;
  usage?: UsageTracker;
}

/**
 * Any OpenAI-compatible chat completions endpoint (OpenRouter, OpenAI,
 * Gemini's compatibility layer, a local server). The SDK's own retries
 * are disabled.
 */
export class OpenAIBackend implements ChatBackend {
  readonly model: string;
  private readonly client: OpenAI;
  private readonly temperature: number;
  private readonly usage: UsageTracker;

  constructor(opts: OpenAIBackendOptions) {
    this.model = opts.model;
    this.temperature = opts.temperature ?? 0.8;
    this.usage = opts.usage ?? usageTracker;
    this.client = new OpenAI({
      baseURL: opts.baseURL ?? "https://openrouter.ai/api/v1",
      apiKey: opts.apiKey,
      timeout: opts.timeoutMs ?? 30_000,
      maxRetries: 0,
      defaultHeaders: {
        "X-Title": "Parley",
      },
    });
  }

  async generate(prompt: string, systemInstruction: string): Promise<string> {
    const startTime = Date.now();
    let response: ChatCompletion;
    try {
      response = await this.client.chat.completions.create({
        model: this.model,
        temperature: this.temperature,
        messages: [
          { role: "system", content: systemInstruction },
          { role: "user", content: prompt },
        ],
      });
    } catch (err) {
      this.usage.recordFailure();
      throw classifyBackendError(err);
    }

    const entry = this.usage.record(
      this.model,
      response.usage?.prompt_tokens ?? 0,
      response.usage?.completion_tokens ?? 0,
      Date.now() - startTime,
    );
    log.debug({ ...entry }, "🤖 Backend call complete");

    const text = response.choices[0]?.message?.content?.trim();
    if (!text) {
      throw new BackendOtherError("the model returned an empty response");
    }
    return text;
  }
}
