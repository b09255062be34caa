// ── Usage Tracking ───────────────────────────────────────
// Every backend call: model, tokens, latency. In-memory, resets on
// restart. Shown by the `usage` command on both surfaces.

export interface UsageEntry {
  timestamp: Date;
  model: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  latencyMs: number;
}

export class UsageTracker {
  private entries: UsageEntry[] = [];
  private failures = 0;
  private readonly startTime: Date;

  constructor(private readonly now: () => Date = () => new Date()) {
    this.startTime = now();
  }

  record(
    model: string,
    inputTokens: number,
    outputTokens: number,
    latencyMs: number,
  ): UsageEntry {
    const entry: UsageEntry = {
      timestamp: this.now(),
      model,
      inputTokens,
      outputTokens,
      totalTokens: inputTokens + outputTokens,
      latencyMs,
    };
    this.entries.push(entry);
    return entry;
  }

  recordFailure(): void {
    this.failures++;
  }

  getCallCount(): number {
    return this.entries.length;
  }

  getFailureCount(): number {
    return this.failures;
  }

  /** Plain-text stats block. */
  getSummary(): string {
    const last = this.entries[this.entries.length - 1];
    if (!last) {
      return this.failures > 0
        ? `📊 No successful backend calls yet (${this.failures} failed).`
        : "📊 No usage data yet. Send a message first!";
    }

    const totalCalls = this.entries.length;
    const totalInput = this.entries.reduce((s, e) => s + e.inputTokens, 0);
    const totalOutput = this.entries.reduce((s, e) => s + e.outputTokens, 0);
    const avgLatency =
      this.entries.reduce((s, e) => s + e.latencyMs, 0) / totalCalls;

    return [
      "📊 Usage Stats",
      "────────────────────",
      `⏱ Uptime: ${this.getUptime()}`,
      `🤖 Model: ${last.model}`,
      `📞 Calls: ${totalCalls} ok, ${this.failures} failed`,
      `📥 Input tokens: ${totalInput}`,
      `📤 Output tokens: ${totalOutput}`,
      `⚡ Avg latency: ${Math.round(avgLatency)}ms`,
    ].join("\n");
  }

  getUptime(): string {
    const ms = this.now().getTime() - this.startTime.getTime();
    const secs = Math.floor(ms / 1000);
    const mins = Math.floor(secs / 60);
    const hours = Math.floor(mins / 60);

    if (hours > 0) return `${hours}h ${mins % 60}m`;
    if (mins > 0) return `${mins}m ${secs % 60}s`;
    return `${secs}s`;
  }
}

// Singleton
export const usageTracker = new UsageTracker();
