import type { RuleName } from "../routing/config.js";
import type { RoutingDecision } from "../routing/router.js";

// ── Usage Tracking ───────────────────────────────────────
// LLM token usage, cost estimate and latency per call, plus context-routing
// savings per turn. In-memory; resets on restart. Exposed via /usage.

export type LlmStage = "classifier" | "responder";

export interface LlmCallEntry {
  timestamp: number;
  stage: LlmStage;
  model: string;
  inputTokens: number;
  outputTokens: number;
  latencyMs: number;
  costEstimate: number; // USD estimate
}

// Rough USD pricing per 1M tokens (OpenRouter, input/output)
const PRICING: Record<string, { input: number; output: number }> = {
  "google/gemini-2.5-flash-lite": { input: 0.1, output: 0.4 },
  "anthropic/claude-3-haiku": { input: 0.25, output: 1.25 },
  "openai/gpt-4o-mini": { input: 0.15, output: 0.6 },
  "openai/gpt-4o": { input: 2.5, output: 10 },
};

const DEFAULT_PRICING = { input: 0.1, output: 0.4 };

export function estimateCost(
  model: string,
  inputTokens: number,
  outputTokens: number,
): number {
  const pricing = PRICING[model] ?? DEFAULT_PRICING;
  return (
    (inputTokens / 1_000_000) * pricing.input +
    (outputTokens / 1_000_000) * pricing.output
  );
}

export class UsageTracker {
  private readonly calls: LlmCallEntry[] = [];
  private readonly routes = new Map<RuleName, number>();
  private turns = 0;
  private contextTokens = 0;
  private contextTokensSaved = 0;
  private readonly startTime: number;
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
    this.startTime = now();
  }

  logCall(
    stage: LlmStage,
    model: string,
    inputTokens: number,
    outputTokens: number,
    latencyMs: number,
  ): LlmCallEntry {
    const entry: LlmCallEntry = {
      timestamp: this.now(),
      stage,
      model,
      inputTokens,
      outputTokens,
      latencyMs,
      costEstimate: estimateCost(model, inputTokens, outputTokens),
    };
    this.calls.push(entry);
    return entry;
  }

  logRouting(decision: RoutingDecision): void {
    this.turns++;
    this.contextTokens += decision.totalTokens;
    this.contextTokensSaved += decision.tokensSaved;
    this.routes.set(decision.rule, (this.routes.get(decision.rule) ?? 0) + 1);
  }

  /** Share of full-context tokens avoided across all turns, in [0, 1]. */
  overallSavings(): number {
    const full = this.contextTokens + this.contextTokensSaved;
    return full > 0 ? this.contextTokensSaved / full : 0;
  }

  getTurnCount(): number {
    return this.turns;
  }

  getCallCount(): number {
    return this.calls.length;
  }

  /** Summary stats for the /usage command. */
  getSummary(): string {
    if (this.turns === 0 && this.calls.length === 0) {
      return "📊 No usage data yet. Send a message first!";
    }

    const totalIn = this.calls.reduce((s, e) => s + e.inputTokens, 0);
    const totalOut = this.calls.reduce((s, e) => s + e.outputTokens, 0);
    const totalCost = this.calls.reduce((s, e) => s + e.costEstimate, 0);
    const avgLatency =
      this.calls.length > 0
        ? this.calls.reduce((s, e) => s + e.latencyMs, 0) / this.calls.length
        : 0;
    const routeLine = [...this.routes.entries()]
      .map(([rule, n]) => `${rule} ${n}`)
      .join(", ");

    return [
      "📊 *Usage Stats*",
      "────────────────────",
      `⏱ Uptime: ${this.getUptime()}`,
      `💬 Turns: ${this.turns}`,
      `📞 LLM calls: ${this.calls.length}`,
      `📥 Input tokens: ${totalIn}`,
      `📤 Output tokens: ${totalOut}`,
      `⚡ Avg latency: ${Math.round(avgLatency)}ms`,
      `💰 Est. cost: $${totalCost.toFixed(6)}`,
      `🧭 Routes: ${routeLine || "none"}`,
      `✂️ Context tokens saved: ${this.contextTokensSaved} (${(this.overallSavings() * 100).toFixed(1)}%)`,
    ].join("\n");
  }

  getUptime(): string {
    const secs = Math.floor((this.now() - this.startTime) / 1000);
    const mins = Math.floor(secs / 60);
    const hours = Math.floor(mins / 60);

    if (hours > 0) return `${hours}h ${mins % 60}m`;
    if (mins > 0) return `${mins}m ${secs % 60}s`;
    return `${secs}s`;
  }
}
