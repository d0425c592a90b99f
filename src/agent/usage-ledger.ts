/**
 * Usage Ledger - running token and cost counters for one session
 */

import type { ModelPrice, ProviderConfig, TokenUsage, UsageSnapshot } from "./types.js";

/**
 * Built-in list prices, USD per million tokens
 */
export const DEFAULT_PRICING: Record<string, ModelPrice> = {
  "gemini-2.0-flash": { input: 0.1, output: 0.4 },
  "gemini-1.5-flash": { input: 0.075, output: 0.3 },
  "gemini-1.5-pro": { input: 1.25, output: 5.0 },
  "gpt-4o": { input: 2.5, output: 10.0 },
  "gpt-4o-mini": { input: 0.15, output: 0.6 },
  "claude-3-5-sonnet": { input: 3.0, output: 15.0 },
  "llama-3.3-70b-versatile": { input: 0.59, output: 0.79 },
};

export const DEFAULT_FALLBACK_PRICE: ModelPrice = { input: 0.5, output: 1.5 };

export type PriceSource = "provider" | "builtin" | "fallback" | "local";

export function resolvePrice(
  provider: Pick<ProviderConfig, "type" | "model" | "pricing">,
  fallback: ModelPrice = DEFAULT_FALLBACK_PRICE
): { price: ModelPrice; source: PriceSource } {
  const model = provider.model.toLowerCase();
  const configured = provider.pricing?.[provider.model] ?? provider.pricing?.[model];
  if (configured) return { price: configured, source: "provider" };
  const builtin = DEFAULT_PRICING[model];
  if (builtin) return { price: builtin, source: "builtin" };
  if (provider.type === "ollama") return { price: { input: 0, output: 0 }, source: "local" };
  return { price: fallback, source: "fallback" };
}

export function computeCost(usage: TokenUsage, price: ModelPrice): number {
  return (usage.inputTokens / 1_000_000) * price.input + (usage.outputTokens / 1_000_000) * price.output;
}

export class UsageLedger {
  private inputTokens = 0;
  private outputTokens = 0;
  private estimatedCost = 0;
  private requests = 0;
  private budgetCeiling?: number;

  constructor(initial?: Partial<UsageSnapshot>) {
    if (initial) this.restore(initial);
  }

  /**
   * Add one completed request. Returns the cost it contributed.
   */
  record(usage: TokenUsage, price: ModelPrice): number {
    const inputTokens = Math.max(0, Math.round(usage.inputTokens));
    const outputTokens = Math.max(0, Math.round(usage.outputTokens));
    const cost = computeCost({ inputTokens, outputTokens }, price);
    this.inputTokens += inputTokens;
    this.outputTokens += outputTokens;
    this.estimatedCost += cost;
    this.requests += 1;
    return cost;
  }

  setBudget(ceiling: number | undefined): void {
    if (ceiling !== undefined && (!Number.isFinite(ceiling) || ceiling < 0)) {
      throw new RangeError(`Budget ceiling must be a non-negative number, got ${ceiling}`);
    }
    this.budgetCeiling = ceiling && ceiling > 0 ? ceiling : undefined;
  }

  /**
   * True when a ceiling is configured and already reached
   */
  isOverBudget(): boolean {
    return this.budgetCeiling !== undefined && this.estimatedCost >= this.budgetCeiling;
  }

  /**
   * Zero the counters; the ceiling is a setting and survives.
   */
  reset(): void {
    this.inputTokens = 0;
    this.outputTokens = 0;
    this.estimatedCost = 0;
    this.requests = 0;
  }

  restore(snapshot: Partial<UsageSnapshot>): void {
    this.inputTokens = snapshot.inputTokens ?? 0;
    this.outputTokens = snapshot.outputTokens ?? 0;
    this.estimatedCost = snapshot.estimatedCost ?? 0;
    this.requests = snapshot.requests ?? 0;
    this.setBudget(snapshot.budgetCeiling);
  }

  snapshot(): UsageSnapshot {
    return {
      inputTokens: this.inputTokens,
      outputTokens: this.outputTokens,
      estimatedCost: this.estimatedCost,
      requests: this.requests,
      ...(this.budgetCeiling !== undefined ? { budgetCeiling: this.budgetCeiling } : {}),
    };
  }
}
