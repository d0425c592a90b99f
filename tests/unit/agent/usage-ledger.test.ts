import { describe, it, expect } from "vitest";

import {
  DEFAULT_FALLBACK_PRICE,
  UsageLedger,
  computeCost,
  resolvePrice,
} from "../../../src/agent/usage-ledger.js";

describe("resolvePrice", () => {
  it("prefers a price configured on the provider", () => {
    const result = resolvePrice({
      type: "openai",
      model: "gpt-4o-mini",
      pricing: { "gpt-4o-mini": { input: 1, output: 2 } },
    });
    expect(result).toEqual({ price: { input: 1, output: 2 }, source: "provider" });
  });

  it("falls back to the built-in table", () => {
    expect(resolvePrice({ type: "openai", model: "gpt-4o-mini" })).toEqual({
      price: { input: 0.15, output: 0.6 },
      source: "builtin",
    });
  });

  it("treats unknown local models as free", () => {
    expect(resolvePrice({ type: "ollama", model: "my-finetune" })).toEqual({
      price: { input: 0, output: 0 },
      source: "local",
    });
  });

  it("uses the fallback rate for unknown hosted models", () => {
    expect(resolvePrice({ type: "groq", model: "mystery-model" })).toEqual({
      price: DEFAULT_FALLBACK_PRICE,
      source: "fallback",
    });
    expect(resolvePrice({ type: "groq", model: "mystery-model" }, { input: 3, output: 4 }).price).toEqual({
      input: 3,
      output: 4,
    });
  });
});

describe("UsageLedger", () => {
  it("accumulates tokens, requests and cost per million tokens", () => {
    const ledger = new UsageLedger();
    const cost = ledger.record({ inputTokens: 1_000_000, outputTokens: 500_000 }, { input: 2.5, output: 10 });
    expect(cost).toBe(7.5);
    ledger.record({ inputTokens: 10, outputTokens: 5 }, { input: 0, output: 0 });
    expect(ledger.snapshot()).toEqual({
      inputTokens: 1_000_010,
      outputTokens: 500_005,
      estimatedCost: 7.5,
      requests: 2,
    });
  });

  it("computes cost directly", () => {
    expect(computeCost({ inputTokens: 2_000_000, outputTokens: 0 }, { input: 0.5, output: 1.5 })).toBe(1);
  });

  it("reports over budget once the cost reaches the ceiling", () => {
    const ledger = new UsageLedger();
    ledger.setBudget(1);
    expect(ledger.isOverBudget()).toBe(false);
    ledger.record({ inputTokens: 1_000_000, outputTokens: 0 }, { input: 1, output: 0 });
    expect(ledger.isOverBudget()).toBe(true);
  });

  it("treats a zero ceiling as no limit", () => {
    const ledger = new UsageLedger();
    ledger.record({ inputTokens: 1_000_000, outputTokens: 0 }, { input: 1, output: 0 });
    ledger.setBudget(0);
    expect(ledger.isOverBudget()).toBe(false);
    expect(ledger.snapshot().budgetCeiling).toBeUndefined();
  });

  it("rejects negative ceilings", () => {
    expect(() => new UsageLedger().setBudget(-1)).toThrow(RangeError);
  });

  it("keeps the ceiling across a reset", () => {
    const ledger = new UsageLedger();
    ledger.setBudget(2);
    ledger.record({ inputTokens: 100, outputTokens: 100 }, { input: 1, output: 1 });
    ledger.reset();
    expect(ledger.snapshot()).toEqual({
      inputTokens: 0,
      outputTokens: 0,
      estimatedCost: 0,
      requests: 0,
      budgetCeiling: 2,
    });
  });

  it("restores from a snapshot", () => {
    const ledger = new UsageLedger({ inputTokens: 5, outputTokens: 6, estimatedCost: 0.25, requests: 1, budgetCeiling: 0.25 });
    expect(ledger.isOverBudget()).toBe(true);
    expect(ledger.snapshot().requests).toBe(1);
  });
});
