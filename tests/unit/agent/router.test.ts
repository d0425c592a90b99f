import { describe, it, expect, vi } from "vitest";

import type { PreparedContext } from "../../../src/agent/context-manager.js";
import { OrchestrationError } from "../../../src/agent/errors.js";
import { RetryController } from "../../../src/agent/retry.js";
import { ProviderRouter, type FailoverInfo, type Preparer } from "../../../src/agent/router.js";
import type { RoutedProvider } from "../../../src/agent/types.js";
import { silentLogger } from "../../../src/log.js";
import { ScriptedTransport, httpError, makeProvider, noSleep, reply } from "../helpers/fake-provider.js";

const logger = silentLogger();

function router(providers: RoutedProvider[], onFailover?: (info: FailoverInfo) => void): ProviderRouter {
  const controller = new RetryController({
    logger,
    policy: { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 10, jitterMs: 0 },
    sleep: noSleep,
  });
  return new ProviderRouter({ providers, controller, logger, onFailover });
}

function preparer() {
  return vi.fn<Preparer>(
    async ({ distill }): Promise<PreparedContext> => ({
      messages: [{ role: "user", content: "hi" }],
      estimatedTokens: 5,
      budget: 1000,
      summarized: false,
      distilled: distill,
      notices: [],
    })
  );
}

describe("ProviderRouter", () => {
  it("uses the primary when it answers", async () => {
    const primary = new ScriptedTransport([reply("from primary")]);
    const backup = new ScriptedTransport([reply("from backup")]);
    const prepare = preparer();
    const r = router([makeProvider("primary", primary), makeProvider("backup", backup)]);

    const result = await r.route({ prepare });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.response.content).toBe("from primary");
    expect(result.index).toBe(0);
    expect(result.failures).toEqual([]);
    expect(prepare).toHaveBeenCalledTimes(1);
    expect(prepare.mock.calls[0]?.[0]).toMatchObject({ index: 0, distill: false });
    expect(backup.calls).toHaveLength(0);
    expect(r.snapshot().stickyIndex).toBeUndefined();
  });

  it("fails over on a fatal error and makes the backup sticky", async () => {
    const primary = new ScriptedTransport([httpError(401, "Unauthorized")]);
    const backup = new ScriptedTransport([reply("first"), reply("second")]);
    const failovers: FailoverInfo[] = [];
    const prepare = preparer();
    const r = router([makeProvider("primary", primary), makeProvider("backup", backup)], (info) =>
      failovers.push(info)
    );

    const first = await r.route({ prepare });

    expect(first.ok).toBe(true);
    if (!first.ok) return;
    expect(first.provider.config.name).toBe("backup");
    expect(first.failures).toEqual([
      { provider: "primary", index: 0, reason: "fatal", failure: "auth", attempts: 1, status: 401, error: "Unauthorized" },
    ]);
    expect(failovers).toEqual([
      { from: "primary", to: "backup", reason: "fatal", failure: "auth", error: "Unauthorized" },
    ]);
    expect(prepare.mock.calls[1]?.[0]).toMatchObject({ index: 1, distill: true });
    expect(r.snapshot()).toMatchObject({ stickyIndex: 1, stickyProvider: "backup" });
    expect(r.activeProvider()?.config.name).toBe("backup");

    const second = await r.route({ prepare: preparer() });

    expect(second.ok && second.response.content).toBe("second");
    expect(primary.calls).toHaveLength(1);
  });

  it("retries locally before failing over", async () => {
    const primary = new ScriptedTransport([], httpError(503, "HTTP 503"));
    const backup = new ScriptedTransport([reply("ok")]);
    const r = router([makeProvider("primary", primary), makeProvider("backup", backup)]);

    const result = await r.route({ prepare: preparer() });

    expect(primary.calls).toHaveLength(3);
    expect(result.ok && result.failures[0]).toMatchObject({ reason: "exhausted", failure: "server", attempts: 3 });
  });

  it("reports every failure when all providers are exhausted", async () => {
    const primary = new ScriptedTransport([httpError(401, "Unauthorized")]);
    const backup = new ScriptedTransport([], httpError(503, "HTTP 503"));
    const r = router([makeProvider("primary", primary), makeProvider("backup", backup)]);

    const result = await r.route({ prepare: preparer() });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(OrchestrationError);
    expect(result.error.kind).toBe("AllProvidersExhausted");
    expect(result.error.message).toBe("All providers failed:\n• primary: Unauthorized\n• backup: HTTP 503");
    expect(result.failures.map((f) => f.provider)).toEqual(["primary", "backup"]);
    expect(r.snapshot().failureCounts).toEqual({ primary: 1, backup: 1 });
  });

  it("tries the providers ahead of a failing sticky backup before giving up", async () => {
    const primary = new ScriptedTransport([httpError(401, "Unauthorized"), reply("primary is back")]);
    const backup = new ScriptedTransport([reply("ok"), httpError(401, "Unauthorized")]);
    const failovers: FailoverInfo[] = [];
    const r = router([makeProvider("primary", primary), makeProvider("backup", backup)], (info) =>
      failovers.push(info)
    );

    await r.route({ prepare: preparer() });
    expect(r.snapshot().stickyIndex).toBe(1);

    const prepare = preparer();
    const result = await r.route({ prepare });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.response.content).toBe("primary is back");
    expect(result.failures.map((f) => f.provider)).toEqual(["backup"]);
    expect(prepare.mock.calls.map((call) => [call[0].index, call[0].distill])).toEqual([
      [1, false],
      [0, true],
    ]);
    expect(failovers.map((f) => [f.from, f.to])).toEqual([
      ["primary", "backup"],
      ["backup", "primary"],
    ]);
    expect(r.snapshot().stickyIndex).toBeUndefined();
  });

  it("contacts every provider once before reporting exhaustion from a sticky start", async () => {
    const primary = new ScriptedTransport([httpError(401, "Unauthorized"), httpError(403, "Forbidden")]);
    const backup = new ScriptedTransport([reply("ok")], httpError(500, "HTTP 500"));
    const r = router([makeProvider("primary", primary), makeProvider("backup", backup)]);
    await r.route({ prepare: preparer() });

    const result = await r.route({ prepare: preparer() });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failures.map((f) => f.provider)).toEqual(["backup", "primary"]);
    expect(result.error.message).toBe("All providers failed:\n• backup: HTTP 500\n• primary: Forbidden");
    expect(primary.calls).toHaveLength(2);
    expect(r.snapshot().stickyIndex).toBeUndefined();
  });

  it("absorbs twenty rate limits, then fails over and sticks to the backup", async () => {
    const limits = Array.from({ length: 21 }, () => httpError(429, "Too Many Requests"));
    const primary = new ScriptedTransport(limits, reply("too late"));
    const backup = new ScriptedTransport([reply("from backup")]);
    const controller = new RetryController({
      logger,
      policy: { maxRetries: 20, baseDelayMs: 1, maxDelayMs: 10, jitterMs: 0 },
      sleep: noSleep,
    });
    const r = new ProviderRouter({
      providers: [makeProvider("primary", primary), makeProvider("backup", backup)],
      controller,
      logger,
    });

    const result = await r.route({ prepare: preparer() });

    expect(primary.calls).toHaveLength(21);
    expect(result.ok && result.response.content).toBe("from backup");
    expect(result.ok && result.failures).toEqual([
      {
        provider: "primary",
        index: 0,
        reason: "exhausted",
        failure: "rate_limit",
        attempts: 21,
        status: 429,
        error: "Too Many Requests",
      },
    ]);
    expect(r.snapshot()).toMatchObject({ stickyIndex: 1, stickyProvider: "backup" });
  });

  it("reports an empty provider list as exhausted", async () => {
    const result = await router([]).route({ prepare: preparer() });
    expect(result.ok ? undefined : result.error.message).toBe("No LLM providers are configured");
  });

  it("forgets stickiness and failure counts on reload", async () => {
    const primary = new ScriptedTransport([httpError(401, "Unauthorized")]);
    const backup = new ScriptedTransport([reply("ok")]);
    const r = router([makeProvider("primary", primary), makeProvider("backup", backup)]);
    await r.route({ prepare: preparer() });

    const fresh = makeProvider("fresh", new ScriptedTransport([reply("fresh")]));
    r.reload([fresh]);

    expect(r.snapshot()).toEqual({ providers: ["fresh"], failureCounts: {} });
    expect(r.activeProvider()).toBe(fresh);
  });

  it("finishes a pass on the provider list it started with", async () => {
    const primary = new ScriptedTransport([httpError(401, "Unauthorized")]);
    const backup = new ScriptedTransport([reply("original backup")]);
    const r = router([makeProvider("primary", primary), makeProvider("backup", backup)]);
    const prepare = preparer();
    prepare.mockImplementationOnce(async () => {
      r.reload([makeProvider("other", new ScriptedTransport([reply("other")]))]);
      return { messages: [], estimatedTokens: 0, budget: 1000, summarized: false, distilled: false, notices: [] };
    });

    const result = await r.route({ prepare });

    expect(result.ok && result.response.content).toBe("original backup");
    expect(r.snapshot().providers).toEqual(["other"]);
  });

  it("propagates context overflow from preparation without failing over", async () => {
    const backup = new ScriptedTransport([reply("never")]);
    const r = router([makeProvider("primary", new ScriptedTransport()), makeProvider("backup", backup)]);
    const prepare = vi.fn<Preparer>(async () => {
      throw new OrchestrationError("ContextOverflow", "too big");
    });

    await expect(r.route({ prepare })).rejects.toMatchObject({ kind: "ContextOverflow" });
    expect(backup.calls).toHaveLength(0);
  });

  it("propagates cancellation", async () => {
    const abort = new AbortController();
    abort.abort();
    const r = router([makeProvider("primary", new ScriptedTransport([reply("x")]))]);

    await expect(r.route({ prepare: preparer(), signal: abort.signal })).rejects.toMatchObject({
      kind: "Cancelled",
    });
  });
});
