import { describe, it, expect, vi } from "vitest";

import { OrchestrationEngine } from "../../../src/agent/engine.js";
import { RetryController } from "../../../src/agent/retry.js";
import type { RoutedProvider } from "../../../src/agent/types.js";
import {
  HELP_LINES,
  formatHistoryLine,
  isSlashCommand,
  parseSlashCommand,
  runSlashCommand,
  type SlashCommand,
} from "../../../src/cli/slash-commands.js";
import { silentLogger } from "../../../src/log.js";
import {
  MemorySessionStore,
  ScriptedTransport,
  httpError,
  makeProvider,
  noSleep,
  reply,
} from "../helpers/fake-provider.js";

const logger = silentLogger();

function setup(providers: RoutedProvider[] = [makeProvider("primary", new ScriptedTransport([], reply("ok")))]) {
  const controller = new RetryController({ logger, policy: { maxRetries: 0 }, sleep: noSleep });
  const engine = new OrchestrationEngine({ providers, logger, controller, sessionStore: new MemorySessionStore() });
  const reloadProviders = vi.fn(async () => providers);
  const run = (command: SlashCommand) => runSlashCommand(command, { engine, sessionId: "chat", reloadProviders });
  return { engine, run, reloadProviders };
}

function command(input: string): SlashCommand {
  const parsed = parseSlashCommand(input);
  if (!parsed.ok) throw new Error(parsed.error);
  return parsed.command;
}

describe("parseSlashCommand", () => {
  it("recognises commands regardless of case", () => {
    expect(parseSlashCommand("/HELP")).toEqual({ ok: true, command: { name: "help" } });
    expect(parseSlashCommand("  /exit ")).toEqual({ ok: true, command: { name: "quit" } });
  });

  it("parses pin indexes", () => {
    expect(parseSlashCommand("/pin 3")).toEqual({ ok: true, command: { name: "pin", seq: 3 } });
    expect(parseSlashCommand("/unpin 12")).toEqual({ ok: true, command: { name: "unpin", seq: 12 } });
    expect(parseSlashCommand("/pin")).toEqual({ ok: false, error: "Usage: /pin <index>" });
    expect(parseSlashCommand("/unpin 0")).toEqual({ ok: false, error: "Usage: /unpin <index>" });
    expect(parseSlashCommand("/pin two")).toEqual({ ok: false, error: "Usage: /pin <index>" });
  });

  it("parses budgets with or without a dollar sign", () => {
    expect(parseSlashCommand("/budget")).toEqual({ ok: true, command: { name: "budget" } });
    expect(parseSlashCommand("/budget $2.50")).toEqual({ ok: true, command: { name: "budget", ceiling: 2.5 } });
    expect(parseSlashCommand("/budget 0")).toEqual({ ok: true, command: { name: "budget", ceiling: 0 } });
    expect(parseSlashCommand("/budget -1")).toEqual({ ok: false, error: "Usage: /budget <usd>, a non-negative amount" });
  });

  it("parses session subcommands with quoted names", () => {
    expect(parseSlashCommand("/session save")).toEqual({ ok: true, command: { name: "session", action: "save" } });
    expect(parseSlashCommand('/session load "my work"')).toEqual({
      ok: true,
      command: { name: "session", action: "load", sessionName: "my work" },
    });
    expect(parseSlashCommand("/session LIST")).toEqual({ ok: true, command: { name: "session", action: "list" } });
    expect(parseSlashCommand("/session delete")).toEqual({ ok: false, error: "Usage: /session delete <name>" });
    expect(parseSlashCommand("/session")).toEqual({
      ok: false,
      error: "Usage: /session save [name] | load <name> | list | delete <name>",
    });
  });

  it("rejects unknown and empty commands", () => {
    expect(parseSlashCommand("/frobnicate")).toEqual({
      ok: false,
      error: "Unknown command: /frobnicate. Type /help for list.",
    });
    expect(parseSlashCommand("   ")).toEqual({ ok: false, error: "Empty command. Type /help for list." });
  });

  it("detects slash input", () => {
    expect(isSlashCommand("  /help")).toBe(true);
    expect(isSlashCommand("what does /help do?")).toBe(false);
  });
});

describe("formatHistoryLine", () => {
  it("flattens whitespace and marks pinned entries", () => {
    expect(formatHistoryLine({ role: "user", content: "two\n  lines", seq: 4, pinned: true, timestamp: 0 })).toBe(
      "#4 (pinned) user: two lines"
    );
  });

  it("labels the summary and truncates long content", () => {
    const line = formatHistoryLine({
      role: "system",
      content: "a".repeat(100),
      seq: 9,
      pinned: false,
      summary: true,
      timestamp: 0,
    });
    expect(line).toBe(`#9 summary: ${"a".repeat(80)}...`);
  });
});

describe("runSlashCommand", () => {
  it("shows help and quits", async () => {
    const { run } = setup();
    expect(await run({ name: "help" })).toEqual({ lines: HELP_LINES });
    expect(await run({ name: "quit" })).toEqual({ lines: [], quit: true });
  });

  it("lists history, pins and reports usage", async () => {
    const { engine, run } = setup([
      makeProvider("primary", new ScriptedTransport([reply("hi there", { inputTokens: 10, outputTokens: 4 })])),
    ]);
    expect((await run(command("/history"))).lines).toEqual(["History is empty."]);
    await engine.submitTurn("chat", "hello");

    expect((await run(command("/pin 1"))).lines).toEqual(["Pinned message #1."]);
    expect((await run(command("/history"))).lines).toEqual(["#1 (pinned) user: hello", "#2 assistant: hi there"]);
    expect((await run(command("/unpin 1"))).lines).toEqual(["Unpinned message #1."]);
    expect((await run(command("/usage"))).lines).toEqual([
      "Tokens: 10 in / 4 out",
      "Requests: 1",
      "Estimated cost: $0.0000",
      "Budget: none",
    ]);
  });

  it("sets, shows and removes the budget", async () => {
    const { run } = setup();
    expect((await run(command("/budget 3"))).lines).toEqual(["Session budget set to $3.00."]);
    expect((await run(command("/budget"))).lines).toEqual(["Budget: $3.00"]);
    expect((await run(command("/budget 0"))).lines).toEqual(["Session budget removed."]);
    expect((await run(command("/budget"))).lines).toEqual(["Budget: none"]);
  });

  it("describes the provider chain", async () => {
    const { engine, run } = setup([
      makeProvider("primary", new ScriptedTransport([], httpError(401, "Unauthorized"))),
      makeProvider("backup", new ScriptedTransport([], reply("ok"))),
    ]);
    await engine.submitTurn("chat", "hello");

    expect((await run(command("/providers"))).lines).toEqual([
      "1. primary (1 consecutive failure(s))",
      "2. backup (sticky)",
    ]);
  });

  it("reports an empty provider chain", async () => {
    const { run } = setup([]);
    expect((await run(command("/providers"))).lines).toEqual(["No providers configured."]);
  });

  it("reloads providers through the caller", async () => {
    const providers = [
      makeProvider("a", new ScriptedTransport()),
      makeProvider("b", new ScriptedTransport()),
    ];
    const { run, reloadProviders } = setup(providers);

    expect((await run(command("/reload"))).lines).toEqual(["Reloaded 2 provider(s): a → b."]);
    expect(reloadProviders).toHaveBeenCalledTimes(1);
  });

  it("clears the session", async () => {
    const { engine, run } = setup();
    await engine.submitTurn("chat", "hello");

    expect((await run(command("/clear"))).lines).toEqual(["Session history and usage cleared."]);
    expect(engine.getHistory("chat")).toEqual([]);
  });

  it("saves, lists, loads and deletes sessions", async () => {
    const { engine, run } = setup();
    expect((await run(command("/session list"))).lines).toEqual(["No saved sessions."]);
    await engine.submitTurn("chat", "hello");

    expect((await run(command("/session save work"))).lines).toEqual(["Session saved as 'work'."]);
    expect((await run(command("/session list"))).lines).toEqual(["- work"]);
    engine.clearSession("chat");
    expect((await run(command("/session load work"))).lines).toEqual(["Session 'work' loaded (2 messages)."]);
    expect((await run(command("/session delete work"))).lines).toEqual(["Session 'work' deleted."]);
  });

  it("lets engine errors reach the caller", async () => {
    const { run } = setup();
    await expect(run(command("/pin 5"))).rejects.toMatchObject({ kind: "NotFound" });
  });
});
