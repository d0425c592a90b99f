/**
 * Slash commands for the interactive chat loop
 *
 * Parsing is pure; execution goes through the engine facade and returns the
 * lines to show, leaving presentation to the caller.
 */

import type { HistoryMessage, RoutedProvider } from "../agent/types.js";
import type { OrchestrationEngine } from "../agent/engine.js";

export type SessionAction =
  | { action: "save"; sessionName?: string }
  | { action: "load"; sessionName: string }
  | { action: "list" }
  | { action: "delete"; sessionName: string };

export type SlashCommand =
  | { name: "help" }
  | { name: "quit" }
  | { name: "clear" }
  | { name: "reload" }
  | { name: "history" }
  | { name: "usage" }
  | { name: "providers" }
  | { name: "pin"; seq: number }
  | { name: "unpin"; seq: number }
  | { name: "budget"; ceiling?: number }
  | ({ name: "session" } & SessionAction);

export type ParseResult = { ok: true; command: SlashCommand } | { ok: false; error: string };

export const HELP_LINES = [
  "Commands:",
  "  /help                  Show this help message",
  "  /history               List messages with their index",
  "  /pin <index>           Keep a message out of summarization",
  "  /unpin <index>         Release a pinned message",
  "  /usage                 Show token usage and estimated cost",
  "  /budget [usd]          Show or set the session cost ceiling (0 removes it)",
  "  /providers             Show failover order and the sticky provider",
  "  /reload                Reload providers from the config file",
  "  /clear                 Clear history and usage for this session",
  "  /session save [name]   Save the session (default name is a timestamp)",
  "  /session load <name>   Replace this session with a saved one",
  "  /session list          List saved sessions",
  "  /session delete <name> Delete a saved session",
  "  /quit                  Exit",
];

export function isSlashCommand(input: string): boolean {
  return input.trimStart().startsWith("/");
}

function tokenize(input: string): string[] {
  const tokens: string[] = [];
  for (const match of input.matchAll(/"([^"]*)"|'([^']*)'|(\S+)/g)) {
    tokens.push(match[1] ?? match[2] ?? match[3] ?? "");
  }
  return tokens;
}

function parseIndex(raw: string | undefined, usage: string): ParseResult | number {
  if (!raw || !/^\d+$/.test(raw) || Number(raw) < 1) {
    return { ok: false, error: `Usage: ${usage}` };
  }
  return Number(raw);
}

export function parseSlashCommand(input: string): ParseResult {
  const [head, ...args] = tokenize(input.trim());
  const name = head?.toLowerCase();

  switch (name) {
    case "/help":
      return { ok: true, command: { name: "help" } };
    case "/quit":
    case "/exit":
      return { ok: true, command: { name: "quit" } };
    case "/clear":
      return { ok: true, command: { name: "clear" } };
    case "/reload":
      return { ok: true, command: { name: "reload" } };
    case "/history":
      return { ok: true, command: { name: "history" } };
    case "/usage":
      return { ok: true, command: { name: "usage" } };
    case "/providers":
      return { ok: true, command: { name: "providers" } };
    case "/pin":
    case "/unpin": {
      const seq = parseIndex(args[0], `${name} <index>`);
      if (typeof seq !== "number") return seq;
      return { ok: true, command: { name: name === "/pin" ? "pin" : "unpin", seq } };
    }
    case "/budget": {
      const raw = args[0];
      if (raw === undefined) return { ok: true, command: { name: "budget" } };
      const ceiling = Number(raw.replace(/^\$/, ""));
      if (!raw || !Number.isFinite(ceiling) || ceiling < 0) {
        return { ok: false, error: "Usage: /budget <usd>, a non-negative amount" };
      }
      return { ok: true, command: { name: "budget", ceiling } };
    }
    case "/session":
      return parseSessionCommand(args);
    case undefined:
      return { ok: false, error: "Empty command. Type /help for list." };
    default:
      return { ok: false, error: `Unknown command: ${name}. Type /help for list.` };
  }
}

function parseSessionCommand(args: string[]): ParseResult {
  const [rawAction, sessionName] = args;
  const action = rawAction?.toLowerCase();
  switch (action) {
    case "save":
      return { ok: true, command: { name: "session", action: "save", ...(sessionName ? { sessionName } : {}) } };
    case "load":
    case "delete":
      if (!sessionName) return { ok: false, error: `Usage: /session ${action} <name>` };
      return { ok: true, command: { name: "session", action, sessionName } };
    case "list":
      return { ok: true, command: { name: "session", action: "list" } };
    default:
      return { ok: false, error: "Usage: /session save [name] | load <name> | list | delete <name>" };
  }
}

// ============================================================================
// Execution
// ============================================================================

export interface SlashContext {
  engine: OrchestrationEngine;
  sessionId: string;
  reloadProviders(): Promise<RoutedProvider[]>;
}

export interface SlashOutcome {
  lines: string[];
  quit?: boolean;
}

const PREVIEW_CHARS = 80;

export function formatHistoryLine(message: HistoryMessage): string {
  const label = message.summary ? "summary" : message.role;
  const flat = message.content.replace(/\s+/g, " ").trim();
  const preview = flat.length > PREVIEW_CHARS ? `${flat.slice(0, PREVIEW_CHARS)}...` : flat;
  return `#${message.seq}${message.pinned ? " (pinned)" : ""} ${label}: ${preview}`;
}

function formatUsd(value: number, digits = 2): string {
  return `$${value.toFixed(digits)}`;
}

export async function runSlashCommand(command: SlashCommand, ctx: SlashContext): Promise<SlashOutcome> {
  const { engine, sessionId } = ctx;

  switch (command.name) {
    case "help":
      return { lines: HELP_LINES };
    case "quit":
      return { lines: [], quit: true };
    case "clear":
      engine.clearSession(sessionId);
      return { lines: ["Session history and usage cleared."] };
    case "reload": {
      const providers = await ctx.reloadProviders();
      const order = providers.map((p) => p.config.name).join(" → ");
      return { lines: [`Reloaded ${providers.length} provider(s)${order ? `: ${order}` : ""}.`] };
    }
    case "history": {
      const history = engine.getHistory(sessionId);
      if (history.length === 0) return { lines: ["History is empty."] };
      return { lines: history.map(formatHistoryLine) };
    }
    case "usage": {
      const usage = engine.getUsage(sessionId);
      return {
        lines: [
          `Tokens: ${usage.inputTokens} in / ${usage.outputTokens} out`,
          `Requests: ${usage.requests}`,
          `Estimated cost: ${formatUsd(usage.estimatedCost, 4)}`,
          `Budget: ${usage.budgetCeiling ? formatUsd(usage.budgetCeiling) : "none"}`,
        ],
      };
    }
    case "providers": {
      const state = engine.getRouterState();
      if (state.providers.length === 0) return { lines: ["No providers configured."] };
      return {
        lines: state.providers.map((name, i) => {
          const failures = state.failureCounts[name] ?? 0;
          const tags = [
            ...(state.stickyIndex === i ? ["sticky"] : []),
            ...(failures > 0 ? [`${failures} consecutive failure(s)`] : []),
          ];
          return `${i + 1}. ${name}${tags.length ? ` (${tags.join(", ")})` : ""}`;
        }),
      };
    }
    case "pin":
      engine.pin(sessionId, command.seq);
      return { lines: [`Pinned message #${command.seq}.`] };
    case "unpin":
      engine.unpin(sessionId, command.seq);
      return { lines: [`Unpinned message #${command.seq}.`] };
    case "budget": {
      if (command.ceiling === undefined) {
        const ceiling = engine.getUsage(sessionId).budgetCeiling;
        return { lines: [`Budget: ${ceiling ? formatUsd(ceiling) : "none"}`] };
      }
      engine.setBudget(sessionId, command.ceiling);
      return {
        lines: [command.ceiling > 0 ? `Session budget set to ${formatUsd(command.ceiling)}.` : "Session budget removed."],
      };
    }
    case "session":
      return runSessionCommand(command, ctx);
  }
}

async function runSessionCommand(command: SessionAction, ctx: SlashContext): Promise<SlashOutcome> {
  const { engine, sessionId } = ctx;
  switch (command.action) {
    case "save": {
      const name = await engine.saveSession(sessionId, command.sessionName);
      return { lines: [`Session saved as '${name}'.`] };
    }
    case "load": {
      await engine.loadSession(sessionId, command.sessionName);
      const count = engine.getHistory(sessionId).length;
      return { lines: [`Session '${command.sessionName}' loaded (${count} messages).`] };
    }
    case "list": {
      const names = await engine.listSessions();
      if (names.length === 0) return { lines: ["No saved sessions."] };
      return { lines: names.map((name) => `- ${name}`) };
    }
    case "delete":
      await engine.deleteSession(command.sessionName);
      return { lines: [`Session '${command.sessionName}' deleted.`] };
  }
}
