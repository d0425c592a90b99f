#!/usr/bin/env node
/**
 * Switchyard CLI
 *
 * Terminal front end for the orchestration engine: one-off questions, an
 * interactive chat loop and saved-session housekeeping.
 */

import "dotenv/config";
import fs from "node:fs";
import { fileURLToPath } from "node:url";

import { Command } from "commander";

import { loadConfig } from "./config.js";
import { OutputFormatter } from "./cli/output-formatter.js";
import { handleError } from "./cli/error-handler.js";
import { ask } from "./cli/commands/agent/ask.js";
import { chat } from "./cli/commands/agent/chat.js";
import { sessionsList } from "./cli/commands/sessions/list.js";
import { sessionsDelete } from "./cli/commands/sessions/delete.js";

export const program = new Command();
const out = new OutputFormatter();

interface GlobalOptions {
  config?: string;
  quiet?: boolean;
  verbose?: boolean;
}

function globals(cmd: Command): GlobalOptions {
  const opts = cmd.optsWithGlobals<GlobalOptions>();
  return { config: opts.config, quiet: opts.quiet, verbose: opts.verbose };
}

program
  .name("switchyard")
  .description("Multi-provider LLM chat with failover, retries and context management")
  .version("0.1.0")
  .option("-c, --config <path>", "Path to switchyard.config.json")
  .option("-q, --quiet", "Quiet mode - minimal output")
  .option("-v, --verbose", "Show stack traces on errors");

// =============================================================================
// CONVERSATION
// =============================================================================

program
  .command("ask")
  .description("Send one message and print the reply")
  .argument("<prompt>", "The question or task")
  .option("-s, --session <name>", "Continue (and save to) a named session")
  .option("--json", "Output as JSON")
  .action(async (prompt: string, options: { session?: string; json?: boolean }, cmd: Command) => {
    const g = globals(cmd);
    await handleError(async () => {
      const cfg = await loadConfig(g.config);
      await ask(cfg, prompt, { ...options, quiet: g.quiet });
    }, g.verbose);
  });

program
  .command("chat")
  .description("Start an interactive chat session")
  .option("-s, --session <name>", "Session to resume or create (default: timestamp)")
  .action(async (options: { session?: string }, cmd: Command) => {
    const g = globals(cmd);
    await handleError(async () => {
      const cfg = await loadConfig(g.config);
      await chat(cfg, options);
    }, g.verbose);
  });

// =============================================================================
// SESSIONS
// =============================================================================

const sessions = program.command("sessions").description("Manage saved sessions");

sessions
  .command("list")
  .description("List saved sessions")
  .option("--json", "Output as JSON")
  .action(async (options: { json?: boolean }, cmd: Command) => {
    const g = globals(cmd);
    await handleError(async () => {
      const cfg = await loadConfig(g.config);
      await sessionsList(cfg, { ...options, quiet: g.quiet });
    }, g.verbose);
  });

sessions
  .command("delete")
  .description("Delete a saved session")
  .argument("<name>", "Session name")
  .action(async (name: string, _options: unknown, cmd: Command) => {
    const g = globals(cmd);
    await handleError(async () => {
      const cfg = await loadConfig(g.config);
      await sessionsDelete(cfg, name, { quiet: g.quiet });
    }, g.verbose);
  });

// =============================================================================
// PARSE AND RUN
// =============================================================================

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    const entryPath = fs.realpathSync(entry);
    const modulePath = fs.realpathSync(fileURLToPath(import.meta.url));
    return entryPath === modulePath;
  } catch {
    return false;
  }
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv).catch((err: unknown) => {
    out.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
}

// Only parse argv when invoked as an entrypoint script.
if (isMainModule()) {
  void runCli();
}
