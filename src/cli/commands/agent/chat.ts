/**
 * Agent Chat Command - Interactive loop with slash commands
 *
 * Ctrl-C cancels the turn in flight; at an idle prompt it exits.
 */

import readline from "node:readline";

import chalk from "chalk";

import type { SwitchyardConfig } from "../../../config.js";
import { defaultSessionName } from "../../../agent/engine.js";
import { isOrchestrationError } from "../../../agent/errors.js";
import { createEngineRuntime } from "../../../runtime/engine-factory.js";
import { formatError } from "../../error-handler.js";
import { OutputFormatter } from "../../output-formatter.js";
import { isSlashCommand, parseSlashCommand, runSlashCommand, type SlashContext } from "../../slash-commands.js";
import { describeFailover, describeRetry, reportTurn, statusLine } from "./turn-output.js";

export interface ChatOptions {
  session?: string;
}

export async function chat(cfg: SwitchyardConfig, options: ChatOptions = {}): Promise<void> {
  const out = new OutputFormatter();
  const runtime = createEngineRuntime(cfg, {
    onRetry: (info) => statusLine(describeRetry(info)),
    onFailover: (info) => statusLine(describeFailover(info)),
  });
  const { engine } = runtime;
  const sessionId = options.session?.trim() || defaultSessionName();

  for (const name of cfg.resolved.missingCredentials) {
    out.warn(`Provider '${name}' has no API key configured`);
  }

  try {
    await engine.loadSession(sessionId, sessionId);
    out.info(`Resumed session '${sessionId}' (${engine.getHistory(sessionId).length} messages).`);
  } catch (err) {
    if (!isOrchestrationError(err) || err.kind !== "NotFound") throw err;
    out.info(`Session '${sessionId}'. Type your message or /help for commands.`);
  }

  const ctx: SlashContext = {
    engine,
    sessionId,
    reloadProviders: () => runtime.reloadProviders(),
  };

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: chalk.bold("you> "),
  });

  rl.on("SIGINT", () => {
    if (engine.cancelTurn(sessionId)) {
      out.warn("Cancelling current turn...");
      return;
    }
    rl.close();
  });

  rl.prompt();
  for await (const raw of rl) {
    const line = raw.trim();
    if (!line) {
      rl.prompt();
      continue;
    }

    if (isSlashCommand(line)) {
      const parsed = parseSlashCommand(line);
      if (!parsed.ok) {
        out.warn(parsed.error);
      } else {
        try {
          const outcome = await runSlashCommand(parsed.command, ctx);
          for (const text of outcome.lines) out.info(text);
          if (outcome.quit) break;
        } catch (err) {
          console.error(formatError(err));
        }
      }
      rl.prompt();
      continue;
    }

    const stopProgress = out.progress("Thinking...");
    const result = await engine.submitTurn(sessionId, line);
    stopProgress();
    reportTurn(out, result);
    rl.prompt();
  }

  rl.close();
  await engine.flush();
}
