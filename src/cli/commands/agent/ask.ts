/**
 * Agent Ask Command - One turn, printed and persisted
 */

import type { SwitchyardConfig } from "../../../config.js";
import { isOrchestrationError } from "../../../agent/errors.js";
import { createEngineRuntime } from "../../../runtime/engine-factory.js";
import { OutputFormatter } from "../../output-formatter.js";
import { ValidationError } from "../../error-handler.js";
import { describeFailover, describeRetry, reportTurn, statusLine } from "./turn-output.js";

export interface AskOptions {
  session?: string;
  json?: boolean;
  quiet?: boolean;
}

const DEFAULT_ASK_SESSION = "ask";

export async function ask(cfg: SwitchyardConfig, prompt: string, options: AskOptions = {}): Promise<void> {
  const out = new OutputFormatter({ quiet: options.quiet });

  if (!prompt?.trim()) {
    throw new ValidationError("Prompt cannot be empty", 'Provide a prompt: switchyard ask "your question"');
  }

  const { engine } = createEngineRuntime(cfg, {
    onRetry: (info) => statusLine(describeRetry(info)),
    onFailover: (info) => statusLine(describeFailover(info)),
  });
  for (const name of cfg.resolved.missingCredentials) {
    out.warn(`Provider '${name}' has no API key configured`);
  }

  const sessionId = options.session?.trim() || DEFAULT_ASK_SESSION;
  if (options.session) {
    try {
      await engine.loadSession(sessionId, sessionId);
    } catch (err) {
      if (!isOrchestrationError(err) || err.kind !== "NotFound") throw err;
    }
  }

  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.once("SIGINT", onSigint);

  const stopProgress = out.progress("Thinking...");
  const startTime = Date.now();
  try {
    const result = await engine.submitTurn(sessionId, prompt.trim(), { signal: controller.signal });
    stopProgress();
    await engine.flush();

    if (options.json) {
      out.json(
        result.ok
          ? {
              response: result.content,
              provider: result.provider,
              model: result.model,
              usage: result.usage,
              cost: result.cost,
              notices: result.notices.map((n) => n.message),
              duration: Date.now() - startTime,
            }
          : { error: { kind: result.error.kind, message: result.error.message } }
      );
      if (!result.ok) process.exitCode = 1;
      return;
    }

    if (!reportTurn(out, result)) {
      process.exitCode = 1;
      return;
    }
    out.debug(`Completed in ${out.formatDuration(Date.now() - startTime)}`);
  } finally {
    stopProgress();
    process.removeListener("SIGINT", onSigint);
  }
}
