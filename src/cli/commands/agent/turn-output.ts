import chalk from "chalk";

import type { TurnResult } from "../../../agent/engine.js";
import type { FailoverInfo } from "../../../agent/router.js";
import type { RetryInfo } from "../../../agent/retry.js";
import { formatError } from "../../error-handler.js";
import type { OutputFormatter } from "../../output-formatter.js";

export function describeRetry(info: RetryInfo): string {
  return (
    `${info.provider} failed (${info.reason}), retrying in ${(info.delayMs / 1000).toFixed(1)}s ` +
    `[attempt ${info.attempt}/${info.maxRetries}]`
  );
}

export function describeFailover(info: FailoverInfo): string {
  return `${info.from} failed (${info.failure}): switching to ${info.to}`;
}

export function describeTurnFooter(result: Extract<TurnResult, { ok: true }>): string {
  const parts = [
    `${result.provider}/${result.model}`,
    `${result.usage.inputTokens} in / ${result.usage.outputTokens} out`,
    `$${result.cost.toFixed(4)}`,
  ];
  if (result.summarized) parts.push("history summarized");
  if (result.distilled) parts.push("context distilled");
  return parts.join(" · ");
}

/**
 * Print a turn outcome; returns false when the turn failed
 */
export function reportTurn(out: OutputFormatter, result: TurnResult): boolean {
  for (const notice of result.notices) {
    out.warn(notice.message);
  }
  if (!result.ok) {
    console.error(formatError(result.error));
    return false;
  }
  out.reply(result.content);
  out.debug(describeTurnFooter(result));
  return true;
}

export function statusLine(message: string): void {
  process.stderr.write(chalk.yellow(`↻ ${message}`) + "\n");
}
