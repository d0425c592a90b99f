/**
 * Context Window Manager
 *
 * Owns one session's ordered history and turns it into a message list that
 * fits a provider's token budget:
 * - rolling summarization of the oldest unpinned messages
 * - pinning (pinned messages never move and are never summarized)
 * - recency-only distillation for a provider activated by failover
 */

import type { ChatResponse, HistoryMessage, Message, ProviderConfig } from "./types.js";
import type { Logger } from "../log.js";
import type { ChatRequest } from "./retry.js";
import { resolveTokenBudget } from "./context-window-registry.js";
import { estimateMessageTokens, estimateTextTokens, estimateTokens } from "./token-estimator.js";
import { OrchestrationError, errorMessage, isOrchestrationError } from "./errors.js";

export interface ContextPolicy {
  /** Unpinned messages required before summarization may run. */
  minHistoryMessages: number;
  /** Newest unpinned messages a summarization pass leaves verbatim. */
  keepRecentMessages: number;
  summaryMaxTokens: number;
  /** Most unpinned messages a distilled context carries. */
  distillWindow: number;
  /** Share of the budget a distilled context aims to stay under. */
  distillBudgetRatio: number;
}

export const DEFAULT_CONTEXT_POLICY: ContextPolicy = {
  minHistoryMessages: 40,
  keepRecentMessages: 10,
  summaryMaxTokens: 600,
  distillWindow: 10,
  distillBudgetRatio: 0.5,
};

export const SUMMARY_PREFIX = "BACKGROUND SUMMARY of previous conversation:";

export const SUMMARIZE_INSTRUCTION =
  "Summarize the following conversation history concisely, focusing on key decisions, findings, and completed tasks. Maintain essential technical details.";

const MAX_TRANSCRIPT_MESSAGE_CHARS = 4000;

/**
 * Sends a condensation request; wired by the engine to the active provider
 * through the retry controller. Throws on failure.
 */
export type Summarizer = (request: ChatRequest, signal?: AbortSignal) => Promise<ChatResponse>;

export interface PreparedContext {
  messages: Message[];
  estimatedTokens: number;
  budget: number;
  summarized: boolean;
  distilled: boolean;
  notices: OrchestrationError[];
}

export interface PrepareOptions {
  /** Messages of the in-flight turn; counted but not yet part of history. */
  pending?: Message[];
  summarizer?: Summarizer;
  signal?: AbortSignal;
}

function toWire(message: Message): Message {
  return {
    role: message.role,
    content: message.content,
    ...(message.toolCallId ? { toolCallId: message.toolCallId } : {}),
    ...(message.toolCalls ? { toolCalls: message.toolCalls } : {}),
    ...(message.name ? { name: message.name } : {}),
  };
}

function truncate(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  return `${text.slice(0, maxChars)}... (truncated)`;
}

export class ContextWindowManager {
  private history: HistoryMessage[] = [];
  private nextSeq = 1;
  readonly policy: ContextPolicy;
  private readonly logger: Logger;
  private readonly systemPrompt?: string;

  constructor(params: { logger: Logger; policy?: Partial<ContextPolicy>; systemPrompt?: string }) {
    this.logger = params.logger.child({ component: "context" });
    this.policy = { ...DEFAULT_CONTEXT_POLICY, ...params.policy };
    this.systemPrompt = params.systemPrompt?.trim() || undefined;
  }

  // ==========================================================================
  // History
  // ==========================================================================

  append(message: Message, opts: { pinned?: boolean } = {}): HistoryMessage {
    const entry: HistoryMessage = {
      ...toWire(message),
      seq: this.nextSeq++,
      pinned: opts.pinned ?? false,
      timestamp: Date.now(),
    };
    this.history.push(entry);
    return entry;
  }

  messages(): HistoryMessage[] {
    return this.history.map((m) => ({ ...m }));
  }

  summaryMessage(): HistoryMessage | undefined {
    return this.history.find((m) => m.summary);
  }

  /**
   * Unpinned messages that have not been folded into the summary
   */
  rawUnpinned(): HistoryMessage[] {
    return this.history.filter((m) => !m.pinned && !m.summary);
  }

  clear(): void {
    this.history = [];
  }

  restore(messages: HistoryMessage[]): void {
    const summaries = messages.filter((m) => m.summary);
    if (summaries.length > 1) {
      throw new Error(`History holds ${summaries.length} summary messages; at most one is allowed`);
    }
    this.history = messages.map((m) => ({ ...m, pinned: m.summary ? false : m.pinned }));
    this.nextSeq = messages.reduce((max, m) => Math.max(max, m.seq), 0) + 1;
  }

  pin(seq: number): HistoryMessage {
    return this.setPinned(seq, true);
  }

  /**
   * Release a pin. A message older than the summary moves behind it, so the
   * summary stays the oldest unpinned entry.
   */
  unpin(seq: number): HistoryMessage {
    const entry = this.setPinned(seq, false);
    const summaryIndex = this.history.findIndex((m) => m.summary);
    const entryIndex = this.history.findIndex((m) => m.seq === seq);
    const summary = this.history[summaryIndex];
    if (summary && entryIndex < summaryIndex) {
      this.history.splice(summaryIndex, 1);
      this.history.splice(entryIndex, 0, summary);
    }
    return entry;
  }

  private setPinned(seq: number, pinned: boolean): HistoryMessage {
    const entry = this.history.find((m) => m.seq === seq);
    if (!entry) {
      throw new OrchestrationError("NotFound", `No message with index ${seq}`, { details: { seq } });
    }
    if (entry.summary) {
      throw new OrchestrationError("NotFound", `Message ${seq} is the background summary and cannot be pinned`, {
        details: { seq, summary: true },
      });
    }
    if (entry.pinned !== pinned) {
      entry.pinned = pinned;
      this.logger.debug({ seq, pinned }, pinned ? "Message pinned" : "Message unpinned");
    }
    return { ...entry };
  }

  // ==========================================================================
  // Composition
  // ==========================================================================

  private systemMessages(): Message[] {
    return this.systemPrompt ? [{ role: "system", content: this.systemPrompt }] : [];
  }

  compose(pending: Message[] = []): Message[] {
    return [...this.systemMessages(), ...this.history.map(toWire), ...pending.map(toWire)];
  }

  /**
   * Budget-compliant message list for a provider, summarizing if needed.
   */
  async prepare(provider: ProviderConfig, opts: PrepareOptions = {}): Promise<PreparedContext> {
    const pending = opts.pending ?? [];
    const budget = resolveTokenBudget(provider);
    const composed = this.compose(pending);
    const tokens = estimateTokens(composed, provider);

    if (tokens <= budget) {
      return { messages: composed, estimatedTokens: tokens, budget, summarized: false, distilled: false, notices: [] };
    }

    const unpinnedCount = this.rawUnpinned().length;
    const run = this.selectSummarizationRun(pending.length);
    if (unpinnedCount < this.policy.minHistoryMessages || run.length === 0 || !opts.summarizer) {
      throw this.overflow(provider, tokens, budget, "History is over budget and cannot be summarized further");
    }

    this.logger.info(
      { provider: provider.name, tokens, budget, runLength: run.length },
      "History over budget, summarizing oldest messages"
    );

    let summaryText: string;
    try {
      summaryText = await this.summarize(run, provider, opts.summarizer, opts.signal);
    } catch (err) {
      if (isOrchestrationError(err) && err.kind === "Cancelled") throw err;
      this.logger.warn({ provider: provider.name, error: errorMessage(err) }, "Summarization failed, sending unreduced history");
      const notice = new OrchestrationError("SummarizationFailed", `Summarization failed: ${errorMessage(err)}`, {
        details: { provider: provider.name, runLength: run.length },
        cause: err,
      });
      return { messages: composed, estimatedTokens: tokens, budget, summarized: false, distilled: false, notices: [notice] };
    }

    this.replaceWithSummary(run, summaryText);

    const reduced = this.compose(pending);
    const reducedTokens = estimateTokens(reduced, provider);
    this.logger.info(
      { provider: provider.name, before: tokens, after: reducedTokens, folded: run.length },
      "Session history summarized"
    );
    if (reducedTokens > budget) {
      throw this.overflow(provider, reducedTokens, budget, "History is still over budget after summarization");
    }
    return { messages: reduced, estimatedTokens: reducedTokens, budget, summarized: true, distilled: false, notices: [] };
  }

  /**
   * Oldest contiguous run of raw unpinned messages, leaving the newest
   * keepRecentMessages (pending included) untouched. A run never ends
   * between a tool call and its tool results.
   */
  private selectSummarizationRun(pendingCount: number): HistoryMessage[] {
    const raw = this.rawUnpinned();
    const total = raw.length + pendingCount;
    let cut = Math.min(raw.length, Math.max(0, total - this.policy.keepRecentMessages));
    while (cut > 0 && cut < raw.length && raw[cut]?.role === "tool") {
      cut++;
    }
    return raw.slice(0, cut);
  }

  private async summarize(
    run: HistoryMessage[],
    provider: ProviderConfig,
    summarizer: Summarizer,
    signal?: AbortSignal
  ): Promise<string> {
    const previous = this.summaryMessage();
    const lines: string[] = [];
    if (previous) {
      lines.push(`Previous summary:\n${previous.content.replace(SUMMARY_PREFIX, "").trim()}`, "");
    }
    for (const message of run) {
      const calls = message.toolCalls?.length
        ? ` [tool calls: ${message.toolCalls.map((tc) => tc.name).join(", ")}]`
        : "";
      lines.push(`${message.role.toUpperCase()}: ${truncate(message.content, MAX_TRANSCRIPT_MESSAGE_CHARS)}${calls}`);
    }

    const response = await summarizer(
      {
        messages: [
          { role: "system", content: SUMMARIZE_INSTRUCTION },
          { role: "user", content: lines.join("\n") },
        ],
        params: { maxTokens: this.policy.summaryMaxTokens, temperature: 0.2 },
      },
      signal
    );

    const text = response.content.trim();
    if (!text) throw new Error("Provider returned an empty summary");
    const tokens = estimateTextTokens(text, provider);
    if (tokens <= this.policy.summaryMaxTokens) return text;
    return text.slice(0, Math.floor((text.length * this.policy.summaryMaxTokens) / tokens));
  }

  /**
   * Fold a run into a fresh summary that takes the old summary's place, or
   * the first folded message's place when there is none yet.
   */
  private replaceWithSummary(run: HistoryMessage[], text: string): void {
    const folded = new Set(run.map((m) => m.seq));
    const summary: HistoryMessage = {
      role: "system",
      content: `${SUMMARY_PREFIX}\n${text}`,
      seq: this.nextSeq++,
      pinned: false,
      summary: true,
      timestamp: Date.now(),
    };

    const next: HistoryMessage[] = [];
    let placed = false;
    for (const entry of this.history) {
      const replaced = entry.summary || folded.has(entry.seq);
      if (replaced) {
        if (!placed) {
          next.push(summary);
          placed = true;
        }
        continue;
      }
      next.push(entry);
    }
    this.history = next;
  }

  // ==========================================================================
  // Distillation
  // ==========================================================================

  /**
   * Reduced context for a provider taking over mid-turn: summary, pinned
   * messages and only the most recent unpinned ones. History is untouched.
   */
  distill(provider: ProviderConfig, opts: { pending?: Message[] } = {}): PreparedContext {
    const pending = opts.pending ?? [];
    const budget = resolveTokenBudget(provider);
    const target = Math.floor(budget * this.policy.distillBudgetRatio);

    const fixed = [...this.systemMessages(), ...this.history.filter((m) => m.summary || m.pinned)];
    const fixedTokens = estimateTokens(fixed, provider);

    // Newest first: pending turn messages, then unpinned history
    const candidates: Array<Message | HistoryMessage> = [...pending].reverse();
    candidates.push(...this.rawUnpinned().reverse());

    const chosen: Array<Message | HistoryMessage> = [];
    let used = fixedTokens;
    for (const candidate of candidates) {
      if (chosen.length >= this.policy.distillWindow) break;
      const cost = estimateMessageTokens(candidate, provider);
      const limit = chosen.length === 0 ? budget : target;
      if (used + cost > limit) break;
      chosen.push(candidate);
      used += cost;
    }

    // A tool result without the call that produced it is rejected upstream
    while (chosen.length > 0 && chosen[chosen.length - 1]?.role === "tool") {
      const dropped = chosen.pop();
      if (dropped) used -= estimateMessageTokens(dropped, provider);
    }

    const keep = new Set(chosen);
    const messages: Message[] = [
      ...this.systemMessages(),
      ...this.history.filter((m) => m.summary || m.pinned || keep.has(m)).map(toWire),
      ...pending.filter((m) => keep.has(m)).map(toWire),
    ];
    const estimatedTokens = estimateTokens(messages, provider);

    const droppedPending = pending.some((m) => !keep.has(m));
    if (estimatedTokens > budget || droppedPending) {
      throw this.overflow(provider, Math.max(estimatedTokens, used), budget, "Pinned content does not fit the failover provider");
    }

    this.logger.info(
      { provider: provider.name, kept: chosen.length, estimatedTokens, budget },
      "Distilled context for failover provider"
    );
    return { messages, estimatedTokens, budget, summarized: false, distilled: true, notices: [] };
  }

  private overflow(provider: ProviderConfig, tokens: number, budget: number, message: string): OrchestrationError {
    this.logger.warn({ provider: provider.name, tokens, budget }, message);
    return new OrchestrationError("ContextOverflow", `${message} (${tokens} > ${budget} tokens for ${provider.name})`, {
      details: { provider: provider.name, tokens, budget },
    });
  }
}
