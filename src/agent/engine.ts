/**
 * Orchestration Engine - facade the UI and tool layer talk to
 *
 * One turn is a sequential pipeline: budget gate, prepare context, route
 * across providers, record usage, commit history, persist in the background.
 * At most one turn per session is in flight.
 */

import type {
  HistoryMessage,
  Message,
  ModelPrice,
  RoutedProvider,
  TokenUsage,
  ToolCall,
  UsageSnapshot,
} from "./types.js";
import type { Logger } from "../log.js";
import type { SessionStore } from "../runtime/session-store.js";
import { ContextWindowManager, type ContextPolicy, type Summarizer } from "./context-manager.js";
import { OrchestrationError, cancelledError, errorMessage, isOrchestrationError } from "./errors.js";
import { RetryController, type RetryInfo, type RetryPolicy } from "./retry.js";
import { ProviderRouter, type FailoverInfo, type ProviderAttempt, type RouterStateSnapshot } from "./router.js";
import { estimateTextTokens, estimateTokens } from "./token-estimator.js";
import { DEFAULT_FALLBACK_PRICE, UsageLedger, resolvePrice } from "./usage-ledger.js";

export interface OrchestrationEngineConfig {
  providers: readonly RoutedProvider[];
  logger: Logger;
  systemPrompt?: string;
  temperature?: number;
  maxOutputTokens?: number;
  retry?: Partial<RetryPolicy>;
  context?: Partial<ContextPolicy>;
  fallbackPrice?: ModelPrice;
  /** Ceiling applied to new sessions; 0 or unset means no limit. */
  defaultBudget?: number;
  sessionStore?: SessionStore;
  /** Persist each session after every completed turn. */
  autosave?: boolean;
  /** Supply a preconfigured controller (tests inject a fake sleep). */
  controller?: RetryController;
  onRetry?: (info: RetryInfo) => void;
  onFailover?: (info: FailoverInfo) => void;
}

export type TurnResult =
  | {
      ok: true;
      content: string;
      toolCalls?: ToolCall[];
      provider: string;
      model: string;
      usage: TokenUsage;
      cost: number;
      userSeq: number;
      assistantSeq: number;
      summarized: boolean;
      distilled: boolean;
      failures: ProviderAttempt[];
      notices: OrchestrationError[];
    }
  | { ok: false; error: OrchestrationError; notices: OrchestrationError[] };

interface SessionState {
  id: string;
  context: ContextWindowManager;
  ledger: UsageLedger;
  inFlight?: AbortController;
  persisting: Promise<void>;
}

function formatUsd(value: number): string {
  return `$${value.toFixed(2)}`;
}

export function defaultSessionName(now = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_` +
    `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`
  );
}

export class OrchestrationEngine {
  private readonly logger: Logger;
  private readonly controller: RetryController;
  private readonly router: ProviderRouter;
  private readonly sessions = new Map<string, SessionState>();
  private readonly config: OrchestrationEngineConfig;
  private readonly fallbackPrice: ModelPrice;

  constructor(config: OrchestrationEngineConfig) {
    this.config = config;
    this.logger = config.logger.child({ component: "engine" });
    this.fallbackPrice = config.fallbackPrice ?? DEFAULT_FALLBACK_PRICE;
    this.controller =
      config.controller ??
      new RetryController({ logger: config.logger, policy: config.retry, onRetry: config.onRetry });
    this.router = new ProviderRouter({
      providers: config.providers,
      controller: this.controller,
      logger: config.logger,
      onFailover: config.onFailover,
    });
  }

  // ==========================================================================
  // Turns
  // ==========================================================================

  async submitTurn(
    sessionId: string,
    userMessage: string | Message,
    opts: { signal?: AbortSignal } = {}
  ): Promise<TurnResult> {
    const session = this.session(sessionId);
    const notices: OrchestrationError[] = [];

    if (session.inFlight) {
      return {
        ok: false,
        error: new OrchestrationError("TurnInProgress", `A turn is already in flight for session '${sessionId}'`),
        notices,
      };
    }

    if (session.ledger.isOverBudget()) {
      const usage = session.ledger.snapshot();
      this.logger.warn({ sessionId, cost: usage.estimatedCost, ceiling: usage.budgetCeiling }, "Session budget exceeded");
      return {
        ok: false,
        error: new OrchestrationError(
          "BudgetExceeded",
          `Session budget exceeded (${formatUsd(usage.estimatedCost)} >= ${formatUsd(usage.budgetCeiling ?? 0)})`,
          { details: { estimatedCost: usage.estimatedCost, budgetCeiling: usage.budgetCeiling } }
        ),
        notices,
      };
    }

    const abort = new AbortController();
    const external = opts.signal;
    const forwardAbort = () => abort.abort(external?.reason);
    if (external?.aborted) abort.abort(external.reason);
    external?.addEventListener("abort", forwardAbort, { once: true });
    session.inFlight = abort;

    const pending: Message[] = [typeof userMessage === "string" ? { role: "user", content: userMessage } : userMessage];

    try {
      const result = await this.router.route({
        prepare: async ({ provider, distill, signal }) => {
          const prepared = distill
            ? session.context.distill(provider.config, { pending })
            : await session.context.prepare(provider.config, {
                pending,
                signal,
                summarizer: this.summarizerFor(session),
              });
          notices.push(...prepared.notices);
          return prepared;
        },
        params: {
          temperature: this.config.temperature,
          ...(this.config.maxOutputTokens ? { maxTokens: this.config.maxOutputTokens } : {}),
        },
        signal: abort.signal,
      });

      if (!result.ok) {
        this.logger.error({ sessionId, failures: result.failures.length }, "Turn failed: all providers exhausted");
        return { ok: false, error: result.error, notices };
      }

      const { response, provider, prepared } = result;
      const usage = response.usage ?? {
        inputTokens: estimateTokens(prepared.messages, provider.config),
        outputTokens: estimateTextTokens(response.content, provider.config),
      };
      const cost = this.record(session, provider, usage);

      let userSeq = 0;
      for (const message of pending) {
        userSeq = session.context.append(message).seq;
      }
      const assistant = session.context.append({
        role: "assistant",
        content: response.content,
        ...(response.toolCalls ? { toolCalls: response.toolCalls } : {}),
      });
      this.schedulePersist(session);

      return {
        ok: true,
        content: response.content,
        ...(response.toolCalls ? { toolCalls: response.toolCalls } : {}),
        provider: provider.config.name,
        model: provider.config.model,
        usage,
        cost,
        userSeq,
        assistantSeq: assistant.seq,
        summarized: prepared.summarized,
        distilled: prepared.distilled,
        failures: result.failures,
        notices,
      };
    } catch (err) {
      if (isOrchestrationError(err)) {
        this.logger.warn({ sessionId, kind: err.kind, error: err.message }, "Turn failed");
        return { ok: false, error: err, notices };
      }
      if (abort.signal.aborted) {
        return { ok: false, error: cancelledError(err), notices };
      }
      this.logger.error({ sessionId, error: errorMessage(err) }, "Turn failed with unexpected error");
      return {
        ok: false,
        error: new OrchestrationError("Fatal", `Unexpected failure: ${errorMessage(err)}`, { cause: err }),
        notices,
      };
    } finally {
      external?.removeEventListener("abort", forwardAbort);
      session.inFlight = undefined;
    }
  }

  /**
   * Abort the in-flight turn of a session, if any
   */
  cancelTurn(sessionId: string): boolean {
    const inFlight = this.sessions.get(sessionId)?.inFlight;
    if (!inFlight) return false;
    inFlight.abort(cancelledError());
    return true;
  }

  isBusy(sessionId: string): boolean {
    return Boolean(this.sessions.get(sessionId)?.inFlight);
  }

  private summarizerFor(session: SessionState): Summarizer {
    return async (request, signal) => {
      const provider = this.router.activeProvider();
      if (!provider) throw new Error("No provider available for summarization");
      const result = await this.controller.execute(request, provider, { signal });
      if (!result.ok) throw result.escalate.error;
      const usage = result.response.usage ?? {
        inputTokens: estimateTokens(request.messages, provider.config),
        outputTokens: estimateTextTokens(result.response.content, provider.config),
      };
      this.record(session, provider, usage);
      return result.response;
    };
  }

  private record(session: SessionState, provider: RoutedProvider, usage: TokenUsage): number {
    const { price, source } = resolvePrice(provider.config, this.fallbackPrice);
    const cost = session.ledger.record(usage, price);
    this.logger.debug(
      { sessionId: session.id, provider: provider.config.name, ...usage, cost, priceSource: source },
      "Usage recorded"
    );
    return cost;
  }

  // ==========================================================================
  // History commands
  // ==========================================================================

  pin(sessionId: string, seq: number): HistoryMessage {
    const session = this.idleSession(sessionId);
    const entry = session.context.pin(seq);
    this.schedulePersist(session);
    return entry;
  }

  unpin(sessionId: string, seq: number): HistoryMessage {
    const session = this.idleSession(sessionId);
    const entry = session.context.unpin(seq);
    this.schedulePersist(session);
    return entry;
  }

  getHistory(sessionId: string): HistoryMessage[] {
    return this.session(sessionId).context.messages();
  }

  /**
   * Forget the conversation and zero the usage counters
   */
  clearSession(sessionId: string): void {
    const session = this.idleSession(sessionId);
    session.context.clear();
    session.ledger.reset();
    this.logger.info({ sessionId }, "Session cleared");
    this.schedulePersist(session);
  }

  // ==========================================================================
  // Providers and usage
  // ==========================================================================

  reloadProviders(providers: readonly RoutedProvider[]): void {
    this.router.reload(providers);
  }

  getRouterState(): RouterStateSnapshot {
    return this.router.snapshot();
  }

  setBudget(sessionId: string, ceiling: number): void {
    const session = this.session(sessionId);
    session.ledger.setBudget(ceiling);
    this.logger.info({ sessionId, ceiling }, "Session budget updated");
    this.schedulePersist(session);
  }

  getUsage(sessionId: string): UsageSnapshot {
    return this.session(sessionId).ledger.snapshot();
  }

  // ==========================================================================
  // Sessions
  // ==========================================================================

  async saveSession(sessionId: string, name: string = defaultSessionName()): Promise<string> {
    const store = this.requireStore();
    const session = this.session(sessionId);
    await store.save(name, { history: session.context.messages(), usage: session.ledger.snapshot() });
    this.logger.info({ sessionId, name }, "Session saved");
    return name;
  }

  async loadSession(sessionId: string, name: string): Promise<void> {
    const store = this.requireStore();
    const session = this.idleSession(sessionId);
    const snapshot = await store.load(name);
    session.context.restore(snapshot.history);
    session.ledger.restore(snapshot.usage);
    this.logger.info({ sessionId, name, messages: snapshot.history.length }, "Session loaded");
  }

  async listSessions(): Promise<string[]> {
    return this.requireStore().list();
  }

  async deleteSession(name: string): Promise<void> {
    await this.requireStore().delete(name);
    this.logger.info({ name }, "Session deleted");
  }

  /**
   * Wait for background persistence of every session to settle
   */
  async flush(): Promise<void> {
    await Promise.all(Array.from(this.sessions.values(), (s) => s.persisting));
  }

  private schedulePersist(session: SessionState): void {
    const store = this.config.sessionStore;
    if (!store || !this.config.autosave) return;
    const data = { history: session.context.messages(), usage: session.ledger.snapshot() };
    session.persisting = session.persisting
      .then(() => store.save(session.id, data))
      .catch((err: unknown) => {
        this.logger.warn({ sessionId: session.id, error: errorMessage(err) }, "Failed to persist session");
      });
  }

  private requireStore(): SessionStore {
    if (!this.config.sessionStore) {
      throw new Error("No session store is configured");
    }
    return this.config.sessionStore;
  }

  private session(sessionId: string): SessionState {
    let session = this.sessions.get(sessionId);
    if (!session) {
      const ledger = new UsageLedger();
      if (this.config.defaultBudget) ledger.setBudget(this.config.defaultBudget);
      session = {
        id: sessionId,
        context: new ContextWindowManager({
          logger: this.config.logger,
          policy: this.config.context,
          systemPrompt: this.config.systemPrompt,
        }),
        ledger,
        persisting: Promise.resolve(),
      };
      this.sessions.set(sessionId, session);
    }
    return session;
  }

  private idleSession(sessionId: string): SessionState {
    const session = this.session(sessionId);
    if (session.inFlight) {
      throw new OrchestrationError("TurnInProgress", `Session '${sessionId}' has a turn in flight`);
    }
    return session;
  }
}
