/**
 * Provider Failover Router
 *
 * Tries every provider once per request: the sticky provider first when a
 * backup has already proven itself this session, then the rest in priority
 * order. Each candidate gets its own prepared context and its own retry budget.
 */

import type { ChatParams, ChatResponse, RoutedProvider } from "./types.js";
import type { Logger } from "../log.js";
import type { PreparedContext } from "./context-manager.js";
import type { FailureReason } from "./providers.js";
import { OrchestrationError } from "./errors.js";
import type { RetryController } from "./retry.js";

export interface RouterState {
  stickyIndex?: number;
  failureCounts: Map<string, number>;
}

export interface PrepareRequest {
  provider: RoutedProvider;
  index: number;
  /** True for every candidate after the first one tried this pass. */
  distill: boolean;
  signal?: AbortSignal;
}

export type Preparer = (request: PrepareRequest) => Promise<PreparedContext>;

export interface ProviderAttempt {
  provider: string;
  index: number;
  reason: "fatal" | "exhausted";
  failure: FailureReason;
  attempts: number;
  status?: number;
  error: string;
}

export interface FailoverInfo {
  from: string;
  to: string;
  reason: "fatal" | "exhausted";
  failure: FailureReason;
  error: string;
}

export interface RouteRequest {
  prepare: Preparer;
  params?: Omit<ChatParams, "signal">;
  signal?: AbortSignal;
}

export type RouteResult =
  | {
      ok: true;
      response: ChatResponse;
      provider: RoutedProvider;
      index: number;
      prepared: PreparedContext;
      failures: ProviderAttempt[];
    }
  | { ok: false; error: OrchestrationError; failures: ProviderAttempt[] };

export interface RouterStateSnapshot {
  providers: string[];
  stickyIndex?: number;
  stickyProvider?: string;
  failureCounts: Record<string, number>;
}

function freshState(): RouterState {
  return { failureCounts: new Map() };
}

export class ProviderRouter {
  private providers: readonly RoutedProvider[];
  private state: RouterState = freshState();
  private readonly controller: RetryController;
  private readonly logger: Logger;
  private readonly onFailover?: (info: FailoverInfo) => void;

  constructor(params: {
    providers: readonly RoutedProvider[];
    controller: RetryController;
    logger: Logger;
    onFailover?: (info: FailoverInfo) => void;
  }) {
    this.providers = [...params.providers];
    this.controller = params.controller;
    this.logger = params.logger.child({ component: "router" });
    this.onFailover = params.onFailover;
  }

  /**
   * Swap the provider list and forget stickiness and failure counts
   */
  reload(providers: readonly RoutedProvider[]): void {
    this.providers = [...providers];
    this.state = freshState();
    this.logger.info(
      { providers: this.providers.map((p) => p.config.name) },
      "Provider list reloaded, routing state cleared"
    );
  }

  /**
   * Provider a new request would start from
   */
  activeProvider(): RoutedProvider | undefined {
    const index = this.startIndex(this.state, this.providers);
    return this.providers[index];
  }

  snapshot(): RouterStateSnapshot {
    const sticky = this.state.stickyIndex;
    return {
      providers: this.providers.map((p) => p.config.name),
      ...(sticky !== undefined
        ? { stickyIndex: sticky, stickyProvider: this.providers[sticky]?.config.name }
        : {}),
      failureCounts: Object.fromEntries(this.state.failureCounts),
    };
  }

  private startIndex(state: RouterState, providers: readonly RoutedProvider[]): number {
    const sticky = state.stickyIndex;
    return sticky !== undefined && sticky < providers.length ? sticky : 0;
  }

  private passOrder(start: number, count: number): number[] {
    const rest = Array.from({ length: count }, (_, i) => i).filter((i) => i !== start);
    return [start, ...rest];
  }

  async route(request: RouteRequest): Promise<RouteResult> {
    // A reload mid-request swaps both; this pass keeps working on what it started with
    const providers = this.providers;
    const state = this.state;
    const failures: ProviderAttempt[] = [];

    if (providers.length === 0) {
      return {
        ok: false,
        error: new OrchestrationError("AllProvidersExhausted", "No LLM providers are configured", {
          details: { failures },
        }),
        failures,
      };
    }

    const start = this.startIndex(state, providers);
    const order = this.passOrder(start, providers.length);
    for (const [position, index] of order.entries()) {
      const provider = providers[index];
      if (!provider) continue;
      const name = provider.config.name;

      const prepared = await request.prepare({
        provider,
        index,
        distill: index !== start,
        signal: request.signal,
      });

      const result = await this.controller.execute(
        { messages: prepared.messages, params: request.params },
        provider,
        { signal: request.signal }
      );

      if (result.ok) {
        state.failureCounts.set(name, 0);
        if (index > 0 && state.stickyIndex !== index) {
          this.logger.info({ provider: name, index }, "Backup provider is now sticky for this session");
        }
        state.stickyIndex = index > 0 ? index : undefined;
        return { ok: true, response: result.response, provider, index, prepared, failures };
      }

      const { escalate } = result;
      state.failureCounts.set(name, (state.failureCounts.get(name) ?? 0) + 1);
      failures.push({
        provider: name,
        index,
        reason: escalate.reason,
        failure: escalate.failure,
        attempts: escalate.attempts,
        status: escalate.error.status,
        error: escalate.error.message,
      });

      const nextIndex = order[position + 1];
      const next = nextIndex !== undefined ? providers[nextIndex] : undefined;
      this.logger.warn(
        {
          provider: name,
          reason: escalate.reason,
          failure: escalate.failure,
          consecutiveFailures: state.failureCounts.get(name),
          next: next?.config.name,
        },
        next ? "Provider escalated, failing over" : "Provider escalated, no providers left"
      );
      if (next) {
        this.onFailover?.({
          from: name,
          to: next.config.name,
          reason: escalate.reason,
          failure: escalate.failure,
          error: escalate.error.message,
        });
      }
    }

    // The next request starts over from the primary
    state.stickyIndex = undefined;
    const summary = failures.map((f) => `• ${f.provider}: ${f.error}`).join("\n");
    return {
      ok: false,
      error: new OrchestrationError("AllProvidersExhausted", `All providers failed:\n${summary}`, {
        details: { failures },
      }),
      failures,
    };
  }
}
