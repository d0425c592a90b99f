/**
 * Retry/Backoff Controller
 *
 * Runs one logical request against one provider. Transient failures are
 * retried locally with a provider hint or exponential backoff; fatal ones and
 * exhausted retries come back as an escalation for the router to act on.
 */

import { setTimeout as sleepFor } from "node:timers/promises";

import type { ChatParams, ChatResponse, Message, RoutedProvider } from "./types.js";
import type { Logger } from "../log.js";
import { cancelledError } from "./errors.js";
import {
  classifyProviderError,
  coerceToProviderError,
  type FailureReason,
  type ProviderError,
} from "./providers.js";

export interface RetryPolicy {
  /** Retries after the first call; the request is sent at most maxRetries + 1 times. */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 10,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
  jitterMs: 1000,
};

export interface ChatRequest {
  messages: Message[];
  params?: Omit<ChatParams, "signal">;
}

export interface Escalation {
  reason: "fatal" | "exhausted";
  failure: FailureReason;
  error: ProviderError;
  attempts: number;
}

export type ExecuteResult =
  | { ok: true; response: ChatResponse; attempts: number }
  | { ok: false; escalate: Escalation };

export interface RetryInfo {
  provider: string;
  attempt: number;
  maxRetries: number;
  delayMs: number;
  reason: FailureReason;
  error: ProviderError;
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryControllerOptions {
  logger: Logger;
  policy?: Partial<RetryPolicy>;
  onRetry?: (info: RetryInfo) => void;
  /** Injected for tests; defaults to an abortable timer. */
  sleep?: SleepFn;
  random?: () => number;
}

const abortableSleep: SleepFn = async (ms, signal) => {
  await sleepFor(ms, undefined, signal ? { signal } : undefined);
};

export class RetryController {
  readonly policy: RetryPolicy;
  private readonly logger: Logger;
  private readonly onRetry?: (info: RetryInfo) => void;
  private readonly sleep: SleepFn;
  private readonly random: () => number;

  constructor(options: RetryControllerOptions) {
    this.policy = { ...DEFAULT_RETRY_POLICY, ...options.policy };
    this.logger = options.logger.child({ component: "retry" });
    this.onRetry = options.onRetry;
    this.sleep = options.sleep ?? abortableSleep;
    this.random = options.random ?? Math.random;
  }

  /**
   * Delay before retry number `attempt + 1`
   */
  computeDelay(attempt: number, error: ProviderError): number {
    const { baseDelayMs, maxDelayMs, jitterMs } = this.policy;
    if (error.suggestedDelayMs !== undefined) {
      return Math.min(Math.max(0, error.suggestedDelayMs), maxDelayMs);
    }
    const exponential = baseDelayMs * Math.pow(2, attempt);
    const jitter = Math.floor(this.random() * jitterMs);
    return Math.min(exponential + jitter, maxDelayMs);
  }

  async execute(
    request: ChatRequest,
    provider: RoutedProvider,
    opts: { signal?: AbortSignal } = {}
  ): Promise<ExecuteResult> {
    const { signal } = opts;
    const name = provider.config.name;

    for (let attempt = 0; ; attempt++) {
      if (signal?.aborted) throw cancelledError(signal.reason);

      try {
        const response = await provider.transport.send(request.messages, provider.config.model, {
          ...request.params,
          signal,
        });
        if (attempt > 0) {
          this.logger.info({ provider: name, attempts: attempt + 1 }, "Provider recovered after retry");
        }
        return { ok: true, response, attempts: attempt + 1 };
      } catch (err) {
        if (signal?.aborted) throw cancelledError(err);

        const error = coerceToProviderError(err, name);
        const { errorClass, reason } = classifyProviderError(error);

        if (errorClass === "fatal") {
          this.logger.warn(
            { provider: name, reason, status: error.status, error: error.message },
            "Fatal provider error, escalating"
          );
          return { ok: false, escalate: { reason: "fatal", failure: reason, error, attempts: attempt + 1 } };
        }

        if (attempt >= this.policy.maxRetries) {
          this.logger.warn(
            { provider: name, reason, attempts: attempt + 1, error: error.message },
            "Retry attempts exhausted, escalating"
          );
          return { ok: false, escalate: { reason: "exhausted", failure: reason, error, attempts: attempt + 1 } };
        }

        const delayMs = this.computeDelay(attempt, error);
        this.logger.warn(
          { provider: name, reason, attempt: attempt + 1, maxRetries: this.policy.maxRetries, delayMs },
          "Transient provider error, retrying"
        );
        this.onRetry?.({
          provider: name,
          attempt: attempt + 1,
          maxRetries: this.policy.maxRetries,
          delayMs,
          reason,
          error,
        });

        try {
          await this.sleep(delayMs, signal);
        } catch (sleepErr) {
          if (signal?.aborted) throw cancelledError(sleepErr);
          throw sleepErr;
        }
      }
    }
  }
}
