/**
 * Agent Module - Orchestration core
 *
 * Provider transports, retry and failover, context window management and
 * usage accounting behind a single engine facade.
 */

// Engine
export { OrchestrationEngine, defaultSessionName, type OrchestrationEngineConfig, type TurnResult } from "./engine.js";

// Errors
export { OrchestrationError, isOrchestrationError, type OrchestrationErrorKind } from "./errors.js";

// Providers
export {
  ProviderError,
  OpenAICompatibleTransport,
  OllamaTransport,
  classifyProviderError,
  coerceToProviderError,
  createTransport,
  isProviderError,
  type FailureReason,
} from "./providers.js";

// Retry and routing
export { RetryController, DEFAULT_RETRY_POLICY, type RetryInfo, type RetryPolicy } from "./retry.js";
export { ProviderRouter, type FailoverInfo, type ProviderAttempt, type RouterStateSnapshot } from "./router.js";

// Context
export {
  ContextWindowManager,
  DEFAULT_CONTEXT_POLICY,
  SUMMARY_PREFIX,
  type ContextPolicy,
  type PreparedContext,
} from "./context-manager.js";
export { getModelContextInfo, resolveTokenBudget } from "./context-window-registry.js";
export { estimateTokens, estimateMessageTokens, estimateTextTokens } from "./token-estimator.js";

// Usage
export { UsageLedger, DEFAULT_PRICING, DEFAULT_FALLBACK_PRICE, computeCost, resolvePrice } from "./usage-ledger.js";

export type * from "./types.js";
