import type { ProviderConfig, RoutedProvider } from "../agent/types.js";
import { OrchestrationEngine } from "../agent/engine.js";
import { createTransport } from "../agent/providers.js";
import type { FailoverInfo } from "../agent/router.js";
import type { RetryInfo } from "../agent/retry.js";
import { loadConfig, type SwitchyardConfig } from "../config.js";
import { createLogger, type Logger } from "../log.js";
import { FileSessionStore } from "./session-store.js";

export interface EngineRuntime {
  config: SwitchyardConfig;
  engine: OrchestrationEngine;
  logger: Logger;
  /** Re-read the config file and swap in its provider list. */
  reloadProviders(): Promise<RoutedProvider[]>;
}

export function buildProviders(configs: readonly ProviderConfig[], logger: Logger): RoutedProvider[] {
  return configs.map((config) => ({ config, transport: createTransport(config, logger) }));
}

export function createEngineRuntime(
  cfg: SwitchyardConfig,
  opts: {
    /** Keep pino off stderr while a REPL owns the terminal. */
    consoleLogging?: boolean;
    onRetry?: (info: RetryInfo) => void;
    onFailover?: (info: FailoverInfo) => void;
  } = {}
): EngineRuntime {
  const logger = createLogger({
    level: cfg.logging.level,
    filePath: cfg.resolved.logFilePath,
    fileLevel: cfg.logging.fileLevel,
    console: opts.consoleLogging ?? false,
  });

  const engine = new OrchestrationEngine({
    providers: buildProviders(cfg.resolved.providers, logger),
    logger,
    systemPrompt: cfg.agent.systemPrompt,
    temperature: cfg.agent.temperature,
    maxOutputTokens: cfg.agent.maxOutputTokens,
    retry: cfg.retry,
    context: cfg.context,
    fallbackPrice: cfg.pricing.fallback,
    defaultBudget: cfg.budget.ceiling,
    sessionStore: new FileSessionStore(cfg.resolved.sessionsDir),
    autosave: cfg.sessions.autosave,
    onRetry: opts.onRetry,
    onFailover: opts.onFailover,
  });

  return {
    config: cfg,
    engine,
    logger,
    async reloadProviders() {
      const next = await loadConfig(cfg.resolved.configPath);
      const providers = buildProviders(next.resolved.providers, logger);
      engine.reloadProviders(providers);
      return providers;
    },
  };
}
