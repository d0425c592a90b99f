import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { z } from "zod";

import type { ProviderConfig } from "./agent/types.js";

const DEFAULT_CONFIG_PATH = "switchyard.config.json";

const PriceSchema = z.object({
  input: z.number().min(0),
  output: z.number().min(0),
});

const ProviderItemSchema = z
  .object({
    name: z.string().min(1),
    type: z.enum(["gemini", "openai", "groq", "ollama"]),
    model: z.string().min(1),
    baseUrl: z.string().url().optional(),
    auth: z.enum(["api_key", "none"]).optional(),
    /** Literal key or an environment reference: `$VAR`, `${VAR}` or `env:VAR`. */
    apiKey: z.string().optional(),
    tokenBudget: z.number().int().positive().optional(),
    pricing: z.record(PriceSchema).optional(),
  });

const RetrySchema = z.object({
  maxRetries: z.number().int().min(0).default(10),
  baseDelayMs: z.number().int().min(0).default(1000),
  maxDelayMs: z.number().int().positive().default(30_000),
  jitterMs: z.number().int().min(0).default(1000),
});

const ContextSchema = z.object({
  minHistoryMessages: z.number().int().positive().default(40),
  keepRecentMessages: z.number().int().min(0).default(10),
  summaryMaxTokens: z.number().int().positive().default(600),
  distillWindow: z.number().int().positive().default(10),
  distillBudgetRatio: z.number().gt(0).max(1).default(0.5),
});

const BudgetSchema = z.object({
  /** USD per session; 0 disables the gate. */
  ceiling: z.number().min(0).default(0),
});

const PricingSchema = z.object({
  fallback: PriceSchema.default({ input: 0.5, output: 1.5 }),
});

const AgentSchema = z.object({
  systemPrompt: z.string().optional(),
  temperature: z.number().min(0).max(2).default(0.2),
  maxOutputTokens: z.number().int().positive().optional(),
});

const SessionsSchema = z.object({
  dir: z.string().optional(),
  autosave: z.boolean().default(true),
});

const LogLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "silent"]);

const LoggingSchema = z.object({
  level: LogLevelSchema.default("info"),
  filePath: z.string().optional(),
  fileLevel: LogLevelSchema.optional(),
});

const ConfigSchema = z
  .object({
    workspaceDir: z.string().default("."),
    stateDir: z.string().optional(),
    providers: z.array(ProviderItemSchema).default([]),
    /** Provider names in failover order; defaults to declaration order. */
    providerOrder: z.array(z.string().min(1)).optional(),
    retry: RetrySchema.default({}),
    context: ContextSchema.default({}),
    budget: BudgetSchema.default({}),
    pricing: PricingSchema.default({}),
    agent: AgentSchema.default({}),
    sessions: SessionsSchema.default({}),
    logging: LoggingSchema.default({}),
  })
  .superRefine((value, ctx) => {
    const seen = new Set<string>();
    for (const provider of value.providers) {
      if (seen.has(provider.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate provider name '${provider.name}'` });
      }
      seen.add(provider.name);
    }
    for (const name of value.providerOrder ?? []) {
      if (!seen.has(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["providerOrder"],
          message: `providerOrder names unknown provider '${name}'`,
        });
      }
    }
  });

export type SwitchyardConfigInput = z.input<typeof ConfigSchema>;

export type SwitchyardConfig = z.infer<typeof ConfigSchema> & {
  resolved: {
    configPath: string;
    workspaceDir: string;
    stateDir: string;
    sessionsDir: string;
    logFilePath: string;
    /** Providers in failover order with credentials resolved. */
    providers: ProviderConfig[];
    /** Providers expecting a key whose reference resolved to nothing. */
    missingCredentials: string[];
  };
};

export async function loadConfig(
  explicitPath?: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<SwitchyardConfig> {
  const configPath = resolveConfigPath(explicitPath, env);
  let raw: string;
  try {
    raw = await fs.readFile(configPath, "utf-8");
  } catch (err) {
    throw new Error(`Cannot read config file: ${configPath}`, { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new Error(`Config file is not valid JSON: ${configPath}`, { cause: err });
  }
  return parseConfig(parsed, { configPath, env });
}

export function parseConfig(
  input: unknown,
  opts: { configPath?: string; env?: NodeJS.ProcessEnv } = {}
): SwitchyardConfig {
  const base = ConfigSchema.parse(input);
  return resolveConfig(base, opts.configPath ?? path.resolve(DEFAULT_CONFIG_PATH), opts.env ?? process.env);
}

export function resolveConfigPath(explicitPath?: string, env: NodeJS.ProcessEnv = process.env): string {
  const envPath = env.SWITCHYARD_CONFIG?.trim();
  const pathToUse = explicitPath?.trim() || envPath || DEFAULT_CONFIG_PATH;
  return path.resolve(pathToUse);
}

/**
 * Expand `$VAR`, `${VAR}` and `env:VAR`; anything else is a literal value
 */
export function resolveCredential(value: string | undefined, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const trimmed = value?.trim();
  if (!trimmed) return undefined;
  const match =
    trimmed.match(/^\$\{([A-Za-z_][A-Za-z0-9_]*)\}$/) ??
    trimmed.match(/^\$([A-Za-z_][A-Za-z0-9_]*)$/) ??
    trimmed.match(/^env:([A-Za-z_][A-Za-z0-9_]*)$/);
  if (!match) return trimmed;
  const name = match[1] ?? "";
  return env[name]?.trim() || undefined;
}

function resolveConfig(
  base: z.infer<typeof ConfigSchema>,
  configPath: string,
  env: NodeJS.ProcessEnv
): SwitchyardConfig {
  const workspaceDir = resolveUserPath(base.workspaceDir, path.dirname(configPath));
  const stateDir = resolveUserPath(base.stateDir?.trim() || path.join(workspaceDir, ".switchyard"), workspaceDir);
  const sessionsDir = resolveUserPath(base.sessions.dir?.trim() || path.join(stateDir, "sessions"), workspaceDir);
  const logFilePath = resolveUserPath(
    base.logging.filePath?.trim() || path.join(stateDir, "switchyard.log"),
    workspaceDir
  );

  const { providers, missingCredentials } = resolveProviders(base, env);

  return {
    ...base,
    resolved: {
      configPath,
      workspaceDir,
      stateDir,
      sessionsDir,
      logFilePath,
      providers,
      missingCredentials,
    },
  };
}

function resolveProviders(
  base: z.infer<typeof ConfigSchema>,
  env: NodeJS.ProcessEnv
): { providers: ProviderConfig[]; missingCredentials: string[] } {
  const byName = new Map(base.providers.map((p) => [p.name, p]));
  const order = base.providerOrder ?? base.providers.map((p) => p.name);
  const providers: ProviderConfig[] = [];
  const missingCredentials: string[] = [];

  for (const name of order) {
    const item = byName.get(name);
    if (!item) continue;
    const auth = item.auth ?? (item.type === "ollama" ? "none" : "api_key");
    const apiKey = auth === "api_key" ? resolveCredential(item.apiKey, env) : undefined;
    if (auth === "api_key" && !apiKey) missingCredentials.push(name);
    providers.push({
      name: item.name,
      type: item.type,
      model: item.model,
      auth,
      ...(item.baseUrl ? { baseUrl: item.baseUrl } : {}),
      ...(apiKey ? { apiKey } : {}),
      ...(item.tokenBudget ? { tokenBudget: item.tokenBudget } : {}),
      ...(item.pricing ? { pricing: item.pricing } : {}),
    });
  }
  return { providers, missingCredentials };
}

function resolveUserPath(value: string, baseDir?: string): string {
  const trimmed = value.trim();
  if (!trimmed) return trimmed;
  if (trimmed === "~") return os.homedir();
  if (trimmed.startsWith("~/")) return path.join(os.homedir(), trimmed.slice(2));
  if (path.isAbsolute(trimmed)) return path.normalize(trimmed);
  return baseDir ? path.resolve(baseDir, trimmed) : path.resolve(trimmed);
}
