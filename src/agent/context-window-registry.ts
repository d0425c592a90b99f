/**
 * Model Context Window Registry
 *
 * Maps model names to their context window sizes and the share of that
 * window history may occupy (the rest is reserved for the reply).
 */

export interface ModelContextInfo {
  contextWindow: number;
  maxHistoryTokens: number;
  label?: string;
}

export const MODEL_CONTEXT_REGISTRY: Record<string, ModelContextInfo> = {
  // OpenAI
  "gpt-4o": { contextWindow: 128_000, maxHistoryTokens: 96_000, label: "OpenAI GPT-4o" },
  "gpt-4o-mini": { contextWindow: 128_000, maxHistoryTokens: 96_000, label: "OpenAI GPT-4o mini" },
  "gpt-4.1": { contextWindow: 1_000_000, maxHistoryTokens: 750_000, label: "OpenAI GPT-4.1" },
  "gpt-4": { contextWindow: 8_192, maxHistoryTokens: 6_000, label: "OpenAI GPT-4" },

  // Google Gemini
  "gemini-2.5-flash": { contextWindow: 1_000_000, maxHistoryTokens: 750_000, label: "Gemini 2.5 Flash" },
  "gemini-2.0-flash": { contextWindow: 1_000_000, maxHistoryTokens: 750_000, label: "Gemini 2.0 Flash" },
  "gemini-1.5-pro": { contextWindow: 2_000_000, maxHistoryTokens: 1_500_000, label: "Gemini 1.5 Pro" },
  "gemini-1.5-flash": { contextWindow: 1_000_000, maxHistoryTokens: 750_000, label: "Gemini 1.5 Flash" },

  // Groq-hosted and local open models
  "llama-3.3-70b-versatile": { contextWindow: 128_000, maxHistoryTokens: 96_000, label: "Llama 3.3 70B (Groq)" },
  "openai/gpt-oss-120b": { contextWindow: 131_072, maxHistoryTokens: 98_000, label: "GPT-OSS 120B" },
  "llama3.1": { contextWindow: 128_000, maxHistoryTokens: 96_000, label: "Llama 3.1" },
  "llama3": { contextWindow: 8_192, maxHistoryTokens: 6_000, label: "Llama 3" },
  "mistral": { contextWindow: 32_768, maxHistoryTokens: 24_000, label: "Mistral" },
  "qwen2.5-coder": { contextWindow: 32_768, maxHistoryTokens: 24_000, label: "Qwen 2.5 Coder" },
};

/**
 * Conservative fallback for unknown models
 */
export const DEFAULT_CONTEXT_INFO: ModelContextInfo = {
  contextWindow: 32_768,
  maxHistoryTokens: 24_000,
  label: "Unknown Model (assuming 32K)",
};

export function getModelContextInfo(modelName: string): ModelContextInfo {
  if (!modelName) return DEFAULT_CONTEXT_INFO;

  const exact = MODEL_CONTEXT_REGISTRY[modelName];
  if (exact) return exact;

  // Longest key contained in the name wins, so "gpt-4o-mini-2024" maps to gpt-4o-mini
  const lower = modelName.toLowerCase();
  let best: { key: string; info: ModelContextInfo } | undefined;
  for (const [key, info] of Object.entries(MODEL_CONTEXT_REGISTRY)) {
    if (lower.includes(key) && (!best || key.length > best.key.length)) {
      best = { key, info };
    }
  }
  if (best) return best.info;

  if (lower.includes("gemini")) return MODEL_CONTEXT_REGISTRY["gemini-1.5-flash"] ?? DEFAULT_CONTEXT_INFO;
  return DEFAULT_CONTEXT_INFO;
}

/**
 * History budget for a provider: explicit override first, then the registry
 */
export function resolveTokenBudget(provider: { model: string; tokenBudget?: number }): number {
  if (provider.tokenBudget && provider.tokenBudget > 0) return provider.tokenBudget;
  return getModelContextInfo(provider.model).maxHistoryTokens;
}
