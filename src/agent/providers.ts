/**
 * Provider transports and error classification
 *
 * Features:
 * - OpenAI-compatible chat completions (OpenAI, Groq, Gemini's compat endpoint)
 * - Ollama native chat API
 * - Structured ProviderError with an optional suggested retry delay
 * - Transient vs fatal classification used by the retry controller
 */

import { z } from "zod";

import type {
  ChatParams,
  ChatResponse,
  Message,
  ProviderConfig,
  ProviderTransport,
  ProviderType,
  ToolCall,
} from "./types.js";
import type { Logger } from "../log.js";

// ============================================================================
// Provider Errors
// ============================================================================

export type FailureReason =
  | "rate_limit"
  | "server"
  | "timeout"
  | "network"
  | "auth"
  | "quota"
  | "format"
  | "unknown";

export type ErrorClass = "transient" | "fatal";

export class ProviderError extends Error {
  readonly status?: number;
  readonly code?: string;
  readonly providerName?: string;
  /** Wait duration the provider asked for, parsed by the transport. */
  readonly suggestedDelayMs?: number;

  constructor(
    message: string,
    params: {
      status?: number;
      code?: string;
      providerName?: string;
      suggestedDelayMs?: number;
      cause?: unknown;
    } = {}
  ) {
    super(message, { cause: params.cause });
    this.name = "ProviderError";
    this.status = params.status;
    this.code = params.code;
    this.providerName = params.providerName;
    this.suggestedDelayMs = params.suggestedDelayMs;
  }
}

export function isProviderError(err: unknown): err is ProviderError {
  return err instanceof ProviderError;
}

function getStatusCode(err: unknown): number | undefined {
  if (!err || typeof err !== "object") return undefined;
  const candidate =
    ("status" in err ? err.status : undefined) ??
    ("statusCode" in err ? err.statusCode : undefined);
  if (typeof candidate === "number") return candidate;
  if (typeof candidate === "string" && /^\d+$/.test(candidate)) {
    return Number(candidate);
  }
  return undefined;
}

function getErrorCode(err: unknown): string | undefined {
  if (!err || typeof err !== "object") return undefined;
  const candidate = "code" in err ? err.code : undefined;
  if (typeof candidate === "string" && candidate.trim()) return candidate.trim();
  // undici wraps socket failures: TypeError("fetch failed", { cause: { code } })
  const cause = "cause" in err ? err.cause : undefined;
  if (cause && cause !== err) return getErrorCode(cause);
  return undefined;
}

function getErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  if (err && typeof err === "object" && "message" in err && typeof err.message === "string") {
    return err.message;
  }
  return String(err);
}

/**
 * Wrap anything a transport threw into a ProviderError
 */
export function coerceToProviderError(err: unknown, providerName?: string): ProviderError {
  if (isProviderError(err)) return err;
  return new ProviderError(getErrorMessage(err) || "Unknown provider error", {
    status: getStatusCode(err),
    code: getErrorCode(err),
    providerName,
    cause: err,
  });
}

type ErrorPattern = RegExp | string;
const ERROR_PATTERNS = {
  // Hard limits that will not clear by waiting a few seconds
  quota: ["quota", "daily", "exceeded your current", "insufficient credits", "billing", "payment required"],
  rateLimit: [/rate[_ ]limit/, "too many requests", /\b429\b/, "overloaded", "resource has been exhausted"],
  timeout: ["timeout", "timed out", "deadline exceeded"],
  auth: [/invalid[_ ]?api[_ ]?key/, "unauthorized", "forbidden", "authentication", /\b401\b/, /\b403\b/],
  server: [/\b50[0-4]\b/, "internal server error", "service unavailable", "bad gateway"],
} as const;

const NETWORK_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ETIMEDOUT",
  "ESOCKETTIMEDOUT",
  "EPIPE",
  "EAI_AGAIN",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
]);

function matchesErrorPatterns(raw: string, patterns: readonly ErrorPattern[]): boolean {
  if (!raw) return false;
  const value = raw.toLowerCase();
  return patterns.some((pattern) =>
    pattern instanceof RegExp ? pattern.test(value) : value.includes(pattern)
  );
}

/**
 * Decide whether a provider failure is worth retrying on the same provider.
 */
export function classifyProviderError(err: ProviderError): { errorClass: ErrorClass; reason: FailureReason } {
  const { status, message } = err;

  if (status === 402 || matchesErrorPatterns(message, ERROR_PATTERNS.quota)) {
    return { errorClass: "fatal", reason: "quota" };
  }
  if (status !== undefined) {
    if (status === 401 || status === 403) return { errorClass: "fatal", reason: "auth" };
    if (status === 429) return { errorClass: "transient", reason: "rate_limit" };
    if (status === 408) return { errorClass: "transient", reason: "timeout" };
    if (status >= 500) return { errorClass: "transient", reason: "server" };
    return { errorClass: "fatal", reason: "format" };
  }

  const code = (err.code ?? "").toUpperCase();
  if (NETWORK_CODES.has(code)) return { errorClass: "transient", reason: "network" };
  if (matchesErrorPatterns(message, ERROR_PATTERNS.rateLimit)) {
    return { errorClass: "transient", reason: "rate_limit" };
  }
  if (matchesErrorPatterns(message, ERROR_PATTERNS.timeout)) {
    return { errorClass: "transient", reason: "timeout" };
  }
  if (matchesErrorPatterns(message, ERROR_PATTERNS.server)) {
    return { errorClass: "transient", reason: "server" };
  }
  if (matchesErrorPatterns(message, ERROR_PATTERNS.auth)) {
    return { errorClass: "fatal", reason: "auth" };
  }
  return { errorClass: "fatal", reason: "unknown" };
}

// ============================================================================
// Retry Hints
// ============================================================================

export function parseRetryAfterMs(value: string | null | undefined, assumeSeconds = true): number | undefined {
  const normalized = (value ?? "").trim();
  if (!normalized) return undefined;

  const numeric = Number(normalized);
  if (Number.isFinite(numeric) && numeric >= 0) {
    return Math.floor(assumeSeconds ? numeric * 1000 : numeric);
  }

  const dateMs = Date.parse(normalized);
  if (!Number.isNaN(dateMs)) {
    return Math.max(0, dateMs - Date.now());
  }
  return undefined;
}

const BODY_RETRY_DELAY_RE = /"retryDelay"\s*:\s*"(\d+(?:\.\d+)?)s"/;
const BODY_TRY_AGAIN_RE = /(?:try again|retry) (?:in|after) (\d+(?:\.\d+)?)\s*(ms|s)\b/i;

/**
 * Pull a provider-suggested wait out of response headers or the error body
 */
export function extractSuggestedDelayMs(headers: Headers | undefined, body: string): number | undefined {
  const fromHeaders =
    parseRetryAfterMs(headers?.get("retry-after-ms"), false) ??
    parseRetryAfterMs(headers?.get("retry-after"), true);
  if (fromHeaders !== undefined) return fromHeaders;

  const gemini = body.match(BODY_RETRY_DELAY_RE);
  if (gemini?.[1]) return Math.floor(Number(gemini[1]) * 1000);

  const text = body.match(BODY_TRY_AGAIN_RE);
  if (text?.[1]) {
    const value = Number(text[1]);
    return Math.floor(text[2]?.toLowerCase() === "ms" ? value : value * 1000);
  }
  return undefined;
}

async function failedResponseError(response: Response, label: string, providerName: string): Promise<ProviderError> {
  const body = await response.text().catch(() => "");
  return new ProviderError(`${label} API error: ${response.status} - ${body.slice(0, 500)}`, {
    status: response.status,
    providerName,
    suggestedDelayMs: extractSuggestedDelayMs(response.headers, body),
  });
}

async function postJson(url: string, init: { headers: Record<string, string>; body: unknown; signal?: AbortSignal }, providerName: string): Promise<Response> {
  try {
    return await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...init.headers },
      body: JSON.stringify(init.body),
      ...(init.signal ? { signal: init.signal } : {}),
    });
  } catch (err) {
    // Let cancellation surface untouched so the controller can tell it apart
    if (init.signal?.aborted) throw err;
    throw coerceToProviderError(err, providerName);
  }
}

// ============================================================================
// OpenAI-compatible Transport
// ============================================================================

const DEFAULT_BASE_URLS: Record<Exclude<ProviderType, "ollama">, string> = {
  openai: "https://api.openai.com/v1",
  groq: "https://api.groq.com/openai/v1",
  gemini: "https://generativelanguage.googleapis.com/v1beta/openai",
};

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          tool_calls: z
            .array(
              z.object({
                id: z.string(),
                function: z.object({ name: z.string(), arguments: z.string() }),
              })
            )
            .nullish(),
        }),
        finish_reason: z.string().nullish(),
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
    })
    .nullish(),
});

interface OpenAICompatibleOptions {
  name: string;
  type: Exclude<ProviderType, "ollama">;
  baseUrl?: string;
  apiKey?: string;
  logger: Logger;
}

export class OpenAICompatibleTransport implements ProviderTransport {
  private readonly name: string;
  private readonly baseUrl: string;
  private readonly apiKey?: string;
  private readonly logger: Logger;

  constructor(options: OpenAICompatibleOptions) {
    this.name = options.name;
    this.baseUrl = (options.baseUrl || DEFAULT_BASE_URLS[options.type]).replace(/\/$/, "");
    this.apiKey = options.apiKey;
    this.logger = options.logger;
  }

  async send(messages: Message[], model: string, params: ChatParams): Promise<ChatResponse> {
    const body: Record<string, unknown> = {
      model,
      messages: messages.map((m) => ({
        role: m.role,
        content: m.content,
        ...(m.toolCallId && { tool_call_id: m.toolCallId }),
        ...(m.toolCalls && {
          tool_calls: m.toolCalls.map((tc) => ({
            id: tc.id,
            type: "function" as const,
            function: { name: tc.name, arguments: JSON.stringify(tc.arguments) },
          })),
        }),
        ...(m.name && { name: m.name }),
      })),
      temperature: params.temperature ?? 0.2,
    };
    if (params.maxTokens) {
      body.max_tokens = params.maxTokens;
    }

    this.logger.debug(
      { provider: this.name, model, messageCount: messages.length },
      "OpenAI-compatible chat call started"
    );

    const headers: Record<string, string> = this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {};
    const response = await postJson(
      `${this.baseUrl}/chat/completions`,
      { headers, body, signal: params.signal },
      this.name
    );
    if (!response.ok) {
      throw await failedResponseError(response, "OpenAI-compatible", this.name);
    }

    const parsed = ChatCompletionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ProviderError(`Malformed chat completion from ${this.name}: ${parsed.error.message}`, {
        status: 502,
        providerName: this.name,
      });
    }

    const data = parsed.data;
    const choice = data.choices[0];
    const toolCalls: ToolCall[] | undefined = choice.message.tool_calls?.map((tc) => ({
      id: tc.id,
      name: tc.function.name,
      arguments: parseArguments(tc.function.arguments),
    }));

    this.logger.debug(
      { provider: this.name, model, finishReason: choice.finish_reason, usage: data.usage },
      "OpenAI-compatible chat call completed"
    );

    return {
      content: choice.message.content ?? "",
      toolCalls: toolCalls && toolCalls.length > 0 ? toolCalls : undefined,
      finishReason: mapFinishReason(choice.finish_reason),
      usage: data.usage
        ? { inputTokens: data.usage.prompt_tokens, outputTokens: data.usage.completion_tokens }
        : undefined,
    };
  }
}

function parseArguments(args: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(args);
    return parsed && typeof parsed === "object" && !Array.isArray(parsed)
      ? Object.fromEntries(Object.entries(parsed))
      : {};
  } catch {
    return {};
  }
}

function mapFinishReason(reason: string | null | undefined): ChatResponse["finishReason"] {
  switch (reason) {
    case "tool_calls":
    case "function_call":
      return "tool_calls";
    case "length":
      return "length";
    default:
      return "stop";
  }
}

// ============================================================================
// Ollama Transport
// ============================================================================

const OllamaChatSchema = z.object({
  message: z.object({ content: z.string() }),
  done_reason: z.string().nullish(),
  prompt_eval_count: z.number().nullish(),
  eval_count: z.number().nullish(),
});

export class OllamaTransport implements ProviderTransport {
  private readonly name: string;
  private readonly baseUrl: string;
  private readonly logger: Logger;

  constructor(options: { name: string; baseUrl?: string; logger: Logger }) {
    this.name = options.name;
    this.baseUrl = (options.baseUrl || "http://localhost:11434").replace(/\/$/, "");
    this.logger = options.logger;
  }

  async send(messages: Message[], model: string, params: ChatParams): Promise<ChatResponse> {
    const body = {
      model,
      messages: messages.map((m) => ({ role: m.role, content: m.content })),
      stream: false,
      options: {
        temperature: params.temperature ?? 0.2,
        ...(params.maxTokens ? { num_predict: params.maxTokens } : {}),
      },
    };

    this.logger.debug({ provider: this.name, model, messageCount: messages.length }, "Ollama chat call started");

    const response = await postJson(`${this.baseUrl}/api/chat`, { headers: {}, body, signal: params.signal }, this.name);
    if (!response.ok) {
      throw await failedResponseError(response, "Ollama", this.name);
    }

    const parsed = OllamaChatSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ProviderError(`Malformed Ollama response from ${this.name}: ${parsed.error.message}`, {
        status: 502,
        providerName: this.name,
      });
    }

    const data = parsed.data;
    const hasUsage = typeof data.prompt_eval_count === "number" && typeof data.eval_count === "number";
    return {
      content: data.message.content,
      finishReason: data.done_reason === "length" ? "length" : "stop",
      usage: hasUsage
        ? { inputTokens: data.prompt_eval_count ?? 0, outputTokens: data.eval_count ?? 0 }
        : undefined,
    };
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createTransport(config: ProviderConfig, logger: Logger): ProviderTransport {
  switch (config.type) {
    case "ollama":
      return new OllamaTransport({ name: config.name, baseUrl: config.baseUrl, logger });
    case "openai":
    case "groq":
    case "gemini":
      return new OpenAICompatibleTransport({
        name: config.name,
        type: config.type,
        baseUrl: config.baseUrl,
        apiKey: config.auth === "api_key" ? config.apiKey : undefined,
        logger,
      });
  }
}
