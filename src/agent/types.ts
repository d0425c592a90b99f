/**
 * Core Types for the Switchyard orchestration core
 *
 * Shared shapes for messages, providers, transports and usage accounting.
 */

// ============================================================================
// Message Types
// ============================================================================

export type MessageRole = "system" | "user" | "assistant" | "tool";

/**
 * Tool call requested by a model. The core carries it opaquely.
 */
export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

/**
 * Message as handed to a provider transport
 */
export interface Message {
  role: MessageRole;
  content: string;
  toolCallId?: string;
  toolCalls?: ToolCall[];
  name?: string;
}

/**
 * Message as stored in a session history
 */
export interface HistoryMessage extends Message {
  /** Monotonically increasing per session; never reused. */
  seq: number;
  pinned: boolean;
  /** Marks the synthetic background summary. */
  summary?: boolean;
  timestamp: number;
}

// ============================================================================
// Provider Types
// ============================================================================

export type ProviderType = "gemini" | "openai" | "groq" | "ollama";

export type AuthMode = "api_key" | "none";

/**
 * USD per million tokens
 */
export interface ModelPrice {
  input: number;
  output: number;
}

/**
 * A configured remote endpoint, credentials already resolved
 */
export interface ProviderConfig {
  name: string;
  type: ProviderType;
  model: string;
  baseUrl?: string;
  auth: AuthMode;
  apiKey?: string;
  /** Overrides the model registry's history budget. */
  tokenBudget?: number;
  pricing?: Record<string, ModelPrice>;
}

export interface ChatParams {
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface ChatResponse {
  content: string;
  toolCalls?: ToolCall[];
  finishReason: "stop" | "tool_calls" | "length" | "error";
  usage?: TokenUsage;
}

/**
 * Wire-level capability for one provider kind. Failures are thrown as
 * ProviderError so the retry controller can classify them.
 */
export interface ProviderTransport {
  send(messages: Message[], model: string, params: ChatParams): Promise<ChatResponse>;
}

/**
 * A provider paired with the transport that talks to it
 */
export interface RoutedProvider {
  config: ProviderConfig;
  transport: ProviderTransport;
}

// ============================================================================
// Usage Types
// ============================================================================

export interface UsageSnapshot {
  inputTokens: number;
  outputTokens: number;
  estimatedCost: number;
  requests: number;
  budgetCeiling?: number;
}
