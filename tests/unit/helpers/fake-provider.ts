import type {
  ChatParams,
  ChatResponse,
  Message,
  ProviderConfig,
  ProviderTransport,
  RoutedProvider,
} from "../../../src/agent/types.js";
import { OrchestrationError } from "../../../src/agent/errors.js";
import { ProviderError } from "../../../src/agent/providers.js";
import type { SleepFn } from "../../../src/agent/retry.js";
import type { SessionData, SessionSnapshot, SessionStore } from "../../../src/runtime/session-store.js";

export type Step = ChatResponse | Error | ((messages: Message[], params: ChatParams) => Promise<ChatResponse>);

export interface RecordedCall {
  messages: Message[];
  model: string;
  params: ChatParams;
}

/**
 * Transport that plays back a fixed script, one step per call
 */
export class ScriptedTransport implements ProviderTransport {
  readonly calls: RecordedCall[] = [];
  private readonly steps: Step[];
  private readonly fallback?: Step;

  constructor(steps: Step[] = [], fallback?: Step) {
    this.steps = [...steps];
    this.fallback = fallback;
  }

  async send(messages: Message[], model: string, params: ChatParams): Promise<ChatResponse> {
    this.calls.push({ messages: messages.map((m) => ({ ...m })), model, params });
    const step = this.steps.shift() ?? this.fallback;
    if (!step) throw new Error("ScriptedTransport ran out of steps");
    if (typeof step === "function") return step(messages, params);
    if (step instanceof Error) throw step;
    return step;
  }
}

export function reply(content: string, usage?: { inputTokens: number; outputTokens: number }): ChatResponse {
  return { content, finishReason: "stop", ...(usage ? { usage } : {}) };
}

export function httpError(status: number, message = `HTTP ${status}`, suggestedDelayMs?: number): ProviderError {
  return new ProviderError(message, { status, ...(suggestedDelayMs !== undefined ? { suggestedDelayMs } : {}) });
}

export function makeProvider(
  name: string,
  transport: ProviderTransport,
  overrides: Partial<Omit<ProviderConfig, "name">> = {}
): RoutedProvider {
  return {
    config: { name, type: "openai", model: "gpt-4o-mini", auth: "none", ...overrides },
    transport,
  };
}

export const noSleep: SleepFn = async () => {};

/**
 * Sleep that never resolves on its own, only by abort
 */
export const hangingSleep: SleepFn = (_ms, signal) =>
  new Promise((_resolve, reject) => {
    signal?.addEventListener("abort", () => reject(signal.reason), { once: true });
  });

/**
 * In-process session store keyed by name
 */
export class MemorySessionStore implements SessionStore {
  readonly saved = new Map<string, SessionSnapshot>();

  async load(name: string): Promise<SessionSnapshot> {
    const snapshot = this.saved.get(name);
    if (!snapshot) throw new OrchestrationError("NotFound", `Session '${name}' not found`);
    return structuredClone(snapshot);
  }

  async save(name: string, data: SessionData): Promise<void> {
    this.saved.set(name, structuredClone({ name, savedAt: Date.now(), ...data }));
  }

  async list(): Promise<string[]> {
    return [...this.saved.keys()].sort();
  }

  async delete(name: string): Promise<void> {
    if (!this.saved.delete(name)) {
      throw new OrchestrationError("NotFound", `Session '${name}' not found`);
    }
  }
}
