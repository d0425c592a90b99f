/**
 * Token estimation
 *
 * No provider tokenizer is bundled, so every count here is an approximation
 * derived from character length. The ratios lean low and a 20% margin is
 * added on top so the estimate errs toward over-counting.
 */

import type { Message, ProviderType } from "./types.js";

const SAFETY_MARGIN = 1.2;

/** Framing tokens every chat message costs (role markers, separators). */
const PER_MESSAGE_OVERHEAD = 4;

const CHARS_PER_TOKEN: Record<ProviderType, number> = {
  openai: 4,
  groq: 3.8,
  gemini: 4,
  // Local models run assorted tokenizers; assume the densest
  ollama: 3.5,
};

const MOST_CONSERVATIVE_RATIO = Math.min(...Object.values(CHARS_PER_TOKEN));

function charsPerToken(provider?: { type: ProviderType }): number {
  if (!provider) return MOST_CONSERVATIVE_RATIO;
  return CHARS_PER_TOKEN[provider.type] ?? MOST_CONSERVATIVE_RATIO;
}

export function estimateTextTokens(text: string, provider?: { type: ProviderType }): number {
  if (!text) return 0;
  return Math.ceil((text.length / charsPerToken(provider)) * SAFETY_MARGIN);
}

function messageText(message: Message): string {
  if (!message.toolCalls || message.toolCalls.length === 0) return message.content;
  return message.content + JSON.stringify(message.toolCalls);
}

export function estimateMessageTokens(message: Message, provider?: { type: ProviderType }): number {
  return PER_MESSAGE_OVERHEAD + estimateTextTokens(messageText(message), provider);
}

/**
 * Approximate prompt size of a message list for one provider
 */
export function estimateTokens(messages: readonly Message[], provider?: { type: ProviderType }): number {
  let total = 0;
  for (const message of messages) {
    total += estimateMessageTokens(message, provider);
  }
  return total;
}
