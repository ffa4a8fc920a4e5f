// src/features/context-window/tokens.ts

import type { ChatMessage } from '../../types.js';

export const DEFAULT_CHARS_PER_TOKEN = 4;

// Role and framing overhead per message.
const MESSAGE_OVERHEAD_TOKENS = 4;

/**
 * Estimates token count from text
 */
export function estimateTokens(text: string, charsPerToken: number = DEFAULT_CHARS_PER_TOKEN): number {
  if (!text) return 0;
  return Math.ceil(text.length / charsPerToken);
}

export function estimateMessageTokens(
  messages: readonly ChatMessage[],
  charsPerToken: number = DEFAULT_CHARS_PER_TOKEN
): number {
  let total = 0;

  for (const message of messages) {
    total += MESSAGE_OVERHEAD_TOKENS;
    total += estimateTokens(message.content ?? '', charsPerToken);

    for (const call of message.tool_calls ?? []) {
      total += estimateTokens(call.function.name + call.function.arguments, charsPerToken);
    }
  }

  return total;
}
