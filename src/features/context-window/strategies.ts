// src/features/context-window/strategies.ts

/**
 * Compaction strategies
 *
 * Both keep leading system messages and the most recent messages verbatim.
 * They differ in what replaces the older span: a one-line pruning note, or
 * a model-written continuation summary.
 */

import type { ChatMessage } from '../../types.js';
import type { CompactionInput, CompactionStrategy } from './types.js';
import { PRUNED_NOTE_TEMPLATE, SUMMARY_PREFIX } from './constants.js';
import type { CompactionStrategyName } from '../../config.js';

interface HistorySplit {
  head: ChatMessage[];
  older: ChatMessage[];
  recent: ChatMessage[];
}

/**
 * Splits history into leading system messages, a compactable older span and
 * a recent tail. The tail never starts on a tool result, whose originating
 * tool call would otherwise be dropped.
 */
export function splitHistory(messages: readonly ChatMessage[], preserveRecent: number): HistorySplit {
  let headEnd = 0;
  while (headEnd < messages.length && messages[headEnd].role === 'system') {
    headEnd++;
  }

  const body = messages.slice(headEnd);
  let recentStart = Math.max(0, body.length - Math.max(0, preserveRecent));
  while (recentStart > 0 && recentStart < body.length && body[recentStart].role === 'tool') {
    recentStart--;
  }

  return {
    head: messages.slice(0, headEnd),
    older: body.slice(0, recentStart),
    recent: body.slice(recentStart)
  };
}

export class TruncateStrategy implements CompactionStrategy {
  readonly name = 'truncate';

  async compact(input: CompactionInput): Promise<ChatMessage[]> {
    const { head, older, recent } = splitHistory(input.messages, input.preserveRecent);
    if (older.length === 0) {
      return [...input.messages];
    }

    const note: ChatMessage = {
      role: 'user',
      content: PRUNED_NOTE_TEMPLATE.replace('{{COUNT}}', String(older.length))
    };
    return [...head, note, ...recent];
  }
}

export class SummarizeStrategy implements CompactionStrategy {
  readonly name = 'summarize';

  async compact(input: CompactionInput): Promise<ChatMessage[]> {
    const { head, older, recent } = splitHistory(input.messages, input.preserveRecent);
    if (older.length === 0) {
      return [...input.messages];
    }

    const summary = (await input.summarize([...head, ...older])).trim();
    if (summary.length === 0) {
      return [...input.messages];
    }

    const summaryMessage: ChatMessage = {
      role: 'user',
      content: `${SUMMARY_PREFIX}\n${summary}`
    };
    return [...head, summaryMessage, ...recent];
  }
}

export function createCompactionStrategy(name: CompactionStrategyName): CompactionStrategy {
  switch (name) {
    case 'summarize':
      return new SummarizeStrategy();
    case 'truncate':
      return new TruncateStrategy();
  }
}
