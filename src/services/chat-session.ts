// src/services/chat-session.ts

/**
 * Chat Agent Session
 *
 * Conversation state over the chat-completions transport: keeps the
 * transcript, prices every call (summaries included) and compacts history
 * through the configured strategy.
 */

import type { ChatMessage, ContextUsage } from '../types.js';
import type { AgentSession } from './agent-session.js';
import type { ProviderClient } from './provider-client.js';
import type { ModelSpec } from '../features/model-registry/types.js';
import { modelKey } from '../features/model-registry/types.js';
import type { SessionFactory } from '../features/model-registry/selector.js';
import type { CompactionStrategy } from '../features/context-window/types.js';
import { needsCompaction } from '../features/context-window/governor.js';
import { estimateMessageTokens } from '../features/context-window/tokens.js';
import { SUMMARY_PROMPT } from '../features/context-window/constants.js';
import { calculateCost } from '../features/cost-tracking/calculator.js';
import { WORKER_PREAMBLE_TEXT, hasPreamble, wrapWithPreamble } from '../utils/worker-preamble.js';
import { logger } from '../utils/logger.js';

export interface ChatSessionOptions {
  spec: ModelSpec;
  client: Pick<ProviderClient, 'complete'>;
  compaction: CompactionStrategy;
  compactionThreshold: number;
  preserveRecent: number;
  /** Unattended operation: no one is there to answer prompts */
  autonomous: boolean;
  history?: readonly ChatMessage[];
  initialCost?: number;
}

export class ChatAgentSession implements AgentSession {
  private readonly options: ChatSessionOptions;
  private messages: ChatMessage[];
  private totalCost: number;
  /** Provider-reported size of the transcript after the last call */
  private reportedTokens: number | null = null;
  private preamblePending = false;

  constructor(options: ChatSessionOptions) {
    this.options = options;
    this.messages = [...(options.history ?? [])];
    this.totalCost = options.initialCost ?? 0;

    const alreadyApplied = this.messages.some(m => m.content !== null && hasPreamble(m.content));
    if (options.autonomous && !alreadyApplied) {
      if (options.spec.supportsSystemRole) {
        this.messages.unshift({ role: 'system', content: WORKER_PREAMBLE_TEXT });
      } else {
        this.preamblePending = true;
      }
    }
  }

  async run(prompt: string): Promise<string> {
    const content = this.preamblePending ? wrapWithPreamble(prompt) : prompt;
    const request: ChatMessage[] = [...this.messages, { role: 'user', content }];

    const result = await this.options.client.complete(this.options.spec, request);

    // Committed only on success, so a retried attempt never duplicates the prompt.
    this.messages = [...request, { role: 'assistant', content: result.content }];
    this.preamblePending = false;
    this.totalCost += calculateCost(result.usage, this.options.spec.pricing).totalCost;
    this.reportedTokens = result.usageReported ? result.usage.totalTokens : null;

    return result.content;
  }

  cumulativeCost(): number {
    return this.totalCost;
  }

  contextUsage(): ContextUsage {
    return {
      used: this.reportedTokens ?? estimateMessageTokens(this.messages, this.options.spec.charsPerToken),
      capacity: this.options.spec.contextWindow
    };
  }

  activeModel(): string {
    return modelKey(this.options.spec);
  }

  history(): readonly ChatMessage[] {
    return this.messages;
  }

  async compact(): Promise<boolean> {
    const before = this.messages.length;
    const compacted = await this.options.compaction.compact({
      messages: this.messages,
      preserveRecent: this.options.preserveRecent,
      summarize: messages => this.summarize(messages)
    });

    if (compacted.length !== before || compacted.some((m, i) => m !== this.messages[i])) {
      this.messages = compacted;
      this.reportedTokens = null;
    }

    const usage = this.contextUsage();
    logger.debug({
      model: this.activeModel(),
      strategy: this.options.compaction.name,
      messagesBefore: before,
      messagesAfter: this.messages.length,
      used: usage.used
    }, 'Session compacted');

    return !needsCompaction(usage.used, usage.capacity, this.options.compactionThreshold);
  }

  private async summarize(messages: readonly ChatMessage[]): Promise<string> {
    const result = await this.options.client.complete(this.options.spec, [
      ...messages,
      { role: 'user', content: SUMMARY_PROMPT }
    ]);
    this.totalCost += calculateCost(result.usage, this.options.spec.pricing).totalCost;
    return result.content;
  }
}

export interface ChatSessionFactoryOptions {
  client: Pick<ProviderClient, 'complete'>;
  compaction: CompactionStrategy;
  compactionThreshold: number;
  preserveRecent: number;
  autonomous: boolean;
}

export function createChatSessionFactory(options: ChatSessionFactoryOptions): SessionFactory {
  return (spec, seed) => new ChatAgentSession({
    ...options,
    spec,
    history: seed.history,
    initialCost: seed.initialCost
  });
}
