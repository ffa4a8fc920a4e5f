// src/features/context-window/types.ts

/**
 * Context Window Types
 */

import type { ChatMessage, ContextUsage } from '../../types.js';

export interface CompactionInput {
  messages: readonly ChatMessage[];
  /** Most recent messages kept verbatim */
  preserveRecent: number;
  /** Asks the active model for a continuation summary of the given messages */
  summarize: (messages: readonly ChatMessage[]) => Promise<string>;
}

/**
 * Pluggable compaction policy. Returns the new history; returning the input
 * unchanged means nothing could be compacted.
 */
export interface CompactionStrategy {
  readonly name: string;
  compact(input: CompactionInput): Promise<ChatMessage[]>;
}

export interface ContextGovernorConfig {
  /** Utilization (0-1] at or above which compaction is required */
  threshold: number;
}

export type ContextCheck =
  | { status: 'ok'; usage: ContextUsage }
  | { status: 'compacted'; before: ContextUsage; after: ContextUsage }
  | {
      status: 'exhausted';
      before: ContextUsage;
      after: ContextUsage;
      reason: 'still_above_threshold' | 'compaction_failed';
      error?: Error;
    };
