// src/services/agent-session.ts

/**
 * Agent Session contract
 *
 * The loop only invokes a session and reads its counters. History and
 * cumulative cost are mutated by the session itself in response to run()
 * and compact(), so the loop needs no locking.
 */

import type { ChatMessage, ContextUsage } from '../types.js';

export interface AgentSession {
  /** Sends one prompt and resolves with the response text */
  run(prompt: string): Promise<string>;

  /** Monotonically non-decreasing total spend in USD */
  cumulativeCost(): number;

  contextUsage(): ContextUsage;

  /** Registry reference of the backing model, e.g. "anthropic/claude-sonnet-4-5" */
  activeModel(): string;

  history(): readonly ChatMessage[];

  /**
   * Summarizes or prunes earlier history.
   * Resolves true when utilization ends below the compaction threshold.
   */
  compact(): Promise<boolean>;
}
