// src/features/context-window/governor.ts

/**
 * Context Governor
 *
 * Decides, before each iteration, whether history must be compacted and
 * whether compaction brought utilization back under the threshold. The
 * compaction policy itself belongs to the session's strategy; only the
 * trigger and the pass/fail outcome are fixed here.
 */

import type { AgentSession } from '../../services/agent-session.js';
import type { ContextUsage } from '../../types.js';
import { ConfigurationError, ProviderError, toError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { DEFAULT_COMPACTION_THRESHOLD } from './constants.js';
import type { ContextCheck, ContextGovernorConfig } from './types.js';

export function needsCompaction(tokensUsed: number, capacity: number, threshold: number): boolean {
  if (capacity <= 0) {
    return true;
  }
  return tokensUsed / capacity >= threshold;
}

export function usageRatio(usage: ContextUsage): number {
  return usage.capacity > 0 ? usage.used / usage.capacity : Infinity;
}

export class ContextGovernor {
  private readonly config: ContextGovernorConfig;

  constructor(config: Partial<ContextGovernorConfig> = {}) {
    this.config = { threshold: DEFAULT_COMPACTION_THRESHOLD, ...config };

    if (!(this.config.threshold > 0 && this.config.threshold <= 1)) {
      throw new ConfigurationError(`Compaction threshold must be in (0, 1], got ${this.config.threshold}`);
    }
  }

  get threshold(): number {
    return this.config.threshold;
  }

  needsCompaction(usage: ContextUsage): boolean {
    return needsCompaction(usage.used, usage.capacity, this.config.threshold);
  }

  async ensureCapacity(session: Pick<AgentSession, 'contextUsage' | 'compact' | 'activeModel'>): Promise<ContextCheck> {
    const before = session.contextUsage();
    if (!this.needsCompaction(before)) {
      return { status: 'ok', usage: before };
    }

    logger.info({
      model: session.activeModel(),
      used: before.used,
      capacity: before.capacity,
      usagePercentage: (usageRatio(before) * 100).toFixed(1) + '%'
    }, 'Context threshold reached, compacting');

    let reduced: boolean;
    try {
      reduced = await session.compact();
    } catch (error) {
      // A provider failure is not a context problem; the caller decides what it means.
      if (error instanceof ProviderError) {
        throw error;
      }
      const cause = toError(error);
      logger.warn({ error: cause.message }, 'Context compaction failed');
      return {
        status: 'exhausted',
        before,
        after: session.contextUsage(),
        reason: 'compaction_failed',
        error: cause
      };
    }

    const after = session.contextUsage();
    if (!reduced || this.needsCompaction(after)) {
      return { status: 'exhausted', before, after, reason: 'still_above_threshold' };
    }

    return { status: 'compacted', before, after };
  }
}
