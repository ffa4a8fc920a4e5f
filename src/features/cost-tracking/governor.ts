// src/features/cost-tracking/governor.ts

/**
 * Cost Governor
 *
 * Consulted before each call is issued, never mid-call. Spend already made
 * by an in-flight call cannot be rolled back, so the governor bounds the
 * number of future calls rather than the exact terminal spend: the final
 * total may exceed the ceiling by at most one iteration's cost.
 */

import { ConfigurationError } from '../../utils/errors.js';
import { formatUsd } from './calculator.js';
import { DEFAULT_ALERT_THRESHOLD } from './types.js';
import type { CostAlert, CostGovernorConfig } from './types.js';

/**
 * True once cumulative cost strictly exceeds a configured ceiling.
 */
export function shouldStopForBudget(cumulativeCost: number, ceiling?: number): boolean {
  if (ceiling === undefined) {
    return false;
  }
  return cumulativeCost > ceiling;
}

export class CostGovernor {
  private readonly config: CostGovernorConfig;

  constructor(config: Partial<CostGovernorConfig> = {}) {
    this.config = { alertThreshold: DEFAULT_ALERT_THRESHOLD, ...config };

    const { ceiling, alertThreshold } = this.config;
    if (ceiling !== undefined && (!Number.isFinite(ceiling) || ceiling < 0)) {
      throw new ConfigurationError(`Cost ceiling must be a non-negative amount, got ${ceiling}`);
    }
    if (!(alertThreshold > 0 && alertThreshold <= 1)) {
      throw new ConfigurationError(`Budget alert threshold must be in (0, 1], got ${alertThreshold}`);
    }
  }

  get ceiling(): number | undefined {
    return this.config.ceiling;
  }

  shouldStop(cumulativeCost: number): boolean {
    return shouldStopForBudget(cumulativeCost, this.config.ceiling);
  }

  remaining(cumulativeCost: number): number | undefined {
    const { ceiling } = this.config;
    return ceiling === undefined ? undefined : Math.max(0, ceiling - cumulativeCost);
  }

  /**
   * Alert for the current spend, if any.
   */
  alertFor(cumulativeCost: number): CostAlert | null {
    const { ceiling, alertThreshold } = this.config;
    if (ceiling === undefined) {
      return null;
    }

    if (cumulativeCost > ceiling) {
      return {
        type: 'limit_reached',
        message: `Spend ${formatUsd(cumulativeCost)} exceeded the ${formatUsd(ceiling)} ceiling`,
        currentCost: cumulativeCost,
        limit: ceiling,
        percentage: ceiling === 0 ? Infinity : cumulativeCost / ceiling
      };
    }

    if (ceiling > 0 && cumulativeCost / ceiling >= alertThreshold) {
      const percentage = cumulativeCost / ceiling;
      return {
        type: 'threshold',
        message: `Spent ${Math.round(percentage * 100)}% of the ${formatUsd(ceiling)} ceiling`,
        currentCost: cumulativeCost,
        limit: ceiling,
        percentage
      };
    }

    return null;
  }
}
