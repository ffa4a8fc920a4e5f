// src/features/cost-tracking/types.ts

/**
 * Cost Tracking Types
 */

/**
 * Token prices (USD per 1M tokens)
 */
export interface ModelPricing {
  inputPricePerMillion: number;
  outputPricePerMillion: number;
  cachedInputPricePerMillion?: number;
}

export interface CallCost {
  inputCost: number;
  outputCost: number;
  totalCost: number;
  currency: 'USD';
}

/**
 * Budget alert raised as spend approaches or passes the ceiling.
 */
export interface CostAlert {
  type: 'threshold' | 'limit_reached';
  message: string;
  currentCost: number;
  limit: number;
  percentage: number;
}

export interface CostGovernorConfig {
  /** Ceiling in USD; undefined disables the governor */
  ceiling?: number;
  /** Fraction of the ceiling (0-1] at which a threshold alert is raised */
  alertThreshold: number;
}

export const DEFAULT_ALERT_THRESHOLD = 0.8;
