// src/features/cost-tracking/index.ts

/**
 * Cost Tracking Module
 *
 * Prices provider usage and governs cumulative spend against a ceiling.
 */

export type { ModelPricing, CallCost, CostAlert, CostGovernorConfig } from './types.js';
export { DEFAULT_ALERT_THRESHOLD } from './types.js';
export { calculateCost, formatUsd } from './calculator.js';
export { CostGovernor, shouldStopForBudget } from './governor.js';
