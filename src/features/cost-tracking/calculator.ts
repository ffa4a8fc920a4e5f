// src/features/cost-tracking/calculator.ts

import type { TokenUsage } from '../../types.js';
import type { CallCost, ModelPricing } from './types.js';

/**
 * Prices one call. Cached input tokens are billed at the cached rate when the
 * model has one, otherwise at the regular input rate.
 */
export function calculateCost(usage: TokenUsage, pricing: ModelPricing): CallCost {
  const cachedTokens = Math.min(usage.cachedTokens ?? 0, usage.inputTokens);
  const uncachedTokens = usage.inputTokens - cachedTokens;
  const cachedPrice = pricing.cachedInputPricePerMillion ?? pricing.inputPricePerMillion;

  const inputCost =
    (uncachedTokens / 1_000_000) * pricing.inputPricePerMillion +
    (cachedTokens / 1_000_000) * cachedPrice;
  const outputCost = (usage.outputTokens / 1_000_000) * pricing.outputPricePerMillion;

  return {
    inputCost,
    outputCost,
    totalCost: inputCost + outputCost,
    currency: 'USD'
  };
}

export function formatUsd(amount: number): string {
  return `$${amount.toFixed(amount >= 1 ? 2 : 4)}`;
}
