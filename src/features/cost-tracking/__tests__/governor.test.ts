import { describe, it, expect } from 'vitest';
import { CostGovernor, shouldStopForBudget } from '../governor.js';
import { calculateCost, formatUsd } from '../calculator.js';
import { ConfigurationError } from '../../../utils/errors.js';

describe('calculateCost', () => {
  it('should price input and output per million tokens', () => {
    const cost = calculateCost(
      { inputTokens: 1_000_000, outputTokens: 500_000, totalTokens: 1_500_000 },
      { inputPricePerMillion: 3, outputPricePerMillion: 15 }
    );

    expect(cost.inputCost).toBe(3);
    expect(cost.outputCost).toBe(7.5);
    expect(cost.totalCost).toBe(10.5);
    expect(cost.currency).toBe('USD');
  });

  it('should bill cached input at the cached rate', () => {
    const cost = calculateCost(
      { inputTokens: 2_000_000, outputTokens: 0, cachedTokens: 1_000_000, totalTokens: 2_000_000 },
      { inputPricePerMillion: 2, outputPricePerMillion: 8, cachedInputPricePerMillion: 0.5 }
    );

    expect(cost.inputCost).toBe(2.5);
  });

  it('should bill cached input at the regular rate when no cached rate exists', () => {
    const cost = calculateCost(
      { inputTokens: 1_000_000, outputTokens: 0, cachedTokens: 1_000_000, totalTokens: 1_000_000 },
      { inputPricePerMillion: 4, outputPricePerMillion: 8 }
    );

    expect(cost.inputCost).toBe(4);
  });
});

describe('formatUsd', () => {
  it('should use cents above a dollar and four decimals below', () => {
    expect(formatUsd(12.5)).toBe('$12.50');
    expect(formatUsd(0.0123)).toBe('$0.0123');
  });
});

describe('shouldStopForBudget', () => {
  it('should stop only when spend strictly exceeds the ceiling', () => {
    expect(shouldStopForBudget(5, 5)).toBe(false);
    expect(shouldStopForBudget(5.01, 5)).toBe(true);
    expect(shouldStopForBudget(1_000, undefined)).toBe(false);
  });
});

describe('CostGovernor', () => {
  it('should report remaining budget', () => {
    const governor = new CostGovernor({ ceiling: 10 });

    expect(governor.remaining(4)).toBe(6);
    expect(governor.remaining(12)).toBe(0);
    expect(new CostGovernor().remaining(4)).toBeUndefined();
  });

  it('should raise a threshold alert at the alert ratio', () => {
    const governor = new CostGovernor({ ceiling: 10, alertThreshold: 0.5 });

    expect(governor.alertFor(4.9)).toBeNull();
    expect(governor.alertFor(5)).toEqual({
      type: 'threshold',
      message: 'Spent 50% of the $10.00 ceiling',
      currentCost: 5,
      limit: 10,
      percentage: 0.5
    });
  });

  it('should raise limit_reached once spend exceeds the ceiling', () => {
    const governor = new CostGovernor({ ceiling: 2 });

    const alert = governor.alertFor(2.5);

    expect(alert?.type).toBe('limit_reached');
    expect(alert?.message).toBe('Spend $2.50 exceeded the $2.00 ceiling');
  });

  it('should reject invalid settings', () => {
    expect(() => new CostGovernor({ ceiling: -1 })).toThrow(ConfigurationError);
    expect(() => new CostGovernor({ ceiling: Number.NaN })).toThrow(ConfigurationError);
    expect(() => new CostGovernor({ alertThreshold: 0 })).toThrow(ConfigurationError);
    expect(() => new CostGovernor({ alertThreshold: 1.5 })).toThrow(ConfigurationError);
  });
});
