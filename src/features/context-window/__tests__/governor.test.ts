import { describe, it, expect } from 'vitest';
import { ContextGovernor, needsCompaction, usageRatio } from '../governor.js';
import type { ContextUsage } from '../../../types.js';
import { ConfigurationError, ProviderError } from '../../../utils/errors.js';

function fakeSession(usage: ContextUsage, compact: () => Promise<ContextUsage>) {
  let current = usage;
  let compactions = 0;
  return {
    get compactions() {
      return compactions;
    },
    contextUsage: () => current,
    activeModel: () => 'anthropic/claude-sonnet-4-5',
    compact: async () => {
      compactions++;
      current = await compact();
      return current.used / current.capacity < 0.85;
    }
  };
}

describe('needsCompaction', () => {
  it('should trigger at or above the threshold', () => {
    expect(needsCompaction(84, 100, 0.85)).toBe(false);
    expect(needsCompaction(85, 100, 0.85)).toBe(true);
  });

  it('should always trigger without capacity', () => {
    expect(needsCompaction(0, 0, 0.85)).toBe(true);
    expect(usageRatio({ used: 1, capacity: 0 })).toBe(Infinity);
  });
});

describe('ContextGovernor', () => {
  it('should leave sessions under the threshold alone', async () => {
    const session = fakeSession({ used: 10, capacity: 100 }, async () => ({ used: 0, capacity: 100 }));

    const check = await new ContextGovernor().ensureCapacity(session);

    expect(check).toEqual({ status: 'ok', usage: { used: 10, capacity: 100 } });
    expect(session.compactions).toBe(0);
  });

  it('should report a successful compaction', async () => {
    const session = fakeSession({ used: 90, capacity: 100 }, async () => ({ used: 30, capacity: 100 }));

    const check = await new ContextGovernor().ensureCapacity(session);

    expect(check).toEqual({
      status: 'compacted',
      before: { used: 90, capacity: 100 },
      after: { used: 30, capacity: 100 }
    });
  });

  it('should report exhaustion when usage stays above the threshold', async () => {
    const session = fakeSession({ used: 95, capacity: 100 }, async () => ({ used: 88, capacity: 100 }));

    const check = await new ContextGovernor().ensureCapacity(session);

    expect(check.status).toBe('exhausted');
    expect(check.status === 'exhausted' ? check.reason : undefined).toBe('still_above_threshold');
  });

  it('should report exhaustion when compaction throws', async () => {
    const session = fakeSession({ used: 95, capacity: 100 }, async () => {
      throw new Error('summarizer offline');
    });

    const check = await new ContextGovernor().ensureCapacity(session);

    expect(check.status === 'exhausted' ? check.reason : undefined).toBe('compaction_failed');
    expect(check.status === 'exhausted' ? check.error?.message : undefined).toBe('summarizer offline');
  });

  it('should pass provider failures during compaction to the caller', async () => {
    const error = new ProviderError('429 Too Many Requests', { kind: 'rate_limit', model: 'openai/gpt-4o' });
    const session = fakeSession({ used: 95, capacity: 100 }, async () => {
      throw error;
    });

    await expect(new ContextGovernor().ensureCapacity(session)).rejects.toBe(error);
  });

  it('should honour a custom threshold', async () => {
    const session = fakeSession({ used: 60, capacity: 100 }, async () => ({ used: 20, capacity: 100 }));

    const check = await new ContextGovernor({ threshold: 0.5 }).ensureCapacity(session);

    expect(check.status).toBe('compacted');
  });

  it('should reject thresholds outside (0, 1]', () => {
    expect(() => new ContextGovernor({ threshold: 0 })).toThrow(ConfigurationError);
    expect(() => new ContextGovernor({ threshold: 1.2 })).toThrow(ConfigurationError);
  });
});
