import { describe, it, expect, vi } from 'vitest';
import { SummarizeStrategy, TruncateStrategy, createCompactionStrategy, splitHistory } from '../strategies.js';
import { estimateMessageTokens, estimateTokens } from '../tokens.js';
import type { ChatMessage } from '../../../types.js';

const system: ChatMessage = { role: 'system', content: 'You are a careful engineer.' };

function turns(count: number): ChatMessage[] {
  return Array.from({ length: count }, (_, i): ChatMessage => ({
    role: i % 2 === 0 ? 'user' : 'assistant',
    content: `message ${i}`
  }));
}

describe('estimateTokens', () => {
  it('should round up characters per token', () => {
    expect(estimateTokens('abcde')).toBe(2);
    expect(estimateTokens('abcdefg', 3.5)).toBe(2);
    expect(estimateTokens('')).toBe(0);
  });

  it('should add per-message overhead and tool call text', () => {
    const messages: ChatMessage[] = [
      { role: 'user', content: 'abcd' },
      {
        role: 'assistant',
        content: null,
        tool_calls: [{ id: 'call_1', type: 'function', function: { name: 'read', arguments: '{"a":1}' } }]
      }
    ];

    // (4 + 1) + (4 + 0 + ceil(11 / 4))
    expect(estimateMessageTokens(messages)).toBe(12);
  });
});

describe('splitHistory', () => {
  it('should keep system messages in the head and the last messages in the tail', () => {
    const messages = [system, ...turns(5)];

    const { head, older, recent } = splitHistory(messages, 2);

    expect(head).toEqual([system]);
    expect(older.map(m => m.content)).toEqual(['message 0', 'message 1', 'message 2']);
    expect(recent.map(m => m.content)).toEqual(['message 3', 'message 4']);
  });

  it('should not start the tail on a tool result', () => {
    const messages: ChatMessage[] = [
      { role: 'user', content: 'start' },
      {
        role: 'assistant',
        content: null,
        tool_calls: [{ id: 'call_1', type: 'function', function: { name: 'ls', arguments: '{}' } }]
      },
      { role: 'tool', content: 'a.ts', tool_call_id: 'call_1' },
      { role: 'assistant', content: 'found a.ts' }
    ];

    const { older, recent } = splitHistory(messages, 2);

    expect(older.map(m => m.content)).toEqual(['start']);
    expect(recent).toHaveLength(3);
  });

  it('should treat everything as older when nothing is preserved', () => {
    const { older, recent } = splitHistory(turns(3), 0);

    expect(older).toHaveLength(3);
    expect(recent).toHaveLength(0);
  });
});

describe('TruncateStrategy', () => {
  it('should replace older messages with a pruning note', async () => {
    const strategy = new TruncateStrategy();

    const result = await strategy.compact({
      messages: [system, ...turns(6)],
      preserveRecent: 2,
      summarize: vi.fn()
    });

    expect(result).toEqual([
      system,
      { role: 'user', content: '[4 earlier messages were pruned to fit the context window]' },
      { role: 'user', content: 'message 4' },
      { role: 'assistant', content: 'message 5' }
    ]);
  });

  it('should leave short histories untouched', async () => {
    const messages = turns(2);

    const result = await new TruncateStrategy().compact({ messages, preserveRecent: 6, summarize: vi.fn() });

    expect(result).toEqual(messages);
  });
});

describe('SummarizeStrategy', () => {
  it('should replace older messages with the model summary', async () => {
    const summarize = vi.fn(async (_messages: readonly ChatMessage[]) => '  Goal: fix parser  ');

    const result = await new SummarizeStrategy().compact({
      messages: [system, ...turns(4)],
      preserveRecent: 1,
      summarize
    });

    expect(summarize).toHaveBeenCalledTimes(1);
    expect(summarize.mock.calls[0][0]).toHaveLength(4);
    expect(result).toEqual([
      system,
      { role: 'user', content: '[Conversation summary]\nGoal: fix parser' },
      { role: 'assistant', content: 'message 3' }
    ]);
  });

  it('should keep history when the summary is empty', async () => {
    const messages = turns(4);

    const result = await new SummarizeStrategy().compact({
      messages,
      preserveRecent: 1,
      summarize: async () => '   '
    });

    expect(result).toEqual(messages);
  });
});

describe('createCompactionStrategy', () => {
  it('should build strategies by name', () => {
    expect(createCompactionStrategy('truncate').name).toBe('truncate');
    expect(createCompactionStrategy('summarize').name).toBe('summarize');
  });
});
