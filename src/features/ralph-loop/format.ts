// src/features/ralph-loop/format.ts

/**
 * Formats a loop outcome as Markdown for the MCP tool and `--json`-less CLI
 * output.
 */

import { formatUsd } from '../cost-tracking/calculator.js';
import { EXCERPT_LENGTH, OUTCOME_LABELS } from './constants.js';
import type { LoopOutcome } from './types.js';

function excerpt(text: string): string {
  return text.length > EXCERPT_LENGTH ? text.substring(0, EXCERPT_LENGTH) + '...' : text;
}

function outcomeDetail(outcome: LoopOutcome): string | null {
  switch (outcome.kind) {
    case 'completed':
      return `## Final Response\n\n${outcome.response}`;
    case 'budget_exceeded':
      return `Spend ${formatUsd(outcome.spend)} exceeded the ${formatUsd(outcome.ceiling)} ceiling.`;
    case 'context_exhausted':
      return `Context still at ${outcome.usage.used} of ${outcome.usage.capacity} tokens after compaction.`;
    case 'max_iterations_reached': {
      const last = outcome.log.at(-1);
      return last ? `## Last Response\n\n${excerpt(last.responseReceived)}` : null;
    }
    case 'failed':
      return `**Error:** ${outcome.error.message}`;
  }
}

export function formatLoopOutcome(outcome: LoopOutcome, taskId?: string): string {
  const lines = [
    `# Ralph Loop: ${OUTCOME_LABELS[outcome.kind]}`,
    '',
    ...(taskId ? [`- **Task:** ${taskId}`] : []),
    `- **Iterations:** ${outcome.iterations}`,
    `- **Spend:** ${formatUsd(outcome.spend)}`,
    ...(outcome.model ? [`- **Model:** ${outcome.model}`] : [])
  ];

  const detail = outcomeDetail(outcome);
  if (detail) {
    lines.push('', detail);
  }
  return lines.join('\n');
}

/**
 * JSON-safe view of an outcome (errors become their message).
 */
export function serializeOutcome(outcome: LoopOutcome): Record<string, unknown> {
  const { log, ...rest } = outcome;
  return {
    ...rest,
    ...(outcome.kind === 'failed' ? { error: { name: outcome.error.name, message: outcome.error.message } } : {}),
    log: log.map(record => ({ ...record }))
  };
}
