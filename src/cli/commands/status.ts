// src/cli/commands/status.ts

/**
 * Status command - prints the persisted loop progress
 */

import { formatUsd } from '../../features/cost-tracking/calculator.js';
import { OUTCOME_LABELS, readState } from '../../features/ralph-loop/index.js';
import type { LoopProgressState } from '../../features/ralph-loop/index.js';
import type { CliIO } from '../types.js';

function outcomeLabel(outcome: string | undefined): string {
  switch (outcome) {
    case 'completed':
    case 'budget_exceeded':
    case 'context_exhausted':
    case 'max_iterations_reached':
    case 'failed':
      return OUTCOME_LABELS[outcome];
    default:
      return outcome ?? 'Unknown';
  }
}

export function formatStatus(state: LoopProgressState): string {
  const lines = [
    `Loop:       ${state.taskId}`,
    `State:      ${state.active ? 'Running' : `Finished (${outcomeLabel(state.outcome)})`}`,
    `Model:      ${state.model}`,
    `Iteration:  ${state.iteration}/${state.maxIterations}`,
    `Spend:      ${formatUsd(state.cumulativeCost)}` +
      (state.costCeiling !== undefined ? ` of ${formatUsd(state.costCeiling)}` : ''),
    `Marker:     ${state.completionMarker}`,
    `Started:    ${state.startedAt}`,
    `Updated:    ${state.updatedAt}`
  ];

  if (state.lastResponseExcerpt) {
    lines.push('', 'Last response:', state.lastResponseExcerpt);
  }
  return lines.join('\n');
}

export function statusCommand(stateFilePath: string, json: boolean, io: CliIO): number {
  const state = readState(stateFilePath);

  if (!state) {
    io.stdout(json ? 'null' : `No loop state at ${stateFilePath}`);
    return 0;
  }

  io.stdout(json ? JSON.stringify(state, null, 2) : formatStatus(state));
  return 0;
}
