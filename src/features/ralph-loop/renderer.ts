// src/features/ralph-loop/renderer.ts

/**
 * Terminal progress renderer: one human-readable line per decision point.
 */

import { formatUsd } from '../cost-tracking/calculator.js';
import { OUTCOME_LABELS } from './constants.js';
import type { LoopEvent, LoopObserver } from './types.js';

export function renderEvent(event: LoopEvent, maxIterations?: number): string | null {
  const of = (iteration: number) => `[${iteration + 1}${maxIterations ? `/${maxIterations}` : ''}]`;

  switch (event.type) {
    case 'loop_started':
      return `▶ Ralph Loop on ${event.model} (max ${event.maxIterations} iterations` +
        (event.costCeiling !== undefined ? `, ceiling ${formatUsd(event.costCeiling)}` : '') +
        `, marker "${event.completionMarker}")`;
    case 'iteration_started':
      return `${of(event.iteration)} running on ${event.model} (spent ${formatUsd(event.cumulativeCost)})`;
    case 'retry_scheduled':
      return `${of(event.iteration)} attempt ${event.attempt} failed: ${event.error}; retrying in ${Math.round(event.delayMs)}ms`;
    case 'compaction':
      return `${of(event.iteration)} context ${event.status}: ${event.before.used} → ${event.after.used} of ${event.after.capacity} tokens`;
    case 'model_switched':
      return `${of(event.iteration)} switched model ${event.from} → ${event.to}`;
    case 'budget_alert':
      return `${of(event.iteration)} budget: ${event.alert.message}`;
    case 'iteration_completed':
      return `${of(event.iteration)} +${formatUsd(event.costDelta)} (total ${formatUsd(event.cumulativeCost)})` +
        (event.completionDetected ? ' · marker found' : '');
    case 'decision':
      return event.decision === 'continue' ? null : `■ stop: ${OUTCOME_LABELS[event.reason === 'completion_pending' ? 'completed' : event.reason]}`;
    case 'loop_finished':
      return `${OUTCOME_LABELS[event.outcome.kind]} after ${event.outcome.iterations} iteration(s), spent ${formatUsd(event.outcome.spend)} in ${(event.totalTimeMs / 1000).toFixed(1)}s`;
  }
}

export function createTerminalRenderer(
  write: (line: string) => void = line => process.stderr.write(line + '\n')
): LoopObserver {
  let maxIterations: number | undefined;

  return {
    onEvent(event) {
      if (event.type === 'loop_started') {
        maxIterations = event.maxIterations;
      }
      const line = renderEvent(event, maxIterations);
      if (line !== null) {
        write(line);
      }
    }
  };
}
