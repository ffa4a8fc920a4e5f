// src/features/ralph-loop/constants.ts

/**
 * Ralph Loop Constants
 */

import type { LoopOutcomeKind } from './types.js';

export const DEFAULT_MAX_ITERATIONS = 50;

/** Retries after the first failed attempt of an iteration */
export const DEFAULT_ITERATION_RETRIES = 2;

/** Stored prompt/response excerpts are cut to this many characters */
export const EXCERPT_LENGTH = 500;

export const OUTCOME_LABELS: Record<LoopOutcomeKind, string> = {
  completed: 'Completed',
  budget_exceeded: 'Budget exceeded',
  context_exhausted: 'Context exhausted',
  max_iterations_reached: 'Max iterations reached',
  failed: 'Failed'
};
