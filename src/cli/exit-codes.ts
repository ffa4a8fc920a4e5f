// src/cli/exit-codes.ts

import type { LoopOutcomeKind } from '../features/ralph-loop/types.js';

export const EXIT_CODES = {
  completed: 0,
  failed: 1,
  budget_exceeded: 2,
  context_exhausted: 3,
  max_iterations_reached: 4,
  /** sysexits EX_USAGE */
  usage: 64
} as const satisfies Record<LoopOutcomeKind | 'usage', number>;

export function exitCodeFor(kind: LoopOutcomeKind): number {
  return EXIT_CODES[kind];
}
