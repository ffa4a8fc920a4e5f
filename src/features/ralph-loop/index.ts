// src/features/ralph-loop/index.ts

/**
 * Ralph Loop Feature
 *
 * Sends the same prompt until a completion marker appears, governed by an
 * iteration cap, a cost ceiling and the context window.
 */

// Types
export type {
  LoopConfiguration,
  LoopConfigurationInput,
  IterationRecord,
  LoopState,
  LoopOutcome,
  LoopOutcomeKind,
  CompletedOutcome,
  BudgetExceededOutcome,
  ContextExhaustedOutcome,
  MaxIterationsReachedOutcome,
  FailedOutcome,
  LoopDecision,
  LoopEvent,
  LoopEventType,
  LoopObserver,
  ModelSwitchContext,
  ModelSwitchPolicy,
  LoopDependencies
} from './types.js';

// Constants
export {
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_ITERATION_RETRIES,
  OUTCOME_LABELS
} from './constants.js';

// Controller
export {
  LoopController,
  runLoop,
  resolveLoopConfiguration,
  switchAtIteration
} from './controller.js';

// Observers
export { LoopEventEmitter, createLoggerObserver } from './events.js';
export { renderEvent, createTerminalRenderer } from './renderer.js';
export type { LoopProgressState } from './storage.js';
export {
  readState,
  writeState,
  getStateFilePath,
  reduceState,
  createStateFileObserver
} from './storage.js';

// Output
export { formatLoopOutcome, serializeOutcome } from './format.js';
