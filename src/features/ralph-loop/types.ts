// src/features/ralph-loop/types.ts

/**
 * Ralph Loop Types
 *
 * The Ralph loop sends the same prompt to an agent session again and again
 * until a response carries the completion marker, stopping earlier when the
 * iteration cap, the cost ceiling or the context window says so.
 */

import type { CompletionGuard } from '../completion/types.js';
import type { CostAlert } from '../cost-tracking/types.js';
import type { ContextUsage } from '../../types.js';
import type { AgentSession } from '../../services/agent-session.js';
import type { SessionSelector } from '../model-registry/selector.js';
import type { CostGovernor } from '../cost-tracking/governor.js';
import type { ContextGovernor } from '../context-window/governor.js';
import type { RetryOptions } from '../../utils/retry.js';

/**
 * Immutable per invocation.
 */
export interface LoopConfiguration {
  prompt: string;
  completionMarker: string;
  maxIterations: number;
  /** USD; omitted means no budget governance */
  costCeiling?: number;
  /** Registry reference; omitted uses the registry default */
  modelId?: string;
  completionGuard: CompletionGuard;
}

export type LoopConfigurationInput =
  Pick<LoopConfiguration, 'prompt' | 'completionMarker'> &
  Partial<Omit<LoopConfiguration, 'prompt' | 'completionMarker'>>;

/**
 * One pass through the loop. Frozen once appended.
 */
export interface IterationRecord {
  /** 0-based, strictly increasing, no gaps */
  index: number;
  promptSent: string;
  responseReceived: string;
  /** Non-negative USD spent by this iteration */
  costDelta: number;
  completionDetected: boolean;
  model: string;
}

export type LoopState =
  | 'idle'
  | 'running'
  | 'completed'
  | 'budget_exceeded'
  | 'context_exhausted'
  | 'max_iterations_reached'
  | 'failed';

interface OutcomeBase {
  /** Successful agent invocations */
  iterations: number;
  /** Cumulative session cost in USD when the loop ended */
  spend: number;
  /** Model active when the loop ended, if a session was created */
  model?: string;
  log: readonly IterationRecord[];
}

export interface CompletedOutcome extends OutcomeBase {
  kind: 'completed';
  response: string;
}

export interface BudgetExceededOutcome extends OutcomeBase {
  kind: 'budget_exceeded';
  ceiling: number;
}

export interface ContextExhaustedOutcome extends OutcomeBase {
  kind: 'context_exhausted';
  usage: ContextUsage;
}

export interface MaxIterationsReachedOutcome extends OutcomeBase {
  kind: 'max_iterations_reached';
}

export interface FailedOutcome extends OutcomeBase {
  kind: 'failed';
  error: Error;
}

export type LoopOutcome =
  | CompletedOutcome
  | BudgetExceededOutcome
  | ContextExhaustedOutcome
  | MaxIterationsReachedOutcome
  | FailedOutcome;

export type LoopOutcomeKind = LoopOutcome['kind'];

export type LoopDecision = 'continue' | 'stop';

/**
 * Progress events, emitted after each decision point.
 */
export type LoopEvent =
  | {
      type: 'loop_started';
      taskId: string;
      model: string;
      maxIterations: number;
      costCeiling?: number;
      completionMarker: string;
      prompt: string;
    }
  | { type: 'iteration_started'; iteration: number; model: string; cumulativeCost: number }
  | { type: 'retry_scheduled'; iteration: number; attempt: number; delayMs: number; error: string }
  | {
      type: 'compaction';
      iteration: number;
      status: 'compacted' | 'exhausted';
      before: ContextUsage;
      after: ContextUsage;
    }
  | { type: 'model_switched'; iteration: number; from: string; to: string }
  | { type: 'budget_alert'; iteration: number; alert: CostAlert }
  | {
      type: 'iteration_completed';
      iteration: number;
      model: string;
      costDelta: number;
      cumulativeCost: number;
      completionDetected: boolean;
      responseLength: number;
    }
  | {
      type: 'decision';
      iteration: number;
      decision: LoopDecision;
      reason: 'completion_pending' | LoopOutcomeKind;
      cumulativeCost: number;
    }
  | { type: 'loop_finished'; taskId: string; outcome: LoopOutcome; totalTimeMs: number };

export type LoopEventType = LoopEvent['type'];

export interface LoopObserver {
  onEvent(event: LoopEvent): void;
}

export interface ModelSwitchContext {
  /** Index of the iteration about to run */
  nextIteration: number;
  activeModel: string;
  cumulativeCost: number;
  log: readonly IterationRecord[];
}

/**
 * Returns the model to use for the next iteration, or undefined to keep the
 * active one.
 */
export type ModelSwitchPolicy = (context: ModelSwitchContext) => string | undefined;

export interface LoopDependencies {
  selector: SessionSelector;
  costGovernor?: CostGovernor;
  contextGovernor?: ContextGovernor;
  retry?: RetryOptions;
  switchPolicy?: ModelSwitchPolicy;
  observers?: LoopObserver[];
  /** Identifies the loop in logs and events */
  taskId?: string;
  /** Hook for sessions created outside the selector (tests, resumed runs) */
  session?: AgentSession;
}
