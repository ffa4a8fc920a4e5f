// src/features/ralph-loop/controller.ts

/**
 * Ralph Loop Controller
 *
 * Sends the same prompt to one agent session, sequentially, until the
 * response carries the completion marker or a governor stops the loop.
 * Planned stops are outcome values; only reuse and invalid configuration
 * throw.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { AgentSession } from '../../services/agent-session.js';
import { COMPLETION_GUARDS } from '../completion/types.js';
import { detectCompletion } from '../completion/detector.js';
import { CostGovernor } from '../cost-tracking/governor.js';
import type { ContextCheck } from '../context-window/types.js';
import type { CostAlert } from '../cost-tracking/types.js';
import {
  ConfigurationError,
  LoopStateError,
  ProviderError,
  isRetryableError,
  toError
} from '../../utils/errors.js';
import { createLoopLogger } from '../../utils/logger.js';
import { withRetry } from '../../utils/retry.js';
import type { RetryOptions } from '../../utils/retry.js';
import {
  DEFAULT_ITERATION_RETRIES,
  DEFAULT_MAX_ITERATIONS
} from './constants.js';
import { LoopEventEmitter } from './events.js';
import type {
  IterationRecord,
  LoopConfiguration,
  LoopConfigurationInput,
  LoopDependencies,
  LoopObserver,
  LoopOutcome,
  LoopState,
  ModelSwitchPolicy
} from './types.js';

const loopConfigurationSchema = z.object({
  prompt: z.string().min(1, 'prompt must not be empty'),
  completionMarker: z.string().min(1, 'completion marker must not be empty'),
  maxIterations: z.number().int().positive().default(DEFAULT_MAX_ITERATIONS),
  costCeiling: z.number().finite().min(0).optional(),
  modelId: z.string().min(1).optional(),
  completionGuard: z.enum(COMPLETION_GUARDS).default('substring')
});

/**
 * Applies defaults and validates a loop configuration.
 */
export function resolveLoopConfiguration(input: LoopConfigurationInput): LoopConfiguration {
  const parsed = loopConfigurationSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid loop configuration: ${details}`, parsed.error);
  }
  return Object.freeze(parsed.data);
}

/**
 * Built-in switch policy: move to `modelId` before iteration `index`.
 */
export function switchAtIteration(index: number, modelId: string): ModelSwitchPolicy {
  if (!Number.isInteger(index) || index < 0) {
    throw new ConfigurationError(`Switch iteration must be a non-negative integer, got ${index}`);
  }
  return ({ nextIteration }) => (nextIteration === index ? modelId : undefined);
}

type Halt = { outcome: LoopOutcome };

export class LoopController {
  private readonly config: LoopConfiguration;
  private readonly deps: LoopDependencies;
  private readonly taskId: string;
  private readonly events: LoopEventEmitter;
  private readonly costGovernor?: CostGovernor;
  private readonly log: ReturnType<typeof createLoopLogger>;

  private state: LoopState = 'idle';
  private session: AgentSession | null = null;
  private readonly records: IterationRecord[] = [];
  private readonly alertsSent = new Set<CostAlert['type']>();

  constructor(input: LoopConfigurationInput, deps: LoopDependencies) {
    this.config = resolveLoopConfiguration(input);
    this.deps = deps;
    this.taskId = deps.taskId ?? randomUUID();
    this.events = new LoopEventEmitter(deps.observers);
    this.log = createLoopLogger(this.taskId);

    const { costCeiling } = this.config;
    if (deps.costGovernor) {
      const ceiling = deps.costGovernor.ceiling;
      if (costCeiling !== undefined && ceiling !== costCeiling) {
        throw new ConfigurationError(
          `Cost ceiling ${costCeiling} conflicts with the governor's ceiling ${ceiling ?? 'none'}`
        );
      }
      this.costGovernor = deps.costGovernor;
    } else if (costCeiling !== undefined) {
      this.costGovernor = new CostGovernor({ ceiling: costCeiling });
    }
  }

  get currentState(): LoopState {
    return this.state;
  }

  get id(): string {
    return this.taskId;
  }

  get iterations(): readonly IterationRecord[] {
    return this.records;
  }

  subscribe(observer: LoopObserver): () => void {
    return this.events.subscribe(observer);
  }

  async run(): Promise<LoopOutcome> {
    if (this.state !== 'idle') {
      throw new LoopStateError(`Loop ${this.taskId} has already run (state: ${this.state})`);
    }
    this.state = 'running';
    const startTime = Date.now();

    const outcome = await this.execute();

    this.state = outcome.kind;
    this.events.emit({
      type: 'loop_finished',
      taskId: this.taskId,
      outcome,
      totalTimeMs: Date.now() - startTime
    });
    return outcome;
  }

  private async execute(): Promise<LoopOutcome> {
    let session: AgentSession;
    try {
      session = this.deps.session ?? this.deps.selector.create(this.config.modelId);
    } catch (error) {
      return this.failed(toError(error));
    }
    this.session = session;

    this.events.emit({
      type: 'loop_started',
      taskId: this.taskId,
      model: session.activeModel(),
      maxIterations: this.config.maxIterations,
      costCeiling: this.ceiling(),
      completionMarker: this.config.completionMarker,
      prompt: this.config.prompt
    });

    for (;;) {
      const iteration = this.records.length;

      if (iteration >= this.config.maxIterations) {
        return this.stop({ kind: 'max_iterations_reached', ...this.summary() });
      }

      const budgetHalt = this.checkBudget(iteration);
      if (budgetHalt) return this.stop(budgetHalt.outcome);

      const switchHalt = this.applySwitchPolicy(iteration);
      if (switchHalt) return this.stop(switchHalt.outcome);

      // Compaction may call the model; its cost belongs to this iteration.
      const costBefore = this.requireSession().cumulativeCost();

      const contextHalt = await this.checkContext(iteration);
      if (contextHalt) return this.stop(contextHalt.outcome);

      const active = this.requireSession();
      this.events.emit({
        type: 'iteration_started',
        iteration,
        model: active.activeModel(),
        cumulativeCost: active.cumulativeCost()
      });

      let response: string;
      try {
        response = await withRetry(() => active.run(this.config.prompt), this.retryOptions(iteration));
      } catch (error) {
        return this.stop(this.failed(toError(error)));
      }

      const costAfter = active.cumulativeCost();
      const completionDetected = detectCompletion(
        response,
        this.config.completionMarker,
        this.config.completionGuard
      );

      const record: IterationRecord = Object.freeze({
        index: iteration,
        promptSent: this.config.prompt,
        responseReceived: response,
        costDelta: Math.max(0, costAfter - costBefore),
        completionDetected,
        model: active.activeModel()
      });
      this.records.push(record);

      this.events.emit({
        type: 'iteration_completed',
        iteration,
        model: record.model,
        costDelta: record.costDelta,
        cumulativeCost: costAfter,
        completionDetected,
        responseLength: response.length
      });

      if (completionDetected) {
        return this.stop({ kind: 'completed', response, ...this.summary() });
      }

      this.events.emit({
        type: 'decision',
        iteration,
        decision: 'continue',
        reason: 'completion_pending',
        cumulativeCost: costAfter
      });
    }
  }

  private checkBudget(iteration: number): Halt | null {
    const governor = this.costGovernor;
    const ceiling = governor?.ceiling;
    if (!governor || ceiling === undefined) return null;

    const cost = this.requireSession().cumulativeCost();
    const alert = governor.alertFor(cost);
    if (alert && !this.alertsSent.has(alert.type)) {
      this.alertsSent.add(alert.type);
      this.events.emit({ type: 'budget_alert', iteration, alert });
    }

    if (governor.shouldStop(cost)) {
      return { outcome: { kind: 'budget_exceeded', ceiling, ...this.summary() } };
    }
    return null;
  }

  private applySwitchPolicy(iteration: number): Halt | null {
    const policy = this.deps.switchPolicy;
    if (!policy) return null;

    const current = this.requireSession();
    const target = policy({
      nextIteration: iteration,
      activeModel: current.activeModel(),
      cumulativeCost: current.cumulativeCost(),
      log: this.records
    });
    if (target === undefined || target === current.activeModel()) {
      return null;
    }

    try {
      const next = this.deps.selector.switchModel(current, target);
      this.session = next;
      this.events.emit({ type: 'model_switched', iteration, from: current.activeModel(), to: next.activeModel() });
      return null;
    } catch (error) {
      return { outcome: this.failed(toError(error)) };
    }
  }

  private async checkContext(iteration: number): Promise<Halt | null> {
    const governor = this.deps.contextGovernor;
    if (!governor) return null;

    const session = this.requireSession();
    let check: ContextCheck;
    try {
      check = await governor.ensureCapacity({
        contextUsage: () => session.contextUsage(),
        activeModel: () => session.activeModel(),
        compact: () => withRetry(() => session.compact(), this.retryOptions(iteration))
      });
    } catch (error) {
      return { outcome: this.failed(toError(error)) };
    }

    if (check.status === 'ok') {
      return null;
    }

    this.events.emit({
      type: 'compaction',
      iteration,
      status: check.status,
      before: check.before,
      after: check.after
    });

    if (check.status === 'compacted') {
      return this.checkBudget(iteration);
    }
    return { outcome: { kind: 'context_exhausted', usage: check.after, ...this.summary() } };
  }

  private retryOptions(iteration: number): RetryOptions {
    const custom = this.deps.retry ?? {};
    return {
      ...custom,
      maxRetries: custom.maxRetries ?? DEFAULT_ITERATION_RETRIES,
      shouldRetry: (error, attempt) =>
        isRetryableError(error) && (custom.shouldRetry?.(error, attempt) ?? true),
      delayFor: (error, attempt, computed) => {
        const base = custom.delayFor?.(error, attempt, computed) ?? computed;
        return error instanceof ProviderError && error.retryAfterMs !== undefined
          ? Math.max(base, error.retryAfterMs)
          : base;
      },
      onRetry: (error, attempt, delayMs) => {
        this.log.warn({ iteration, attempt, delayMs, error: error.message }, 'Agent call failed, retrying');
        this.events.emit({ type: 'retry_scheduled', iteration, attempt: attempt + 1, delayMs, error: error.message });
        custom.onRetry?.(error, attempt, delayMs);
      }
    };
  }

  private stop(outcome: LoopOutcome): LoopOutcome {
    this.events.emit({
      type: 'decision',
      iteration: this.records.length,
      decision: 'stop',
      reason: outcome.kind,
      cumulativeCost: outcome.spend
    });
    return outcome;
  }

  private failed(error: Error): LoopOutcome {
    this.log.error({ error: error.message, code: error.name }, 'Ralph Loop failed');
    return { kind: 'failed', error, ...this.summary() };
  }

  private summary(): { iterations: number; spend: number; model?: string; log: readonly IterationRecord[] } {
    return {
      iterations: this.records.length,
      spend: this.session?.cumulativeCost() ?? 0,
      model: this.session?.activeModel(),
      log: [...this.records]
    };
  }

  private ceiling(): number | undefined {
    return this.costGovernor?.ceiling;
  }

  private requireSession(): AgentSession {
    if (!this.session) {
      throw new LoopStateError(`Loop ${this.taskId} has no active session`);
    }
    return this.session;
  }
}

/**
 * Runs one loop to its terminal state.
 */
export async function runLoop(
  config: LoopConfigurationInput,
  deps: LoopDependencies
): Promise<LoopOutcome> {
  return new LoopController(config, deps).run();
}
