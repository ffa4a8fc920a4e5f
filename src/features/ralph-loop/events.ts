// src/features/ralph-loop/events.ts

/**
 * Loop event fan-out
 *
 * The controller only emits events; rendering, logging and persistence are
 * subscribers. A failing subscriber is logged and skipped.
 */

import type { Logger } from '../../utils/logger.js';
import { logger } from '../../utils/logger.js';
import { toError } from '../../utils/errors.js';
import type { LoopEvent, LoopObserver } from './types.js';

export class LoopEventEmitter {
  private readonly observers: LoopObserver[];

  constructor(observers: readonly LoopObserver[] = []) {
    this.observers = [...observers];
  }

  subscribe(observer: LoopObserver): () => void {
    this.observers.push(observer);
    return () => {
      const index = this.observers.indexOf(observer);
      if (index >= 0) this.observers.splice(index, 1);
    };
  }

  emit(event: LoopEvent): void {
    for (const observer of this.observers) {
      try {
        observer.onEvent(event);
      } catch (error) {
        logger.warn({ event: event.type, error: toError(error).message }, 'Loop observer failed');
      }
    }
  }
}

/**
 * Machine-readable subscriber: one structured log line per event.
 */
export function createLoggerObserver(log: Logger = logger): LoopObserver {
  return {
    onEvent(event) {
      switch (event.type) {
        case 'loop_started':
          log.info({
            taskId: event.taskId,
            model: event.model,
            maxIterations: event.maxIterations,
            costCeiling: event.costCeiling,
            completionMarker: event.completionMarker
          }, 'Ralph Loop started');
          break;
        case 'retry_scheduled':
          log.warn({ iteration: event.iteration, attempt: event.attempt, delayMs: event.delayMs, error: event.error }, 'Ralph Loop iteration retrying');
          break;
        case 'budget_alert':
          log.warn({ iteration: event.iteration, ...event.alert }, 'Ralph Loop budget alert');
          break;
        case 'compaction':
          log.info({
            iteration: event.iteration,
            status: event.status,
            usedBefore: event.before.used,
            usedAfter: event.after.used,
            capacity: event.after.capacity
          }, 'Ralph Loop context compaction');
          break;
        case 'loop_finished': {
          const { outcome } = event;
          const level = outcome.kind === 'completed' ? 'info' : outcome.kind === 'failed' ? 'error' : 'warn';
          log[level]({
            taskId: event.taskId,
            outcome: outcome.kind,
            iterations: outcome.iterations,
            spend: outcome.spend,
            totalTimeMs: event.totalTimeMs,
            ...(outcome.kind === 'failed' ? { error: outcome.error.message } : {})
          }, 'Ralph Loop finished');
          break;
        }
        default:
          log.debug(event, 'Ralph Loop event');
      }
    }
  };
}
