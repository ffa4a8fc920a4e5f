// src/features/ralph-loop/storage.ts

/**
 * Ralph Loop State Storage
 *
 * Persists the progress of the running loop as JSON so `autoloop status`
 * (and the MCP status tool) can report on it from another process.
 */

import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { dirname, isAbsolute, join } from 'node:path';
import { z } from 'zod';
import { logger } from '../../utils/logger.js';
import { EXCERPT_LENGTH } from './constants.js';
import type { LoopEvent, LoopObserver } from './types.js';

const loopProgressSchema = z.object({
  active: z.boolean(),
  taskId: z.string(),
  iteration: z.number().int().min(0),
  maxIterations: z.number().int().positive(),
  completionMarker: z.string(),
  prompt: z.string(),
  model: z.string(),
  cumulativeCost: z.number().min(0),
  costCeiling: z.number().min(0).optional(),
  startedAt: z.string(),
  updatedAt: z.string(),
  lastResponseExcerpt: z.string().optional(),
  outcome: z.string().optional()
});

export type LoopProgressState = z.infer<typeof loopProgressSchema>;

export function getStateFilePath(directory: string, statePath: string): string {
  return isAbsolute(statePath) ? statePath : join(directory, statePath);
}

/**
 * Returns null if no state exists or the file is not a valid state.
 */
export function readState(filePath: string): LoopProgressState | null {
  if (!existsSync(filePath)) {
    return null;
  }

  try {
    const parsed = loopProgressSchema.safeParse(JSON.parse(readFileSync(filePath, 'utf-8')));
    if (!parsed.success) {
      logger.warn({ filePath }, 'Invalid Ralph Loop state file');
      return null;
    }
    return parsed.data;
  } catch (error) {
    logger.error({ error, filePath }, 'Failed to read Ralph Loop state');
    return null;
  }
}

export function writeState(filePath: string, state: LoopProgressState): boolean {
  try {
    const dir = dirname(filePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    writeFileSync(filePath, JSON.stringify(state, null, 2), 'utf-8');
    logger.debug({ filePath, iteration: state.iteration }, 'Ralph Loop state written');
    return true;
  } catch (error) {
    logger.error({ error, filePath }, 'Failed to write Ralph Loop state');
    return false;
  }
}

/**
 * Applies one event to the persisted progress. Returns null when there is
 * no state to update yet.
 */
export function reduceState(
  state: LoopProgressState | null,
  event: LoopEvent,
  now: string = new Date().toISOString()
): LoopProgressState | null {
  if (event.type === 'loop_started') {
    return {
      active: true,
      taskId: event.taskId,
      iteration: 0,
      maxIterations: event.maxIterations,
      completionMarker: event.completionMarker,
      prompt: event.prompt.substring(0, EXCERPT_LENGTH),
      model: event.model,
      cumulativeCost: 0,
      costCeiling: event.costCeiling,
      startedAt: now,
      updatedAt: now
    };
  }

  if (!state) {
    return null;
  }

  switch (event.type) {
    case 'iteration_started':
      return { ...state, iteration: event.iteration, model: event.model, cumulativeCost: event.cumulativeCost, updatedAt: now };
    case 'model_switched':
      return { ...state, model: event.to, updatedAt: now };
    case 'iteration_completed':
      return { ...state, iteration: event.iteration + 1, cumulativeCost: event.cumulativeCost, updatedAt: now };
    case 'loop_finished':
      return {
        ...state,
        active: false,
        iteration: event.outcome.iterations,
        cumulativeCost: event.outcome.spend,
        outcome: event.outcome.kind,
        lastResponseExcerpt: event.outcome.log.at(-1)?.responseReceived.substring(0, EXCERPT_LENGTH),
        updatedAt: now
      };
    default:
      return state;
  }
}

/**
 * Subscriber that mirrors loop progress into the state file.
 */
export function createStateFileObserver(filePath: string): LoopObserver {
  let state: LoopProgressState | null = null;

  return {
    onEvent(event) {
      const next = reduceState(state, event);
      if (next && next !== state) {
        state = next;
        writeState(filePath, next);
      }
    }
  };
}
