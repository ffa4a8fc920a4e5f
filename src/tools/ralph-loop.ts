// src/tools/ralph-loop.ts

/**
 * Ralph Loop MCP Tools
 *
 * ralph_loop_run runs a loop to its terminal state and returns the outcome;
 * ralph_loop_status reports recent outcomes and the running loop's progress.
 */

import { z } from 'zod';
import { LRUCache } from 'lru-cache';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { COMPLETION_GUARDS } from '../features/completion/types.js';
import { formatUsd } from '../features/cost-tracking/calculator.js';
import {
  OUTCOME_LABELS,
  createLoggerObserver,
  createStateFileObserver,
  formatLoopOutcome,
  readState,
  runLoop
} from '../features/ralph-loop/index.js';
import type { LoopDependencies, LoopOutcome, LoopOutcomeKind } from '../features/ralph-loop/index.js';
import { logger } from '../utils/logger.js';
import { toError } from '../utils/errors.js';

export const TOOL_MAX_ITERATIONS = 200;

export const ralphLoopRunSchema = {
  prompt: z.string().min(1).describe('Task prompt, sent unchanged on every iteration'),
  completion_promise: z.string().min(1)
    .describe('Marker the agent prints when the task is done (exact, case-sensitive)'),
  max_iterations: z.number().int().min(1).max(TOOL_MAX_ITERATIONS).optional()
    .describe(`Iteration cap (default 50, max ${TOOL_MAX_ITERATIONS})`),
  cost_ceiling: z.number().min(0).optional()
    .describe('Stop once cumulative spend exceeds this many USD'),
  model: z.string().optional()
    .describe('Model reference as "provider/model" (default: configured model)'),
  completion_guard: z.enum(COMPLETION_GUARDS).optional()
    .describe('substring (default), final-token or promise-tag')
};

export const ralphLoopStatusSchema = {
  limit: z.number().int().min(1).max(50).optional()
    .describe('Number of recent outcomes to list (default 5)')
};

export type RalphLoopRunArgs = z.infer<z.ZodObject<typeof ralphLoopRunSchema>>;
export type RalphLoopStatusArgs = z.infer<z.ZodObject<typeof ralphLoopStatusSchema>>;

export type ToolResult = {
  content: { type: 'text'; text: string }[];
  isError?: boolean;
};

export interface RecentOutcome {
  taskId: string;
  kind: LoopOutcomeKind;
  iterations: number;
  spend: number;
  model?: string;
  finishedAt: string;
}

export interface LoopToolContext {
  loopDependencies(ceiling?: number): LoopDependencies;
  stateFilePath: string;
  recent: LRUCache<string, RecentOutcome>;
  /** Set while a loop is running in this process */
  activeTaskId: string | null;
}

export function createLoopToolContext(
  loopDependencies: LoopToolContext['loopDependencies'],
  options: { stateFilePath: string; cacheSize: number }
): LoopToolContext {
  return {
    loopDependencies,
    stateFilePath: options.stateFilePath,
    recent: new LRUCache<string, RecentOutcome>({ max: options.cacheSize }),
    activeTaskId: null
  };
}

function text(value: string, isError = false): ToolResult {
  return isError
    ? { content: [{ type: 'text', text: value }], isError: true }
    : { content: [{ type: 'text', text: value }] };
}

function remember(context: LoopToolContext, taskId: string, outcome: LoopOutcome): void {
  context.recent.set(taskId, {
    taskId,
    kind: outcome.kind,
    iterations: outcome.iterations,
    spend: outcome.spend,
    model: outcome.model,
    finishedAt: new Date().toISOString()
  });
}

export async function handleRalphLoopRun(
  args: RalphLoopRunArgs,
  context: LoopToolContext
): Promise<ToolResult> {
  if (context.activeTaskId) {
    return text(
      `Ralph Loop ${context.activeTaskId} is already running. Check progress with ralph_loop_status.`,
      true
    );
  }

  const taskId = `ralph_${Date.now()}`;
  const base = context.loopDependencies(args.cost_ceiling);

  logger.info({
    taskId,
    prompt: args.prompt.substring(0, 100),
    maxIterations: args.max_iterations,
    model: args.model
  }, 'Starting Ralph Loop');

  context.activeTaskId = taskId;
  try {
    const outcome = await runLoop({
      prompt: args.prompt,
      completionMarker: args.completion_promise,
      maxIterations: args.max_iterations,
      costCeiling: args.cost_ceiling,
      modelId: args.model,
      completionGuard: args.completion_guard
    }, {
      ...base,
      taskId,
      observers: [
        ...(base.observers ?? []),
        createLoggerObserver(),
        createStateFileObserver(context.stateFilePath)
      ]
    });

    remember(context, taskId, outcome);
    return text(formatLoopOutcome(outcome, taskId), outcome.kind === 'failed');
  } catch (error) {
    const err = toError(error);
    logger.error({ error: err.message, taskId }, 'Ralph Loop could not start');
    return text(`Ralph Loop could not start: ${err.message}`, true);
  } finally {
    context.activeTaskId = null;
  }
}

export function handleRalphLoopStatus(
  args: RalphLoopStatusArgs,
  context: LoopToolContext
): ToolResult {
  const lines: string[] = ['# Ralph Loop Status', ''];

  const state = readState(context.stateFilePath);
  if (state?.active) {
    lines.push(
      `**Running:** ${state.taskId} on ${state.model}`,
      `- Iteration ${state.iteration}/${state.maxIterations}`,
      `- Spend ${formatUsd(state.cumulativeCost)}` +
        (state.costCeiling !== undefined ? ` of ${formatUsd(state.costCeiling)}` : ''),
      `- Started ${state.startedAt}`
    );
  } else {
    lines.push('No loop is running.');
  }

  const limit = args.limit ?? 5;
  const recent = [...context.recent.values()].slice(0, limit);
  if (recent.length > 0) {
    lines.push('', '## Recent Outcomes', '', '| Task | Outcome | Iterations | Spend | Model |', '|------|---------|------------|-------|-------|');
    for (const entry of recent) {
      lines.push(
        `| ${entry.taskId} | ${OUTCOME_LABELS[entry.kind]} | ${entry.iterations} | ${formatUsd(entry.spend)} | ${entry.model ?? '-'} |`
      );
    }
  }

  return text(lines.join('\n'));
}

/**
 * Registers the Ralph Loop tools
 */
export function registerRalphLoopTools(server: McpServer, context: LoopToolContext): void {
  server.tool(
    'ralph_loop_run',
    'Run a Ralph Loop: send the same prompt until the response contains the completion promise, ' +
      'the iteration cap is reached, the cost ceiling is exceeded or the context window is exhausted.',
    ralphLoopRunSchema,
    async args => handleRalphLoopRun(args, context)
  );

  server.tool(
    'ralph_loop_status',
    'Show the running Ralph Loop and recent outcomes',
    ralphLoopStatusSchema,
    async args => handleRalphLoopStatus(args, context)
  );
}
