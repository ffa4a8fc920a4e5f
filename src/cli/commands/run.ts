// src/cli/commands/run.ts

/**
 * Run command - executes one Ralph Loop and maps its outcome to an exit code
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type { AutoloopConfig } from '../../config.js';
import type { Runtime } from '../../runtime.js';
import {
  createLoggerObserver,
  createStateFileObserver,
  createTerminalRenderer,
  formatLoopOutcome,
  runLoop,
  serializeOutcome,
  switchAtIteration
} from '../../features/ralph-loop/index.js';
import type { LoopObserver } from '../../features/ralph-loop/index.js';
import { exitCodeFor } from '../exit-codes.js';
import { UsageError } from '../args.js';
import type { CliIO, RunOptions } from '../types.js';

export function readPrompt(options: Pick<RunOptions, 'prompt' | 'promptFile'>): string {
  if (options.prompt !== undefined) {
    return options.prompt;
  }
  if (options.promptFile === undefined) {
    throw new UsageError('run requires --prompt or --prompt-file');
  }

  let content: string;
  try {
    content = readFileSync(resolve(options.promptFile), 'utf-8');
  } catch (error) {
    throw new UsageError(`Cannot read prompt file ${options.promptFile}: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (content.trim() === '') {
    throw new UsageError(`Prompt file ${options.promptFile} is empty`);
  }
  return content;
}

export async function runCommand(
  options: RunOptions,
  runtime: Pick<Runtime, 'loopDependencies'>,
  config: Pick<AutoloopConfig, 'stateFilePath'>,
  io: CliIO
): Promise<number> {
  const prompt = readPrompt(options);

  const observers: LoopObserver[] = [
    options.json ? createLoggerObserver() : createTerminalRenderer(io.stderr),
    createStateFileObserver(config.stateFilePath)
  ];

  const base = runtime.loopDependencies(options.costCeiling);
  const outcome = await runLoop({
    prompt,
    completionMarker: options.completionPromise,
    maxIterations: options.maxIterations,
    costCeiling: options.costCeiling,
    modelId: options.model,
    completionGuard: options.completionGuard
  }, {
    ...base,
    observers: [...(base.observers ?? []), ...observers],
    switchPolicy: options.switchModel
      ? switchAtIteration(options.switchModel.iteration, options.switchModel.model)
      : base.switchPolicy
  });

  io.stdout(options.json
    ? JSON.stringify(serializeOutcome(outcome), null, 2)
    : formatLoopOutcome(outcome));

  return exitCodeFor(outcome.kind);
}
