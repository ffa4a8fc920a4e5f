// src/cli/types.ts

/**
 * CLI Types for autoloop
 */

import type { CompletionGuard } from '../features/completion/types.js';

/**
 * Options for `autoloop run`
 */
export interface RunOptions {
  /** Prompt text (exclusive with promptFile) */
  prompt?: string;
  /** File whose contents are the prompt */
  promptFile?: string;
  completionPromise: string;
  maxIterations?: number;
  model?: string;
  /** USD */
  costCeiling?: number;
  completionGuard?: CompletionGuard;
  /** Move to another model before the given iteration */
  switchModel?: {
    model: string;
    iteration: number;
  };
  /** YAML model catalog */
  catalog?: string;
  /** Print the outcome as JSON */
  json: boolean;
}

export interface CatalogOptions {
  catalog?: string;
}

export type CliCommand =
  | { command: 'run'; options: RunOptions }
  | { command: 'status'; options: { json: boolean } }
  | { command: 'models'; options: CatalogOptions }
  | { command: 'serve'; options: CatalogOptions }
  | { command: 'help' };

/**
 * Where command output goes; stdout carries results only.
 */
export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}
