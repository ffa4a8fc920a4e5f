// src/cli/args.ts

/**
 * Parses command line arguments
 */

import { AutoloopError } from '../utils/errors.js';
import { COMPLETION_GUARDS, isCompletionGuard } from '../features/completion/types.js';
import type { CatalogOptions, CliCommand, RunOptions } from './types.js';

export class UsageError extends AutoloopError {
  constructor(message: string) {
    super(message, 'USAGE_ERROR');
    this.name = 'UsageError';
  }
}

/**
 * Splits `--flag=value` and reads `--flag value`.
 */
class ArgReader {
  private index = 0;
  private pending: string | undefined;

  constructor(private readonly args: readonly string[]) {}

  next(): string | undefined {
    this.pending = undefined;
    const arg = this.args[this.index++];
    if (arg === undefined) return undefined;

    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    if (eq > 0) {
      this.pending = arg.slice(eq + 1);
      return arg.slice(0, eq);
    }
    return arg;
  }

  value(flag: string): string {
    if (this.pending !== undefined) {
      const value = this.pending;
      this.pending = undefined;
      return value;
    }
    const value = this.args[this.index];
    if (value === undefined || (value.startsWith('--') && value.length > 2)) {
      throw new UsageError(`${flag} requires a value`);
    }
    this.index++;
    return value;
  }
}

function parseInteger(flag: string, raw: string, min: number): number {
  const value = Number(raw);
  if (!/^\d+$/.test(raw.trim()) || !Number.isSafeInteger(value) || value < min) {
    throw new UsageError(`${flag} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function parseAmount(flag: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value) || value < 0) {
    throw new UsageError(`${flag} must be a non-negative number, got "${raw}"`);
  }
  return value;
}

/**
 * "provider/model@N": switch to the model before iteration N (0-based).
 */
export function parseSwitchSpec(raw: string): { model: string; iteration: number } {
  const at = raw.lastIndexOf('@');
  if (at <= 0 || at === raw.length - 1) {
    throw new UsageError(`--switch-model expects provider/model@N, got "${raw}"`);
  }
  return {
    model: raw.slice(0, at),
    iteration: parseInteger('--switch-model iteration', raw.slice(at + 1), 0)
  };
}

function parseRun(reader: ArgReader): RunOptions {
  const options: Partial<RunOptions> & { json: boolean } = { json: false };

  for (let arg = reader.next(); arg !== undefined; arg = reader.next()) {
    switch (arg) {
      case '--prompt':
      case '-p':
        options.prompt = reader.value(arg);
        break;
      case '--prompt-file':
        options.promptFile = reader.value(arg);
        break;
      case '--completion-promise':
      case '-c':
        options.completionPromise = reader.value(arg);
        break;
      case '--max-iterations':
      case '-n':
        options.maxIterations = parseInteger(arg, reader.value(arg), 1);
        break;
      case '--model':
      case '-m':
        options.model = reader.value(arg);
        break;
      case '--cost-ceiling':
        options.costCeiling = parseAmount(arg, reader.value(arg));
        break;
      case '--completion-guard': {
        const guard = reader.value(arg);
        if (!isCompletionGuard(guard)) {
          throw new UsageError(`--completion-guard must be one of: ${COMPLETION_GUARDS.join(', ')}`);
        }
        options.completionGuard = guard;
        break;
      }
      case '--switch-model':
        options.switchModel = parseSwitchSpec(reader.value(arg));
        break;
      case '--catalog':
        options.catalog = reader.value(arg);
        break;
      case '--json':
        options.json = true;
        break;
      default:
        throw new UsageError(`Unknown option for run: ${arg}`);
    }
  }

  if (options.prompt === undefined && options.promptFile === undefined) {
    throw new UsageError('run requires --prompt or --prompt-file');
  }
  if (options.prompt !== undefined && options.promptFile !== undefined) {
    throw new UsageError('--prompt and --prompt-file cannot be combined');
  }
  if (options.prompt === '') {
    throw new UsageError('--prompt must not be empty');
  }
  if (!options.completionPromise) {
    throw new UsageError('run requires --completion-promise');
  }

  return { ...options, completionPromise: options.completionPromise };
}

function parseCatalogOnly(command: string, reader: ArgReader): CatalogOptions {
  const options: CatalogOptions = {};
  for (let arg = reader.next(); arg !== undefined; arg = reader.next()) {
    if (arg !== '--catalog') {
      throw new UsageError(`Unknown option for ${command}: ${arg}`);
    }
    options.catalog = reader.value(arg);
  }
  return options;
}

export function parseArgs(args: readonly string[]): CliCommand {
  const command = args[0] ?? 'help';
  const reader = new ArgReader(args.slice(1));

  switch (command) {
    case 'run':
      return { command: 'run', options: parseRun(reader) };
    case 'status':
    case 's': {
      let json = false;
      for (let arg = reader.next(); arg !== undefined; arg = reader.next()) {
        if (arg !== '--json') throw new UsageError(`Unknown option for status: ${arg}`);
        json = true;
      }
      return { command: 'status', options: { json } };
    }
    case 'models':
      return { command: 'models', options: parseCatalogOnly(command, reader) };
    case 'serve':
      return { command: 'serve', options: parseCatalogOnly(command, reader) };
    case 'help':
    case '-h':
    case '--help':
      return { command: 'help' };
    default:
      throw new UsageError(`Unknown command: ${command}`);
  }
}
