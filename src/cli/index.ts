// src/cli/index.ts

/**
 * autoloop CLI
 *
 * Runs the Ralph Loop from the command line.
 *
 * Commands:
 *   run       Run a loop until the completion promise appears
 *   status    Show the persisted progress of the last loop
 *   models    List the model registry
 *   serve     Start the MCP server on stdio
 *   help      Show usage
 */

import { loadConfig } from '../config.js';
import type { AutoloopConfig } from '../config.js';
import { createRuntime } from '../runtime.js';
import { getStateFilePath } from '../features/ralph-loop/storage.js';
import { startServer } from '../server.js';
import { ConfigurationError, toError } from '../utils/errors.js';
import { UsageError, parseArgs } from './args.js';
import { EXIT_CODES } from './exit-codes.js';
import { runCommand } from './commands/run.js';
import { statusCommand } from './commands/status.js';
import { modelsCommand } from './commands/models.js';
import type { CliCommand, CliIO } from './types.js';

export const HELP_TEXT = `
autoloop - run an agent until it says it is done

Usage: autoloop <command> [options]

Commands:
  run           Run a Ralph Loop
  status        Show the progress of the running (or last) loop
  models        List registered models
  serve         Start the MCP server on stdio
  help          Show this help message

Run Options:
  --prompt, -p <text>               Task prompt, sent unchanged every iteration
  --prompt-file <path>              Read the prompt from a file
  --completion-promise, -c <text>   Marker that ends the loop (case-sensitive)
  --max-iterations, -n <N>          Iteration cap (default 50)
  --model, -m <provider/model>      Model to start on
  --cost-ceiling <USD>              Stop once spend exceeds this amount
  --completion-guard <guard>        substring | final-token | promise-tag
  --switch-model <provider/model@N> Switch model before iteration N (0-based)
  --catalog <file.yaml>             Extra model definitions
  --json                            Print the outcome as JSON

Exit Codes:
  0 completed, 1 failed, 2 budget exceeded, 3 context exhausted,
  4 max iterations reached, 64 usage error

Examples:
  autoloop run -p "Fix the failing tests" -c "ALL TESTS PASS" -n 10
  autoloop run --prompt-file task.md -c DONE --cost-ceiling 5 --switch-model openai/gpt-4o@3
  autoloop status
`;

const defaultIO: CliIO = {
  stdout: line => process.stdout.write(line + '\n'),
  stderr: line => process.stderr.write(line + '\n')
};

async function dispatch(parsed: CliCommand, config: AutoloopConfig, io: CliIO): Promise<number> {
  switch (parsed.command) {
    case 'run': {
      // Unattended mode is decided here, once, and passed down explicitly.
      const runtime = createRuntime(config, {
        catalogPath: parsed.options.catalog,
        autonomous: config.autonomous
      });
      return runCommand(parsed.options, runtime, config, io);
    }
    case 'status':
      return statusCommand(config.stateFilePath, parsed.options.json, io);
    case 'models':
      return modelsCommand(createRuntime(config, { catalogPath: parsed.options.catalog }).registry, io);
    case 'serve':
      await startServer(config, { catalogPath: parsed.options.catalog, autonomous: config.autonomous });
      return 0;
    case 'help':
      io.stdout(HELP_TEXT);
      return 0;
  }
}

/**
 * Main entry point; resolves to the process exit code.
 */
export async function main(
  args: string[] = process.argv.slice(2),
  io: CliIO = defaultIO,
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  try {
    const parsed = parseArgs(args);
    const config = loadConfig(env);
    return await dispatch(parsed, {
      ...config,
      stateFilePath: getStateFilePath(process.cwd(), config.stateFilePath)
    }, io);
  } catch (error) {
    if (error instanceof UsageError || error instanceof ConfigurationError) {
      io.stderr(`Error: ${error.message}`);
      if (error instanceof UsageError) {
        io.stderr('Run "autoloop help" for usage.');
      }
      return EXIT_CODES.usage;
    }
    io.stderr(`Error: ${toError(error).message}`);
    return EXIT_CODES.failed;
  }
}
