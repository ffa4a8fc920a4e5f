import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { readPrompt, runCommand } from '../commands/run.js';
import { formatStatus, statusCommand } from '../commands/status.js';
import { formatModelTable } from '../commands/models.js';
import { UsageError } from '../args.js';
import type { CliIO, RunOptions } from '../types.js';
import { ModelRegistry } from '../../features/model-registry/registry.js';
import { readState } from '../../features/ralph-loop/storage.js';
import type { LoopProgressState } from '../../features/ralph-loop/storage.js';
import { ScriptedSelector } from '../../features/ralph-loop/__tests__/fake-session.js';
import type { ScriptStep } from '../../features/ralph-loop/__tests__/fake-session.js';

function captureIO(): CliIO & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: line => { out.push(line); },
    stderr: line => { err.push(line); }
  };
}

function fakeRuntime(script: ScriptStep[], costPerCall = 0) {
  const selector = new ScriptedSelector({
    'openai/gpt-4o': { script, costPerCall },
    'google/gemini-2.5-pro': { script, costPerCall }
  });
  return { selector, runtime: { loopDependencies: () => ({ selector }) } };
}

describe('run command', () => {
  let tmpDir: string;
  let stateFilePath: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'autoloop-cli-'));
    stateFilePath = path.join(tmpDir, '.autoloop', 'loop-state.json');
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  const options = (overrides: Partial<RunOptions> = {}): RunOptions => ({
    prompt: 'Make the tests pass',
    completionPromise: 'DONE',
    json: false,
    ...overrides
  });

  it('should print the outcome and exit 0 on completion', async () => {
    const io = captureIO();
    const { runtime } = fakeRuntime(['Tests pass. DONE']);

    const code = await runCommand(options(), runtime, { stateFilePath }, io);

    expect(code).toBe(0);
    expect(io.out).toEqual([[
      '# Ralph Loop: Completed',
      '',
      '- **Iterations:** 1',
      '- **Spend:** $0.0000',
      '- **Model:** openai/gpt-4o',
      '',
      '## Final Response',
      '',
      'Tests pass. DONE'
    ].join('\n')]);
  });

  it('should render progress to stderr', async () => {
    const io = captureIO();
    const { runtime } = fakeRuntime(['Tests pass. DONE']);

    await runCommand(options(), runtime, { stateFilePath }, io);

    expect(io.err.slice(0, 4)).toEqual([
      '▶ Ralph Loop on openai/gpt-4o (max 50 iterations, marker "DONE")',
      '[1/50] running on openai/gpt-4o (spent $0.0000)',
      '[1/50] +$0.0000 (total $0.0000) · marker found',
      '■ stop: Completed'
    ]);
    expect(io.err[4]).toMatch(/^Completed after 1 iteration\(s\), spent \$0\.0000 in \d+\.\ds$/);
  });

  it('should exit 2 when the budget is exceeded', async () => {
    const { runtime } = fakeRuntime(['still working'], 2);

    const code = await runCommand(options({ costCeiling: 5 }), runtime, { stateFilePath }, captureIO());

    expect(code).toBe(2);
  });

  it('should exit 4 at the iteration cap and honour --switch-model', async () => {
    const { runtime, selector } = fakeRuntime(['still working'], 1);

    const code = await runCommand(
      options({ maxIterations: 3, switchModel: { model: 'google/gemini-2.5-pro', iteration: 1 } }),
      runtime,
      { stateFilePath },
      captureIO()
    );

    expect(code).toBe(4);
    expect(selector.created.map(session => session.activeModel())).toEqual(['openai/gpt-4o', 'google/gemini-2.5-pro']);
    expect(selector.created[1].cumulativeCost()).toBe(3);
  });

  it('should print JSON with --json', async () => {
    const io = captureIO();
    const { runtime } = fakeRuntime(['DONE']);

    await runCommand(options({ json: true }), runtime, { stateFilePath }, io);

    const printed: unknown = JSON.parse(io.out[0]);
    expect(printed).toMatchObject({ kind: 'completed', iterations: 1, response: 'DONE', model: 'openai/gpt-4o' });
  });

  it('should persist progress to the state file', async () => {
    const { runtime } = fakeRuntime(['still working', 'DONE']);

    await runCommand(options(), runtime, { stateFilePath }, captureIO());

    const state = readState(stateFilePath);
    expect(state?.active).toBe(false);
    expect(state?.outcome).toBe('completed');
    expect(state?.iteration).toBe(2);
    expect(state?.lastResponseExcerpt).toBe('DONE');
  });

  it('should read the prompt from a file', async () => {
    const promptFile = path.join(tmpDir, 'task.md');
    fs.writeFileSync(promptFile, 'Refactor the lexer\n');
    const { runtime, selector } = fakeRuntime(['DONE']);

    await runCommand(options({ prompt: undefined, promptFile }), runtime, { stateFilePath }, captureIO());

    expect(selector.created[0].prompts).toEqual(['Refactor the lexer\n']);
  });

  it('should turn unreadable or empty prompt files into usage errors', () => {
    const empty = path.join(tmpDir, 'empty.md');
    fs.writeFileSync(empty, '  \n');

    expect(() => readPrompt({ promptFile: path.join(tmpDir, 'missing.md') })).toThrow(UsageError);
    expect(() => readPrompt({ promptFile: empty })).toThrow(`Prompt file ${empty} is empty`);
  });
});

describe('status command', () => {
  const state: LoopProgressState = {
    active: true,
    taskId: 'ralph_1',
    iteration: 2,
    maxIterations: 10,
    completionMarker: 'DONE',
    prompt: 'Make the tests pass',
    model: 'openai/gpt-4o',
    cumulativeCost: 0.5,
    costCeiling: 2,
    startedAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:05:00.000Z'
  };

  it('should format a running loop', () => {
    expect(formatStatus(state)).toBe([
      'Loop:       ralph_1',
      'State:      Running',
      'Model:      openai/gpt-4o',
      'Iteration:  2/10',
      'Spend:      $0.5000 of $2.00',
      'Marker:     DONE',
      'Started:    2026-01-01T00:00:00.000Z',
      'Updated:    2026-01-01T00:05:00.000Z'
    ].join('\n'));
  });

  it('should label finished loops with their outcome', () => {
    const finished = formatStatus({ ...state, active: false, outcome: 'budget_exceeded' });

    expect(finished.split('\n')[1]).toBe('State:      Finished (Budget exceeded)');
  });

  it('should say when there is no state', () => {
    const io = captureIO();
    const missing = path.join(os.tmpdir(), 'autoloop-no-such-dir', 'state.json');

    expect(statusCommand(missing, false, io)).toBe(0);
    expect(io.out).toEqual([`No loop state at ${missing}`]);
  });
});

describe('models command', () => {
  it('should list models with the default marked', () => {
    const registry = new ModelRegistry('openai/gpt-4o', [{
      provider: 'openai',
      modelId: 'gpt-4o',
      displayName: 'GPT-4o',
      contextWindow: 128000,
      supportsTools: true,
      supportsSystemRole: true,
      reasoning: false,
      pricing: { inputPricePerMillion: 2.5, outputPricePerMillion: 10 }
    }]);

    expect(formatModelTable(registry)).toBe([
      'MODEL            CONTEXT  USD/1M IN/OUT  TOOLS',
      'openai/gpt-4o *  128,000  2.5/10         yes'
    ].join('\n'));
  });
});
