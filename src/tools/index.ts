// src/tools/index.ts

export {
  ralphLoopRunSchema,
  ralphLoopStatusSchema,
  handleRalphLoopRun,
  handleRalphLoopStatus,
  registerRalphLoopTools,
  createLoopToolContext,
  TOOL_MAX_ITERATIONS
} from './ralph-loop.js';
export type {
  RalphLoopRunArgs,
  RalphLoopStatusArgs,
  ToolResult,
  RecentOutcome,
  LoopToolContext
} from './ralph-loop.js';
