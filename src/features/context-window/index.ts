// src/features/context-window/index.ts

/**
 * Context Window Module
 *
 * Token estimation, the compaction trigger and pluggable compaction
 * strategies.
 */

export type {
  CompactionInput,
  CompactionStrategy,
  ContextGovernorConfig,
  ContextCheck
} from './types.js';
export {
  DEFAULT_COMPACTION_THRESHOLD,
  DEFAULT_PRESERVE_RECENT_MESSAGES,
  SUMMARY_PROMPT,
  SUMMARY_PREFIX
} from './constants.js';
export { estimateTokens, estimateMessageTokens, DEFAULT_CHARS_PER_TOKEN } from './tokens.js';
export {
  splitHistory,
  TruncateStrategy,
  SummarizeStrategy,
  createCompactionStrategy
} from './strategies.js';
export { ContextGovernor, needsCompaction, usageRatio } from './governor.js';
