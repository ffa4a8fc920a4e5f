// src/features/context-window/constants.ts

export const DEFAULT_COMPACTION_THRESHOLD = 0.85;

export const DEFAULT_PRESERVE_RECENT_MESSAGES = 6;

export const SUMMARY_PREFIX = '[Conversation summary]';

export const PRUNED_NOTE_TEMPLATE = '[{{COUNT}} earlier messages were pruned to fit the context window]';

export const SUMMARY_PROMPT = `Provide a detailed summary for continuing the conversation above.
Focus on what a fresh reader needs to carry on the work: what was done, what is in progress, and what comes next.

Use this template:
---
## Goal
[What the task is trying to accomplish]

## Instructions
- [Constraints and instructions that still apply]

## Discoveries
[Notable findings worth keeping]

## Accomplished
[What is finished, what is in progress, what is left]

## Relevant files / directories
[Files read, edited or created that matter for the task]
---`;
