// src/features/completion/index.ts

export type { CompletionGuard } from './types.js';
export { COMPLETION_GUARDS, isCompletionGuard } from './types.js';
export { detectCompletion, promiseTag } from './detector.js';
