// src/features/completion/detector.ts

/**
 * Completion Detector
 *
 * The marker is the literal contract between the workflow and the agent's
 * output: no trimming of the marker, no case folding, no markup stripping.
 * A marker quoted inside an explanation still matches under the default
 * guard; callers who need stricter matching pick another guard.
 */

import type { CompletionGuard } from './types.js';

export function promiseTag(marker: string): string {
  return `<promise>${marker}</promise>`;
}

export function detectCompletion(
  response: string,
  marker: string,
  guard: CompletionGuard = 'substring'
): boolean {
  if (marker.length === 0) {
    return false;
  }

  switch (guard) {
    case 'substring':
      return response.includes(marker);
    case 'final-token':
      return response.trimEnd().endsWith(marker);
    case 'promise-tag':
      return response.includes(promiseTag(marker));
  }
}
