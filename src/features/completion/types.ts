// src/features/completion/types.ts

/**
 * How strictly a response must carry the completion marker.
 *
 * - substring: the marker appears anywhere, exact and case-sensitive
 * - final-token: the response ends with the marker (trailing whitespace ignored)
 * - promise-tag: the response contains <promise>MARKER</promise>
 */
export const COMPLETION_GUARDS = ['substring', 'final-token', 'promise-tag'] as const;

export type CompletionGuard = (typeof COMPLETION_GUARDS)[number];

export function isCompletionGuard(value: string): value is CompletionGuard {
  return (COMPLETION_GUARDS as readonly string[]).includes(value);
}
