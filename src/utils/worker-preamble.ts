// src/utils/worker-preamble.ts

/**
 * Worker Preamble Protocol
 *
 * Unattended loops have nobody to answer a question or approve an action.
 * Sessions built with `autonomous: true` put these constraints in front of
 * the conversation so the agent keeps working instead of waiting.
 */

const WORKER_PREAMBLE = `<worker-constraints>
## Unattended execution

You are running inside an automated loop with no human watching.

### Do not
- Ask the user questions or wait for confirmation
- Stop to request approval before acting
- Claim completion before the task is actually done

### Do
- Decide and proceed on your own judgement
- Report what you did and what remains at the end of every response
- Emit the agreed completion marker only when the task is fully finished
</worker-constraints>

---

`;

export const WORKER_PREAMBLE_TEXT = WORKER_PREAMBLE.replace(/\n---\n\n$/, '').trim();

export function wrapWithPreamble(prompt: string): string {
  return WORKER_PREAMBLE + prompt;
}

export function hasPreamble(prompt: string): boolean {
  return prompt.includes('<worker-constraints>');
}
