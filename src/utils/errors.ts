// src/utils/errors.ts

/**
 * Error taxonomy for the loop and its collaborators.
 *
 * Planned loop endings (budget, context, iteration cap) are outcomes, not
 * errors. Only infrastructure failures are modelled here.
 */

export class AutoloopError extends Error {
  public readonly code: string;
  public override readonly cause?: unknown;

  constructor(message: string, code: string, cause?: unknown) {
    super(message);
    this.code = code;
    this.cause = cause;
    this.name = 'AutoloopError';
  }
}

export type ProviderErrorKind =
  | 'rate_limit'
  | 'timeout'
  | 'network'
  | 'server'
  | 'auth'
  | 'bad_request'
  | 'invalid_response';

const RETRYABLE_KINDS: ReadonlySet<ProviderErrorKind> = new Set<ProviderErrorKind>([
  'rate_limit',
  'timeout',
  'network',
  'server',
  'invalid_response'
]);

/**
 * Transport or model failure from the provider.
 */
export class ProviderError extends AutoloopError {
  public readonly kind: ProviderErrorKind;
  public readonly retryable: boolean;
  public readonly model: string;
  public readonly statusCode?: number;
  public readonly retryAfterMs?: number;

  constructor(
    message: string,
    details: {
      kind: ProviderErrorKind;
      model: string;
      statusCode?: number;
      retryAfterMs?: number;
      cause?: unknown;
    }
  ) {
    super(message, 'PROVIDER_ERROR', details.cause);
    this.name = 'ProviderError';
    this.kind = details.kind;
    this.model = details.model;
    this.retryable = RETRYABLE_KINDS.has(details.kind);
    this.statusCode = details.statusCode;
    this.retryAfterMs = details.retryAfterMs;
  }
}

/**
 * A model switch could not carry the existing transcript forward.
 */
export class ModelIncompatibleError extends AutoloopError {
  constructor(
    public readonly fromModel: string,
    public readonly toModel: string,
    public readonly reason: string
  ) {
    super(`Cannot switch from ${fromModel} to ${toModel}: ${reason}`, 'MODEL_INCOMPATIBLE');
    this.name = 'ModelIncompatibleError';
  }
}

export class UnknownModelError extends AutoloopError {
  constructor(public readonly modelRef: string, detail?: string) {
    super(`Unknown model "${modelRef}"${detail ? `: ${detail}` : ''}`, 'UNKNOWN_MODEL');
    this.name = 'UnknownModelError';
  }
}

export class ConfigurationError extends AutoloopError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CONFIGURATION_ERROR', cause);
    this.name = 'ConfigurationError';
  }
}

export class LoopStateError extends AutoloopError {
  constructor(message: string) {
    super(message, 'LOOP_STATE_ERROR');
    this.name = 'LoopStateError';
  }
}

export function isRetryableError(error: unknown): boolean {
  return error instanceof ProviderError && error.retryable;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
