// src/features/model-registry/registry.ts

/**
 * Model Registry
 *
 * Resolves "provider/model" references to typed model specs. Unknown
 * providers and models fail here, before a session exists.
 */

import { UnknownModelError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { DEFAULT_MODEL_CATALOG } from './catalog.js';
import { PROVIDERS, isProvider, modelKey } from './types.js';
import type { ModelRef, ModelSpec } from './types.js';

/**
 * Parses "provider/model". The model part may itself contain slashes
 * (e.g. "openai-compatible/qwen/qwen2.5-coder").
 */
export function parseModelRef(value: string): ModelRef {
  const trimmed = value.trim();
  const slash = trimmed.indexOf('/');

  if (slash <= 0 || slash === trimmed.length - 1) {
    throw new UnknownModelError(value, 'expected "provider/model"');
  }

  const provider = trimmed.slice(0, slash);
  const model = trimmed.slice(slash + 1);

  if (!isProvider(provider)) {
    throw new UnknownModelError(value, `unknown provider "${provider}" (expected one of: ${PROVIDERS.join(', ')})`);
  }

  return { provider, model };
}

export class ModelRegistry {
  private readonly models = new Map<string, ModelSpec>();
  private defaultRef: string;

  constructor(defaultRef: string, specs: readonly ModelSpec[] = DEFAULT_MODEL_CATALOG) {
    for (const spec of specs) {
      this.register(spec);
    }
    this.defaultRef = defaultRef;
  }

  /**
   * Adds or replaces a model.
   */
  register(spec: ModelSpec): void {
    const key = modelKey(spec);
    if (this.models.has(key)) {
      logger.debug({ model: key }, 'Overriding registered model');
    }
    this.models.set(key, spec);
  }

  list(): ModelSpec[] {
    return [...this.models.values()];
  }

  get defaultModel(): string {
    return this.defaultRef;
  }

  setDefault(ref: string): void {
    this.resolve(ref);
    this.defaultRef = ref;
  }

  /**
   * Resolves a reference; a bare model id is accepted when exactly one
   * provider registers it. Omitting the reference resolves the default.
   */
  resolve(ref?: string | ModelRef): ModelSpec {
    const target = ref ?? this.defaultRef;

    if (typeof target !== 'string') {
      return this.lookup(modelKey(target));
    }

    if (!target.includes('/')) {
      const matches = this.list().filter(spec => spec.modelId === target);
      if (matches.length === 1) {
        return matches[0];
      }
      throw new UnknownModelError(
        target,
        matches.length === 0 ? 'not registered' : 'registered by several providers, qualify it as "provider/model"'
      );
    }

    return this.lookup(modelKey(parseModelRef(target)));
  }

  private lookup(key: string): ModelSpec {
    const spec = this.models.get(key);
    if (!spec) {
      throw new UnknownModelError(key, 'not registered');
    }
    return spec;
  }
}
