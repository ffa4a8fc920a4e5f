// src/features/model-registry/index.ts

/**
 * Model Registry Module
 *
 * Typed model specs, "provider/model" resolution and session switching.
 */

export type {
  Provider,
  ModelSpec,
  ModelRef,
  OpenAIModelSpec,
  AnthropicModelSpec,
  GoogleModelSpec,
  CompatibleModelSpec
} from './types.js';
export { PROVIDERS, isProvider, modelKey } from './types.js';
export { DEFAULT_MODEL_CATALOG } from './catalog.js';
export { ModelRegistry, parseModelRef } from './registry.js';
export type { SessionSeed, SessionFactory, SessionSelector } from './selector.js';
export { ModelSelector, findIncompatibility } from './selector.js';
export { parseModelCatalog, loadModelCatalog } from './catalog-loader.js';
