// src/runtime.ts

/**
 * Wires configuration into the collaborators a loop needs: the model
 * registry (with an optional YAML catalog), the provider transport, the
 * session selector and the governors.
 */

import type { AutoloopConfig } from './config.js';
import { ModelRegistry } from './features/model-registry/registry.js';
import { ModelSelector } from './features/model-registry/selector.js';
import { loadModelCatalog } from './features/model-registry/catalog-loader.js';
import { CostGovernor } from './features/cost-tracking/governor.js';
import { ContextGovernor } from './features/context-window/governor.js';
import { createCompactionStrategy } from './features/context-window/strategies.js';
import { ProviderClient } from './services/provider-client.js';
import { createChatSessionFactory } from './services/chat-session.js';
import type { LoopDependencies } from './features/ralph-loop/types.js';
import type { RetryOptions } from './utils/retry.js';
import { logger } from './utils/logger.js';

export interface RuntimeOptions {
  /** YAML catalog merged over the built-in models */
  catalogPath?: string;
  /** Overrides config.autonomous */
  autonomous?: boolean;
  fetch?: typeof fetch;
}

export interface Runtime {
  config: AutoloopConfig;
  registry: ModelRegistry;
  client: ProviderClient;
  selector: ModelSelector;
  contextGovernor: ContextGovernor;
  retry: RetryOptions;
  createCostGovernor(ceiling?: number): CostGovernor;
  /** Base loop dependencies; callers add observers and policies */
  loopDependencies(ceiling?: number): LoopDependencies;
}

export function createRuntime(config: AutoloopConfig, options: RuntimeOptions = {}): Runtime {
  const registry = new ModelRegistry(config.defaultModel);

  if (options.catalogPath) {
    const specs = loadModelCatalog(options.catalogPath);
    for (const spec of specs) {
      registry.register(spec);
    }
    logger.info({ catalog: options.catalogPath, models: specs.length }, 'Model catalog loaded');
  }

  const client = new ProviderClient({
    proxyUrl: config.proxyUrl,
    apiKey: config.apiKey,
    timeoutMs: config.requestTimeoutMs,
    fetch: options.fetch
  });

  const selector = new ModelSelector(registry, createChatSessionFactory({
    client,
    compaction: createCompactionStrategy(config.compaction.strategy),
    compactionThreshold: config.compaction.threshold,
    preserveRecent: config.compaction.preserveRecent,
    autonomous: options.autonomous ?? config.autonomous
  }));

  const contextGovernor = new ContextGovernor({ threshold: config.compaction.threshold });
  const retry: RetryOptions = { ...config.retry };

  const createCostGovernor = (ceiling?: number) =>
    new CostGovernor({ ceiling, alertThreshold: config.budget.alertThreshold });

  return {
    config,
    registry,
    client,
    selector,
    contextGovernor,
    retry,
    createCostGovernor,
    loopDependencies: ceiling => ({
      selector,
      contextGovernor,
      retry,
      costGovernor: createCostGovernor(ceiling)
    })
  };
}
