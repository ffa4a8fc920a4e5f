// src/features/model-registry/selector.ts

/**
 * Model Selector
 *
 * Builds sessions for registry models and moves a running conversation to
 * another backend. A switch carries history and cumulative cost forward; it
 * is a policy on top of the loop, not a new session from the loop's view.
 */

import type { AgentSession } from '../../services/agent-session.js';
import type { ChatMessage } from '../../types.js';
import { ModelIncompatibleError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { ModelRegistry } from './registry.js';
import { modelKey } from './types.js';
import type { ModelSpec } from './types.js';

export interface SessionSeed {
  history: readonly ChatMessage[];
  initialCost: number;
}

export type SessionFactory = (spec: ModelSpec, seed: SessionSeed) => AgentSession;

export interface SessionSelector {
  create(modelId?: string, carryHistoryFrom?: AgentSession): AgentSession;
  switchModel(currentSession: AgentSession, newModelId: string): AgentSession;
}

/**
 * Reason the transcript cannot be replayed on the given model, or null.
 */
export function findIncompatibility(history: readonly ChatMessage[], spec: ModelSpec): string | null {
  if (!spec.supportsTools) {
    const hasToolTraffic = history.some(
      message => message.role === 'tool' || (message.tool_calls?.length ?? 0) > 0
    );
    if (hasToolTraffic) {
      return 'transcript contains tool calls but the model has no tool support';
    }
  }

  if (!spec.supportsSystemRole && history.some(message => message.role === 'system')) {
    return 'transcript contains system messages but the model has no system role';
  }

  return null;
}

export class ModelSelector implements SessionSelector {
  constructor(
    private readonly registry: ModelRegistry,
    private readonly factory: SessionFactory
  ) {}

  create(modelId?: string, carryHistoryFrom?: AgentSession): AgentSession {
    const spec = this.registry.resolve(modelId);

    if (!carryHistoryFrom) {
      return this.factory(spec, { history: [], initialCost: 0 });
    }

    const history = carryHistoryFrom.history();
    const reason = findIncompatibility(history, spec);
    if (reason) {
      throw new ModelIncompatibleError(carryHistoryFrom.activeModel(), modelKey(spec), reason);
    }

    logger.debug({
      from: carryHistoryFrom.activeModel(),
      to: modelKey(spec),
      messages: history.length
    }, 'Carrying conversation to new model');

    return this.factory(spec, {
      history: [...history],
      initialCost: carryHistoryFrom.cumulativeCost()
    });
  }

  switchModel(currentSession: AgentSession, newModelId: string): AgentSession {
    return this.create(newModelId, currentSession);
  }
}
