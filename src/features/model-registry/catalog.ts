// src/features/model-registry/catalog.ts

/**
 * Built-in model catalog (pricing as of 2025)
 */

import type { ModelSpec } from './types.js';

export const DEFAULT_MODEL_CATALOG: ModelSpec[] = [
  // OpenAI
  {
    provider: 'openai',
    modelId: 'gpt-4o',
    displayName: 'GPT-4o',
    contextWindow: 128000,
    supportsTools: true,
    supportsSystemRole: true,
    reasoning: false,
    pricing: { inputPricePerMillion: 2.50, outputPricePerMillion: 10.00, cachedInputPricePerMillion: 1.25 }
  },
  {
    provider: 'openai',
    modelId: 'gpt-4o-mini',
    displayName: 'GPT-4o Mini',
    contextWindow: 128000,
    supportsTools: true,
    supportsSystemRole: true,
    reasoning: false,
    pricing: { inputPricePerMillion: 0.15, outputPricePerMillion: 0.60, cachedInputPricePerMillion: 0.075 }
  },
  {
    provider: 'openai',
    modelId: 'o1-mini',
    displayName: 'O1 Mini',
    contextWindow: 128000,
    supportsTools: false,
    supportsSystemRole: false,
    reasoning: true,
    pricing: { inputPricePerMillion: 3.00, outputPricePerMillion: 12.00, cachedInputPricePerMillion: 1.50 }
  },

  // Anthropic
  {
    provider: 'anthropic',
    modelId: 'claude-sonnet-4-5',
    displayName: 'Claude Sonnet 4.5',
    contextWindow: 200000,
    maxOutputTokens: 8192,
    supportsTools: true,
    supportsSystemRole: true,
    charsPerToken: 3.5,
    pricing: { inputPricePerMillion: 3.00, outputPricePerMillion: 15.00, cachedInputPricePerMillion: 0.30 }
  },
  {
    provider: 'anthropic',
    modelId: 'claude-3-opus-20240229',
    displayName: 'Claude 3 Opus',
    contextWindow: 200000,
    maxOutputTokens: 4096,
    supportsTools: true,
    supportsSystemRole: true,
    charsPerToken: 3.5,
    pricing: { inputPricePerMillion: 15.00, outputPricePerMillion: 75.00, cachedInputPricePerMillion: 1.50 }
  },
  {
    provider: 'anthropic',
    modelId: 'claude-3-haiku-20240307',
    displayName: 'Claude 3 Haiku',
    contextWindow: 200000,
    maxOutputTokens: 4096,
    supportsTools: true,
    supportsSystemRole: true,
    charsPerToken: 3.5,
    pricing: { inputPricePerMillion: 0.25, outputPricePerMillion: 1.25, cachedInputPricePerMillion: 0.03 }
  },

  // Google
  {
    provider: 'google',
    modelId: 'gemini-2.5-pro',
    displayName: 'Gemini 2.5 Pro',
    contextWindow: 1000000,
    supportsTools: true,
    supportsSystemRole: true,
    temperature: 0.7,
    pricing: { inputPricePerMillion: 1.25, outputPricePerMillion: 5.00, cachedInputPricePerMillion: 0.31 }
  },
  {
    provider: 'google',
    modelId: 'gemini-2.5-flash',
    displayName: 'Gemini 2.5 Flash',
    contextWindow: 1000000,
    supportsTools: true,
    supportsSystemRole: true,
    temperature: 0.7,
    pricing: { inputPricePerMillion: 0.075, outputPricePerMillion: 0.30, cachedInputPricePerMillion: 0.01875 }
  }
];
