// src/features/model-registry/types.ts

/**
 * Model Registry Types
 *
 * Models are typed variants keyed by provider. Provider-specific fields are
 * read by the transport when it builds a request.
 */

import type { ModelPricing } from '../cost-tracking/types.js';

export const PROVIDERS = ['openai', 'anthropic', 'google', 'openai-compatible'] as const;

export type Provider = (typeof PROVIDERS)[number];

export function isProvider(value: string): value is Provider {
  return (PROVIDERS as readonly string[]).includes(value);
}

interface ModelSpecBase {
  modelId: string;
  displayName: string;
  /** Context window in tokens */
  contextWindow: number;
  maxOutputTokens?: number;
  /** Whether tool calls and tool results may appear in the transcript */
  supportsTools: boolean;
  /** Whether the transcript may carry system messages */
  supportsSystemRole: boolean;
  /** Token estimate ratio for this model family */
  charsPerToken?: number;
  pricing: ModelPricing;
}

export interface OpenAIModelSpec extends ModelSpecBase {
  provider: 'openai';
  /** Reasoning models take max_completion_tokens and no temperature */
  reasoning: boolean;
}

export interface AnthropicModelSpec extends ModelSpecBase {
  provider: 'anthropic';
  maxOutputTokens: number;
}

export interface GoogleModelSpec extends ModelSpecBase {
  provider: 'google';
  temperature: number;
}

export interface CompatibleModelSpec extends ModelSpecBase {
  provider: 'openai-compatible';
  /** Endpoint root; requests go to {baseUrl}/v1/chat/completions */
  baseUrl: string;
  /** Environment variable holding the bearer token */
  apiKeyEnv?: string;
}

export type ModelSpec =
  | OpenAIModelSpec
  | AnthropicModelSpec
  | GoogleModelSpec
  | CompatibleModelSpec;

export interface ModelRef {
  provider: Provider;
  model: string;
}

export function modelKey(ref: ModelRef | ModelSpec): string {
  return 'modelId' in ref ? `${ref.provider}/${ref.modelId}` : `${ref.provider}/${ref.model}`;
}
