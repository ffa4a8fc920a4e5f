// src/services/provider-client.ts

/**
 * Provider Client
 *
 * OpenAI-compatible chat-completions transport. Registry models of the
 * openai, anthropic and google providers are reached through the routing
 * proxy; openai-compatible models name their own endpoint.
 */

import { z } from 'zod';
import type { ChatMessage, TokenUsage } from '../types.js';
import type { ModelSpec } from '../features/model-registry/types.js';
import { modelKey } from '../features/model-registry/types.js';
import { estimateMessageTokens, estimateTokens } from '../features/context-window/tokens.js';
import { ProviderError } from '../utils/errors.js';
import { classifyHttpFailure, parseRetryAfter } from '../utils/rate-limit.js';
import { logger } from '../utils/logger.js';

export const DEFAULT_PROXY_URL = 'http://localhost:8317';
export const DEFAULT_REQUEST_TIMEOUT_MS = 120_000;

const DEFAULT_MAX_TOKENS = 4096;
const DEFAULT_TEMPERATURE = 0.2;

export interface ChatRequest {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  max_tokens?: number;
  max_completion_tokens?: number;
}

const toolCallSchema = z.object({
  id: z.string(),
  type: z.literal('function'),
  function: z.object({ name: z.string(), arguments: z.string() })
});

const chatResponseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({
      content: z.string().nullable().optional(),
      tool_calls: z.array(toolCallSchema).optional()
    }),
    finish_reason: z.string().nullable().optional()
  })).min(1),
  usage: z.object({
    prompt_tokens: z.number().int().min(0),
    completion_tokens: z.number().int().min(0),
    total_tokens: z.number().int().min(0).optional(),
    prompt_tokens_details: z.object({
      cached_tokens: z.number().int().min(0).optional()
    }).nullable().optional()
  }).optional()
});

export interface CompletionResult {
  content: string;
  usage: TokenUsage;
  /** False when the provider sent no usage block and tokens were estimated */
  usageReported: boolean;
  finishReason: string;
  latencyMs: number;
}

export interface ProviderClientOptions {
  proxyUrl: string;
  apiKey?: string;
  timeoutMs: number;
  fetch?: typeof fetch;
  env?: NodeJS.ProcessEnv;
}

/**
 * Builds the request body, applying provider-specific fields.
 */
export function buildChatRequest(spec: ModelSpec, messages: readonly ChatMessage[]): ChatRequest {
  const request: ChatRequest = {
    model: spec.modelId,
    messages: messages.map(m => ({ ...m }))
  };

  switch (spec.provider) {
    case 'openai':
      if (spec.reasoning) {
        request.max_completion_tokens = spec.maxOutputTokens ?? DEFAULT_MAX_TOKENS;
      } else {
        request.temperature = DEFAULT_TEMPERATURE;
        request.max_tokens = spec.maxOutputTokens ?? DEFAULT_MAX_TOKENS;
      }
      break;
    case 'anthropic':
      request.temperature = DEFAULT_TEMPERATURE;
      request.max_tokens = spec.maxOutputTokens;
      break;
    case 'google':
      request.temperature = spec.temperature;
      request.max_tokens = spec.maxOutputTokens ?? DEFAULT_MAX_TOKENS;
      break;
    case 'openai-compatible':
      request.temperature = DEFAULT_TEMPERATURE;
      request.max_tokens = spec.maxOutputTokens ?? DEFAULT_MAX_TOKENS;
      break;
  }

  return request;
}

export class ProviderClient {
  private readonly options: ProviderClientOptions;
  private readonly fetchImpl: typeof fetch;

  constructor(options: Partial<ProviderClientOptions> = {}) {
    this.options = {
      proxyUrl: DEFAULT_PROXY_URL,
      timeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
      ...options
    };
    this.fetchImpl = options.fetch ?? fetch;
  }

  endpointFor(spec: ModelSpec): string {
    const root = spec.provider === 'openai-compatible' ? spec.baseUrl : this.options.proxyUrl;
    return `${root}/v1/chat/completions`;
  }

  private headersFor(spec: ModelSpec): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    const env = this.options.env ?? process.env;

    const apiKey = spec.provider === 'openai-compatible'
      ? (spec.apiKeyEnv ? env[spec.apiKeyEnv] : undefined)
      : this.options.apiKey;

    if (apiKey) {
      headers.Authorization = `Bearer ${apiKey}`;
    }
    return headers;
  }

  async complete(spec: ModelSpec, messages: readonly ChatMessage[]): Promise<CompletionResult> {
    const model = modelKey(spec);
    const startTime = Date.now();
    const request = buildChatRequest(spec, messages);

    logger.debug({ model, messages: messages.length }, 'Calling chat completions');

    let res: Response;
    try {
      res = await this.fetchImpl(this.endpointFor(spec), {
        method: 'POST',
        headers: this.headersFor(spec),
        body: JSON.stringify(request),
        signal: AbortSignal.timeout(this.options.timeoutMs)
      });
    } catch (error) {
      const timedOut = error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
      throw new ProviderError(
        timedOut
          ? `Request to ${model} timed out after ${this.options.timeoutMs}ms`
          : `Request to ${model} failed: ${error instanceof Error ? error.message : String(error)}`,
        { kind: timedOut ? 'timeout' : 'network', model, cause: error }
      );
    }

    if (!res.ok) {
      const errorText = await res.text();
      const kind = classifyHttpFailure(res.status, errorText);
      throw new ProviderError(`API error (${res.status}) from ${model}: ${errorText.slice(0, 500)}`, {
        kind,
        model,
        statusCode: res.status,
        retryAfterMs: kind === 'rate_limit' ? parseRetryAfter(res.headers) ?? undefined : undefined
      });
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (error) {
      throw new ProviderError(`Malformed JSON from ${model}`, { kind: 'invalid_response', model, cause: error });
    }

    const parsed = chatResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderError(`Unexpected response shape from ${model}: ${parsed.error.issues[0]?.message ?? 'invalid'}`, {
        kind: 'invalid_response',
        model,
        cause: parsed.error
      });
    }

    const choice = parsed.data.choices[0];
    const content = choice.message.content ?? '';
    const usage = parsed.data.usage;
    const charsPerToken = spec.charsPerToken;

    const tokenUsage: TokenUsage = usage
      ? {
          inputTokens: usage.prompt_tokens,
          outputTokens: usage.completion_tokens,
          cachedTokens: usage.prompt_tokens_details?.cached_tokens,
          totalTokens: usage.total_tokens ?? usage.prompt_tokens + usage.completion_tokens
        }
      : estimateUsage(messages, content, charsPerToken);

    const latencyMs = Date.now() - startTime;
    logger.debug({ model, latencyMs, tokens: tokenUsage.totalTokens }, 'Chat completion finished');

    return {
      content,
      usage: tokenUsage,
      usageReported: usage !== undefined,
      finishReason: choice.finish_reason ?? 'stop',
      latencyMs
    };
  }
}

function estimateUsage(messages: readonly ChatMessage[], content: string, charsPerToken?: number): TokenUsage {
  const inputTokens = estimateMessageTokens(messages, charsPerToken);
  const outputTokens = estimateTokens(content, charsPerToken);
  return { inputTokens, outputTokens, totalTokens: inputTokens + outputTokens };
}
