import { describe, it, expect, vi } from 'vitest';
import { ProviderClient, buildChatRequest } from '../provider-client.js';
import { ModelRegistry } from '../../features/model-registry/registry.js';
import type { CompatibleModelSpec } from '../../features/model-registry/types.js';
import type { ChatMessage } from '../../types.js';

const registry = new ModelRegistry('anthropic/claude-sonnet-4-5');
const sonnet = registry.resolve('anthropic/claude-sonnet-4-5');
const messages: ChatMessage[] = [{ role: 'user', content: 'Fix the build' }];

const localModel: CompatibleModelSpec = {
  provider: 'openai-compatible',
  modelId: 'qwen2.5-coder',
  displayName: 'Qwen 2.5 Coder',
  contextWindow: 32768,
  supportsTools: true,
  supportsSystemRole: true,
  baseUrl: 'http://localhost:11434',
  apiKeyEnv: 'LOCAL_LLM_KEY',
  pricing: { inputPricePerMillion: 0, outputPricePerMillion: 0 }
};

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), { status: 200, ...init });
}

function stubFetch(response: Response | Error) {
  return vi.fn(async (_input: unknown, _init?: RequestInit): Promise<Response> => {
    if (response instanceof Error) throw response;
    return response;
  });
}

function clientWith(fetchImpl: typeof fetch, env: NodeJS.ProcessEnv = {}): ProviderClient {
  return new ProviderClient({
    proxyUrl: 'http://proxy.test',
    apiKey: 'test-secret',
    timeoutMs: 1000,
    fetch: fetchImpl,
    env
  });
}

const okBody = {
  choices: [{ message: { content: 'Build fixed. DONE' }, finish_reason: 'stop' }],
  usage: { prompt_tokens: 1000, completion_tokens: 200, prompt_tokens_details: { cached_tokens: 100 } }
};

describe('buildChatRequest', () => {
  it('should send max_completion_tokens and no temperature to reasoning models', () => {
    const request = buildChatRequest(registry.resolve('openai/o1-mini'), messages);

    expect(request).toEqual({ model: 'o1-mini', messages, max_completion_tokens: 4096 });
  });

  it('should send the anthropic output limit as max_tokens', () => {
    const request = buildChatRequest(sonnet, messages);

    expect(request.max_tokens).toBe(8192);
    expect(request.temperature).toBe(0.2);
  });

  it('should use the google model temperature', () => {
    const request = buildChatRequest(registry.resolve('google/gemini-2.5-pro'), messages);

    expect(request.temperature).toBe(0.7);
  });
});

describe('ProviderClient', () => {
  it('should post to the proxy with the bearer token', async () => {
    const fetchImpl = stubFetch(jsonResponse(okBody));

    await clientWith(fetchImpl).complete(sonnet, messages);

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('http://proxy.test/v1/chat/completions');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'claude-sonnet-4-5',
      messages,
      temperature: 0.2,
      max_tokens: 8192
    });
  });

  it('should map reported usage', async () => {
    const result = await clientWith(stubFetch(jsonResponse(okBody))).complete(sonnet, messages);

    expect(result.content).toBe('Build fixed. DONE');
    expect(result.usage).toEqual({ inputTokens: 1000, outputTokens: 200, cachedTokens: 100, totalTokens: 1200 });
    expect(result.usageReported).toBe(true);
    expect(result.finishReason).toBe('stop');
  });

  it('should estimate usage when the provider reports none', async () => {
    const body = { choices: [{ message: { content: 'abcdefg' } }] };

    const result = await clientWith(stubFetch(jsonResponse(body))).complete(sonnet, messages);

    expect(result.usageReported).toBe(false);
    // 'Fix the build' is 13 chars at 3.5 chars/token, plus 4 overhead; 'abcdefg' is 7 chars
    expect(result.usage).toEqual({ inputTokens: 8, outputTokens: 2, totalTokens: 10 });
  });

  it('should reach openai-compatible models on their own endpoint', async () => {
    const fetchImpl = stubFetch(jsonResponse(okBody));

    await clientWith(fetchImpl, { LOCAL_LLM_KEY: 'test-local-key' }).complete(localModel, messages);

    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('http://localhost:11434/v1/chat/completions');
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer test-local-key' });
  });

  it('should classify rate limits with the Retry-After delay', async () => {
    const response = new Response('Too many requests', { status: 429, headers: { 'retry-after': '3' } });

    await expect(clientWith(stubFetch(response)).complete(sonnet, messages)).rejects.toMatchObject({
      name: 'ProviderError',
      kind: 'rate_limit',
      statusCode: 429,
      retryAfterMs: 3000,
      retryable: true,
      message: 'API error (429) from anthropic/claude-sonnet-4-5: Too many requests'
    });
  });

  it('should treat authentication failures as not retryable', async () => {
    const response = new Response('invalid api key', { status: 401 });

    await expect(clientWith(stubFetch(response)).complete(sonnet, messages)).rejects.toMatchObject({
      kind: 'auth',
      retryable: false
    });
  });

  it('should classify server errors as retryable', async () => {
    const response = new Response('bad gateway', { status: 502 });

    await expect(clientWith(stubFetch(response)).complete(sonnet, messages)).rejects.toMatchObject({
      kind: 'server',
      retryable: true
    });
  });

  it('should report network failures', async () => {
    const fetchImpl = stubFetch(new TypeError('fetch failed'));

    await expect(clientWith(fetchImpl).complete(sonnet, messages)).rejects.toMatchObject({
      kind: 'network',
      message: 'Request to anthropic/claude-sonnet-4-5 failed: fetch failed'
    });
  });

  it('should report timeouts', async () => {
    const timeout = new Error('The operation was aborted due to timeout');
    timeout.name = 'TimeoutError';

    await expect(clientWith(stubFetch(timeout)).complete(sonnet, messages)).rejects.toMatchObject({
      kind: 'timeout',
      message: 'Request to anthropic/claude-sonnet-4-5 timed out after 1000ms'
    });
  });

  it('should reject responses without choices', async () => {
    await expect(clientWith(stubFetch(jsonResponse({ choices: [] }))).complete(sonnet, messages)).rejects.toMatchObject({
      kind: 'invalid_response',
      retryable: true
    });
  });

  it('should reject malformed JSON', async () => {
    const response = new Response('<html>oops</html>', { status: 200 });

    await expect(clientWith(stubFetch(response)).complete(sonnet, messages)).rejects.toMatchObject({
      kind: 'invalid_response',
      message: 'Malformed JSON from anthropic/claude-sonnet-4-5'
    });
  });
});
