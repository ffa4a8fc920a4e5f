// src/index.ts

/**
 * autoloop
 *
 * Iterate-until-done control loop for conversational coding agents.
 */

export * from './features/ralph-loop/index.js';
export * from './features/completion/index.js';
export * from './features/cost-tracking/index.js';
export * from './features/context-window/index.js';
export * from './features/model-registry/index.js';

export type { AgentSession } from './services/agent-session.js';
export { ChatAgentSession, createChatSessionFactory } from './services/chat-session.js';
export type { ChatSessionOptions, ChatSessionFactoryOptions } from './services/chat-session.js';
export { ProviderClient, buildChatRequest } from './services/provider-client.js';
export type { ProviderClientOptions, CompletionResult } from './services/provider-client.js';

export type { ChatMessage, MessageRole, ToolCall, TokenUsage, ContextUsage } from './types.js';
export {
  AutoloopError,
  ProviderError,
  ModelIncompatibleError,
  UnknownModelError,
  ConfigurationError,
  LoopStateError,
  isRetryableError
} from './utils/errors.js';
export type { ProviderErrorKind } from './utils/errors.js';
export { withRetry, calculateBackoff } from './utils/retry.js';
export type { RetryOptions } from './utils/retry.js';

export { loadConfig } from './config.js';
export type { AutoloopConfig } from './config.js';
export { createRuntime } from './runtime.js';
export type { Runtime, RuntimeOptions } from './runtime.js';
export { createServer, startServer } from './server.js';
