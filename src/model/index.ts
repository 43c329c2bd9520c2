// pattern: Functional Core

export type {
  ChatRole,
  ChatMessage,
  SamplingParams,
  TurnRequest,
  UsageStats,
  ProviderTurn,
  TurnStreamEvent,
  ChatSession,
  ChatProvider,
  ProviderOptions,
  ModelInfo,
  ModelErrorCode,
} from "./types.js";

export { ModelError, emptyUsage } from "./types.js";
export { callWithRetry, isRetryableModelError, type RetryOptions } from "./retry.js";
export { createOpenAIProvider, type OpenAIChatTransport } from "./openai.js";
export { createAnthropicProvider, type AnthropicMessagesTransport } from "./anthropic.js";
export { createChatProvider, resolveChatProvider } from "./factory.js";
export { MODEL_CATALOG, modelsFor, defaultModelFor } from "./catalog.js";
