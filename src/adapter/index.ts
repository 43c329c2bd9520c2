// pattern: Functional Core

export type {
  ProviderName,
  MissingCorrelationIdPolicy,
  ToolAdapterOptions,
  OpenAIToolCallFragment,
  OpenAIStreamingToolCalls,
  ToolUseStart,
  ToolUseDelta,
  ToolUseStop,
  NoToolUse,
  AnthropicStreamingToolUse,
  OpenAIToolAdapter,
  AnthropicToolAdapter,
  ToolAdapterFor,
  ToolAdapter,
} from './types.js';

export {
  PROVIDER_NAMES,
  MalformedArgumentsError,
  MissingCorrelationIdError,
  ToolStreamError,
  UnknownProviderError,
  isProviderName,
} from './types.js';
export { createOpenAIToolAdapter } from './openai.js';
export { createAnthropicToolAdapter } from './anthropic.js';
export { createToolAdapter, resolveToolAdapter } from './factory.js';
export {
  createToolUseAccumulator,
  createToolCallAccumulator,
  type ToolUseAccumulator,
  type ToolCallAccumulator,
  type PendingToolUse,
  type ToolUseBlockStatus,
} from './accumulator.js';
