// pattern: Functional Core

/**
 * Tool adapter port.
 * An adapter translates between the provider-neutral tool representation
 * (ToolDefinition, StandardToolCall, ToolCallOutcome) and one provider's wire format.
 */

import type Anthropic from '@anthropic-ai/sdk';
import type OpenAI from 'openai';
import type { StandardToolCall, ToolCallOutcome, ToolDefinition } from '../tool/types.js';

export const PROVIDER_NAMES = ['openai', 'anthropic'] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

/**
 * What to do with a tool result that has no correlation id.
 * `reject` throws MissingCorrelationIdError; `substitute` sends an empty id
 * and logs a warning (the provider cannot match such a result to its call).
 */
export type MissingCorrelationIdPolicy = 'reject' | 'substitute';

export type ToolAdapterOptions = {
  readonly missingCorrelationId?: MissingCorrelationIdPolicy;
};

export type OpenAIToolCallFragment = {
  index: number;
  id?: string;
  function?: {
    name?: string;
    arguments?: string;
  };
};

export type OpenAIStreamingToolCalls = {
  tool_calls?: Array<OpenAIToolCallFragment>;
};

export type ToolUseStart = {
  event: 'tool_use_start';
  index?: number;
  id?: string;
  name?: string;
};

export type ToolUseDelta = {
  event: 'tool_use_delta';
  index?: number;
  partial_json: string;
};

export type ToolUseStop = {
  event: 'tool_use_stop';
  index?: number;
};

/** Returned for events that carry nothing tool related. */
export type NoToolUse = {
  event?: undefined;
};

export type AnthropicStreamingToolUse = ToolUseStart | ToolUseDelta | ToolUseStop | NoToolUse;

type ToolAdapterBase<TTool, TResult> = {
  formatTools(tools: ReadonlyArray<ToolDefinition>): Array<TTool>;
  parseToolCalls(response: unknown): Array<StandardToolCall>;
  formatToolResults(outcomes: ReadonlyArray<ToolCallOutcome>): Array<TResult>;
  supportsStreaming(): boolean;
};

export type OpenAIToolAdapter = ToolAdapterBase<
  OpenAI.Chat.ChatCompletionTool,
  OpenAI.Chat.ChatCompletionToolMessageParam
> & {
  readonly provider: 'openai';
  parseStreamingToolCalls(delta: unknown): OpenAIStreamingToolCalls;
};

export type AnthropicToolAdapter = ToolAdapterBase<
  Anthropic.Messages.Tool,
  Anthropic.Messages.ToolResultBlockParam
> & {
  readonly provider: 'anthropic';
  parseStreamingToolUse(event: unknown): AnthropicStreamingToolUse;
  createToolResultMessage(outcomes: ReadonlyArray<ToolCallOutcome>): Anthropic.Messages.MessageParam;
};

export type ToolAdapterFor = {
  openai: OpenAIToolAdapter;
  anthropic: AnthropicToolAdapter;
};

export type ToolAdapter = ToolAdapterFor[ProviderName];

export class MalformedArgumentsError extends Error {
  constructor(
    public readonly toolName: string,
    public readonly rawArguments: string,
    public readonly recoverable: boolean,
  ) {
    super(`malformed arguments for tool ${toolName || '(unnamed)'}: ${rawArguments}`);
    this.name = 'MalformedArgumentsError';
  }
}

export class MissingCorrelationIdError extends Error {
  constructor(
    public readonly provider: ProviderName,
    public readonly toolName: string,
  ) {
    super(`${provider} tool result for ${toolName} has no tool call id`);
    this.name = 'MissingCorrelationIdError';
  }
}

export class ToolStreamError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ToolStreamError';
  }
}

export class UnknownProviderError extends Error {
  constructor(public readonly provider: string) {
    super(
      `Unknown provider: ${provider}. Valid providers are: ${PROVIDER_NAMES.map((p) => `'${p}'`).join(', ')}`,
    );
    this.name = 'UnknownProviderError';
  }
}

export function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some((name) => name === value);
}
