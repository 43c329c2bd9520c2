// pattern: Functional Core

/**
 * Shared types for chat providers.
 * A provider opens a session over a conversation; the session keeps the
 * transcript in the vendor's native message format and runs one model turn at
 * a time, so tool results can be appended between turns.
 */

import type { MissingCorrelationIdPolicy, ProviderName, ToolAdapter } from "../adapter/types.js";
import type { StandardToolCall, ToolCallOutcome, ToolDefinition } from "../tool/types.js";

export type ChatRole = "user" | "assistant" | "system";

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

export type SamplingParams = {
  model: string;
  temperature: number;
  max_tokens: number;
  top_p: number;
};

export type TurnRequest = SamplingParams & {
  tools: ReadonlyArray<ToolDefinition>;
};

export type UsageStats = {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
};

export type ProviderTurn = {
  text: string;
  finish_reason: string | null;
  usage: UsageStats;
  tool_calls: Array<StandardToolCall>;
};

export type TurnStreamEvent =
  | { type: "text_delta"; text: string }
  | { type: "turn_complete"; turn: ProviderTurn };

export interface ChatSession {
  /** Run one turn; the assistant message is appended to the transcript. */
  complete(request: TurnRequest): Promise<ProviderTurn>;
  /** Streamed variant of complete; the final event is always turn_complete. */
  streamTurn(request: TurnRequest): AsyncIterable<TurnStreamEvent>;
  appendToolResults(outcomes: ReadonlyArray<ToolCallOutcome>): void;
}

export interface ChatProvider {
  readonly name: ProviderName;
  readonly adapter: ToolAdapter;
  openSession(messages: ReadonlyArray<ChatMessage>): ChatSession;
}

export type ProviderOptions = {
  api_key?: string;
  base_url?: string;
  max_retries?: number;
  retry_backoff_ms?: number;
  missing_correlation_id?: MissingCorrelationIdPolicy;
};

export type ModelInfo = {
  id: string;
  provider: ProviderName;
  name: string;
  context_window: number;
  supports_streaming: boolean;
};

export type ModelErrorCode = "auth" | "rate_limit" | "timeout" | "api_error" | "stream_interrupted";

export class ModelError extends Error {
  constructor(
    public code: ModelErrorCode,
    public retryable: boolean = false,
    message: string = ""
  ) {
    super(message);
    this.name = "ModelError";
  }
}

export function emptyUsage(): UsageStats {
  return { prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 };
}
