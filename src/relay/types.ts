// pattern: Functional Core

import type { ProviderName } from '../adapter/types.js';
import type { ModelInfo, UsageStats } from '../model/types.js';
import type { ExecutedToolCall } from '../tool/dispatch.js';
import type { ToolContext } from '../tool/types.js';
import type { ChatRequestInput } from './schema.js';

/** Finish reason reported when the tool loop stops at its round limit. */
export const MAX_TOOL_ROUNDS_REASON = 'max_tool_rounds';

export const RELAY_VERSION = '0.1.0';

export type ChatResponse = {
  content: string;
  role: 'assistant';
  finish_reason: string | null;
  usage: UsageStats;
  tool_calls: Array<ExecutedToolCall>;
};

export type StreamChunk = {
  delta: string;
  finish_reason?: string | null;
  tool_result?: ExecutedToolCall;
};

export type HealthStatus = {
  status: 'healthy';
  version: string;
  providers_available: Array<ProviderName>;
};

export type ConnectionCheck = {
  status: 'success' | 'error';
  message: string;
  provider: string;
};

export interface Relay {
  chat(request: ChatRequestInput, context?: ToolContext): Promise<ChatResponse>;
  stream(request: ChatRequestInput, context?: ToolContext): AsyncIterable<StreamChunk>;
  listModels(): Array<ModelInfo>;
  health(): HealthStatus;
  testConnection(provider: string): Promise<ConnectionCheck>;
}

export class ProviderNotConfiguredError extends Error {
  constructor(public readonly provider: ProviderName) {
    super(`provider not configured: ${provider}`);
    this.name = 'ProviderNotConfiguredError';
  }
}
