// pattern: Functional Core

/**
 * Tool system types for registration, dispatch, and provider translation.
 * These types define the port interface for the tool registry and the
 * provider-neutral tool-call representation that adapters decode into.
 */

export type JsonSchemaType = 'string' | 'number' | 'integer' | 'boolean' | 'object' | 'array';

export type JsonSchemaProperty = {
  type: JsonSchemaType;
  description?: string;
  enum?: ReadonlyArray<string>;
  items?: JsonSchemaProperty;
  default?: unknown;
  minimum?: number;
  maximum?: number;
};

export type ToolParametersSchema = {
  type: 'object';
  properties: Record<string, JsonSchemaProperty>;
  required?: ReadonlyArray<string>;
};

export type ToolDefinition = {
  name: string;
  description: string;
  parameters_schema: ToolParametersSchema;
};

/**
 * Out-of-band values a tool may need but the model never sees.
 * Providers and front doors decide which keys they fill in.
 */
export type ToolContext = {
  readonly access_token?: string;
  readonly user_id?: string;
  readonly [key: string]: unknown;
};

export type ToolExecutionResult = {
  success: boolean;
  result?: Record<string, unknown>;
  error?: string;
  tool_name: string;
};

export type ToolHandler = (
  params: Record<string, unknown>,
  context?: ToolContext,
) => Promise<ToolExecutionResult>;

export type Tool = {
  definition: ToolDefinition;
  execute: ToolHandler;
  /** Replaces the shallow required-field check when present. */
  validateParameters?: (params: Record<string, unknown>) => boolean;
};

/**
 * A tool call decoded from a provider response.
 * `id` is the provider's correlation token; providers without one leave it out.
 */
export type StandardToolCall = {
  id?: string;
  tool_name: string;
  parameters: Record<string, unknown>;
};

/**
 * One executed call, ready to be encoded back into provider format.
 * `result` is serialized as JSON into the provider message content.
 */
export type ToolCallOutcome = {
  tool_call_id?: string;
  tool_name: string;
  result: unknown;
  is_error?: boolean;
};

export class DuplicateToolError extends Error {
  constructor(public readonly toolName: string) {
    super(`tool already registered: ${toolName}`);
    this.name = 'DuplicateToolError';
  }
}

export class UnknownToolError extends Error {
  constructor(public readonly toolNames: ReadonlyArray<string>) {
    super(`unknown tool${toolNames.length === 1 ? '' : 's'}: ${toolNames.join(', ')}`);
    this.name = 'UnknownToolError';
  }
}

export interface ToolRegistry {
  register(tool: Tool): void;
  unregister(name: string): void;
  get(name: string): Tool | undefined;
  listNames(): Array<string>;
  all(): Map<string, Tool>;
  schemas(): Array<ToolDefinition>;
  clear(): void;
  dispatch(call: StandardToolCall, context?: ToolContext): Promise<ToolExecutionResult>;
}
