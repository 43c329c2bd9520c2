// pattern: Imperative Shell

import type {
  StandardToolCall,
  ToolCallOutcome,
  ToolContext,
  ToolExecutionResult,
  ToolRegistry,
} from './types.js';
import { toolFailure } from './contract.js';

export type ExecutedToolCall = {
  id?: string;
  tool_name: string;
  parameters: Record<string, unknown>;
  result: ToolExecutionResult;
};

export type ExecuteToolCallsOptions = {
  /** Names the model may call in this turn. Calls outside the set fail without running. */
  readonly allowed?: ReadonlySet<string>;
};

/**
 * Run every call of one response turn concurrently.
 * The returned array lines up with `calls` by position, so a call without an id
 * is still matched to its result.
 */
export async function executeToolCalls(
  registry: ToolRegistry,
  calls: ReadonlyArray<StandardToolCall>,
  context?: ToolContext,
  options: ExecuteToolCallsOptions = {},
): Promise<Array<ExecutedToolCall>> {
  return Promise.all(
    calls.map(async (call): Promise<ExecutedToolCall> => {
      const result =
        options.allowed && !options.allowed.has(call.tool_name)
          ? toolFailure(call.tool_name, `tool not enabled for this request: ${call.tool_name}`)
          : await registry.dispatch(call, context);

      return {
        ...(call.id !== undefined && { id: call.id }),
        tool_name: call.tool_name,
        parameters: call.parameters,
        result,
      };
    }),
  );
}

export function toToolCallOutcomes(
  executed: ReadonlyArray<ExecutedToolCall>,
): Array<ToolCallOutcome> {
  return executed.map((call) => ({
    ...(call.id !== undefined && { tool_call_id: call.id }),
    tool_name: call.tool_name,
    result: call.result,
    ...(!call.result.success && { is_error: true }),
  }));
}
