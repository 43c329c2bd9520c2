// pattern: Imperative Shell

/**
 * ToolRegistry implementation.
 * Manages tool registration, lookup, schema export, and dispatch.
 * One instance is built by the composition root and passed to whoever needs it.
 */

import type {
  StandardToolCall,
  Tool,
  ToolContext,
  ToolDefinition,
  ToolExecutionResult,
  ToolRegistry,
} from './types.js';
import { DuplicateToolError } from './types.js';
import {
  errorMessage,
  missingRequiredParameters,
  toolFailure,
  validateParameters,
} from './contract.js';

export function createToolRegistry(): ToolRegistry {
  // Map iteration order is insertion order, so listNames() follows registration order.
  const tools = new Map<string, Tool>();

  function invalidParametersError(tool: Tool, params: Record<string, unknown>): string {
    const missing = missingRequiredParameters(tool.definition.parameters_schema, params);
    if (missing.length > 0) {
      return `missing required parameter${missing.length === 1 ? '' : 's'}: ${missing.join(', ')}`;
    }
    return `invalid parameters for tool: ${tool.definition.name}`;
  }

  return {
    register(tool: Tool): void {
      const name = tool.definition.name;
      if (tools.has(name)) {
        throw new DuplicateToolError(name);
      }
      tools.set(name, tool);
    },

    unregister(name: string): void {
      tools.delete(name);
    },

    get(name: string): Tool | undefined {
      return tools.get(name);
    },

    listNames(): Array<string> {
      return Array.from(tools.keys());
    },

    all(): Map<string, Tool> {
      return new Map(tools);
    },

    schemas(): Array<ToolDefinition> {
      return Array.from(tools.values()).map((tool) => ({
        name: tool.definition.name,
        description: tool.definition.description,
        parameters_schema: tool.definition.parameters_schema,
      }));
    },

    clear(): void {
      tools.clear();
    },

    async dispatch(
      call: StandardToolCall,
      context?: ToolContext,
    ): Promise<ToolExecutionResult> {
      const tool = tools.get(call.tool_name);
      if (!tool) {
        return toolFailure(call.tool_name, `unknown tool: ${call.tool_name}`);
      }

      if (!validateParameters(tool, call.parameters)) {
        return toolFailure(call.tool_name, invalidParametersError(tool, call.parameters));
      }

      try {
        return await tool.execute(call.parameters, context);
      } catch (error) {
        console.error(`[tools] ${call.tool_name} threw during execution:`, error);
        return toolFailure(call.tool_name, `handler error: ${errorMessage(error)}`);
      }
    },
  };
}
