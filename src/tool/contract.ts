// pattern: Functional Core

import type { Tool, ToolExecutionResult, ToolParametersSchema } from './types.js';

/**
 * Shallow pre-check: every name in `schema.required` must be a key of `params`.
 * Types, enums and ranges are not checked, and undeclared keys are allowed.
 */
export function hasRequiredParameters(
  schema: ToolParametersSchema,
  params: Record<string, unknown>,
): boolean {
  return (schema.required ?? []).every((name) => name in params);
}

export function missingRequiredParameters(
  schema: ToolParametersSchema,
  params: Record<string, unknown>,
): Array<string> {
  return (schema.required ?? []).filter((name) => !(name in params));
}

export function validateParameters(tool: Tool, params: Record<string, unknown>): boolean {
  if (tool.validateParameters) {
    return tool.validateParameters(params);
  }
  return hasRequiredParameters(tool.definition.parameters_schema, params);
}

export function toolSuccess(
  toolName: string,
  result: Record<string, unknown>,
): ToolExecutionResult {
  return { success: true, result, tool_name: toolName };
}

export function toolFailure(toolName: string, error: string): ToolExecutionResult {
  return { success: false, error, tool_name: toolName };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
