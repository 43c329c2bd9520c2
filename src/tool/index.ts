// pattern: Functional Core

export type {
  JsonSchemaType,
  JsonSchemaProperty,
  ToolParametersSchema,
  ToolDefinition,
  ToolContext,
  ToolExecutionResult,
  ToolHandler,
  Tool,
  StandardToolCall,
  ToolCallOutcome,
  ToolRegistry,
} from './types.js';

export { DuplicateToolError, UnknownToolError } from './types.js';
export { createToolRegistry } from './registry.js';
export { executeToolCalls, toToolCallOutcomes, type ExecutedToolCall } from './dispatch.js';
export { validateParameters, toolSuccess, toolFailure, errorMessage } from './contract.js';
export { createFileSystemTool, FILE_SYSTEM_TOOL_NAME } from './builtin/file-system.js';
export { createGoogleCalendarTool, GOOGLE_CALENDAR_TOOL_NAME } from './builtin/google-calendar.js';
