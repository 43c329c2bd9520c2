// pattern: Functional Core

/**
 * Tool adapter for the OpenAI function-calling wire format.
 *
 * - definitions are wrapped as `{ type: "function", function: {...} }`
 * - calls arrive on `choices[0].message.tool_calls` with JSON-string arguments
 * - results go back as one `role: "tool"` message per call, keyed by `tool_call_id`
 * - streamed calls arrive as indexed fragments on each chunk's `delta.tool_calls`
 */

import type OpenAI from 'openai';
import type { StandardToolCall, ToolCallOutcome, ToolDefinition } from '../tool/types.js';
import type {
  OpenAIStreamingToolCalls,
  OpenAIToolAdapter,
  OpenAIToolCallFragment,
  ToolAdapterOptions,
} from './types.js';
import { MalformedArgumentsError } from './types.js';
import { isRecord, parseJsonObject, readArray, readNumber, readRecord, readString } from './decode.js';
import { encodeResultContent, resolveCorrelationId } from './results.js';

function decodeToolCall(raw: unknown): StandardToolCall | undefined {
  if (!isRecord(raw)) {
    return undefined;
  }

  const fn = readRecord(raw, 'function');
  const name = fn ? readString(fn, 'name') : undefined;
  if (!fn || name === undefined) {
    return undefined;
  }

  const id = readString(raw, 'id');
  const rawArguments = readString(fn, 'arguments') ?? '';
  let parameters = parseJsonObject(rawArguments);

  if (!parameters) {
    // Tolerated: one bad argument set must not sink the other calls in the turn.
    const error = new MalformedArgumentsError(name, rawArguments, true);
    console.warn(`[tools] ${error.message}; using empty parameters`);
    parameters = {};
  }

  return {
    ...(id !== undefined && { id }),
    tool_name: name,
    parameters,
  };
}

function decodeFragment(raw: Record<string, unknown>): OpenAIToolCallFragment {
  const fragment: OpenAIToolCallFragment = { index: readNumber(raw, 'index') ?? 0 };

  const id = readString(raw, 'id');
  if (id) {
    fragment.id = id;
  }

  const fn = readRecord(raw, 'function');
  if (fn) {
    const name = readString(fn, 'name');
    const args = readString(fn, 'arguments');
    fragment.function = {
      ...(name && { name }),
      ...(args && { arguments: args }),
    };
  }

  return fragment;
}

export function createOpenAIToolAdapter(options: ToolAdapterOptions = {}): OpenAIToolAdapter {
  const policy = options.missingCorrelationId ?? 'reject';

  return {
    provider: 'openai',

    formatTools(tools: ReadonlyArray<ToolDefinition>): Array<OpenAI.Chat.ChatCompletionTool> {
      return tools.map((tool) => ({
        type: 'function',
        function: {
          name: tool.name,
          description: tool.description,
          parameters: tool.parameters_schema,
        },
      }));
    },

    parseToolCalls(response: unknown): Array<StandardToolCall> {
      if (!isRecord(response)) {
        return [];
      }

      const choice = readArray(response, 'choices')?.[0];
      const message = isRecord(choice) ? readRecord(choice, 'message') : undefined;
      const rawCalls = message ? readArray(message, 'tool_calls') : undefined;
      if (!rawCalls) {
        return [];
      }

      const calls: Array<StandardToolCall> = [];
      for (const raw of rawCalls) {
        const call = decodeToolCall(raw);
        if (call) {
          calls.push(call);
        }
      }
      return calls;
    },

    formatToolResults(
      outcomes: ReadonlyArray<ToolCallOutcome>,
    ): Array<OpenAI.Chat.ChatCompletionToolMessageParam> {
      return outcomes.map((outcome) => ({
        role: 'tool',
        tool_call_id: resolveCorrelationId('openai', outcome, policy),
        content: encodeResultContent(outcome.result),
      }));
    },

    supportsStreaming(): boolean {
      return true;
    },

    parseStreamingToolCalls(delta: unknown): OpenAIStreamingToolCalls {
      if (!isRecord(delta)) {
        return {};
      }

      const rawCalls = readArray(delta, 'tool_calls');
      if (!rawCalls) {
        return {};
      }

      return {
        tool_calls: rawCalls.filter(isRecord).map(decodeFragment),
      };
    },
  };
}
