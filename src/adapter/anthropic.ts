// pattern: Functional Core

/**
 * Tool adapter for the Anthropic content-block wire format.
 *
 * Definitions carry the schema inline as `input_schema`. Calls are `tool_use`
 * blocks in the assistant content with already-structured `input`. Results are
 * `tool_result` blocks that must travel together in a single user message.
 * Streamed calls are rebuilt from content_block_start / _delta / _stop events.
 */

import type Anthropic from '@anthropic-ai/sdk';
import type { StandardToolCall, ToolCallOutcome, ToolDefinition } from '../tool/types.js';
import type { AnthropicStreamingToolUse, AnthropicToolAdapter, ToolAdapterOptions } from './types.js';
import { isRecord, readArray, readNumber, readRecord, readString } from './decode.js';
import { encodeResultContent, resolveCorrelationId } from './results.js';

function decodeToolUseBlock(block: unknown): StandardToolCall | undefined {
  if (!isRecord(block) || readString(block, 'type') !== 'tool_use') {
    return undefined;
  }

  const name = readString(block, 'name');
  if (name === undefined) {
    return undefined;
  }

  const id = readString(block, 'id');
  return {
    ...(id !== undefined && { id }),
    tool_name: name,
    parameters: readRecord(block, 'input') ?? {},
  };
}

function decodeStreamEvent(event: Record<string, unknown>): AnthropicStreamingToolUse {
  const index = readNumber(event, 'index');
  const at = index === undefined ? {} : { index };

  switch (readString(event, 'type')) {
    case 'content_block_start': {
      const block = readRecord(event, 'content_block');
      if (!block || readString(block, 'type') !== 'tool_use') {
        return {};
      }
      const id = readString(block, 'id');
      const name = readString(block, 'name');
      return {
        event: 'tool_use_start',
        ...at,
        ...(id !== undefined && { id }),
        ...(name !== undefined && { name }),
      };
    }

    case 'content_block_delta': {
      const delta = readRecord(event, 'delta');
      if (!delta || readString(delta, 'type') !== 'input_json_delta') {
        return {};
      }
      return {
        event: 'tool_use_delta',
        ...at,
        partial_json: readString(delta, 'partial_json') ?? '',
      };
    }

    case 'content_block_stop':
      return { event: 'tool_use_stop', ...at };

    default:
      return {};
  }
}

export function createAnthropicToolAdapter(
  options: ToolAdapterOptions = {},
): AnthropicToolAdapter {
  const policy = options.missingCorrelationId ?? 'reject';

  function formatToolResults(
    outcomes: ReadonlyArray<ToolCallOutcome>,
  ): Array<Anthropic.Messages.ToolResultBlockParam> {
    return outcomes.map((outcome) => ({
      type: 'tool_result',
      tool_use_id: resolveCorrelationId('anthropic', outcome, policy),
      content: encodeResultContent(outcome.result),
      ...(outcome.is_error && { is_error: true }),
    }));
  }

  return {
    provider: 'anthropic',

    formatTools(tools: ReadonlyArray<ToolDefinition>): Array<Anthropic.Messages.Tool> {
      return tools.map((tool) => ({
        name: tool.name,
        description: tool.description,
        input_schema: tool.parameters_schema,
      }));
    },

    parseToolCalls(response: unknown): Array<StandardToolCall> {
      const content = isRecord(response) ? readArray(response, 'content') : undefined;
      if (!content) {
        return [];
      }

      const calls: Array<StandardToolCall> = [];
      for (const block of content) {
        const call = decodeToolUseBlock(block);
        if (call) {
          calls.push(call);
        }
      }
      return calls;
    },

    formatToolResults,

    supportsStreaming(): boolean {
      return true;
    },

    parseStreamingToolUse(event: unknown): AnthropicStreamingToolUse {
      return isRecord(event) ? decodeStreamEvent(event) : {};
    },

    createToolResultMessage(
      outcomes: ReadonlyArray<ToolCallOutcome>,
    ): Anthropic.Messages.MessageParam {
      return {
        role: 'user',
        content: formatToolResults(outcomes),
      };
    },
  };
}
