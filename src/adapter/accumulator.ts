// pattern: Functional Core

/**
 * Per-session assembly of streamed tool calls.
 *
 * Each streaming session owns exactly one accumulator; it is never shared.
 * Fragments must be applied in arrival order. Nothing is finalized before the
 * provider says the block (Anthropic) or the message (OpenAI) is complete, and
 * a finished accumulation that is not valid JSON throws MalformedArgumentsError
 * because there is no later point to recover from.
 */

import type { StandardToolCall } from '../tool/types.js';
import type { AnthropicStreamingToolUse, OpenAIStreamingToolCalls } from './types.js';
import { MalformedArgumentsError, ToolStreamError } from './types.js';
import { parseJsonObject } from './decode.js';

export type ToolUseBlockStatus = 'started' | 'accumulating' | 'complete';

export type PendingToolUse = {
  readonly index: number;
  readonly id?: string;
  readonly name?: string;
  readonly status: ToolUseBlockStatus;
  readonly partialJson: string;
};

export type ToolUseAccumulator = {
  /** Returns the finished call when `fragment` completes a block. */
  apply(fragment: AnthropicStreamingToolUse): StandardToolCall | undefined;
  completed(): Array<StandardToolCall>;
  /** Indexes that started but have not stopped yet. */
  pending(): Array<number>;
  /** Drop every incomplete block, e.g. when the stream ends early. */
  discard(): Array<PendingToolUse>;
};

type ToolUseBlockState = {
  id?: string;
  name?: string;
  status: ToolUseBlockStatus;
  partialJson: string;
};

function toPending(index: number, state: ToolUseBlockState): PendingToolUse {
  return {
    index,
    ...(state.id !== undefined && { id: state.id }),
    ...(state.name !== undefined && { name: state.name }),
    status: state.status,
    partialJson: state.partialJson,
  };
}

function finalizeArguments(name: string, json: string): Record<string, unknown> {
  const parameters = parseJsonObject(json);
  if (!parameters) {
    throw new MalformedArgumentsError(name, json, false);
  }
  return parameters;
}

/**
 * Anthropic block-lifecycle assembly, one state machine per block index:
 * NONE -> started -> accumulating* -> complete.
 */
export function createToolUseAccumulator(): ToolUseAccumulator {
  const blocks = new Map<number, ToolUseBlockState>();
  const finished: Array<StandardToolCall> = [];
  let lastStarted: number | undefined;

  // Events without an index refer to the block most recently started.
  function resolveIndex(index: number | undefined): number | undefined {
    return index ?? lastStarted;
  }

  return {
    apply(fragment: AnthropicStreamingToolUse): StandardToolCall | undefined {
      switch (fragment.event) {
        case 'tool_use_start': {
          const index = fragment.index ?? (lastStarted === undefined ? 0 : lastStarted + 1);
          if (blocks.has(index)) {
            throw new ToolStreamError(`tool_use block ${index} started twice`);
          }
          blocks.set(index, {
            ...(fragment.id !== undefined && { id: fragment.id }),
            ...(fragment.name !== undefined && { name: fragment.name }),
            status: 'started',
            partialJson: '',
          });
          lastStarted = index;
          return undefined;
        }

        case 'tool_use_delta': {
          const index = resolveIndex(fragment.index);
          const state = index === undefined ? undefined : blocks.get(index);
          if (!state || state.status === 'complete') {
            throw new ToolStreamError(`input delta for tool_use block ${index ?? '?'} that is not open`);
          }
          state.partialJson += fragment.partial_json;
          state.status = 'accumulating';
          return undefined;
        }

        case 'tool_use_stop': {
          const index = resolveIndex(fragment.index);
          const state = index === undefined ? undefined : blocks.get(index);
          if (!state) {
            // Stop of a block that never started as tool_use, e.g. a text block.
            return undefined;
          }
          if (state.status === 'complete') {
            if (fragment.index === undefined) {
              // An index-less stop after the last tool_use block closed belongs to a later non-tool block.
              return undefined;
            }
            throw new ToolStreamError(`tool_use block ${index ?? '?'} stopped twice`);
          }

          const name = state.name ?? '';
          const call: StandardToolCall = {
            ...(state.id !== undefined && { id: state.id }),
            tool_name: name,
            parameters: finalizeArguments(name, state.partialJson),
          };
          state.status = 'complete';
          finished.push(call);
          return call;
        }

        default:
          return undefined;
      }
    },

    completed(): Array<StandardToolCall> {
      return [...finished];
    },

    pending(): Array<number> {
      return Array.from(blocks.entries())
        .filter(([, state]) => state.status !== 'complete')
        .map(([index]) => index);
    },

    discard(): Array<PendingToolUse> {
      const dropped: Array<PendingToolUse> = [];
      for (const [index, state] of blocks) {
        if (state.status !== 'complete') {
          dropped.push(toPending(index, state));
          blocks.delete(index);
        }
      }
      return dropped;
    },
  };
}

export type ToolCallAccumulator = {
  apply(fragment: OpenAIStreamingToolCalls): void;
  /** Parse every accumulated call in index order and reset. */
  finalize(): Array<StandardToolCall>;
  pending(): number;
  /** Drop everything accumulated so far; returns how many calls were dropped. */
  discard(): number;
};

type ToolCallState = {
  id?: string;
  name?: string;
  arguments: string;
};

/**
 * OpenAI fragment assembly: fragments are merged by `index`, the id and name
 * are taken from the first fragment that carries them, arguments are appended.
 */
export function createToolCallAccumulator(): ToolCallAccumulator {
  const calls = new Map<number, ToolCallState>();

  return {
    apply(fragment: OpenAIStreamingToolCalls): void {
      for (const part of fragment.tool_calls ?? []) {
        let state = calls.get(part.index);
        if (!state) {
          state = { arguments: '' };
          calls.set(part.index, state);
        }
        if (part.id && state.id === undefined) {
          state.id = part.id;
        }
        if (part.function?.name && state.name === undefined) {
          state.name = part.function.name;
        }
        if (part.function?.arguments) {
          state.arguments += part.function.arguments;
        }
      }
    },

    finalize(): Array<StandardToolCall> {
      const ordered = Array.from(calls.entries()).sort(([a], [b]) => a - b);
      const result = ordered.map(([, state]): StandardToolCall => {
        const name = state.name ?? '';
        return {
          ...(state.id !== undefined && { id: state.id }),
          tool_name: name,
          parameters: finalizeArguments(name, state.arguments),
        };
      });
      calls.clear();
      return result;
    },

    pending(): number {
      return calls.size;
    },

    discard(): number {
      const dropped = calls.size;
      calls.clear();
      return dropped;
    },
  };
}
