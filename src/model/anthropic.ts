// pattern: Imperative Shell

import Anthropic from "@anthropic-ai/sdk";
import type { StandardToolCall, ToolCallOutcome } from "../tool/types.js";
import type { AnthropicToolAdapter } from "../adapter/types.js";
import { MalformedArgumentsError, ToolStreamError } from "../adapter/types.js";
import { createAnthropicToolAdapter } from "../adapter/anthropic.js";
import { createToolUseAccumulator } from "../adapter/accumulator.js";
import { isRecord, readArray, readNumber, readRecord, readString } from "../adapter/decode.js";
import type {
  ChatMessage,
  ChatProvider,
  ChatSession,
  ProviderOptions,
  ProviderTurn,
  TurnRequest,
  TurnStreamEvent,
  UsageStats,
} from "./types.js";
import { ModelError } from "./types.js";
import { callWithRetry, providerRetryOptions } from "./retry.js";

export type AnthropicMessagesTransport = {
  create(body: Anthropic.Messages.MessageCreateParamsNonStreaming): Promise<unknown>;
  stream(body: Anthropic.Messages.MessageCreateParamsStreaming): Promise<AsyncIterable<unknown>>;
};

type AnthropicMessage = Anthropic.Messages.MessageParam;

function clientTransport(client: Anthropic): AnthropicMessagesTransport {
  return {
    create: (body) => client.messages.create(body),
    stream: (body) => client.messages.create(body),
  };
}

function toModelError(error: unknown): unknown {
  if (error instanceof Anthropic.AuthenticationError) {
    return new ModelError("auth", false, error.message || "authentication failed");
  }
  if (error instanceof Anthropic.RateLimitError) {
    return new ModelError("rate_limit", true, error.message || "rate limit exceeded");
  }
  if (error instanceof Anthropic.APIConnectionTimeoutError) {
    return new ModelError("timeout", true, error.message || "request timed out");
  }
  if (error instanceof Anthropic.APIError) {
    const retryable = error.status !== undefined && error.status >= 500;
    return new ModelError("api_error", retryable, error.message || "api error");
  }
  if (error instanceof Error && error.message.includes("timeout")) {
    return new ModelError("timeout", true, error.message);
  }
  return error;
}

async function guarded<T>(call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (error) {
    throw toModelError(error);
  }
}

/**
 * The Messages API takes system prompts as a separate parameter; every
 * system-role message is lifted out and joined in order.
 */
export function splitSystemMessages(messages: ReadonlyArray<ChatMessage>): {
  system: string | undefined;
  messages: Array<AnthropicMessage>;
} {
  const systemContents: Array<string> = [];
  const rest: Array<AnthropicMessage> = [];

  for (const msg of messages) {
    if (msg.role === "system") {
      if (msg.content) {
        systemContents.push(msg.content);
      }
    } else {
      rest.push({ role: msg.role, content: msg.content });
    }
  }

  return {
    system: systemContents.length > 0 ? systemContents.join("\n\n") : undefined,
    messages: rest,
  };
}

/** Undefined for an empty turn; the Messages API rejects empty assistant content. */
function assistantMessage(text: string, calls: ReadonlyArray<StandardToolCall>): AnthropicMessage | undefined {
  const blocks: Array<Anthropic.Messages.ContentBlockParam> = [];
  if (text.length > 0) {
    blocks.push({ type: "text", text });
  }
  for (const call of calls) {
    blocks.push({ type: "tool_use", id: call.id ?? "", name: call.tool_name, input: call.parameters });
  }
  return blocks.length > 0 ? { role: "assistant", content: blocks } : undefined;
}

function decodeUsage(source: Record<string, unknown> | undefined): UsageStats {
  const input = (source && readNumber(source, "input_tokens")) ?? 0;
  const output = (source && readNumber(source, "output_tokens")) ?? 0;
  return { prompt_tokens: input, completion_tokens: output, total_tokens: input + output };
}

function textOf(content: ReadonlyArray<unknown>): string {
  return content
    .filter(isRecord)
    .filter((block) => readString(block, "type") === "text")
    .map((block) => readString(block, "text") ?? "")
    .join("");
}

export function createAnthropicProvider(
  config: ProviderOptions,
  transport?: AnthropicMessagesTransport,
): ChatProvider {
  let resolvedTransport = transport;
  if (!resolvedTransport) {
    if (!config.api_key) {
      throw new Error(
        "anthropic provider requires api_key in config or ANTHROPIC_API_KEY environment variable"
      );
    }
    resolvedTransport = clientTransport(
      new Anthropic({
        apiKey: config.api_key,
        ...(config.base_url && { baseURL: config.base_url }),
        maxRetries: 0,
      })
    );
  }
  const send = resolvedTransport;

  const adapter: AnthropicToolAdapter = createAnthropicToolAdapter({
    ...(config.missing_correlation_id && { missingCorrelationId: config.missing_correlation_id }),
  });
  const retryOptions = providerRetryOptions("anthropic", config.max_retries, config.retry_backoff_ms);

  function openSession(initial: ReadonlyArray<ChatMessage>): ChatSession {
    const { system, messages: transcript } = splitSystemMessages(initial);

    function buildBody(request: TurnRequest) {
      return {
        model: request.model,
        messages: [...transcript],
        max_tokens: request.max_tokens,
        temperature: request.temperature,
        top_p: request.top_p,
        ...(system && { system }),
        ...(request.tools.length > 0 && { tools: adapter.formatTools(request.tools) }),
      };
    }

    return {
      async complete(request: TurnRequest): Promise<ProviderTurn> {
        const body = buildBody(request);
        const response = await callWithRetry(() => guarded(() => send.create(body)), retryOptions);

        if (!isRecord(response)) {
          throw new ModelError("api_error", false, "Unexpected response shape");
        }

        const text = textOf(readArray(response, "content") ?? []);
        const toolCalls = adapter.parseToolCalls(response);
        const reply = assistantMessage(text, toolCalls);
        if (reply) {
          transcript.push(reply);
        }

        return {
          text,
          finish_reason: readString(response, "stop_reason") ?? null,
          usage: decodeUsage(readRecord(response, "usage")),
          tool_calls: toolCalls,
        };
      },

      async *streamTurn(request: TurnRequest): AsyncIterable<TurnStreamEvent> {
        const body = { ...buildBody(request), stream: true as const };
        const stream = await callWithRetry(() => guarded(() => send.stream(body)), retryOptions);

        const accumulator = createToolUseAccumulator();
        let text = "";
        let finishReason: string | null = null;
        let inputTokens = 0;
        let outputTokens = 0;

        try {
          for await (const event of stream) {
            if (!isRecord(event)) continue;

            switch (readString(event, "type")) {
              case "message_start": {
                const message = readRecord(event, "message");
                const usage = message && readRecord(message, "usage");
                inputTokens = (usage && readNumber(usage, "input_tokens")) ?? inputTokens;
                break;
              }
              case "content_block_delta": {
                const delta = readRecord(event, "delta");
                const chunk = delta && readString(delta, "type") === "text_delta" ? readString(delta, "text") : undefined;
                if (chunk) {
                  text += chunk;
                  yield { type: "text_delta", text: chunk };
                }
                break;
              }
              case "message_delta": {
                const delta = readRecord(event, "delta");
                finishReason = (delta && readString(delta, "stop_reason")) ?? finishReason;
                const usage = readRecord(event, "usage");
                outputTokens = (usage && readNumber(usage, "output_tokens")) ?? outputTokens;
                break;
              }
            }

            accumulator.apply(adapter.parseStreamingToolUse(event));
          }
        } catch (error) {
          const dropped = accumulator.discard();
          if (error instanceof MalformedArgumentsError || error instanceof ToolStreamError) {
            throw error;
          }
          const reason = error instanceof Error ? error.message : String(error);
          console.error(
            `[anthropic] stream interrupted, dropped ${dropped.length} partial tool call(s): ${reason}`
          );
          throw new ModelError("stream_interrupted", false, `anthropic stream interrupted: ${reason}`);
        }

        const unfinished = accumulator.discard();
        if (unfinished.length > 0) {
          console.warn(
            `[anthropic] stream ended with ${unfinished.length} unfinished tool_use block(s); dropping them`
          );
        }

        const toolCalls = accumulator.completed();
        const reply = assistantMessage(text, toolCalls);
        if (reply) {
          transcript.push(reply);
        }

        yield {
          type: "turn_complete",
          turn: {
            text,
            finish_reason: finishReason,
            usage: {
              prompt_tokens: inputTokens,
              completion_tokens: outputTokens,
              total_tokens: inputTokens + outputTokens,
            },
            tool_calls: toolCalls,
          },
        };
      },

      appendToolResults(outcomes: ReadonlyArray<ToolCallOutcome>): void {
        if (outcomes.length > 0) {
          transcript.push(adapter.createToolResultMessage(outcomes));
        }
      },
    };
  }

  return {
    name: "anthropic",
    adapter,
    openSession,
  };
}
