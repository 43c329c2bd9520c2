// pattern: Imperative Shell

import OpenAI from "openai";
import type { StandardToolCall, ToolCallOutcome } from "../tool/types.js";
import type { OpenAIToolAdapter } from "../adapter/types.js";
import { createOpenAIToolAdapter } from "../adapter/openai.js";
import { createToolCallAccumulator } from "../adapter/accumulator.js";
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
import { ModelError, emptyUsage } from "./types.js";
import { callWithRetry, providerRetryOptions } from "./retry.js";

/**
 * The slice of the SDK client the provider calls.
 * Responses come back untyped and are decoded field by field.
 */
export type OpenAIChatTransport = {
  create(body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming): Promise<unknown>;
  stream(body: OpenAI.Chat.ChatCompletionCreateParamsStreaming): Promise<AsyncIterable<unknown>>;
};

type OpenAIMessage = OpenAI.Chat.ChatCompletionMessageParam;

function clientTransport(client: OpenAI): OpenAIChatTransport {
  return {
    create: (body) => client.chat.completions.create(body),
    stream: (body) => client.chat.completions.create(body),
  };
}

function toModelError(error: unknown): unknown {
  if (error instanceof OpenAI.AuthenticationError) {
    return new ModelError("auth", false, error.message || "authentication failed");
  }
  if (error instanceof OpenAI.RateLimitError) {
    return new ModelError("rate_limit", true, error.message || "rate limit exceeded");
  }
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new ModelError("timeout", true, error.message || "request timed out");
  }
  if (error instanceof OpenAI.APIError) {
    const retryable = error.status !== undefined && error.status >= 500;
    return new ModelError("api_error", retryable, error.message || "api error");
  }
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    if (message.includes("timeout") || message.includes("econnrefused")) {
      return new ModelError("timeout", true, error.message);
    }
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

function toOpenAIMessage(message: ChatMessage): OpenAIMessage {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
    case "user":
      return { role: "user", content: message.content };
  }
}

function toAssistantToolCall(call: StandardToolCall): OpenAI.Chat.ChatCompletionMessageToolCall {
  return {
    id: call.id ?? "",
    type: "function",
    function: {
      name: call.tool_name,
      arguments: JSON.stringify(call.parameters),
    },
  };
}

function assistantMessage(text: string, calls: ReadonlyArray<StandardToolCall>): OpenAIMessage {
  return {
    role: "assistant",
    content: text.length > 0 ? text : null,
    ...(calls.length > 0 && { tool_calls: calls.map(toAssistantToolCall) }),
  };
}

export function decodeUsage(source: Record<string, unknown> | undefined): UsageStats {
  if (!source) {
    return emptyUsage();
  }
  const prompt = readNumber(source, "prompt_tokens") ?? 0;
  const completion = readNumber(source, "completion_tokens") ?? 0;
  return {
    prompt_tokens: prompt,
    completion_tokens: completion,
    total_tokens: readNumber(source, "total_tokens") ?? prompt + completion,
  };
}

function firstChoice(source: unknown): Record<string, unknown> | undefined {
  if (!isRecord(source)) {
    return undefined;
  }
  const [choice] = readArray(source, "choices") ?? [];
  return isRecord(choice) ? choice : undefined;
}

export function createOpenAIProvider(
  config: ProviderOptions,
  transport?: OpenAIChatTransport,
): ChatProvider {
  let resolvedTransport = transport;
  if (!resolvedTransport) {
    if (!config.api_key) {
      throw new Error(
        "openai provider requires api_key in config or OPENAI_API_KEY environment variable"
      );
    }
    resolvedTransport = clientTransport(
      new OpenAI({
        apiKey: config.api_key,
        ...(config.base_url && { baseURL: config.base_url }),
        maxRetries: 0,
      })
    );
  }
  const send = resolvedTransport;

  const adapter: OpenAIToolAdapter = createOpenAIToolAdapter({
    ...(config.missing_correlation_id && { missingCorrelationId: config.missing_correlation_id }),
  });
  const retryOptions = providerRetryOptions("openai", config.max_retries, config.retry_backoff_ms);

  function buildBody(request: TurnRequest, transcript: ReadonlyArray<OpenAIMessage>) {
    return {
      model: request.model,
      messages: [...transcript],
      temperature: request.temperature,
      max_tokens: request.max_tokens,
      top_p: request.top_p,
      ...(request.tools.length > 0 && { tools: adapter.formatTools(request.tools) }),
    };
  }

  function openSession(messages: ReadonlyArray<ChatMessage>): ChatSession {
    const transcript: Array<OpenAIMessage> = messages.map(toOpenAIMessage);

    return {
      async complete(request: TurnRequest): Promise<ProviderTurn> {
        const body = buildBody(request, transcript);
        const response = await callWithRetry(() => guarded(() => send.create(body)), retryOptions);

        const choice = firstChoice(response);
        if (!choice) {
          throw new ModelError("api_error", false, "No choices in response");
        }

        const message = readRecord(choice, "message");
        const text = (message && readString(message, "content")) ?? "";
        const toolCalls = adapter.parseToolCalls(response);
        transcript.push(assistantMessage(text, toolCalls));

        return {
          text,
          finish_reason: readString(choice, "finish_reason") ?? null,
          usage: decodeUsage(isRecord(response) ? readRecord(response, "usage") : undefined),
          tool_calls: toolCalls,
        };
      },

      async *streamTurn(request: TurnRequest): AsyncIterable<TurnStreamEvent> {
        const body = {
          ...buildBody(request, transcript),
          stream: true as const,
          stream_options: { include_usage: true },
        };
        const stream = await callWithRetry(() => guarded(() => send.stream(body)), retryOptions);

        const accumulator = createToolCallAccumulator();
        let text = "";
        let finishReason: string | null = null;
        let usage = emptyUsage();

        try {
          for await (const chunk of stream) {
            if (isRecord(chunk)) {
              const chunkUsage = readRecord(chunk, "usage");
              if (chunkUsage) {
                usage = decodeUsage(chunkUsage);
              }
            }

            const choice = firstChoice(chunk);
            if (!choice) continue;

            const delta = readRecord(choice, "delta");
            if (delta) {
              const content = readString(delta, "content");
              if (content) {
                text += content;
                yield { type: "text_delta", text: content };
              }
              accumulator.apply(adapter.parseStreamingToolCalls(delta));
            }

            finishReason = readString(choice, "finish_reason") ?? finishReason;
          }
        } catch (error) {
          const dropped = accumulator.discard();
          const reason = error instanceof Error ? error.message : String(error);
          console.error(`[openai] stream interrupted, dropped ${dropped} partial tool call(s): ${reason}`);
          throw new ModelError("stream_interrupted", false, `openai stream interrupted: ${reason}`);
        }

        if (finishReason === null && accumulator.pending() > 0) {
          const dropped = accumulator.discard();
          console.error(`[openai] stream ended without a finish_reason, dropped ${dropped} partial tool call(s)`);
          throw new ModelError("stream_interrupted", false, "openai stream ended without a finish_reason");
        }

        const toolCalls = accumulator.finalize();
        transcript.push(assistantMessage(text, toolCalls));

        yield {
          type: "turn_complete",
          turn: { text, finish_reason: finishReason, usage, tool_calls: toolCalls },
        };
      },

      appendToolResults(outcomes: ReadonlyArray<ToolCallOutcome>): void {
        transcript.push(...adapter.formatToolResults(outcomes));
      },
    };
  }

  return {
    name: "openai",
    adapter,
    openSession,
  };
}
