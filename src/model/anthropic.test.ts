// pattern: Imperative Shell

import { describe, it, expect, vi } from "vitest";
import Anthropic from "@anthropic-ai/sdk";
import {
  createAnthropicProvider,
  splitSystemMessages,
  type AnthropicMessagesTransport,
} from "./anthropic.js";
import type { TurnRequest, TurnStreamEvent } from "./types.js";
import { MalformedArgumentsError } from "../adapter/types.js";
import type { ToolDefinition } from "../tool/types.js";

const searchTool: ToolDefinition = {
  name: "search",
  description: "Search the notes",
  parameters_schema: { type: "object", properties: { q: { type: "string" } }, required: ["q"] },
};

function turnRequest(overrides?: Partial<TurnRequest>): TurnRequest {
  return {
    model: "claude-haiku-4-5-20251001",
    temperature: 0.7,
    max_tokens: 1024,
    top_p: 1,
    tools: [],
    ...overrides,
  };
}

async function* fromArray(items: ReadonlyArray<unknown>, failure?: Error): AsyncIterable<unknown> {
  for (const item of items) {
    yield item;
  }
  if (failure) {
    throw failure;
  }
}

async function collect(events: AsyncIterable<TurnStreamEvent>): Promise<Array<TurnStreamEvent>> {
  const out: Array<TurnStreamEvent> = [];
  for await (const event of events) {
    out.push(event);
  }
  return out;
}

type FakeTransport = AnthropicMessagesTransport & {
  createBodies: Array<Anthropic.Messages.MessageCreateParamsNonStreaming>;
  streamBodies: Array<Anthropic.Messages.MessageCreateParamsStreaming>;
};

function createFakeTransport(options: {
  responses?: Array<unknown>;
  streams?: Array<AsyncIterable<unknown>>;
}): FakeTransport {
  const responses = [...(options.responses ?? [])];
  const streams = [...(options.streams ?? [])];
  const createBodies: Array<Anthropic.Messages.MessageCreateParamsNonStreaming> = [];
  const streamBodies: Array<Anthropic.Messages.MessageCreateParamsStreaming> = [];

  return {
    createBodies,
    streamBodies,
    async create(body) {
      createBodies.push(structuredClone(body));
      return responses.shift();
    },
    async stream(body) {
      streamBodies.push(structuredClone(body));
      return streams.shift() ?? fromArray([]);
    },
  };
}

function toolStream(partials: ReadonlyArray<string>): Array<unknown> {
  return [
    { type: "message_start", message: { id: "msg_1", usage: { input_tokens: 30, output_tokens: 1 } } },
    { type: "content_block_start", index: 0, content_block: { type: "text", text: "" } },
    { type: "content_block_delta", index: 0, delta: { type: "text_delta", text: "Searching" } },
    { type: "content_block_delta", index: 0, delta: { type: "text_delta", text: "..." } },
    { type: "content_block_stop", index: 0 },
    {
      type: "content_block_start",
      index: 1,
      content_block: { type: "tool_use", id: "toolu_1", name: "search", input: {} },
    },
    ...partials.map((partial_json) => ({
      type: "content_block_delta",
      index: 1,
      delta: { type: "input_json_delta", partial_json },
    })),
    { type: "content_block_stop", index: 1 },
    { type: "message_delta", delta: { stop_reason: "tool_use" }, usage: { output_tokens: 15 } },
    { type: "message_stop" },
  ];
}

describe("splitSystemMessages", () => {
  it("should lift system messages into one parameter joined by blank lines", () => {
    expect(
      splitSystemMessages([
        { role: "system", content: "You are helpful." },
        { role: "user", content: "hi" },
        { role: "system", content: "Answer in French." },
        { role: "assistant", content: "bonjour" },
      ])
    ).toEqual({
      system: "You are helpful.\n\nAnswer in French.",
      messages: [
        { role: "user", content: "hi" },
        { role: "assistant", content: "bonjour" },
      ],
    });
  });

  it("should leave system undefined when there are no system messages", () => {
    expect(splitSystemMessages([{ role: "user", content: "hi" }]).system).toBeUndefined();
  });
});

describe("createAnthropicProvider", () => {
  describe("complete", () => {
    it("should join text blocks and report usage", async () => {
      const transport = createFakeTransport({
        responses: [
          {
            id: "msg_1",
            role: "assistant",
            content: [
              { type: "text", text: "Hello" },
              { type: "text", text: " world" },
            ],
            stop_reason: "end_turn",
            usage: { input_tokens: 10, output_tokens: 4 },
          },
        ],
      });
      const session = createAnthropicProvider({}, transport).openSession([
        { role: "system", content: "be brief" },
        { role: "user", content: "hi" },
      ]);

      const turn = await session.complete(turnRequest());

      expect(turn).toEqual({
        text: "Hello world",
        finish_reason: "end_turn",
        usage: { prompt_tokens: 10, completion_tokens: 4, total_tokens: 14 },
        tool_calls: [],
      });
      expect(transport.createBodies[0]).toEqual({
        model: "claude-haiku-4-5-20251001",
        messages: [{ role: "user", content: "hi" }],
        max_tokens: 1024,
        temperature: 0.7,
        top_p: 1,
        system: "be brief",
      });
    });

    it("should send tool results back as a single user message", async () => {
      const transport = createFakeTransport({
        responses: [
          {
            content: [{ type: "tool_use", id: "toolu_1", name: "search", input: { q: "cats" } }],
            stop_reason: "tool_use",
            usage: { input_tokens: 10, output_tokens: 4 },
          },
          {
            content: [{ type: "text", text: "two cats" }],
            stop_reason: "end_turn",
            usage: { input_tokens: 20, output_tokens: 3 },
          },
        ],
      });
      const session = createAnthropicProvider({}, transport).openSession([{ role: "user", content: "cats?" }]);

      const first = await session.complete(turnRequest({ tools: [searchTool] }));
      expect(first.tool_calls).toEqual([{ id: "toolu_1", tool_name: "search", parameters: { q: "cats" } }]);
      expect(transport.createBodies[0]?.tools).toEqual([
        { name: "search", description: "Search the notes", input_schema: searchTool.parameters_schema },
      ]);

      session.appendToolResults([{ tool_call_id: "toolu_1", tool_name: "search", result: { hits: 2 } }]);
      await session.complete(turnRequest({ tools: [searchTool] }));

      expect(transport.createBodies[1]?.messages).toEqual([
        { role: "user", content: "cats?" },
        {
          role: "assistant",
          content: [{ type: "tool_use", id: "toolu_1", name: "search", input: { q: "cats" } }],
        },
        {
          role: "user",
          content: [{ type: "tool_result", tool_use_id: "toolu_1", content: '{"hits": 2}' }],
        },
      ]);
    });

    it("should not record an empty assistant turn in the transcript", async () => {
      const transport = createFakeTransport({
        responses: [
          { content: [], stop_reason: "end_turn", usage: { input_tokens: 5, output_tokens: 0 } },
          { content: [{ type: "text", text: "hi" }], stop_reason: "end_turn", usage: { input_tokens: 5, output_tokens: 1 } },
        ],
      });
      const session = createAnthropicProvider({}, transport).openSession([{ role: "user", content: "hello" }]);

      const first = await session.complete(turnRequest());
      await session.complete(turnRequest());

      expect(first.text).toBe("");
      expect(transport.createBodies[1]?.messages).toEqual([{ role: "user", content: "hello" }]);
    });

    it("should map rate limits to a retryable model error", async () => {
      const transport = createFakeTransport({});
      const create = vi
        .spyOn(transport, "create")
        .mockRejectedValue(new Anthropic.RateLimitError(429, undefined, "slow down", {}));
      vi.spyOn(console, "warn").mockImplementation(() => {});
      const session = createAnthropicProvider({ max_retries: 2, retry_backoff_ms: 0 }, transport).openSession([]);

      await expect(session.complete(turnRequest())).rejects.toMatchObject({
        name: "ModelError",
        code: "rate_limit",
        retryable: true,
      });
      expect(create).toHaveBeenCalledTimes(2);
    });
  });

  describe("streamTurn", () => {
    it("should stream text and rebuild tool calls from block events", async () => {
      const transport = createFakeTransport({ streams: [fromArray(toolStream(['{"q":', '"cats"}']))] });
      const session = createAnthropicProvider({}, transport).openSession([{ role: "user", content: "cats?" }]);

      const events = await collect(session.streamTurn(turnRequest({ tools: [searchTool] })));

      expect(events).toEqual([
        { type: "text_delta", text: "Searching" },
        { type: "text_delta", text: "..." },
        {
          type: "turn_complete",
          turn: {
            text: "Searching...",
            finish_reason: "tool_use",
            usage: { prompt_tokens: 30, completion_tokens: 15, total_tokens: 45 },
            tool_calls: [{ id: "toolu_1", tool_name: "search", parameters: { q: "cats" } }],
          },
        },
      ]);
      expect(transport.streamBodies[0]?.stream).toBe(true);
    });

    it("should fail on tool input that never forms valid JSON", async () => {
      const transport = createFakeTransport({ streams: [fromArray(toolStream(['{"q":']))] });
      const session = createAnthropicProvider({}, transport).openSession([]);

      await expect(collect(session.streamTurn(turnRequest()))).rejects.toBeInstanceOf(MalformedArgumentsError);
    });

    it("should drop tool_use blocks that never stopped", async () => {
      // position 7 is the content_block_stop of the tool_use block
      const events = toolStream(['{"q":"cats"}']).filter((_, position) => position !== 7);
      const transport = createFakeTransport({ streams: [fromArray(events)] });
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      const session = createAnthropicProvider({}, transport).openSession([]);

      const result = await collect(session.streamTurn(turnRequest()));
      const last = result[result.length - 1];

      expect(last?.type === "turn_complete" && last.turn.tool_calls).toEqual([]);
      expect(warn).toHaveBeenCalledWith(
        "[anthropic] stream ended with 1 unfinished tool_use block(s); dropping them"
      );
    });

    it("should turn a broken stream into stream_interrupted", async () => {
      const transport = createFakeTransport({
        streams: [fromArray(toolStream(['{"q":']).slice(0, 7), new Error("connection reset"))],
      });
      vi.spyOn(console, "error").mockImplementation(() => {});
      const session = createAnthropicProvider({}, transport).openSession([]);

      await expect(collect(session.streamTurn(turnRequest()))).rejects.toMatchObject({
        code: "stream_interrupted",
        message: "anthropic stream interrupted: connection reset",
      });
    });
  });
});
