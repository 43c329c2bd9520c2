// pattern: Imperative Shell

/**
 * The relay runs a chat request against one provider and keeps calling tools
 * until the model answers without asking for one or the round limit is hit.
 *
 * Each request gets its own provider session, so transcripts and streaming
 * accumulators are never shared between concurrent requests.
 */

import type { ProviderName } from '../adapter/types.js';
import { isProviderName, UnknownProviderError } from '../adapter/types.js';
import { MODEL_CATALOG, defaultModelFor } from '../model/catalog.js';
import type { ChatProvider, ChatSession, ModelInfo, ProviderTurn, TurnRequest, UsageStats } from '../model/types.js';
import { ModelError, emptyUsage } from '../model/types.js';
import { executeToolCalls, toToolCallOutcomes, type ExecutedToolCall } from '../tool/dispatch.js';
import { errorMessage } from '../tool/contract.js';
import type { ToolContext, ToolRegistry } from '../tool/types.js';
import { UnknownToolError } from '../tool/types.js';
import { ChatRequestSchema, type ChatRequest, type ChatRequestInput } from './schema.js';
import type { ChatResponse, ConnectionCheck, HealthStatus, Relay, StreamChunk } from './types.js';
import { MAX_TOOL_ROUNDS_REASON, ProviderNotConfiguredError, RELAY_VERSION } from './types.js';

export type RelayDependencies = {
  readonly providers: Partial<Record<ProviderName, ChatProvider>>;
  readonly registry: ToolRegistry;
  readonly maxToolRounds: number;
};

type PreparedRequest = {
  provider: ChatProvider;
  session: ChatSession;
  turn: TurnRequest;
  allowed: ReadonlySet<string>;
};

function addUsage(total: UsageStats, turn: UsageStats): void {
  total.prompt_tokens += turn.prompt_tokens;
  total.completion_tokens += turn.completion_tokens;
  total.total_tokens += turn.total_tokens;
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export function createRelay(deps: RelayDependencies): Relay {
  const { providers, registry, maxToolRounds } = deps;

  function providerFor(name: ProviderName): ChatProvider {
    const provider = providers[name];
    if (!provider) {
      throw new ProviderNotConfiguredError(name);
    }
    return provider;
  }

  function prepare(request: ChatRequest): PreparedRequest {
    const provider = providerFor(request.provider);

    const requested = request.tools ?? registry.listNames();
    const unknown = requested.filter((name) => !registry.get(name));
    if (unknown.length > 0) {
      throw new UnknownToolError(unknown);
    }
    const allowed = new Set(requested);

    return {
      provider,
      session: provider.openSession(request.messages),
      turn: {
        model: request.model,
        temperature: request.temperature,
        max_tokens: request.max_tokens,
        top_p: request.top_p,
        tools: registry.schemas().filter((schema) => allowed.has(schema.name)),
      },
      allowed,
    };
  }

  async function runTools(
    prepared: PreparedRequest,
    turn: ProviderTurn,
    context: ToolContext | undefined,
  ): Promise<Array<ExecutedToolCall>> {
    console.log(
      `[relay] ${prepared.provider.name} requested ${turn.tool_calls.length} tool call(s): ${turn.tool_calls.map((c) => c.tool_name).join(', ')}`,
    );
    const executed = await executeToolCalls(registry, turn.tool_calls, context, { allowed: prepared.allowed });
    prepared.session.appendToolResults(toToolCallOutcomes(executed));
    return executed;
  }

  function roundLimitReached(prepared: PreparedRequest): void {
    console.warn(`[relay] ${prepared.provider.name} still requesting tools after ${maxToolRounds} round(s); stopping`);
  }

  async function chat(input: ChatRequestInput, context?: ToolContext): Promise<ChatResponse> {
    const prepared = prepare(ChatRequestSchema.parse(input));
    const usage = emptyUsage();
    const executed: Array<ExecutedToolCall> = [];

    for (let round = 0; ; round++) {
      const turn = await prepared.session.complete(prepared.turn);
      addUsage(usage, turn.usage);

      if (turn.tool_calls.length === 0) {
        return { content: turn.text, role: 'assistant', finish_reason: turn.finish_reason, usage, tool_calls: executed };
      }

      if (round >= maxToolRounds) {
        roundLimitReached(prepared);
        return { content: turn.text, role: 'assistant', finish_reason: MAX_TOOL_ROUNDS_REASON, usage, tool_calls: executed };
      }

      executed.push(...(await runTools(prepared, turn, context)));
    }
  }

  async function* stream(input: ChatRequestInput, context?: ToolContext): AsyncIterable<StreamChunk> {
    const prepared = prepare(ChatRequestSchema.parse(input));

    for (let round = 0; ; round++) {
      let turn: ProviderTurn | undefined;
      for await (const event of prepared.session.streamTurn(prepared.turn)) {
        if (event.type === 'text_delta') {
          yield { delta: event.text };
        } else {
          turn = event.turn;
        }
      }

      if (!turn) {
        throw new ModelError('stream_interrupted', false, `${prepared.provider.name} stream ended without a final turn`);
      }

      if (turn.tool_calls.length === 0) {
        yield { delta: '', finish_reason: turn.finish_reason };
        return;
      }

      if (round >= maxToolRounds) {
        roundLimitReached(prepared);
        yield { delta: '', finish_reason: MAX_TOOL_ROUNDS_REASON };
        return;
      }

      for (const result of await runTools(prepared, turn, context)) {
        yield { delta: '', tool_result: result };
      }
    }
  }

  function listModels(): Array<ModelInfo> {
    return MODEL_CATALOG.map((model) => ({ ...model }));
  }

  function health(): HealthStatus {
    const available: Array<ProviderName> = [];
    for (const name of Object.keys(providers)) {
      if (isProviderName(name) && providers[name]) {
        available.push(name);
      }
    }
    return { status: 'healthy', version: RELAY_VERSION, providers_available: available };
  }

  async function testConnection(name: string): Promise<ConnectionCheck> {
    if (!isProviderName(name)) {
      return { status: 'error', message: new UnknownProviderError(name).message, provider: name };
    }

    const model = defaultModelFor(name);
    try {
      const provider = providerFor(name);
      if (!model) {
        return { status: 'error', message: `no known model for ${name}`, provider: name };
      }
      const session = provider.openSession([{ role: 'user', content: 'Hello' }]);
      await session.complete({ model, temperature: 0.7, max_tokens: 5, top_p: 1, tools: [] });
      return { status: 'success', message: `${capitalize(name)} API key is valid`, provider: name };
    } catch (error) {
      console.error(`[relay] connection check for ${name} failed:`, error);
      return { status: 'error', message: errorMessage(error), provider: name };
    }
  }

  return {
    chat,
    stream,
    listModels,
    health,
    testConnection,
  };
}
