#!/usr/bin/env node
// pattern: Imperative Shell

/**
 * Tool relay entry point.
 * Composition root that wires config, providers and tools, then starts the interactive REPL.
 */

import * as readline from 'node:readline';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { loadConfig, type AppConfig } from './config/config.js';
import { isProviderName, PROVIDER_NAMES, type ProviderName } from './adapter/index.js';
import { createChatProvider, defaultModelFor, type ChatMessage, type ChatProvider } from './model/index.js';
import {
  createFileSystemTool,
  createGoogleCalendarTool,
  createToolRegistry,
  errorMessage,
  type ToolContext,
  type ToolRegistry,
} from './tool/index.js';
import { createRelay, type Relay } from './relay/index.js';

export function buildRegistry(config: AppConfig): ToolRegistry {
  const registry = createToolRegistry();
  const { file_system, google_calendar } = config.tools;

  if (file_system.enabled) {
    registry.register(createFileSystemTool({ root: resolve(file_system.root) }));
  }
  if (google_calendar.enabled) {
    registry.register(
      createGoogleCalendarTool({ baseUrl: google_calendar.base_url, timeoutMs: google_calendar.timeout_ms }),
    );
  }

  return registry;
}

/**
 * One provider per configured API key. Providers without a key are left out
 * and show up as unavailable in /health.
 */
export function buildProviders(config: AppConfig): Partial<Record<ProviderName, ChatProvider>> {
  const providers: Partial<Record<ProviderName, ChatProvider>> = {};

  for (const name of PROVIDER_NAMES) {
    const settings = config.providers[name];
    if (!settings.api_key) {
      continue;
    }
    providers[name] = createChatProvider(name, {
      api_key: settings.api_key,
      ...(settings.base_url !== undefined && { base_url: settings.base_url }),
      max_retries: config.relay.max_retries,
      retry_backoff_ms: config.relay.retry_backoff_ms,
      missing_correlation_id: config.tools.missing_correlation_id,
    });
  }

  return providers;
}

export type ReplSession = {
  provider: ProviderName;
  model: string;
  history: Array<ChatMessage>;
};

type CommandHandlerDeps = {
  relay: Relay;
  registry: ToolRegistry;
  session: ReplSession;
  context?: ToolContext;
  write: (text: string) => void;
};

const HELP_TEXT = [
  'commands:',
  '  /models                  list known models',
  '  /tools                   list registered tools',
  '  /health                  show configured providers',
  '  /test <provider>         send a minimal request to check credentials',
  '  /use <provider> [model]  switch provider and model',
  '  /reset                   clear the conversation',
  '  /help                    show this help',
].join('\n');

/**
 * Handle one REPL line: a slash command, or a chat message streamed back
 * through the relay. The conversation history lives in `session`.
 */
export function createCommandHandler(deps: CommandHandlerDeps): (line: string) => Promise<void> {
  const { relay, registry, session, context, write } = deps;

  async function sendMessage(content: string): Promise<void> {
    session.history.push({ role: 'user', content });

    let reply = '';
    let finishReason: string | null | undefined;
    try {
      for await (const chunk of relay.stream(
        { provider: session.provider, model: session.model, messages: session.history, stream: true },
        context,
      )) {
        if (chunk.tool_result) {
          const { tool_name, result } = chunk.tool_result;
          write(`\n[tool] ${tool_name}: ${result.success ? 'ok' : `error: ${result.error ?? 'unknown error'}`}\n`);
        }
        if (chunk.delta) {
          reply += chunk.delta;
          write(chunk.delta);
        }
        if (chunk.finish_reason !== undefined) {
          finishReason = chunk.finish_reason;
        }
      }
    } catch (error) {
      session.history.pop();
      throw error;
    }

    session.history.push({ role: 'assistant', content: reply });
    write(finishReason === 'max_tool_rounds' ? '\n[stopped: tool round limit reached]\n\n' : '\n\n');
  }

  async function runCommand(command: string, args: Array<string>): Promise<void> {
    switch (command) {
      case '/models':
        for (const model of relay.listModels()) {
          write(`${model.provider}/${model.id}  ${model.name} (${model.context_window} tokens)\n`);
        }
        return;
      case '/tools': {
        const names = registry.listNames();
        write(names.length > 0 ? `${names.join('\n')}\n` : 'no tools registered\n');
        return;
      }
      case '/health': {
        const status = relay.health();
        const available = status.providers_available.join(', ') || 'none';
        write(`${status.status} v${status.version}, providers: ${available}\n`);
        return;
      }
      case '/test': {
        const check = await relay.testConnection(args[0] ?? session.provider);
        write(`${check.provider}: ${check.status}: ${check.message}\n`);
        return;
      }
      case '/use': {
        const [name, model] = args;
        if (!name || !isProviderName(name)) {
          write(`usage: /use <${PROVIDER_NAMES.join('|')}> [model]\n`);
          return;
        }
        const nextModel = model ?? defaultModelFor(name);
        if (!nextModel) {
          write(`no model known for ${name}\n`);
          return;
        }
        session.provider = name;
        session.model = nextModel;
        write(`using ${name}/${nextModel}\n`);
        return;
      }
      case '/reset':
        session.history.length = 0;
        write('conversation cleared\n');
        return;
      case '/help':
        write(`${HELP_TEXT}\n`);
        return;
      default:
        write(`unknown command: ${command} (try /help)\n`);
    }
  }

  return async (line: string) => {
    const trimmed = line.trim();
    if (!trimmed) {
      return;
    }
    if (trimmed.startsWith('/')) {
      const [command = '', ...args] = trimmed.split(/\s+/);
      await runCommand(command, args);
      return;
    }
    await sendMessage(trimmed);
  };
}

export function initialSession(config: AppConfig): ReplSession {
  const provider = config.relay.default_provider;
  const model = config.relay.default_model ?? defaultModelFor(provider) ?? '';
  return { provider, model, history: [] };
}

async function main(): Promise<void> {
  console.log('tool relay starting...\n');

  const config = loadConfig(process.argv[2]);
  const registry = buildRegistry(config);
  const providers = buildProviders(config);
  const relay = createRelay({ providers, registry, maxToolRounds: config.relay.max_tool_rounds });

  const available = relay.health().providers_available;
  if (available.length === 0) {
    console.warn('[relay] no provider has an api_key; set OPENAI_API_KEY or ANTHROPIC_API_KEY');
  }
  console.log(`tools: ${registry.listNames().join(', ') || 'none'}`);

  const session = initialSession(config);
  const accessToken = process.env['GOOGLE_ACCESS_TOKEN'];
  const handleLine = createCommandHandler({
    relay,
    registry,
    session,
    ...(accessToken !== undefined && { context: { access_token: accessToken } }),
    write: (text) => process.stdout.write(text),
  });

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  const shutdown = (): void => {
    console.log('\nShutting down...');
    rl.close();
    process.exit(0);
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  console.log(`using ${session.provider}/${session.model}. Type /help for commands (Ctrl+C to exit):\n`);

  rl.setPrompt('> ');
  rl.on('line', (line: string) => {
    rl.pause();
    handleLine(line)
      .catch((error: unknown) => {
        console.error(`error: ${errorMessage(error)}`);
      })
      .finally(() => {
        rl.resume();
        rl.prompt();
      });
  });

  rl.prompt();
}

// Run main entry point only when file is executed directly
if (process.argv[1] !== undefined && resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main().catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
