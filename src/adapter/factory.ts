// pattern: Functional Core

import type { ProviderName, ToolAdapter, ToolAdapterFor, ToolAdapterOptions } from './types.js';
import { UnknownProviderError, isProviderName } from './types.js';
import { createOpenAIToolAdapter } from './openai.js';
import { createAnthropicToolAdapter } from './anthropic.js';

// Adding a provider means adding an entry here and a variant to ToolAdapterFor.
const adapterFactories: { [P in ProviderName]: (options?: ToolAdapterOptions) => ToolAdapterFor[P] } = {
  openai: createOpenAIToolAdapter,
  anthropic: createAnthropicToolAdapter,
};

export function createToolAdapter<P extends ProviderName>(
  provider: P,
  options?: ToolAdapterOptions,
): ToolAdapterFor[P] {
  return adapterFactories[provider](options);
}

/** Look up an adapter from an unchecked provider name, e.g. one read from a request. */
export function resolveToolAdapter(provider: string, options?: ToolAdapterOptions): ToolAdapter {
  if (!isProviderName(provider)) {
    throw new UnknownProviderError(provider);
  }
  return createToolAdapter(provider, options);
}
