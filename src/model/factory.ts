// pattern: Imperative Shell

import type { ProviderName } from "../adapter/types.js";
import { UnknownProviderError, isProviderName } from "../adapter/types.js";
import type { ChatProvider, ProviderOptions } from "./types.js";
import { createAnthropicProvider } from "./anthropic.js";
import { createOpenAIProvider } from "./openai.js";

export function createChatProvider(provider: ProviderName, options: ProviderOptions): ChatProvider {
  switch (provider) {
    case "openai":
      return createOpenAIProvider(options);
    case "anthropic":
      return createAnthropicProvider(options);
  }
}

export function resolveChatProvider(provider: string, options: ProviderOptions): ChatProvider {
  if (!isProviderName(provider)) {
    throw new UnknownProviderError(provider);
  }
  return createChatProvider(provider, options);
}
