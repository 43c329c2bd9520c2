// pattern: Functional Core

import type { ProviderName } from "../adapter/types.js";
import type { ModelInfo } from "./types.js";

export const MODEL_CATALOG: ReadonlyArray<ModelInfo> = [
  {
    id: "gpt-5-nano-2025-08-07",
    provider: "openai",
    name: "GPT-5 Nano",
    context_window: 128000,
    supports_streaming: true,
  },
  {
    id: "gpt-4-turbo-preview",
    provider: "openai",
    name: "GPT-4 Turbo",
    context_window: 128000,
    supports_streaming: true,
  },
  {
    id: "claude-haiku-4-5-20251001",
    provider: "anthropic",
    name: "Claude Haiku 4.5",
    context_window: 200000,
    supports_streaming: true,
  },
  {
    id: "claude-3-opus-20240229",
    provider: "anthropic",
    name: "Claude 3 Opus",
    context_window: 200000,
    supports_streaming: true,
  },
];

export function modelsFor(provider: ProviderName): Array<ModelInfo> {
  return MODEL_CATALOG.filter((model) => model.provider === provider);
}

/** The first catalog entry of a provider; used for connection checks. */
export function defaultModelFor(provider: ProviderName): string | undefined {
  return modelsFor(provider)[0]?.id;
}
