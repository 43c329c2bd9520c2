// pattern: Imperative Shell

import TOML from "@iarna/toml";
import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { isRecord } from "../adapter/decode.js";
import { AppConfigSchema, type AppConfig } from "./schema.js";

export type { AppConfig } from "./schema.js";

const DEFAULT_CONFIG_PATH = "config.toml";

function section(source: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = source[key];
  return isRecord(value) ? { ...value } : {};
}

/** Environment variables win over the file for provider secrets and endpoints. */
export function applyEnvOverrides(
  parsed: Record<string, unknown>,
  env: NodeJS.ProcessEnv
): Record<string, unknown> {
  const providers = section(parsed, "providers");
  const openai = section(providers, "openai");
  const anthropic = section(providers, "anthropic");

  if (env["OPENAI_API_KEY"]) {
    openai["api_key"] = env["OPENAI_API_KEY"];
  }
  if (env["OPENAI_BASE_URL"]) {
    openai["base_url"] = env["OPENAI_BASE_URL"];
  }
  if (env["ANTHROPIC_API_KEY"]) {
    anthropic["api_key"] = env["ANTHROPIC_API_KEY"];
  }

  return { ...parsed, providers: { ...providers, openai, anthropic } };
}

/**
 * Load config.toml (or `configPath`). A missing default file means
 * defaults plus environment; a missing explicit path is an error.
 */
export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const resolvedPath = resolve(configPath ?? DEFAULT_CONFIG_PATH);

  let parsed: Record<string, unknown> = {};
  if (configPath !== undefined || existsSync(resolvedPath)) {
    const raw = readFileSync(resolvedPath, "utf-8");
    parsed = TOML.parse(raw);
  }

  return AppConfigSchema.parse(applyEnvOverrides(parsed, env));
}
