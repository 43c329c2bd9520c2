// pattern: Functional Core
import { z } from "zod";
import { PROVIDER_NAMES } from "../adapter/types.js";

const RelayConfigSchema = z.object({
  default_provider: z.enum(PROVIDER_NAMES).default("anthropic"),
  default_model: z.string().optional(),
  max_tool_rounds: z.number().int().positive().default(8),
  max_retries: z.number().int().positive().default(3),
  retry_backoff_ms: z.number().int().nonnegative().default(1000),
});

const ProviderConfigSchema = z.object({
  api_key: z.string().optional(),
  base_url: z.string().url().optional(),
});

const ProvidersConfigSchema = z.object({
  openai: ProviderConfigSchema.default({}),
  anthropic: ProviderConfigSchema.default({}),
});

const FileSystemToolConfigSchema = z.object({
  enabled: z.boolean().default(true),
  root: z.string().default("./workspace"),
});

const GoogleCalendarToolConfigSchema = z.object({
  enabled: z.boolean().default(false),
  base_url: z.string().url().default("https://www.googleapis.com/calendar/v3"),
  timeout_ms: z.number().int().positive().default(30000),
});

const ToolsConfigSchema = z.object({
  missing_correlation_id: z.enum(["reject", "substitute"]).default("reject"),
  file_system: FileSystemToolConfigSchema.default({}),
  google_calendar: GoogleCalendarToolConfigSchema.default({}),
});

const AppConfigSchema = z.object({
  relay: RelayConfigSchema.default({}),
  providers: ProvidersConfigSchema.default({}),
  tools: ToolsConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type RelayConfig = z.infer<typeof RelayConfigSchema>;
export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;
export type ProvidersConfig = z.infer<typeof ProvidersConfigSchema>;
export type FileSystemToolConfig = z.infer<typeof FileSystemToolConfigSchema>;
export type GoogleCalendarToolConfig = z.infer<typeof GoogleCalendarToolConfigSchema>;
export type ToolsConfig = z.infer<typeof ToolsConfigSchema>;

export {
  AppConfigSchema,
  RelayConfigSchema,
  ProviderConfigSchema,
  ProvidersConfigSchema,
  FileSystemToolConfigSchema,
  GoogleCalendarToolConfigSchema,
  ToolsConfigSchema,
};
