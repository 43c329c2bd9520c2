// pattern: Functional Core

import { describe, it, expect } from "vitest";
import { AppConfigSchema } from "./schema.js";

describe("AppConfigSchema", () => {
  it("should fill every section with defaults", () => {
    const result = AppConfigSchema.parse({});

    expect(result.relay).toEqual({
      default_provider: "anthropic",
      max_tool_rounds: 8,
      max_retries: 3,
      retry_backoff_ms: 1000,
    });
    expect(result.providers).toEqual({ openai: {}, anthropic: {} });
    expect(result.tools).toEqual({
      missing_correlation_id: "reject",
      file_system: { enabled: true, root: "./workspace" },
      google_calendar: {
        enabled: false,
        base_url: "https://www.googleapis.com/calendar/v3",
        timeout_ms: 30000,
      },
    });
  });

  it("should accept the substitute correlation id policy", () => {
    const result = AppConfigSchema.parse({ tools: { missing_correlation_id: "substitute" } });

    expect(result.tools.missing_correlation_id).toBe("substitute");
  });

  it("should reject an unknown default provider", () => {
    expect(() => AppConfigSchema.parse({ relay: { default_provider: "gemini" } })).toThrow();
  });

  it("should reject a non-positive tool round limit", () => {
    expect(() => AppConfigSchema.parse({ relay: { max_tool_rounds: 0 } })).toThrow();
  });

  it("should reject a provider base_url that is not a URL", () => {
    expect(() => AppConfigSchema.parse({ providers: { openai: { base_url: "not a url" } } })).toThrow();
  });
});
