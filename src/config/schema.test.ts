// pattern: Functional Core

import { describe, it, expect } from "vitest";
import { AppConfigSchema } from "./schema.ts";

describe("AppConfigSchema", () => {
  it("fills every section with defaults from an empty object", () => {
    const result = AppConfigSchema.parse({});

    expect(result).toEqual({
      dispatch: { confirm_sensitive: true },
      search: { max_results: 5 },
      telegram: { enabled: false, api_base_url: "https://api.telegram.org" },
      agent: { default_name: "default", wake_word: "" },
    });
  });

  it("rejects a non-positive dispatch timeout", () => {
    const result = AppConfigSchema.safeParse({ dispatch: { timeout_ms: 0 } });

    expect(result.success).toBe(false);
  });

  it("rejects more than 20 search results", () => {
    const result = AppConfigSchema.safeParse({ search: { max_results: 50 } });

    expect(result.success).toBe(false);
  });

  describe("telegram", () => {
    it("requires bot_token when telegram is enabled", () => {
      const result = AppConfigSchema.safeParse({ telegram: { enabled: true } });

      expect(result.success).toBe(false);
      if (!result.success) {
        const issue = result.error.issues.find((i) => i.path.join(".") === "telegram.bot_token");
        expect(issue?.message).toBe("bot_token is required when telegram is enabled");
      }
    });

    it("accepts an enabled telegram section with a token", () => {
      const result = AppConfigSchema.parse({
        telegram: { enabled: true, bot_token: "test-token", api_base_url: "http://localhost:8081" },
      });

      expect(result.telegram).toEqual({
        enabled: true,
        bot_token: "test-token",
        api_base_url: "http://localhost:8081",
      });
    });

    it("rejects an api_base_url that is not a URL", () => {
      const result = AppConfigSchema.safeParse({ telegram: { api_base_url: "not a url" } });

      expect(result.success).toBe(false);
    });
  });
});
