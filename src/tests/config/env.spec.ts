import { describe, expect, it } from "vitest";
import { loadConfig, loadLoggingConfig } from "../../config/env";
import { ConfigurationError } from "../../errors";

function issuesOf(load: () => unknown): string[] {
  try {
    load();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error.issues;
    }
    throw error;
  }
  return [];
}

describe("loadConfig", () => {
  it("requires an OpenAI key", () => {
    expect(() => loadConfig({})).toThrow(ConfigurationError);
    expect(issuesOf(() => loadConfig({}))).toEqual(["OPENAI_API_KEY: OPENAI_API_KEY is required"]);
    expect(issuesOf(() => loadConfig({ OPENAI_API_KEY: "   " }))).toEqual(["OPENAI_API_KEY: OPENAI_API_KEY is required"]);
  });

  it("fills defaults around a provided key", () => {
    const config = loadConfig({ OPENAI_API_KEY: " test-secret " });

    expect(config.OPENAI_API_KEY).toBe("test-secret");
    expect(config.LOG_LEVEL).toBe("info");
    expect(config.FUSION_STRATEGY).toBe("hybrid");
  });
});

describe("loadLoggingConfig", () => {
  it("reads the level and output type", () => {
    expect(loadLoggingConfig({ LOG_LEVEL: "warn", LOG_TYPE: "json" })).toEqual({ LOG_LEVEL: "warn", LOG_TYPE: "json" });
    expect(loadLoggingConfig({})).toEqual({ LOG_LEVEL: "info", LOG_TYPE: "pretty" });
  });

  it("does not need the rest of the configuration", () => {
    expect(loadLoggingConfig({ LOG_LEVEL: "debug", PORT: "not-a-port" })).toEqual({ LOG_LEVEL: "debug", LOG_TYPE: "pretty" });
  });

  it("rejects unknown levels instead of falling back", () => {
    const issues = issuesOf(() => loadLoggingConfig({ LOG_LEVEL: "verbose" }));

    expect(issues).toHaveLength(1);
    expect(issues[0].startsWith("LOG_LEVEL: Invalid enum value.")).toBe(true);
  });
});
