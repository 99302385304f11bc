import { describe, expect, it } from "vitest";
import { loadConfig } from "./config";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      geminiApiKey: undefined,
      geminiModel: "gemini-2.0-flash",
      twitterBearerToken: undefined,
      newsApiKey: undefined,
      mongoUri: undefined,
      port: 3001,
      nodeEnv: "development",
      mappingsPath: "data/twittermappings.json",
      logsDir: "logs",
      cacheTtlHours: 24,
    });
  });

  it("reads values and treats blank ones as unset", () => {
    const config = loadConfig({
      PORT: "8080",
      GEMINI_API_KEY: "test-key",
      TWITTER_BEARER_TOKEN: "  ",
      NODE_ENV: "test",
      CACHE_TTL_HOURS: "6",
    });

    expect(config.port).toBe(8080);
    expect(config.geminiApiKey).toBe("test-key");
    expect(config.twitterBearerToken).toBeUndefined();
    expect(config.nodeEnv).toBe("test");
    expect(config.cacheTtlHours).toBe(6);
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ PORT: "abc" })).toThrow(/^Invalid configuration: PORT:/);
    expect(() => loadConfig({ NODE_ENV: "staging" })).toThrow(/NODE_ENV/);
    expect(() => loadConfig({ MONGODB_URI: "not a url" })).toThrow(/MONGODB_URI/);
  });
});
