import { describe, expect, it } from "vitest";
import { ConfigError, loadConfig } from "../src/config.js";
import { GITHUB_MODELS_BASE_URL } from "../src/pipeline/generation.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({ OPENAI_API_KEY: "test-key" })).toEqual({
      port: 8000,
      generationMode: "openai",
      apiKey: "test-key",
      baseURL: undefined,
      model: "gpt-4o-mini",
      temperature: 0.7,
      generationTimeoutMs: 120000,
      maxConcurrentCycles: 2,
      fakeDelayMs: 0
    });
  });

  it("reads overrides", () => {
    const config = loadConfig({
      OPENAI_API_KEY: "test-key",
      PORT: "9001",
      NEWSROOM_MODEL: "gpt-4o",
      NEWSROOM_TEMPERATURE: "0.2",
      NEWSROOM_GENERATION_TIMEOUT_MS: "30000",
      NEWSROOM_MAX_CONCURRENT_CYCLES: "4",
      NEWSROOM_OPENAI_BASE_URL: "https://llm.example.com/v1"
    });
    expect(config).toMatchObject({
      port: 9001,
      model: "gpt-4o",
      temperature: 0.2,
      generationTimeoutMs: 30000,
      maxConcurrentCycles: 4,
      baseURL: "https://llm.example.com/v1"
    });
  });

  it("falls back to defaults for malformed numbers", () => {
    const config = loadConfig({
      OPENAI_API_KEY: "test-key",
      PORT: "eighty",
      NEWSROOM_TEMPERATURE: "-1",
      NEWSROOM_GENERATION_TIMEOUT_MS: "1.5",
      NEWSROOM_MAX_CONCURRENT_CYCLES: "0",
      NEWSROOM_FAKE_DELAY_MS: "5000"
    });
    expect(config).toMatchObject({
      port: 8000,
      temperature: 0.7,
      generationTimeoutMs: 120000,
      maxConcurrentCycles: 2,
      fakeDelayMs: 0
    });
  });

  it("routes a GitHub token to GitHub Models", () => {
    const config = loadConfig({ GITHUB_TOKEN: "test-token" });
    expect(config.apiKey).toBe("test-token");
    expect(config.baseURL).toBe(GITHUB_MODELS_BASE_URL);
  });

  it("prefers the OpenAI key over a GitHub token", () => {
    const config = loadConfig({ OPENAI_API_KEY: "test-key", GITHUB_TOKEN: "test-token" });
    expect(config.apiKey).toBe("test-key");
    expect(config.baseURL).toBeUndefined();
  });

  it("requires credentials in openai mode and names both variables", () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({ OPENAI_API_KEY: "  " })).toThrow(/OPENAI_API_KEY or GITHUB_TOKEN/);
  });

  it("needs no credentials in fake mode", () => {
    const config = loadConfig({ NEWSROOM_GENERATION_MODE: "FAKE", NEWSROOM_FAKE_DELAY_MS: "250" });
    expect(config.generationMode).toBe("fake");
    expect(config.apiKey).toBeUndefined();
    expect(config.fakeDelayMs).toBe(250);
  });

  it("rejects an unknown generation mode", () => {
    expect(() => loadConfig({ NEWSROOM_GENERATION_MODE: "local" })).toThrow('must be "openai" or "fake", got "local"');
  });
});
