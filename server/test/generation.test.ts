import { beforeEach, describe, expect, it, vi } from "vitest";

const mocks = vi.hoisted(() => ({
  run: vi.fn(),
  agentConfigs: [] as unknown[],
  providerConfigs: [] as unknown[],
  runnerConfigs: [] as unknown[]
}));

vi.mock("@openai/agents", () => {
  class Agent {
    constructor(config: unknown) {
      mocks.agentConfigs.push(config);
    }
  }

  class OpenAIProvider {
    constructor(config: unknown) {
      mocks.providerConfigs.push(config);
    }
  }

  class Runner {
    constructor(config: unknown) {
      mocks.runnerConfigs.push(config);
    }

    run(agent: unknown, input: unknown, options: unknown) {
      return mocks.run(agent, input, options);
    }
  }

  return { Agent, OpenAIProvider, Runner };
});

import {
  AgentsGenerationClient,
  GENERATION_ERROR_MARKER,
  generationErrorText,
  isGenerationError
} from "../src/pipeline/generation.js";

beforeEach(() => {
  mocks.run.mockReset();
  mocks.agentConfigs.length = 0;
  mocks.providerConfigs.length = 0;
  mocks.runnerConfigs.length = 0;
});

describe("generation sentinel", () => {
  it("marks failures with the error marker", () => {
    expect(generationErrorText("timeout")).toBe("ERROR: generation failed: timeout");
    expect(isGenerationError(generationErrorText("timeout"))).toBe(true);
    expect(isGenerationError(`  ${GENERATION_ERROR_MARKER} x`)).toBe(true);
    expect(isGenerationError('{"title": "ERROR: nothing"}')).toBe(false);
  });
});

describe("AgentsGenerationClient", () => {
  it("runs a single-turn agent with the role as instructions", async () => {
    mocks.run.mockResolvedValueOnce({ finalOutput: '{"ok": true}' });
    const client = new AgentsGenerationClient({ apiKey: "test-key", temperature: 0.2, timeoutMs: 5000 });

    const text = await client.generate("TOPIC: Rivers", "You research.", "gpt-4o-mini");

    expect(text).toBe('{"ok": true}');
    expect(mocks.agentConfigs[0]).toEqual({
      name: "Newsroom Agent",
      instructions: "You research.",
      model: "gpt-4o-mini",
      modelSettings: { temperature: 0.2 }
    });
    const [, input, options] = mocks.run.mock.calls[0];
    expect(input).toBe("TOPIC: Rivers");
    expect(options).toMatchObject({ maxTurns: 1 });
    expect(options).toHaveProperty("signal");
  });

  it("uses the Responses API and tracing against the default endpoint", () => {
    new AgentsGenerationClient({ apiKey: "test-key" });
    expect(mocks.providerConfigs[0]).toEqual({ apiKey: "test-key", baseURL: undefined, useResponses: true });
    expect(mocks.runnerConfigs[0]).toMatchObject({ tracingDisabled: false });
  });

  it("switches to Chat Completions without tracing for a custom endpoint", () => {
    new AgentsGenerationClient({ apiKey: "test-key", baseURL: "https://models.example.com" });
    expect(mocks.providerConfigs[0]).toEqual({
      apiKey: "test-key",
      baseURL: "https://models.example.com",
      useResponses: false
    });
    expect(mocks.runnerConfigs[0]).toMatchObject({ tracingDisabled: true });
  });

  it("returns the sentinel and reports the failure when the call throws", async () => {
    mocks.run.mockRejectedValueOnce(new Error("429 rate limited"));
    const onFailure = vi.fn();
    const client = new AgentsGenerationClient({ apiKey: "test-key", onFailure });

    const text = await client.generate("task", "role", "gpt-4o-mini");

    expect(text).toBe("ERROR: generation failed: 429 rate limited");
    expect(onFailure).toHaveBeenCalledWith("Generation call failed: 429 rate limited");
  });

  it("treats an empty or non-text answer as a failure", async () => {
    mocks.run.mockResolvedValueOnce({ finalOutput: "   " });
    mocks.run.mockResolvedValueOnce({ finalOutput: undefined });
    const client = new AgentsGenerationClient({ apiKey: "test-key" });

    expect(await client.generate("task", "role", "m1")).toBe("ERROR: generation failed: m1 returned an empty response");
    expect(await client.generate("task", "role", "m1")).toBe("ERROR: generation failed: m1 returned an empty response");
  });
});
