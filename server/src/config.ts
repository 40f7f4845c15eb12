import { FAKE_DELAY_MAX_MS } from "./pipeline/fake_generation.js";
import { GITHUB_MODELS_BASE_URL } from "./pipeline/generation.js";

export type GenerationMode = "openai" | "fake";

export type NewsroomConfig = {
  port: number;
  generationMode: GenerationMode;
  /** Absent only in fake mode. */
  apiKey?: string;
  baseURL?: string;
  model: string;
  temperature: number;
  generationTimeoutMs: number;
  maxConcurrentCycles: number;
  fakeDelayMs: number;
};

export const DEFAULT_PORT = 8000;
export const DEFAULT_MODEL = "gpt-4o-mini";
export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_GENERATION_TIMEOUT_MS = 120_000;
export const DEFAULT_MAX_CONCURRENT_CYCLES = 2;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

function text(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function numberInRange(env: Env, name: string, fallback: number, min: number, max: number, integer: boolean): number {
  const raw = text(env, name);
  if (raw === undefined) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || n < min || n > max) return fallback;
  if (integer && !Number.isInteger(n)) return fallback;
  return n;
}

function generationModeFromEnv(env: Env): GenerationMode {
  const mode = text(env, "NEWSROOM_GENERATION_MODE")?.toLowerCase();
  if (mode === undefined || mode === "openai") return "openai";
  if (mode === "fake") return "fake";
  throw new ConfigError(`NEWSROOM_GENERATION_MODE must be "openai" or "fake", got "${mode}"`);
}

/**
 * Reads the server configuration from environment variables. Malformed
 * numbers fall back to their defaults. OPENAI_API_KEY wins over GITHUB_TOKEN;
 * the GitHub token routes calls to GitHub Models unless
 * NEWSROOM_OPENAI_BASE_URL says otherwise.
 */
export function loadConfig(env: Env = process.env): NewsroomConfig {
  const generationMode = generationModeFromEnv(env);

  const openaiKey = text(env, "OPENAI_API_KEY");
  const githubToken = text(env, "GITHUB_TOKEN");
  const apiKey = openaiKey ?? githubToken;
  if (generationMode === "openai" && !apiKey) {
    throw new ConfigError(
      "No model credentials: set OPENAI_API_KEY or GITHUB_TOKEN, or run with NEWSROOM_GENERATION_MODE=fake"
    );
  }
  const baseURL = text(env, "NEWSROOM_OPENAI_BASE_URL") ?? (openaiKey ? undefined : githubToken ? GITHUB_MODELS_BASE_URL : undefined);

  return {
    port: numberInRange(env, "PORT", DEFAULT_PORT, 1, 65_535, true),
    generationMode,
    apiKey,
    baseURL,
    model: text(env, "NEWSROOM_MODEL") ?? DEFAULT_MODEL,
    temperature: numberInRange(env, "NEWSROOM_TEMPERATURE", DEFAULT_TEMPERATURE, 0, 2, false),
    generationTimeoutMs: numberInRange(
      env,
      "NEWSROOM_GENERATION_TIMEOUT_MS",
      DEFAULT_GENERATION_TIMEOUT_MS,
      1,
      Number.MAX_SAFE_INTEGER,
      true
    ),
    maxConcurrentCycles: numberInRange(env, "NEWSROOM_MAX_CONCURRENT_CYCLES", DEFAULT_MAX_CONCURRENT_CYCLES, 1, 64, true),
    fakeDelayMs: numberInRange(env, "NEWSROOM_FAKE_DELAY_MS", 0, 0, FAKE_DELAY_MAX_MS, true)
  };
}
