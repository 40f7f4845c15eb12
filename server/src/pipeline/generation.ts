import { Agent, OpenAIProvider, Runner } from "@openai/agents";
import { toErrorMessage } from "./utils.js";

export const GENERATION_ERROR_MARKER = "ERROR:";
export const GITHUB_MODELS_BASE_URL = "https://models.inference.ai.azure.com";

const DEFAULT_TIMEOUT_MS = 120_000;
const DEFAULT_TEMPERATURE = 0.7;

/**
 * Text generation backend. Implementations never reject: a failed call
 * resolves to text starting with GENERATION_ERROR_MARKER, which then fails
 * structured parsing one layer up.
 */
export interface GenerationClient {
  generate(taskInstruction: string, roleInstruction: string, modelId: string): Promise<string>;
}

export function generationErrorText(reason: string): string {
  return `${GENERATION_ERROR_MARKER} generation failed: ${reason}`;
}

export function isGenerationError(text: string): boolean {
  return text.trimStart().startsWith(GENERATION_ERROR_MARKER);
}

export type AgentsGenerationOptions = {
  apiKey: string;
  /** OpenAI-compatible endpoint. Such endpoints get Chat Completions and no trace export. */
  baseURL?: string;
  temperature?: number;
  timeoutMs?: number;
  runner?: Runner;
  onFailure?: (message: string) => void;
};

export class AgentsGenerationClient implements GenerationClient {
  private readonly runner: Runner;
  private readonly temperature: number;
  private readonly timeoutMs: number;
  private readonly onFailure?: (message: string) => void;

  constructor(options: AgentsGenerationOptions) {
    const customEndpoint = Boolean(options.baseURL);
    this.runner =
      options.runner ??
      new Runner({
        modelProvider: new OpenAIProvider({
          apiKey: options.apiKey,
          baseURL: options.baseURL,
          useResponses: !customEndpoint
        }),
        tracingDisabled: customEndpoint
      });
    this.temperature = options.temperature ?? DEFAULT_TEMPERATURE;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.onFailure = options.onFailure;
  }

  async generate(taskInstruction: string, roleInstruction: string, modelId: string): Promise<string> {
    const agent = new Agent({
      name: "Newsroom Agent",
      instructions: roleInstruction,
      model: modelId,
      modelSettings: { temperature: this.temperature }
    });

    try {
      const result = await this.runner.run(agent, taskInstruction, {
        maxTurns: 1,
        signal: AbortSignal.timeout(this.timeoutMs)
      });
      const text = typeof result.finalOutput === "string" ? result.finalOutput : "";
      if (text.trim().length === 0) return this.failed(`${modelId} returned an empty response`);
      return text;
    } catch (err) {
      return this.failed(toErrorMessage(err));
    }
  }

  private failed(reason: string): string {
    this.onFailure?.(`Generation call failed: ${reason}`);
    return generationErrorText(reason);
  }
}
