import { z } from "zod";
import { PromptConfigError, PromptLookupError, PromptTemplateError } from "./errors.js";
import { promptsFileAbs, readJsonFile, toErrorMessage } from "./utils.js";

export const AGENT_NAMES = ["researcher", "writer", "editor"] as const;
export type AgentName = (typeof AGENT_NAMES)[number];

const AgentPromptConfigSchema = z.object({
  name: z.string().optional(),
  description: z.string().optional(),
  system_prompt: z.string().min(1),
  user_prompt_template: z.string().min(1)
});

const PromptFileSchema = z.record(z.string(), AgentPromptConfigSchema);

export type AgentPromptConfig = z.infer<typeof AgentPromptConfigSchema>;

export interface PromptConfigProvider {
  /** Rejects with PromptLookupError when `agent` is not configured. */
  getAgentConfig(agent: string): Promise<AgentPromptConfig>;
}

export class FilePromptProvider implements PromptConfigProvider {
  private cache: Promise<Record<string, AgentPromptConfig>> | null = null;

  constructor(private readonly filePath: string = promptsFileAbs()) {}

  async getAgentConfig(agent: string): Promise<AgentPromptConfig> {
    const all = await this.load();
    if (!Object.hasOwn(all, agent)) throw new PromptLookupError(agent, Object.keys(all));
    return all[agent];
  }

  async knownAgents(): Promise<string[]> {
    return Object.keys(await this.load());
  }

  private load(): Promise<Record<string, AgentPromptConfig>> {
    if (!this.cache) {
      // A failed read is not cached so a fixed file is picked up on the next call.
      this.cache = this.read().catch((err: unknown) => {
        this.cache = null;
        throw err;
      });
    }
    return this.cache;
  }

  private async read(): Promise<Record<string, AgentPromptConfig>> {
    let raw: unknown;
    try {
      raw = await readJsonFile(this.filePath);
    } catch (err) {
      throw new PromptConfigError(`Cannot read prompts file ${this.filePath}: ${toErrorMessage(err)}`);
    }

    const parsed = PromptFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new PromptConfigError(`Invalid prompts file ${this.filePath}: ${issue.path.join(".")} ${issue.message}`);
    }
    return parsed.data;
  }
}

const PLACEHOLDER_RE = /\{\{|\}\}|\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Substitutes `{name}` placeholders. `{{` and `}}` produce literal braces so
 * templates can carry JSON examples.
 */
export function fillTemplate(template: string, values: Record<string, string | number>): string {
  return template.replace(PLACEHOLDER_RE, (match: string, name: string | undefined) => {
    if (match === "{{") return "{";
    if (match === "}}") return "}";
    if (name === undefined || !Object.hasOwn(values, name)) throw new PromptTemplateError(name ?? match);
    return String(values[name]);
  });
}
