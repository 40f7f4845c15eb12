import { generationErrorText, type GenerationClient } from "../src/pipeline/generation.js";
import type { CycleLogger } from "../src/pipeline/orchestrator.js";
import { PromptLookupError } from "../src/pipeline/errors.js";
import type { AgentName, AgentPromptConfig, PromptConfigProvider } from "../src/pipeline/prompts.js";

export const TEST_PROMPTS: Record<AgentName, AgentPromptConfig> = {
  researcher: {
    system_prompt: "ROLE:researcher",
    user_prompt_template: "TOPIC: {topic}"
  },
  writer: {
    system_prompt: "ROLE:writer",
    user_prompt_template: "TOPIC: {topic}\nSOURCES:\n{sources}\nFACTS:\n{key_facts}\nANGLE: {suggested_angle}"
  },
  editor: {
    system_prompt: "ROLE:editor",
    user_prompt_template:
      "TITLE: {title}\nLEAD: {lead}\nBODY: {body}\nTAGS: {tags}\nWORDS: {word_count}\nCLICKBAIT: {clickbait_score}"
  }
};

export const TEST_ROLES: Record<AgentName, string> = {
  researcher: TEST_PROMPTS.researcher.system_prompt,
  writer: TEST_PROMPTS.writer.system_prompt,
  editor: TEST_PROMPTS.editor.system_prompt
};

export class StaticPromptProvider implements PromptConfigProvider {
  constructor(private readonly configs: Record<string, AgentPromptConfig> = TEST_PROMPTS) {}

  async getAgentConfig(agent: string): Promise<AgentPromptConfig> {
    const config = this.configs[agent];
    if (!config) throw new PromptLookupError(agent, Object.keys(this.configs));
    return config;
  }
}

export type RecordedCall = { agent: AgentName | "unknown"; task: string; role: string; model: string };

function agentForRole(role: string): AgentName | "unknown" {
  if (role === TEST_ROLES.researcher) return "researcher";
  if (role === TEST_ROLES.writer) return "writer";
  if (role === TEST_ROLES.editor) return "editor";
  return "unknown";
}

/**
 * Replays canned responses per agent, in order. An exhausted script answers
 * with the generation error sentinel.
 */
export class ScriptedGeneration implements GenerationClient {
  readonly calls: RecordedCall[] = [];
  private readonly script: Record<AgentName, string[]>;

  constructor(script: Partial<Record<AgentName, string[]>>) {
    this.script = {
      researcher: [...(script.researcher ?? [])],
      writer: [...(script.writer ?? [])],
      editor: [...(script.editor ?? [])]
    };
  }

  async generate(task: string, role: string, model: string): Promise<string> {
    const agent = agentForRole(role);
    this.calls.push({ agent, task, role, model });
    if (agent === "unknown") return generationErrorText("unknown role");
    return this.script[agent].shift() ?? generationErrorText(`no scripted ${agent} response left`);
  }

  callsFor(agent: AgentName): RecordedCall[] {
    return this.calls.filter((call) => call.agent === agent);
  }
}

export type MemoryLogger = CycleLogger & { lines: string[] };

export function memoryLogger(): MemoryLogger {
  const lines: string[] = [];
  return {
    lines,
    info: (message) => void lines.push(`INFO ${message}`),
    warn: (message) => void lines.push(`WARNING ${message}`),
    error: (message) => void lines.push(`ERROR ${message}`)
  };
}

export const ARTICLE_BODY =
  "Heat pumps are now being fitted to apartment blocks across the region. " +
  "Installers report longer waiting lists, and housing cooperatives are asking for clearer subsidy rules.";

export function researchJson(topic = "Heat pumps in apartment blocks"): string {
  return JSON.stringify({
    topic,
    sources: [
      {
        title: "Regional energy agency report",
        url: "https://example.com/energy-report",
        summary: "Installations doubled year over year.",
        relevance_score: 0.9
      },
      {
        title: "Housing cooperative survey",
        url: null,
        summary: "Most boards want clearer subsidy rules.",
        relevance_score: 0.7
      }
    ],
    key_facts: ["Installations doubled year over year", "Subsidy rules changed in spring"],
    suggested_angle: "What the change means for tenants"
  });
}

export function writerJson(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    title: "Heat pumps move into apartment blocks",
    lead: "Housing cooperatives are replacing gas boilers faster than expected.",
    body: ARTICLE_BODY,
    tags: ["energy", "housing"],
    word_count: 30,
    ...overrides
  });
}

export function editorJson(decision: string, score: number, overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    decision,
    overall_score: score,
    strengths: ["Clear lead"],
    weaknesses: decision === "approve" ? [] : ["Needs more numbers"],
    specific_suggestions: decision === "approve" ? [] : ["Add installation figures", "Quote a tenant"],
    fact_check_notes: null,
    ...overrides
  });
}
