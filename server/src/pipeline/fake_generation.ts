import { FEEDBACK_SECTION_HEADER } from "./agents.js";
import { generationErrorText, type GenerationClient } from "./generation.js";
import type { AgentName } from "./prompts.js";

export type FakeGenerationOptions = {
  delayMs?: number;
};

const REVISED_MARKER = "(revised)";
export const FAKE_DELAY_MAX_MS = 2000;
const TOPIC_MAX_CHARS = 80;

function wait(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function topicFromTask(task: string): string {
  const match = /TOPIC:\s*(.+)/.exec(task);
  const topic = match?.[1]?.trim().slice(0, TOPIC_MAX_CHARS);
  return topic || "offline rehearsal";
}

function researchResponse(topic: string): string {
  return JSON.stringify({
    topic,
    sources: [
      {
        title: `Field notes on ${topic}`,
        url: "https://example.com/field-notes",
        summary: "Background interviews collected for an offline rehearsal run.",
        relevance_score: 0.9
      },
      {
        title: `Open questions about ${topic}`,
        url: null,
        summary: "A list of claims that still need independent confirmation.",
        relevance_score: 0.6
      }
    ],
    key_facts: [`${topic} is discussed in two independent sources`, "No figures were verified in offline mode"],
    suggested_angle: `What readers should know about ${topic} right now`
  });
}

function writerResponse(topic: string, revised: boolean): string {
  const title = revised ? `A closer look at ${topic} ${REVISED_MARKER}` : `A first look at ${topic}`;
  const body = [
    "## Background",
    "",
    `This article was produced by the offline generation backend and describes ${topic} in general terms.`,
    "",
    "## What we know",
    "",
    "Two sources agree on the main points, and the remaining claims are flagged for fact-checking."
  ].join("\n");

  const json = JSON.stringify(
    {
      title,
      lead: `An overview of ${topic}, written without access to a live model.`,
      body,
      tags: ["offline", "rehearsal"],
      word_count: body.split(/\s+/).filter((w) => w.length > 0).length
    },
    null,
    2
  );
  // Revisions come back fenced, the way chat models often wrap JSON.
  return revised ? `\`\`\`json\n${json}\n\`\`\`` : json;
}

function editorResponse(revised: boolean): string {
  if (revised) {
    return JSON.stringify({
      decision: "approve",
      overall_score: 8.5,
      strengths: ["Clear structure", "Claims are attributed"],
      weaknesses: [],
      specific_suggestions: [],
      fact_check_notes: null
    });
  }
  return JSON.stringify({
    decision: "revise",
    overall_score: 6.5,
    strengths: ["Readable lead"],
    weaknesses: ["The headline is too generic"],
    specific_suggestions: ["Sharpen the headline", "Attribute every claim to a source"],
    fact_check_notes: "Confirm the claims from the second source."
  });
}

/**
 * Deterministic stand-in for a model, for running cycles without credentials.
 * The agent is recognised by its role instruction; the first draft is always
 * sent back for revision and the revised one approved.
 */
export class FakeGenerationClient implements GenerationClient {
  private readonly delayMs: number;

  constructor(
    private readonly roles: Record<AgentName, string>,
    options: FakeGenerationOptions = {}
  ) {
    this.delayMs = Math.min(FAKE_DELAY_MAX_MS, Math.max(0, options.delayMs ?? 0));
  }

  async generate(taskInstruction: string, roleInstruction: string, _modelId: string): Promise<string> {
    await wait(this.delayMs);

    if (roleInstruction === this.roles.researcher) return researchResponse(topicFromTask(taskInstruction));
    if (roleInstruction === this.roles.writer) {
      return writerResponse(topicFromTask(taskInstruction), taskInstruction.includes(FEEDBACK_SECTION_HEADER));
    }
    if (roleInstruction === this.roles.editor) return editorResponse(taskInstruction.includes(REVISED_MARKER));
    return generationErrorText("offline backend does not recognise this role instruction");
  }
}
