import { MalformedOutputError, asNewsroomError, fail, ok, type StepResult } from "./errors.js";
import { isGenerationError, type GenerationClient } from "./generation.js";
import { fillTemplate, type AgentName, type PromptConfigProvider } from "./prompts.js";
import {
  EditorOutputSchema,
  ResearcherOutputSchema,
  WriterOutputSchema,
  validateEntity,
  type ArticleDraft,
  type ResearchNotes,
  type ReviewDecision,
  type ReviewFeedback
} from "./schemas.js";
import { parseStructuredOutput } from "./structured_output.js";
import { excerpt, nowIso } from "./utils.js";

export type StepDeps = {
  generation: GenerationClient;
  prompts: PromptConfigProvider;
  model: string;
};

type RenderedPrompt = { system: string; user: string };

export const FEEDBACK_SECTION_HEADER = "=== EDITOR FEEDBACK (MUST BE ADDRESSED) ===";

async function renderPrompt(deps: StepDeps, agent: AgentName, values: Record<string, string | number>): Promise<RenderedPrompt> {
  const config = await deps.prompts.getAgentConfig(agent);
  return { system: config.system_prompt, user: fillTemplate(config.user_prompt_template, values) };
}

async function generateStructured(deps: StepDeps, prompt: RenderedPrompt): Promise<StepResult<Record<string, unknown>>> {
  const raw = await deps.generation.generate(prompt.user, prompt.system, deps.model);
  if (isGenerationError(raw)) {
    return fail(new MalformedOutputError(`Generation backend returned no usable output: ${excerpt(raw)}`, excerpt(raw)));
  }
  return parseStructuredOutput(raw);
}

async function guarded<T>(fn: () => Promise<StepResult<T>>): Promise<StepResult<T>> {
  try {
    return await fn();
  } catch (err) {
    return fail(asNewsroomError(err));
  }
}

function bullets(items: string[]): string[] {
  return items.map((item) => `- ${item}`);
}

export function formatSources(research: ResearchNotes): string {
  return research.sources.map((src) => `- ${src.title} (${src.url ?? "no URL"}) — ${src.summary}`).join("\n");
}

export function formatKeyFacts(research: ResearchNotes): string {
  return bullets(research.key_facts).join("\n");
}

export function formatFeedbackSection(feedback: ReviewFeedback): string {
  const lines = [
    "",
    "",
    FEEDBACK_SECTION_HEADER,
    `Previous score: ${feedback.overall_score}/10`,
    `Decision: ${feedback.decision.toUpperCase()}`,
    "",
    "WEAKNESSES TO FIX:",
    ...bullets(feedback.weaknesses),
    "",
    "SPECIFIC SUGGESTIONS:",
    ...bullets(feedback.specific_suggestions)
  ];
  if (feedback.fact_check_notes) lines.push("", `FACT-CHECK NOTES: ${feedback.fact_check_notes}`);
  lines.push("", "IMPORTANT: Write a NEW, IMPROVED version of the article that addresses every point above.");
  return lines.join("\n");
}

/**
 * Maps the editor's verdict onto a ReviewDecision. Matching is
 * case-insensitive; anything else, including typos and non-strings, becomes
 * "revise" so an unrecognised verdict can never approve a draft.
 */
export function toReviewDecision(raw: unknown): ReviewDecision {
  if (typeof raw !== "string") return "revise";
  switch (raw.toLowerCase()) {
    case "approve":
      return "approve";
    case "reject":
      return "reject";
    case "revise":
      return "revise";
    default:
      return "revise";
  }
}

export async function runResearchStep(topic: string, deps: StepDeps): Promise<StepResult<ResearchNotes>> {
  return guarded(async () => {
    const prompt = await renderPrompt(deps, "researcher", { topic });
    const data = await generateStructured(deps, prompt);
    if (!data.ok) return data;

    const output = validateEntity(ResearcherOutputSchema, "ResearchNotes", data.value);
    if (!output.ok) return output;
    const notes: ResearchNotes = { ...output.value, created_at: nowIso() };
    return ok(notes);
  });
}

/** Drafts version 1 without feedback, otherwise one past the iteration that produced the feedback. */
export async function runWriterStep(
  research: ResearchNotes,
  feedback: ReviewFeedback | null,
  deps: StepDeps
): Promise<StepResult<ArticleDraft>> {
  return guarded(async () => {
    const prompt = await renderPrompt(deps, "writer", {
      topic: research.topic,
      sources: formatSources(research),
      key_facts: formatKeyFacts(research),
      suggested_angle: research.suggested_angle
    });
    if (feedback) prompt.user += formatFeedbackSection(feedback);

    const data = await generateStructured(deps, prompt);
    if (!data.ok) return data;

    const output = validateEntity(WriterOutputSchema, "ArticleDraft", data.value);
    if (!output.ok) return output;

    const at = nowIso();
    const draft: ArticleDraft = {
      ...output.value,
      status: "draft",
      version: feedback ? feedback.originating_iteration + 1 : 1,
      created_at: at,
      updated_at: at
    };
    return ok(draft);
  });
}

export async function runEditorStep(
  draft: ArticleDraft,
  clickbaitScore: number,
  iteration: number,
  deps: StepDeps
): Promise<StepResult<ReviewFeedback>> {
  return guarded(async () => {
    const prompt = await renderPrompt(deps, "editor", {
      title: draft.title,
      lead: draft.lead,
      body: draft.body,
      tags: draft.tags.join(", "),
      word_count: draft.word_count,
      clickbait_score: clickbaitScore.toFixed(2)
    });

    const data = await generateStructured(deps, prompt);
    if (!data.ok) return data;

    const output = validateEntity(EditorOutputSchema, "ReviewFeedback", {
      ...data.value,
      decision: toReviewDecision(data.value.decision)
    });
    if (!output.ok) return output;
    const review: ReviewFeedback = { ...output.value, originating_iteration: iteration, reviewed_at: nowIso() };
    return ok(review);
  });
}
