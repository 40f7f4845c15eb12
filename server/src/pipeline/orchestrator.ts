import { runEditorStep, runResearchStep, runWriterStep, type StepDeps } from "./agents.js";
import { classifyClickbait, scoreClickbait } from "./clickbait.js";
import { InvalidInputError, ValidationError, asNewsroomError, fail, ok, type NewsroomError, type StepResult } from "./errors.js";
import type { ArticleDraft, ArticleStatus, CycleResult, CycleStatus, ResearchNotes, ReviewFeedback } from "./schemas.js";
import { newCycleId, nowIso } from "./utils.js";

export const DEFAULT_MAX_ITERATIONS = 2;

export type CyclePhase =
  | "researching"
  | "writing"
  | "scoring"
  | "reviewing"
  | "approved"
  | "rejected"
  | "exhausted"
  | "failed";

export interface CycleLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export type CycleDeps = StepDeps & {
  log: CycleLogger;
  scoreTitle?: (title: string) => number;
  onPhase?: (phase: CyclePhase, iteration: number) => void;
};

export type CycleInput = {
  topic: string;
  maxIterations: number;
  cycleId?: string;
};

function withStatus(draft: ArticleDraft, status: ArticleStatus): ArticleDraft {
  return { ...draft, status, updated_at: nowIso() };
}

function scoreSafely(score: (title: string) => number, title: string): StepResult<number> {
  let value: number;
  try {
    value = score(title);
  } catch (err) {
    return fail(asNewsroomError(err));
  }
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    return fail(new ValidationError("ClickbaitScore", "score", `expected a number in [0, 1], got ${value}`));
  }
  return ok(value);
}

function validateInput(input: CycleInput): NewsroomError | null {
  if (input.topic.trim().length === 0) return new InvalidInputError("Topic must not be empty");
  const n = input.maxIterations;
  if (!Number.isInteger(n) || n < 1) {
    return new InvalidInputError(`max_iterations must be an integer of at least 1, got ${n}`);
  }
  return null;
}

/**
 * Runs one research -> (write -> score -> review)* cycle.
 *
 * Research runs once. Each iteration drafts (with the previous review as
 * feedback), scores the headline and asks the editor for a verdict. An
 * approve ends the cycle with "success" on any iteration. Revise and reject
 * both loop while iterations remain; a reject on the last iteration ends with
 * "rejected" and a revise with "max_iterations". A failing step ends the cycle
 * with "error", keeping whatever research, draft and review exist so far.
 * Never rejects.
 */
export async function runNewsroomCycle(input: CycleInput, deps: CycleDeps): Promise<CycleResult> {
  const { topic, maxIterations } = input;
  const { log } = deps;
  const score = deps.scoreTitle ?? scoreClickbait;
  const cycleId = input.cycleId ?? newCycleId(topic);
  const startedAt = nowIso();

  let iterations = 0;
  let research: ResearchNotes | undefined;
  let draft: ArticleDraft | undefined;
  let review: ReviewFeedback | undefined;
  let clickbaitScore: number | undefined;

  const phase = (next: CyclePhase, iteration: number) => deps.onPhase?.(next, iteration);

  const finish = (status: CycleStatus, error?: NewsroomError): CycleResult => ({
    cycle_id: cycleId,
    status,
    topic,
    max_iterations: maxIterations,
    iterations,
    final_draft: draft,
    final_review: review,
    research_notes: research,
    clickbait_score: clickbaitScore,
    error_message: error?.message,
    error_kind: error?.name,
    started_at: startedAt,
    finished_at: nowIso()
  });

  const failed = (stage: string, error: NewsroomError): CycleResult => {
    log.error(`${stage} failed (${error.name}): ${error.message}`);
    phase("failed", iterations);
    return finish("error", error);
  };

  const invalid = validateInput(input);
  if (invalid) return failed("Cycle input", invalid);

  log.info(`ORCHESTRATOR START: "${topic}" (max iterations: ${maxIterations})`);

  phase("researching", 0);
  log.info("[STEP 1/4] RESEARCH AGENT");
  const researched = await runResearchStep(topic, deps);
  if (!researched.ok) return failed("Research", researched.error);
  research = researched.value;
  log.info(`  Sources: ${research.sources.length}, key facts: ${research.key_facts.length}`);
  log.info(`  Suggested angle: ${research.suggested_angle}`);

  let previousFeedback: ReviewFeedback | null = null;

  for (let iteration = 1; iteration <= maxIterations; iteration++) {
    iterations = iteration;
    const isLast = iteration === maxIterations;
    log.info(`ITERATION ${iteration}/${maxIterations}`);

    phase("writing", iteration);
    log.info("[STEP 2/4] WRITER AGENT");
    if (previousFeedback) {
      for (const suggestion of previousFeedback.specific_suggestions.slice(0, 3)) {
        log.info(`  Editor feedback: ${suggestion}`);
      }
    }
    const written = await runWriterStep(research, previousFeedback, deps);
    if (!written.ok) return failed("Writer", written.error);
    draft = written.value;
    log.info(`  Title: ${draft.title}`);
    log.info(`  Words: ${draft.word_count}, version: ${draft.version}`);

    phase("scoring", iteration);
    log.info("[STEP 3/4] CLICKBAIT DETECTOR");
    const scored = scoreSafely(score, draft.title);
    if (!scored.ok) return failed("Clickbait scoring", scored.error);
    clickbaitScore = scored.value;
    log.info(`  Score: ${clickbaitScore.toFixed(2)} [${classifyClickbait(clickbaitScore).toUpperCase()}]`);

    phase("reviewing", iteration);
    log.info("[STEP 4/4] EDITOR AGENT");
    const reviewed = await runEditorStep(draft, clickbaitScore, iteration, deps);
    if (!reviewed.ok) return failed("Editor", reviewed.error);
    review = reviewed.value;
    draft = withStatus(draft, review.decision === "approve" ? "approved" : "needs_revision");
    log.info(`  Decision: ${review.decision.toUpperCase()}, score: ${review.overall_score}/10`);
    log.info(`  Strengths: ${review.strengths.join("; ") || "-"}`);
    log.info(`  Weaknesses: ${review.weaknesses.join("; ") || "-"}`);

    if (review.decision === "approve") {
      log.info(`ARTICLE APPROVED after ${iteration} iteration(s): "${draft.title}"`);
      phase("approved", iteration);
      return finish("success");
    }

    if (review.decision === "reject") {
      log.warn(`ARTICLE REJECTED: ${review.weaknesses.join("; ") || "no reasons given"}`);
      if (isLast) {
        phase("rejected", iteration);
        return finish("rejected");
      }
      log.info("  Retrying with the editor's feedback");
      previousFeedback = review;
      continue;
    }

    log.info("[REVISION REQUIRED]");
    review.specific_suggestions.forEach((suggestion, i) => log.info(`  ${i + 1}. ${suggestion}`));
    if (isLast) {
      log.warn("  No iterations left");
    } else {
      log.info(`  Passing feedback to the writer (iteration ${iteration + 1})`);
      previousFeedback = review;
    }
  }

  log.warn(`MAX ITERATIONS (${maxIterations}) REACHED, delivering the last draft`);
  log.warn(`  Last draft: ${draft?.title ?? "none"}, last score: ${review?.overall_score ?? "none"}/10`);
  phase("exhausted", iterations);
  return finish("max_iterations");
}
