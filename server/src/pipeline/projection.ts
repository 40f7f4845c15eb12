import type { ArticleStatus, CycleResult, CycleStatus, ReviewDecision } from "./schemas.js";

export const BODY_PREVIEW_CHARS = 500;

export type ArticleSummary = {
  title: string;
  lead: string;
  body: string;
  tags: string[];
  word_count: number;
  version: number;
  status: ArticleStatus;
};

export type ReviewSummary = {
  decision: ReviewDecision;
  score: number;
  strengths: string[];
  weaknesses: string[];
  suggestions: string[];
  fact_check_notes?: string;
};

export type CycleSummary = {
  cycle_id: string;
  status: CycleStatus;
  topic: string;
  iterations: number;
  max_iterations: number;
  started_at: string;
  finished_at: string;
  article?: ArticleSummary;
  review?: ReviewSummary;
  clickbait_score?: number;
  error?: string;
};

export type NoResult = { status: "no_result"; message: string };

export const NO_RESULT: NoResult = {
  status: "no_result",
  message: "No cycle has finished yet. Start one with POST /start-cycle."
};

export function truncateBody(body: string, max = BODY_PREVIEW_CHARS): string {
  const chars = [...body];
  return chars.length > max ? `${chars.slice(0, max).join("")}...` : body;
}

export function projectCycleResult(result: CycleResult, options: { fullBody: boolean }): CycleSummary {
  const summary: CycleSummary = {
    cycle_id: result.cycle_id,
    status: result.status,
    topic: result.topic,
    iterations: result.iterations,
    max_iterations: result.max_iterations,
    started_at: result.started_at,
    finished_at: result.finished_at
  };

  const draft = result.final_draft;
  if (draft) {
    summary.article = {
      title: draft.title,
      lead: draft.lead,
      body: options.fullBody ? draft.body : truncateBody(draft.body),
      tags: draft.tags,
      word_count: draft.word_count,
      version: draft.version,
      status: draft.status
    };
  }

  const review = result.final_review;
  if (review) {
    summary.review = {
      decision: review.decision,
      score: review.overall_score,
      strengths: review.strengths,
      weaknesses: review.weaknesses,
      suggestions: review.specific_suggestions,
      fact_check_notes: review.fact_check_notes
    };
  }

  if (result.clickbait_score !== undefined) summary.clickbait_score = result.clickbait_score;
  if (result.error_message !== undefined) summary.error = result.error_message;
  return summary;
}
