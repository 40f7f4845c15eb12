import { z } from "zod";
import { ValidationError, fail, ok, type StepResult } from "./errors.js";
import { nowIso } from "./utils.js";

export const ARTICLE_STATUSES = ["draft", "in_review", "needs_revision", "approved", "published"] as const;
export const REVIEW_DECISIONS = ["approve", "revise", "reject"] as const;
export const CYCLE_STATUSES = ["success", "max_iterations", "rejected", "error"] as const;

export const ArticleStatusSchema = z.enum(ARTICLE_STATUSES);
export const ReviewDecisionSchema = z.enum(REVIEW_DECISIONS);

// Models emit `null` for absent optional text; normalise it away.
const OptionalTextSchema = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

const TimestampSchema = z.string().default(() => nowIso());

export const SourceInfoSchema = z.object({
  title: z.string(),
  url: OptionalTextSchema,
  summary: z.string(),
  relevance_score: z.number().min(0).max(1)
});

export const ResearcherOutputSchema = z.object({
  topic: z.string(),
  sources: z.array(SourceInfoSchema).default([]),
  key_facts: z.array(z.string()).default([]),
  suggested_angle: z.string()
});

export const ResearchNotesSchema = ResearcherOutputSchema.extend({
  created_at: TimestampSchema
});

export const WriterOutputSchema = z.object({
  title: z.string().min(5).max(200),
  lead: z.string().min(20).max(500),
  body: z.string().min(100),
  tags: z.array(z.string()).default([]),
  word_count: z.number().int().min(0)
});

export const ArticleDraftSchema = WriterOutputSchema.extend({
  status: ArticleStatusSchema.default("draft"),
  version: z.number().int().min(1).default(1),
  created_at: TimestampSchema,
  updated_at: TimestampSchema
});

export const EditorOutputSchema = z.object({
  decision: ReviewDecisionSchema,
  overall_score: z.number().min(0).max(10),
  strengths: z.array(z.string()).default([]),
  weaknesses: z.array(z.string()).default([]),
  specific_suggestions: z.array(z.string()).default([]),
  fact_check_notes: OptionalTextSchema
});

export const ReviewFeedbackSchema = EditorOutputSchema.extend({
  originating_iteration: z.number().int().min(1),
  reviewed_at: TimestampSchema
});

export type ArticleStatus = z.infer<typeof ArticleStatusSchema>;
export type ReviewDecision = z.infer<typeof ReviewDecisionSchema>;
export type CycleStatus = (typeof CYCLE_STATUSES)[number];

export type SourceInfo = z.infer<typeof SourceInfoSchema>;
export type ResearcherOutput = z.infer<typeof ResearcherOutputSchema>;
export type ResearchNotes = z.infer<typeof ResearchNotesSchema>;
export type WriterOutput = z.infer<typeof WriterOutputSchema>;
export type ArticleDraft = z.infer<typeof ArticleDraftSchema>;
export type EditorOutput = z.infer<typeof EditorOutputSchema>;
export type ReviewFeedback = z.infer<typeof ReviewFeedbackSchema>;

export type CycleResult = {
  cycle_id: string;
  status: CycleStatus;
  topic: string;
  max_iterations: number;
  iterations: number;
  final_draft?: ArticleDraft;
  final_review?: ReviewFeedback;
  research_notes?: ResearchNotes;
  clickbait_score?: number;
  error_message?: string;
  error_kind?: string;
  started_at: string;
  finished_at: string;
};

/**
 * Validates `data` against `schema`. The first failing issue is reported as a
 * ValidationError whose field is the dotted path of the offending value.
 */
export function validateEntity<S extends z.ZodTypeAny>(schema: S, entity: string, data: unknown): StepResult<z.output<S>> {
  const parsed = schema.safeParse(data);
  if (parsed.success) return ok(parsed.data);

  const issue = parsed.error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return fail(new ValidationError(entity, field, issue?.message ?? "invalid value"));
}

export function parseSourceInfo(data: unknown): StepResult<SourceInfo> {
  return validateEntity(SourceInfoSchema, "SourceInfo", data);
}

export function parseResearchNotes(data: unknown): StepResult<ResearchNotes> {
  return validateEntity(ResearchNotesSchema, "ResearchNotes", data);
}

export function parseArticleDraft(data: unknown): StepResult<ArticleDraft> {
  return validateEntity(ArticleDraftSchema, "ArticleDraft", data);
}

export function parseReviewFeedback(data: unknown): StepResult<ReviewFeedback> {
  return validateEntity(ReviewFeedbackSchema, "ReviewFeedback", data);
}
