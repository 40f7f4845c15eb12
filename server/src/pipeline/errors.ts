import { toErrorMessage } from "./utils.js";

export type NewsroomErrorKind =
  | "malformed_output"
  | "validation"
  | "prompt_lookup"
  | "prompt_template"
  | "prompt_config"
  | "invalid_input"
  | "unexpected";

export class NewsroomError extends Error {
  readonly kind: NewsroomErrorKind;
  constructor(kind: NewsroomErrorKind, message: string) {
    super(message);
    this.name = "NewsroomError";
    this.kind = kind;
  }
}

/** Model text that is not a JSON object once code fences are stripped. */
export class MalformedOutputError extends NewsroomError {
  readonly rawExcerpt: string;
  constructor(message: string, rawExcerpt: string) {
    super("malformed_output", message);
    this.name = "MalformedOutputError";
    this.rawExcerpt = rawExcerpt;
  }
}

/** Parsed data violating an entity's field constraints. `field` is a dotted path. */
export class ValidationError extends NewsroomError {
  readonly entity: string;
  readonly field: string;
  constructor(entity: string, field: string, message: string) {
    super("validation", `${entity}.${field}: ${message}`);
    this.name = "ValidationError";
    this.entity = entity;
    this.field = field;
  }
}

export class PromptLookupError extends NewsroomError {
  readonly agent: string;
  readonly knownAgents: string[];
  constructor(agent: string, knownAgents: string[]) {
    super("prompt_lookup", `Unknown agent: ${agent}. Known agents: ${knownAgents.join(", ")}`);
    this.name = "PromptLookupError";
    this.agent = agent;
    this.knownAgents = knownAgents;
  }
}

export class PromptTemplateError extends NewsroomError {
  readonly placeholder: string;
  constructor(placeholder: string) {
    super("prompt_template", `Prompt template placeholder has no value: {${placeholder}}`);
    this.name = "PromptTemplateError";
    this.placeholder = placeholder;
  }
}

export class PromptConfigError extends NewsroomError {
  constructor(message: string) {
    super("prompt_config", message);
    this.name = "PromptConfigError";
  }
}

export class InvalidInputError extends NewsroomError {
  constructor(message: string) {
    super("invalid_input", message);
    this.name = "InvalidInputError";
  }
}

export type StepResult<T> = { ok: true; value: T } | { ok: false; error: NewsroomError };

export function ok<T>(value: T): StepResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: NewsroomError): StepResult<T> {
  return { ok: false, error };
}

export function asNewsroomError(err: unknown): NewsroomError {
  if (err instanceof NewsroomError) return err;
  return new NewsroomError("unexpected", toErrorMessage(err));
}
