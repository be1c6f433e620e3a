import { MaxTurnsExceededError, ModelBehaviorError } from "@openai/agents";
import { ZodError } from "zod";
import type { StageName } from "./stages.js";
import { errorMessage } from "./utils.js";

export const FAILURE_KINDS = [
  "PlanningFailure",
  "EnrichmentFailure",
  "ValidationFailure",
  "ExecutionFailure",
  "Timeout",
  "Cancelled",
  "Unknown"
] as const;

export type FailureKind = (typeof FAILURE_KINDS)[number];

/** Warning tag for attempts that finished below the quality threshold. Never an error. */
export const QUALITY_BELOW_THRESHOLD = "QualityBelowThreshold";

export type StageFailureOptions = {
  /** Overrides the default disposition of the kind. */
  retryable?: boolean;
  diagnostics?: string;
  autoFixAttempted?: boolean;
  cause?: unknown;
};

export class StageFailure extends Error {
  readonly kind: FailureKind;
  readonly retryable?: boolean;
  readonly diagnostics?: string;
  readonly autoFixAttempted: boolean;

  constructor(kind: FailureKind, message: string, options?: StageFailureOptions) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "StageFailure";
    this.kind = kind;
    this.retryable = options?.retryable;
    this.diagnostics = options?.diagnostics;
    this.autoFixAttempted = options?.autoFixAttempted ?? false;
  }
}

export type ClassifiedFailure = {
  kind: FailureKind;
  message: string;
  retryable: boolean;
  suggestedAction?: string;
  diagnostics?: string;
  /** Per-kind attempt cap applied on top of the configured stage budget. */
  maxAttempts?: number;
};

type Disposition = {
  retryable: boolean;
  suggestedAction: string;
  maxAttempts?: number;
};

const DISPOSITIONS: Record<FailureKind, Disposition> = {
  PlanningFailure: {
    retryable: true,
    suggestedAction: "Rephrase the simulation request with more specific details"
  },
  EnrichmentFailure: {
    retryable: false,
    suggestedAction: "Check the materials database; every material should resolve to at least the default"
  },
  ValidationFailure: {
    retryable: true,
    maxAttempts: 2,
    suggestedAction: "Simplify the request; the generated scene script failed structural or safety checks"
  },
  ExecutionFailure: {
    retryable: true,
    suggestedAction: "Check the Blender installation and reduce simulation complexity"
  },
  Timeout: {
    retryable: true,
    suggestedAction: "Reduce simulation complexity or raise the stage timeout"
  },
  Cancelled: {
    retryable: false,
    suggestedAction: "Resubmit the request if the cancellation was unintended"
  },
  Unknown: {
    retryable: false,
    suggestedAction: "Check the job log and report the failure"
  }
};

const TIMEOUT_PATTERNS = /timeout|timed?\s*out|ETIMEDOUT|deadline exceeded/i;

function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}

function build(kind: FailureKind, message: string, extra?: { retryable?: boolean; diagnostics?: string }): ClassifiedFailure {
  const d = DISPOSITIONS[kind];
  const out: ClassifiedFailure = {
    kind,
    message,
    retryable: extra?.retryable ?? d.retryable,
    suggestedAction: d.suggestedAction
  };
  if (d.maxAttempts !== undefined) out.maxAttempts = d.maxAttempts;
  if (extra?.diagnostics) out.diagnostics = extra.diagnostics;
  return out;
}

function zodSummary(err: ZodError): string {
  return err.issues
    .slice(0, 8)
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Maps anything a stage can throw onto exactly one failure kind.
 *
 * Order: cancellation → explicit StageFailure → abort/timeout → agent schema errors →
 * zod errors → stage context → Unknown.
 */
export function classifyFailure(err: unknown, context?: { stage?: StageName; cancelled?: boolean }): ClassifiedFailure {
  const stage = context?.stage;

  if (context?.cancelled) {
    return build("Cancelled", err instanceof StageFailure && err.kind === "Cancelled" ? err.message : "Job cancelled");
  }

  if (err instanceof StageFailure) {
    if (err.kind === "ValidationFailure" && err.autoFixAttempted) {
      return build(err.kind, err.message, { retryable: false, diagnostics: err.diagnostics });
    }
    return build(err.kind, err.message, { retryable: err.retryable, diagnostics: err.diagnostics });
  }

  const message = errorMessage(err);

  if (isAbortError(err) || (err instanceof Error && TIMEOUT_PATTERNS.test(message))) {
    return build("Timeout", stage ? `${stage} timed out: ${message}` : message);
  }

  if (err instanceof ModelBehaviorError || err instanceof MaxTurnsExceededError) {
    return build("PlanningFailure", `Generative service returned unusable output: ${message}`);
  }

  if (err instanceof ZodError) {
    if (stage === "plan") return build("PlanningFailure", `Plan failed schema validation: ${zodSummary(err)}`);
    return build("Unknown", `Schema validation failed${stage ? ` during ${stage}` : ""}: ${zodSummary(err)}`);
  }

  if (stage === "plan") return build("PlanningFailure", message);
  if (stage === "execute") return build("ExecutionFailure", message);

  return build("Unknown", message || "Unknown failure");
}

export function isRetryable(failure: ClassifiedFailure): boolean {
  return failure.retryable && failure.kind !== "Cancelled";
}

/** Attempts allowed for a stage failing with this classification. */
export function attemptBudget(failure: ClassifiedFailure, stageMaxAttempts: number): number {
  const cap = failure.maxAttempts ?? stageMaxAttempts;
  return Math.max(1, Math.min(stageMaxAttempts, cap));
}
