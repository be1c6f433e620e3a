import type { ClassifiedFailure, FailureKind } from "./errors.js";
import type { Artifact, ExecutionRecord, Plan, QualityMetrics, EnrichedPlan } from "./schemas.js";
import type { StageName } from "./stages.js";
import { roundTo } from "./utils.js";

export type JobStatus = "pending" | "running" | "refining" | "succeeded" | "failed";

export type JobOutcome = "accepted" | "refinement_disabled" | "exhausted_fallback" | "failed" | "cancelled";

export type JobError = {
  kind: FailureKind;
  stage: StageName | null;
  iteration: number;
  message: string;
  retryable: boolean;
  suggestedAction?: string;
  diagnostics?: string;
};

export type BestAttempt = {
  iteration: number;
  plan: Plan;
  enrichedPlan: EnrichedPlan;
  artifact: Artifact;
  execution: ExecutionRecord;
  quality: QualityMetrics;
};

export type AttemptSummary =
  | { iteration: number; outcome: "scored"; score: number; issues: string[] }
  | { iteration: number; outcome: "failed"; stage: StageName; kind: FailureKind };

export type JobResult = {
  jobId: string;
  request: string;
  success: boolean;
  status: Extract<JobStatus, "succeeded" | "failed">;
  outcome: JobOutcome;
  best: BestAttempt | null;
  quality: QualityMetrics | null;
  /** Version of the checker that produced `quality`; null when nothing was scored. */
  qualityCheckerVersion: string | null;
  refinementIterations: number;
  /** Seconds per stage; refinement iterations use `refine_<n>.<stage>` keys. */
  stageTimings: Record<string, number>;
  totalSeconds: number;
  attempts: AttemptSummary[];
  warnings: string[];
  errors: JobError[];
};

export function toJobError(failure: ClassifiedFailure, stage: StageName | null, iteration: number): JobError {
  const out: JobError = {
    kind: failure.kind,
    stage,
    iteration,
    message: failure.message,
    retryable: failure.retryable
  };
  if (failure.suggestedAction) out.suggestedAction = failure.suggestedAction;
  if (failure.diagnostics) out.diagnostics = failure.diagnostics;
  return out;
}

/** Accumulates elapsed seconds per key; repeated attempts add to the same key. */
export class StageTimer {
  private readonly timings = new Map<string, number>();

  add(key: string, seconds: number): void {
    this.timings.set(key, (this.timings.get(key) ?? 0) + Math.max(0, seconds));
  }

  toRecord(): Record<string, number> {
    const out: Record<string, number> = {};
    for (const [k, v] of this.timings) out[k] = roundTo(v, 3);
    return out;
  }
}

export function summarizeResult(result: JobResult): string {
  if (!result.success) {
    const err = result.errors[result.errors.length - 1];
    return err ? `failed: ${err.kind} at ${err.stage ?? "start"}: ${err.message}` : "failed";
  }
  const score = result.quality ? result.quality.score.toFixed(2) : "n/a";
  return `${result.outcome}: score ${score} after ${result.refinementIterations} refinement iteration(s)`;
}

/** Result for a job that ended before any stage ran. */
export function unstartedFailureResult(jobId: string, request: string, failure: ClassifiedFailure): JobResult {
  return {
    jobId,
    request,
    success: false,
    status: "failed",
    outcome: failure.kind === "Cancelled" ? "cancelled" : "failed",
    best: null,
    quality: null,
    qualityCheckerVersion: null,
    refinementIterations: 0,
    stageTimings: {},
    totalSeconds: 0,
    attempts: [],
    warnings: [],
    errors: [toJobError(failure, null, 0)]
  };
}
