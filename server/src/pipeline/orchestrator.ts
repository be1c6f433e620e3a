import type { PipelineConfig } from "../config.js";
import { JobManager } from "../job_manager.js";
import { createGenerateStage, type SceneTemplate } from "./artifact.js";
import { createEnrichStage } from "./enrich.js";
import {
  attemptBudget,
  classifyFailure,
  isRetryable,
  QUALITY_BELOW_THRESHOLD,
  type ClassifiedFailure
} from "./errors.js";
import { createExecuteStage, type ExecutionEnvironment } from "./execution.js";
import type { GenerativeService } from "./generative.js";
import { StageTimer, toJobError, type AttemptSummary, type BestAttempt, type JobOutcome, type JobResult } from "./job_result.js";
import { ExecutionLimiter } from "./limiter.js";
import type { MaterialResolver } from "./materials.js";
import { createPlanStage, type PlanningInput } from "./planner.js";
import { fanOutProgress, NOOP_PROGRESS, type ProgressReporter } from "./progress.js";
import { createScoreStage, type QualityChecker, type ScoringInput } from "./quality.js";
import {
  buildFeedback,
  isBetterAttempt,
  meetsThreshold,
  nextRefinementState,
  refinementReason,
  type RefinementSettings,
  type RefinementState
} from "./refinement.js";
import { backoffDelayMs, sleep as defaultSleep, type SleepFn } from "./retry.js";
import type { Artifact, EnrichedPlan, ExecutionRecord, Plan, QualityMetrics, ValidationOutcome } from "./schemas.js";
import { STAGE_CHECKPOINTS, STAGE_LABELS, timeStage, timingKey, type Stage, type StageContext, type StageName } from "./stages.js";
import { roundTo } from "./utils.js";
import { createValidateStage } from "./validate.js";

export type PipelineServices = {
  generative: GenerativeService;
  execution: ExecutionEnvironment;
  resolver: MaterialResolver;
  template: SceneTemplate;
  quality: QualityChecker;
};

export type OrchestratorDeps = {
  config: PipelineConfig;
  services: PipelineServices;
  jobs?: JobManager;
  /** Shared across orchestrators that run jobs side by side. */
  limiter?: ExecutionLimiter;
  sleep?: SleepFn;
  random?: () => number;
  /** Milliseconds; only differences are used. */
  clock?: () => number;
};

export type RunJobOptions = {
  refinement?: Partial<RefinementSettings>;
  signal?: AbortSignal;
  progress?: ProgressReporter;
  /** Reuse a pending job already registered with the JobManager; any other id gets a new job. */
  jobId?: string;
};

type PipelineStages = {
  plan: Stage<PlanningInput, Plan>;
  enrich: Stage<Plan, EnrichedPlan>;
  generate: Stage<EnrichedPlan, Artifact>;
  validate: Stage<Artifact, ValidationOutcome>;
  execute: Stage<ValidationOutcome, ExecutionRecord>;
  score: Stage<ScoringInput, QualityMetrics>;
};

type StageResult<O> = { ok: true; value: O } | { ok: false; stage: StageName; failure: ClassifiedFailure };

type AttemptResult = { ok: true; attempt: BestAttempt } | { ok: false; stage: StageName; failure: ClassifiedFailure };

/** Mutable bookkeeping for one job while it runs. */
type JobRun = {
  jobId: string;
  request: string;
  signal: AbortSignal;
  progress: ProgressReporter;
  timer: StageTimer;
  attempts: AttemptSummary[];
  warnings: string[];
  errors: JobResult["errors"];
  startedAt: number;
  iteration: number;
};

export function normalizeRefinementSettings(
  defaults: RefinementSettings,
  override?: Partial<RefinementSettings>
): RefinementSettings {
  const merged = { ...defaults, ...override };
  const maxIterations = Number.isFinite(merged.maxIterations) ? Math.max(0, Math.floor(merged.maxIterations)) : 0;
  return { enabled: Boolean(merged.enabled), maxIterations };
}

function belowThresholdWarning(quality: QualityMetrics, threshold: number): string {
  return `${QUALITY_BELOW_THRESHOLD}: best score ${quality.score.toFixed(2)} is below the required ${threshold.toFixed(2)}`;
}

/**
 * Drives one request through plan → enrich → generate → validate → execute → score,
 * retrying failed stages with backoff and refining the plan while the score stays under
 * the threshold. `runJob` always resolves with a JobResult.
 */
export class PipelineOrchestrator {
  readonly config: PipelineConfig;
  readonly jobs: JobManager;
  readonly limiter: ExecutionLimiter;
  private readonly stages: PipelineStages;
  private readonly sleep: SleepFn;
  private readonly random: () => number;
  private readonly clock: () => number;
  private readonly qualityCheckerVersion: string;

  constructor(deps: OrchestratorDeps) {
    this.config = deps.config;
    this.jobs = deps.jobs ?? new JobManager();
    this.limiter = deps.limiter ?? new ExecutionLimiter(deps.config.maxConcurrentExecutions);
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
    this.clock = deps.clock ?? (() => performance.now());

    const { services, config } = deps;
    this.qualityCheckerVersion = services.quality.version;
    this.stages = {
      plan: createPlanStage(services.generative, config.generativeTimeoutMs),
      enrich: createEnrichStage(services.resolver),
      generate: createGenerateStage(services.template, config.outputDir),
      validate: createValidateStage(),
      execute: createExecuteStage(services.execution, this.limiter, config.executionTimeoutSeconds),
      score: createScoreStage(services.quality)
    };
  }

  async runJob(request: string, options: RunJobOptions = {}): Promise<JobResult> {
    const settings = normalizeRefinementSettings(this.config.refinement, options.refinement);
    const existing = options.jobId ? this.jobs.getJob(options.jobId) : null;
    const jobId =
      existing?.status === "pending" ? existing.jobId : this.jobs.createJob(request, { refinement: settings }).jobId;

    const run: JobRun = {
      jobId,
      request,
      signal: options.signal ?? new AbortController().signal,
      progress: fanOutProgress(
        [options.progress ?? NOOP_PROGRESS, { report: (event) => this.jobs.progress(jobId, event) }],
        (err) => this.jobs.warn(jobId, `Progress listener failed: ${err instanceof Error ? err.message : String(err)}`)
      ),
      timer: new StageTimer(),
      attempts: [],
      warnings: [],
      errors: [],
      startedAt: this.clock(),
      iteration: 0
    };

    try {
      return await this.drive(run, settings);
    } catch (err) {
      // Stages report through StageResult; reaching here means a bug in the loop itself.
      const failure = classifyFailure(err, { cancelled: run.signal.aborted });
      run.errors.push(toJobError(failure, null, run.iteration));
      return this.finalize(run, { outcome: failure.kind === "Cancelled" ? "cancelled" : "failed", best: null });
    }
  }

  private async drive(run: JobRun, settings: RefinementSettings): Promise<JobResult> {
    const threshold = this.config.qualityThreshold;
    let best: BestAttempt | null = null;
    let latest: BestAttempt | null = null;
    let refinementScored = false;
    let planning: PlanningInput = { purpose: "plan", request: run.request };
    let state: RefinementState = "attempting";

    this.jobs.setStatus(run.jobId, "running");

    for (;;) {
      this.jobs.beginIteration(run.jobId, run.iteration);
      if (run.iteration > 0) this.jobs.setStatus(run.jobId, "refining");

      if (run.signal.aborted) {
        const failure = classifyFailure(undefined, { cancelled: true });
        run.errors.push(toJobError(failure, null, run.iteration));
        return this.finalize(run, { outcome: "cancelled", best });
      }

      const result = await this.runAttempt(run, planning);

      if (!result.ok) {
        const { stage, failure } = result;
        run.attempts.push({ iteration: run.iteration, outcome: "failed", stage, kind: failure.kind });
        run.errors.push(toJobError(failure, stage, run.iteration));
        this.jobs.error(run.jobId, `${failure.kind} in ${stage}: ${failure.message}`, stage);

        if (failure.kind === "Cancelled") return this.finalize(run, { outcome: "cancelled", best });
        if (run.iteration === 0 || !latest) return this.finalize(run, { outcome: "failed", best: null });

        if (run.iteration >= settings.maxIterations) {
          if (best && refinementScored) {
            this.warn(run, belowThresholdWarning(best.quality, threshold));
            return this.finalize(run, { outcome: "exhausted_fallback", best });
          }
          const scores = run.attempts
            .flatMap((a) => (a.outcome === "scored" ? [`iteration ${a.iteration}: ${a.score.toFixed(2)}`] : []))
            .join(", ");
          this.warn(run, `No refinement iteration reached scoring; scored attempts: ${scores}`);
          return this.finalize(run, { outcome: "failed", best });
        }

        planning = { purpose: "refine", request: run.request, currentPlan: latest.plan, feedback: buildFeedback(latest.quality, threshold) };
        run.iteration += 1;
        continue;
      }

      const attempt = result.attempt;
      const scoredEvent = { quality: attempt.quality, threshold, settings, iterationsUsed: run.iteration };
      state = nextRefinementState(state, scoredEvent);
      latest = attempt;
      if (run.iteration > 0) refinementScored = true;
      run.attempts.push({
        iteration: run.iteration,
        outcome: "scored",
        score: attempt.quality.score,
        issues: [...attempt.quality.issues]
      });
      if (isBetterAttempt({ iteration: attempt.iteration, quality: attempt.quality }, best)) best = attempt;
      const chosen = best ?? attempt;

      state = nextRefinementState(state, scoredEvent);
      this.jobs.log(run.jobId, `Iteration ${run.iteration} scored ${attempt.quality.score.toFixed(2)} (threshold ${threshold.toFixed(2)}): ${state}`, "score");

      if (state === "accepted") {
        if (meetsThreshold(attempt.quality, threshold)) return this.finalize(run, { outcome: "accepted", best: chosen });
        this.warn(run, belowThresholdWarning(chosen.quality, threshold));
        return this.finalize(run, { outcome: "refinement_disabled", best: chosen });
      }
      if (state === "exhausted_fallback") {
        this.warn(run, belowThresholdWarning(chosen.quality, threshold));
        return this.finalize(run, { outcome: "exhausted_fallback", best: chosen });
      }

      this.jobs.log(run.jobId, `Refining plan: ${refinementReason(attempt.quality)}`);
      planning = {
        purpose: "refine",
        request: run.request,
        currentPlan: attempt.plan,
        feedback: buildFeedback(attempt.quality, threshold)
      };
      run.iteration += 1;
      state = nextRefinementState(state, scoredEvent);
    }
  }

  private async runAttempt(run: JobRun, planning: PlanningInput): Promise<AttemptResult> {
    const plan = await this.runStage(run, "plan", this.stages.plan, planning);
    if (!plan.ok) return plan;
    const enriched = await this.runStage(run, "enrich", this.stages.enrich, plan.value);
    if (!enriched.ok) return enriched;
    const artifact = await this.runStage(run, "generate", this.stages.generate, enriched.value);
    if (!artifact.ok) return artifact;
    const validated = await this.runStage(run, "validate", this.stages.validate, artifact.value);
    if (!validated.ok) return validated;
    const execution = await this.runStage(run, "execute", this.stages.execute, validated.value);
    if (!execution.ok) return execution;
    const quality = await this.runStage(run, "score", this.stages.score, {
      plan: enriched.value,
      execution: execution.value
    });
    if (!quality.ok) return quality;

    return {
      ok: true,
      attempt: {
        iteration: run.iteration,
        plan: plan.value,
        enrichedPlan: enriched.value,
        artifact: validated.value.artifact,
        execution: execution.value,
        quality: quality.value
      }
    };
  }

  private async runStage<I, O>(run: JobRun, stage: StageName, fn: Stage<I, O>, input: I): Promise<StageResult<O>> {
    const key = timingKey(stage, run.iteration);
    const suffix = run.iteration > 0 ? ` (refinement ${run.iteration})` : "";

    for (let attempt = 1; ; attempt++) {
      if (run.signal.aborted) {
        return { ok: false, stage, failure: classifyFailure(undefined, { stage, cancelled: true }) };
      }

      if (attempt === 1) {
        run.progress.report({ stage, fraction: STAGE_CHECKPOINTS[stage], message: `${STAGE_LABELS[stage]}${suffix}` });
      }
      this.jobs.startStage(run.jobId, stage, attempt);

      const ctx: StageContext = {
        jobId: run.jobId,
        attempt,
        iteration: run.iteration,
        signal: run.signal,
        warn: (message) => this.warn(run, message, stage),
        log: (message) => this.jobs.log(run.jobId, message, stage)
      };
      const outcome = await timeStage(fn, input, ctx, this.clock);
      run.timer.add(key, outcome.seconds);

      if (outcome.ok) {
        this.jobs.finishStage(run.jobId, stage, true, outcome.seconds);
        return { ok: true, value: outcome.value };
      }

      const failure = classifyFailure(outcome.error, { stage, cancelled: run.signal.aborted });
      this.jobs.finishStage(run.jobId, stage, false, outcome.seconds, failure.message);

      const budget = attemptBudget(failure, this.config.stageMaxAttempts);
      if (!isRetryable(failure) || attempt >= budget) return { ok: false, stage, failure };

      const delayMs = backoffDelayMs(attempt, this.config.backoff, this.random);
      this.jobs.log(
        run.jobId,
        `${stage} attempt ${attempt}/${budget} failed (${failure.kind}): ${failure.message}; retrying in ${delayMs}ms`,
        stage
      );
      try {
        await this.sleep(delayMs, run.signal);
      } catch (err) {
        return { ok: false, stage, failure: classifyFailure(err, { stage, cancelled: true }) };
      }
    }
  }

  private warn(run: JobRun, message: string, stage?: StageName): void {
    run.warnings.push(message);
    this.jobs.warn(run.jobId, message, stage);
  }

  private finalize(run: JobRun, final: { outcome: JobOutcome; best: BestAttempt | null }): JobResult {
    const success = final.outcome === "accepted" || final.outcome === "refinement_disabled" || final.outcome === "exhausted_fallback";
    const result: JobResult = {
      jobId: run.jobId,
      request: run.request,
      success,
      status: success ? "succeeded" : "failed",
      outcome: final.outcome,
      best: final.best,
      quality: final.best?.quality ?? null,
      qualityCheckerVersion: final.best ? this.qualityCheckerVersion : null,
      refinementIterations: run.iteration,
      stageTimings: run.timer.toRecord(),
      totalSeconds: roundTo((this.clock() - run.startedAt) / 1000, 3),
      attempts: run.attempts,
      warnings: run.warnings,
      errors: run.errors
    };
    if (success) run.progress.report({ stage: "complete", fraction: 1, message: "Simulation complete" });
    this.jobs.finish(run.jobId, result);
    return result;
  }
}
