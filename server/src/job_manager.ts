import { EventEmitter } from "node:events";
import { randomBytes } from "node:crypto";
import type { JobResult, JobStatus } from "./pipeline/job_result.js";
import type { ProgressEvent } from "./pipeline/progress.js";
import type { RefinementSettings } from "./pipeline/refinement.js";
import type { StageName } from "./pipeline/stages.js";
import { nowIso, slug } from "./pipeline/utils.js";

export type JobSettings = {
  refinement?: Partial<RefinementSettings>;
};

export type StageRecord = {
  name: StageName;
  status: "queued" | "running" | "done" | "error";
  attempts: number;
  iteration: number;
  startedAt?: string;
  finishedAt?: string;
  error?: string;
};

export type JobSnapshot = {
  jobId: string;
  request: string;
  settings?: JobSettings;
  status: JobStatus;
  currentStage: StageName | null;
  refinementIteration: number;
  createdAt: string;
  startedAt?: string;
  finishedAt?: string;
  stages: Record<StageName, StageRecord>;
  result?: JobResult;
};

type JobInternal = JobSnapshot & {
  emitter: EventEmitter;
};

export type JobListItem = Pick<JobSnapshot, "jobId" | "request" | "status" | "createdAt" | "finishedAt">;

export type JobRetentionStats = {
  totalJobs: number;
  terminalJobs: number;
  activeJobs: number;
};

export const JOB_EVENT_TYPES = [
  "status",
  "stage_started",
  "stage_finished",
  "progress",
  "log",
  "warning",
  "error",
  "finished"
] as const;

export type JobEventType = (typeof JOB_EVENT_TYPES)[number];

const JOB_ID_SLUG_MAX = 40;
const JOB_ID_SUFFIX_LEN = 8;
const JOB_ID_MAX_ATTEMPTS = 10;
const JOB_ID_SUFFIX_ALPHABET = "abcdefghijklmnopqrstuvwxyz0123456789";

function randomJobSuffix(length: number): string {
  const bytes = randomBytes(length);
  let out = "";
  for (let i = 0; i < bytes.length; i++) {
    out += JOB_ID_SUFFIX_ALPHABET[bytes[i] % JOB_ID_SUFFIX_ALPHABET.length];
  }
  return out;
}

export function isTerminalJobStatus(status: JobStatus): boolean {
  return status === "succeeded" || status === "failed";
}

function stageRecord(name: StageName, iteration: number): StageRecord {
  return { name, status: "queued", attempts: 0, iteration };
}

function freshStages(iteration = 0): Record<StageName, StageRecord> {
  return {
    plan: stageRecord("plan", iteration),
    enrich: stageRecord("enrich", iteration),
    generate: stageRecord("generate", iteration),
    validate: stageRecord("validate", iteration),
    execute: stageRecord("execute", iteration),
    score: stageRecord("score", iteration)
  };
}

/**
 * In-memory job registry. Each job owns an EventEmitter that subscribers attach to;
 * the orchestrator is the only writer.
 */
export class JobManager {
  private jobs = new Map<string, JobInternal>();

  retentionStats(): JobRetentionStats {
    const totalJobs = this.jobs.size;
    const terminalJobs = [...this.jobs.values()].filter((j) => isTerminalJobStatus(j.status)).length;
    return { totalJobs, terminalJobs, activeJobs: totalJobs - terminalJobs };
  }

  listJobs(): JobListItem[] {
    return [...this.jobs.values()]
      .map((j) => ({ jobId: j.jobId, request: j.request, status: j.status, createdAt: j.createdAt, finishedAt: j.finishedAt }))
      .sort((a, b) => (a.createdAt < b.createdAt ? 1 : a.createdAt > b.createdAt ? -1 : 0));
  }

  /** Drops all but the `keepLast` most recent terminal jobs; returns the removed ids. */
  pruneTerminalJobs(keepLast: number): string[] {
    const keep = Math.max(0, Math.floor(keepLast));
    const terminal = [...this.jobs.values()]
      .filter((j) => isTerminalJobStatus(j.status))
      .sort((a, b) => (a.createdAt < b.createdAt ? 1 : a.createdAt > b.createdAt ? -1 : 0));
    const removed = terminal.slice(keep).map((j) => j.jobId);
    for (const id of removed) {
      this.jobs.get(id)?.emitter.removeAllListeners();
      this.jobs.delete(id);
    }
    return removed;
  }

  getJob(jobId: string): JobSnapshot | null {
    const j = this.jobs.get(jobId);
    return j ? this.snapshot(j) : null;
  }

  private nextJobId(request: string): string {
    const requestSlug = slug(request).slice(0, JOB_ID_SLUG_MAX).replace(/^-+|-+$/g, "") || "untitled";
    for (let attempt = 0; attempt < JOB_ID_MAX_ATTEMPTS; attempt++) {
      const jobId = `${requestSlug}-${randomJobSuffix(JOB_ID_SUFFIX_LEN)}`;
      if (!this.jobs.has(jobId)) return jobId;
    }
    throw new Error("Unable to allocate unique jobId after retries");
  }

  createJob(request: string, settings?: JobSettings): JobSnapshot {
    const jobId = this.nextJobId(request);
    const emitter = new EventEmitter();
    // "error" events with no listener would throw; job errors are an optional stream.
    emitter.on("error", () => undefined);

    const job: JobInternal = {
      jobId,
      request,
      settings,
      status: "pending",
      currentStage: null,
      refinementIteration: 0,
      createdAt: nowIso(),
      stages: freshStages(),
      emitter
    };
    this.jobs.set(jobId, job);
    return this.snapshot(job);
  }

  setStatus(jobId: string, status: JobStatus): void {
    const j = this.jobs.get(jobId);
    if (!j) return;
    j.status = status;
    if (status === "running" && !j.startedAt) j.startedAt = nowIso();
    j.emitter.emit("status", { status, at: nowIso() });
  }

  beginIteration(jobId: string, iteration: number): void {
    const j = this.jobs.get(jobId);
    if (!j) return;
    j.refinementIteration = iteration;
    if (iteration > 0) j.stages = freshStages(iteration);
  }

  startStage(jobId: string, stage: StageName, attempt: number): void {
    const j = this.jobs.get(jobId);
    if (!j) return;
    const s = j.stages[stage];
    s.status = "running";
    s.attempts = attempt;
    s.iteration = j.refinementIteration;
    s.startedAt = nowIso();
    delete s.finishedAt;
    j.currentStage = stage;
    j.emitter.emit("stage_started", { stage, attempt, iteration: j.refinementIteration, at: s.startedAt });
  }

  finishStage(jobId: string, stage: StageName, ok: boolean, seconds: number, error?: string): void {
    const j = this.jobs.get(jobId);
    if (!j) return;
    const s = j.stages[stage];
    s.status = ok ? "done" : "error";
    s.finishedAt = nowIso();
    if (ok) delete s.error;
    else if (error) s.error = error;
    j.emitter.emit("stage_finished", { stage, ok, seconds, iteration: j.refinementIteration, at: s.finishedAt });
  }

  progress(jobId: string, event: ProgressEvent): void {
    const j = this.jobs.get(jobId);
    if (!j) return;
    j.emitter.emit("progress", { ...event, iteration: j.refinementIteration, at: nowIso() });
  }

  log(jobId: string, message: string, stage?: StageName): void {
    const j = this.jobs.get(jobId);
    if (!j) return;
    j.emitter.emit("log", { message, stage, at: nowIso() });
  }

  warn(jobId: string, message: string, stage?: StageName): void {
    const j = this.jobs.get(jobId);
    if (!j) return;
    j.emitter.emit("warning", { message, stage, at: nowIso() });
  }

  error(jobId: string, message: string, stage?: StageName): void {
    const j = this.jobs.get(jobId);
    if (!j) return;
    j.emitter.emit("error", { message, stage, at: nowIso() });
  }

  finish(jobId: string, result: JobResult): void {
    const j = this.jobs.get(jobId);
    if (!j) return;
    j.result = result;
    j.status = result.status;
    j.currentStage = null;
    j.finishedAt = nowIso();
    j.emitter.emit("status", { status: result.status, at: j.finishedAt });
    j.emitter.emit("finished", { result, at: j.finishedAt });
  }

  subscribe(jobId: string, onEvent: (type: JobEventType, payload: unknown) => void): (() => void) | null {
    const j = this.jobs.get(jobId);
    if (!j) return null;

    const handlers = JOB_EVENT_TYPES.map((type) => {
      const handler = (payload: unknown) => {
        try {
          onEvent(type, payload);
        } catch (err) {
          // A failing subscriber must not break the job that emitted the event.
          console.warn(`job ${jobId}: ${type} subscriber threw: ${err instanceof Error ? err.message : String(err)}`);
        }
      };
      j.emitter.on(type, handler);
      return { type, handler };
    });

    return () => {
      for (const { type, handler } of handlers) j.emitter.off(type, handler);
    };
  }

  private snapshot(job: JobInternal): JobSnapshot {
    const { emitter: _emitter, ...pub } = job;
    return { ...pub, stages: structuredClone(pub.stages) };
  }
}
