import type { JobManager, JobSettings } from "./job_manager.js";
import { classifyFailure } from "./pipeline/errors.js";
import { summarizeResult, unstartedFailureResult, type JobResult } from "./pipeline/job_result.js";
import type { RunJobOptions } from "./pipeline/orchestrator.js";
import type { ProgressReporter } from "./pipeline/progress.js";
import { errorMessage } from "./pipeline/utils.js";

/** The part of the orchestrator the executor drives. */
export interface JobRunner {
  readonly jobs: JobManager;
  runJob(request: string, options?: RunJobOptions): Promise<JobResult>;
}

type QueueItem = {
  jobId: string;
  progress?: ProgressReporter;
};

type Waiter = (result: JobResult) => void;

/**
 * Runs submitted jobs with a cap on how many run at once. Queued jobs start in
 * submission order as running ones finish.
 */
export class JobExecutor {
  private readonly concurrency: number;
  private readonly running = new Map<string, AbortController>();
  private readonly queue: QueueItem[] = [];
  private readonly waiters = new Map<string, Waiter[]>();

  constructor(
    private readonly runner: JobRunner,
    options?: {
      concurrency?: number;
    }
  ) {
    this.concurrency = Math.max(1, Math.floor(options?.concurrency ?? 1));
  }

  get runningCount(): number {
    return this.running.size;
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  isRunning(jobId: string): boolean {
    return this.running.has(jobId);
  }

  isQueued(jobId: string): boolean {
    return this.queue.some((q) => q.jobId === jobId);
  }

  /** Registers a new job and queues it; returns the job id. */
  submit(request: string, settings?: JobSettings, options?: { progress?: ProgressReporter }): string {
    const job = this.runner.jobs.createJob(request, settings);
    this.enqueue(job.jobId, options);
    return job.jobId;
  }

  enqueue(jobId: string, options?: { progress?: ProgressReporter }): boolean {
    const job = this.runner.jobs.getJob(jobId);
    if (!job) return false;
    if (job.status !== "pending") return false;

    // Avoid duplicate queue entries.
    if (this.isQueued(jobId) || this.running.has(jobId)) return true;

    this.queue.push({ jobId, progress: options?.progress });
    this.runner.jobs.log(jobId, `Queued (max concurrency ${this.concurrency})`);
    this.drain();
    return true;
  }

  cancel(jobId: string): boolean {
    const job = this.runner.jobs.getJob(jobId);
    if (!job) return false;

    const ctrl = this.running.get(jobId);
    if (ctrl) {
      this.runner.jobs.log(jobId, "Cancellation requested");
      ctrl.abort();
      return true;
    }

    const idx = this.queue.findIndex((q) => q.jobId === jobId);
    if (idx !== -1) {
      this.queue.splice(idx, 1);
      this.runner.jobs.error(jobId, "Cancelled while queued");
      const result = unstartedFailureResult(jobId, job.request, classifyFailure(undefined, { cancelled: true }));
      this.runner.jobs.finish(jobId, result);
      this.settle(result);
      return true;
    }

    return false;
  }

  /** Resolves once the job has a result; null for unknown or pruned jobs. */
  waitForResult(jobId: string): Promise<JobResult | null> {
    const job = this.runner.jobs.getJob(jobId);
    if (!job) return Promise.resolve(null);
    if (job.result) return Promise.resolve(job.result);
    return new Promise((resolve) => {
      const list = this.waiters.get(jobId) ?? [];
      list.push(resolve);
      this.waiters.set(jobId, list);
    });
  }

  private drain(): void {
    while (this.running.size < this.concurrency) {
      const next = this.queue.shift();
      if (!next) return;
      void this.start(next);
    }
  }

  private settle(result: JobResult): void {
    const list = this.waiters.get(result.jobId) ?? [];
    this.waiters.delete(result.jobId);
    for (const resolve of list) resolve(result);
  }

  private async start(item: QueueItem): Promise<void> {
    const job = this.runner.jobs.getJob(item.jobId);
    if (!job) return;

    const controller = new AbortController();
    this.running.set(item.jobId, controller);

    try {
      const result = await this.runner.runJob(job.request, {
        jobId: job.jobId,
        refinement: job.settings?.refinement,
        signal: controller.signal,
        progress: item.progress
      });
      this.runner.jobs.log(item.jobId, `Job ${summarizeResult(result)}`);
      this.settle(result);
    } catch (err) {
      // runJob resolves on every path; this only guards a misbehaving runner.
      const msg = controller.signal.aborted ? "Cancelled" : errorMessage(err);
      this.runner.jobs.error(item.jobId, msg);
      const failure = classifyFailure(err, { cancelled: controller.signal.aborted });
      const result = unstartedFailureResult(job.jobId, job.request, failure);
      this.runner.jobs.finish(item.jobId, result);
      this.settle(result);
    } finally {
      this.running.delete(item.jobId);
      this.drain();
    }
  }
}
