import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import { createPipelineConfig, type PipelineConfigOverrides } from "../src/config.js";
import { loadSceneTemplate, type SceneTemplate } from "../src/pipeline/artifact.js";
import { QUALITY_BELOW_THRESHOLD, StageFailure } from "../src/pipeline/errors.js";
import type { ExecutionEnvironment } from "../src/pipeline/execution.js";
import { FakeExecutionEnvironment, FakeGenerativeService } from "../src/pipeline/fake_services.js";
import type { GenerativeService } from "../src/pipeline/generative.js";
import { ExecutionLimiter } from "../src/pipeline/limiter.js";
import type { MaterialResolver } from "../src/pipeline/materials.js";
import { normalizeRefinementSettings, PipelineOrchestrator, type PipelineServices } from "../src/pipeline/orchestrator.js";
import type { ProgressEvent } from "../src/pipeline/progress.js";
import type { QualityChecker } from "../src/pipeline/quality.js";
import type { ExecutionRecord } from "../src/pipeline/schemas.js";
import { makeExecution, scriptedQuality, testResolver } from "./helpers.js";

const REQUEST = "Drop 5 rubber balls onto the floor";

let template: SceneTemplate;
let tmpOut = "";

beforeAll(async () => {
  template = await loadSceneTemplate();
});

beforeEach(async () => {
  tmpOut = await fs.mkdtemp(path.join(os.tmpdir(), "simforge-orch-"));
});

afterEach(async () => {
  if (tmpOut) await fs.rm(tmpOut, { recursive: true, force: true }).catch(() => undefined);
  tmpOut = "";
});

function orchestrator(options: {
  config?: PipelineConfigOverrides;
  quality?: QualityChecker;
  generative?: GenerativeService;
  execution?: ExecutionEnvironment;
  resolver?: MaterialResolver;
  template?: SceneTemplate;
  limiter?: ExecutionLimiter;
  sleeps?: number[];
}): PipelineOrchestrator {
  const services: PipelineServices = {
    generative: options.generative ?? new FakeGenerativeService(),
    execution: options.execution ?? new FakeExecutionEnvironment(),
    resolver: options.resolver ?? testResolver(),
    template: options.template ?? template,
    quality: options.quality ?? scriptedQuality([0.93])
  };
  return new PipelineOrchestrator({
    config: createPipelineConfig({ mode: "fake", outputDir: tmpOut, ...options.config }),
    services,
    limiter: options.limiter,
    random: () => 0,
    sleep: async (ms) => {
      options.sleeps?.push(ms);
    }
  });
}

/** Registers a pending job and records the log messages it emits. */
function trackedJob(orch: PipelineOrchestrator): { jobId: string; logs: string[] } {
  const { jobId } = orch.jobs.createJob(REQUEST);
  const logs: string[] = [];
  orch.jobs.subscribe(jobId, (type, payload) => {
    if (type !== "log" || typeof payload !== "object" || payload === null || !("message" in payload)) return;
    if (typeof payload.message === "string") logs.push(payload.message);
  });
  return { jobId, logs };
}

describe("normalizeRefinementSettings", () => {
  it("merges overrides and floors the iteration count", () => {
    expect(normalizeRefinementSettings({ enabled: false, maxIterations: 2 }, { enabled: true, maxIterations: 2.7 })).toEqual({
      enabled: true,
      maxIterations: 2
    });
    expect(normalizeRefinementSettings({ enabled: true, maxIterations: 2 }, { maxIterations: -3 })).toEqual({
      enabled: true,
      maxIterations: 0
    });
    expect(normalizeRefinementSettings({ enabled: true, maxIterations: 2 }, { maxIterations: Number.NaN }).maxIterations).toBe(0);
  });
});

describe("PipelineOrchestrator", () => {
  it("accepts a first attempt that meets the threshold", async () => {
    const orch = orchestrator({ quality: scriptedQuality([0.93]) });
    const result = await orch.runJob(REQUEST);

    expect(result).toMatchObject({
      success: true,
      status: "succeeded",
      outcome: "accepted",
      refinementIterations: 0,
      errors: []
    });
    expect(result.quality?.score).toBe(0.93);
    expect(result.qualityCheckerVersion).toBe("test");
    expect(result.best?.iteration).toBe(0);
    expect(Object.keys(result.stageTimings)).toEqual(["plan", "enrich", "generate", "validate", "execute", "score"]);
    expect(result.attempts).toEqual([{ iteration: 0, outcome: "scored", score: 0.93, issues: ["Rigid body world not configured"] }]);
    expect(result.best?.artifact.outputPath).toBe(path.join(tmpOut, result.jobId, "attempt-0", "scene.blend"));
    expect(orch.jobs.getJob(result.jobId)?.status).toBe("succeeded");
    expect(orch.limiter.held).toBe(0);
  });

  it("refines once and keeps the better attempt", async () => {
    const quality = scriptedQuality([0.6, 0.85]);
    const orch = orchestrator({ quality, config: { refinement: { enabled: true, maxIterations: 2 } } });
    const result = await orch.runJob(REQUEST);

    expect(result.outcome).toBe("accepted");
    expect(result.refinementIterations).toBe(1);
    expect(result.best?.iteration).toBe(1);
    expect(result.quality?.score).toBe(0.85);
    expect(quality.calls).toBe(2);
    expect(result.stageTimings).toHaveProperty("refine_1.plan");
    expect(result.stageTimings).toHaveProperty("refine_1.score");
    expect(result.attempts.map((a) => (a.outcome === "scored" ? a.score : a.kind))).toEqual([0.6, 0.85]);
  });

  it("returns the best attempt when refinement runs out", async () => {
    const orch = orchestrator({
      quality: scriptedQuality([0.5, 0.6, 0.7]),
      config: { refinement: { enabled: true, maxIterations: 2 } }
    });
    const result = await orch.runJob(REQUEST);

    expect(result).toMatchObject({ success: true, outcome: "exhausted_fallback", refinementIterations: 2 });
    expect(result.best?.iteration).toBe(2);
    expect(result.quality?.score).toBe(0.7);
    expect(result.warnings).toContain(`${QUALITY_BELOW_THRESHOLD}: best score 0.70 is below the required 0.80`);
  });

  it("keeps the earlier attempt when a refinement scores worse", async () => {
    const orch = orchestrator({
      quality: scriptedQuality([0.7, 0.4]),
      config: { refinement: { enabled: true, maxIterations: 1 } }
    });
    const result = await orch.runJob(REQUEST);

    expect(result.outcome).toBe("exhausted_fallback");
    expect(result.best?.iteration).toBe(0);
    expect(result.quality?.score).toBe(0.7);
  });

  it("keeps the earlier attempt when a refinement ties its score", async () => {
    const orch = orchestrator({
      quality: scriptedQuality([0.7, 0.7]),
      config: { refinement: { enabled: true, maxIterations: 1 } }
    });
    const { jobId, logs } = trackedJob(orch);
    const result = await orch.runJob(REQUEST, { jobId });

    expect(result).toMatchObject({ success: true, outcome: "exhausted_fallback", refinementIterations: 1 });
    expect(result.best?.iteration).toBe(0);
    expect(result.attempts.map((a) => a.iteration)).toEqual([0, 1]);
    expect(logs).toContain("Iteration 0 scored 0.70 (threshold 0.80): refining");
    expect(logs).toContain("Iteration 1 scored 0.70 (threshold 0.80): exhausted_fallback");
  });

  it("succeeds with a warning when refinement is disabled", async () => {
    const quality = scriptedQuality([0.5]);
    const orch = orchestrator({ quality });
    const result = await orch.runJob(REQUEST);

    expect(result).toMatchObject({ success: true, outcome: "refinement_disabled", refinementIterations: 0 });
    expect(result.warnings).toContain(`${QUALITY_BELOW_THRESHOLD}: best score 0.50 is below the required 0.80`);
    expect(quality.calls).toBe(1);
  });

  it("per-job refinement settings override the config", async () => {
    const orch = orchestrator({ quality: scriptedQuality([0.5, 0.9]) });
    const result = await orch.runJob(REQUEST, { refinement: { enabled: true, maxIterations: 1 } });
    expect(result.outcome).toBe("accepted");
    expect(result.refinementIterations).toBe(1);
  });

  it("fails fast on a blank request without calling the generative service", async () => {
    const generate = vi.fn(async () => ({}));
    const orch = orchestrator({ generative: { generate } });
    const result = await orch.runJob("   ");

    expect(generate).not.toHaveBeenCalled();
    expect(result).toMatchObject({ success: false, status: "failed", outcome: "failed", best: null, qualityCheckerVersion: null });
    expect(result.attempts).toEqual([{ iteration: 0, outcome: "failed", stage: "plan", kind: "PlanningFailure" }]);
    expect(result.errors).toMatchObject([{ kind: "PlanningFailure", stage: "plan", message: "Simulation request is empty" }]);
  });

  it("retries a timed-out generative call with backoff and then fails", async () => {
    const generate = vi.fn((): Promise<unknown> => new Promise(() => undefined));
    const sleeps: number[] = [];
    const orch = orchestrator({ generative: { generate }, config: { generativeTimeoutMs: 20 }, sleeps });
    const result = await orch.runJob(REQUEST);

    expect(generate).toHaveBeenCalledTimes(3);
    expect(sleeps).toEqual([500, 1000]);
    expect(result.outcome).toBe("failed");
    expect(result.errors).toMatchObject([{ kind: "Timeout", stage: "plan", message: "Generative service exceeded its 20ms deadline" }]);
    expect(orch.jobs.getJob(result.jobId)?.stages.plan).toMatchObject({ status: "error", attempts: 3 });
  });

  it("recovers when a retry succeeds", async () => {
    const fake = new FakeGenerativeService();
    let calls = 0;
    const flaky: GenerativeService = {
      generate: async (request, signal) => {
        calls += 1;
        if (calls === 1) return { simulation_type: "plasma" };
        return fake.generate(request, signal);
      }
    };
    const orch = orchestrator({ generative: flaky });
    const result = await orch.runJob(REQUEST);

    expect(result.outcome).toBe("accepted");
    expect(calls).toBe(2);
    expect(orch.jobs.getJob(result.jobId)?.stages.plan.attempts).toBe(2);
  });

  it("fails with the earlier attempt kept when no refinement reaches scoring", async () => {
    const fake = new FakeGenerativeService();
    const generative: GenerativeService = {
      generate: async (request, signal) => {
        if (request.purpose === "refine") throw new Error("model unavailable");
        return fake.generate(request, signal);
      }
    };
    const orch = orchestrator({
      generative,
      quality: scriptedQuality([0.5]),
      config: { refinement: { enabled: true, maxIterations: 1 } }
    });
    const result = await orch.runJob(REQUEST);

    expect(result).toMatchObject({ success: false, outcome: "failed", refinementIterations: 1 });
    expect(result.best?.iteration).toBe(0);
    expect(result.attempts).toEqual([
      { iteration: 0, outcome: "scored", score: 0.5, issues: ["Rigid body world not configured"] },
      { iteration: 1, outcome: "failed", stage: "plan", kind: "PlanningFailure" }
    ]);
    expect(result.warnings).toContain("No refinement iteration reached scoring; scored attempts: iteration 0: 0.50");
  });

  it("retries a failing Blender run to the attempt budget and keeps its diagnostics", async () => {
    const execute = vi.fn(
      async (): Promise<ExecutionRecord> => ({
        ...makeExecution(null),
        success: false,
        outputPath: null,
        exitCode: 1,
        stderrTail: "Traceback: boom\n",
        failure: "Blender exited with code 1"
      })
    );
    const quality = scriptedQuality([0.93]);
    const sleeps: number[] = [];
    const orch = orchestrator({ execution: { execute }, quality, sleeps });
    const result = await orch.runJob(REQUEST);

    expect(execute).toHaveBeenCalledTimes(3);
    expect(sleeps).toEqual([500, 1000]);
    expect(quality.calls).toBe(0);
    expect(result).toMatchObject({ success: false, outcome: "failed", best: null });
    expect(result.errors).toMatchObject([
      {
        kind: "ExecutionFailure",
        stage: "execute",
        retryable: true,
        message: "Blender exited with code 1",
        diagnostics: "Blender exited with code 1\nTraceback: boom"
      }
    ]);
    expect(orch.jobs.getJob(result.jobId)?.stages.execute).toMatchObject({ status: "error", attempts: 3 });
    expect(orch.limiter.held).toBe(0);
  });

  it("recovers from a missing import through the auto-fix retry", async () => {
    const sleeps: number[] = [];
    const orch = orchestrator({ template: { name: "no-import", source: 'PARAMS = """__SCENE_PARAMS__"""\n' }, sleeps });
    const { jobId, logs } = trackedJob(orch);
    const result = await orch.runJob(REQUEST, { jobId });

    expect(result.outcome).toBe("accepted");
    expect(sleeps).toEqual([500]);
    expect(result.best?.artifact.script.startsWith("import bpy\n")).toBe(true);
    expect(orch.jobs.getJob(jobId)?.stages.validate).toMatchObject({ status: "done", attempts: 2 });
    expect(logs).toContain("Applied scene script auto-fix");
  });

  it("fails after one auto-fix retry when the script stays invalid", async () => {
    const sleeps: number[] = [];
    const orch = orchestrator({
      template: { name: "unsafe", source: 'import bpy\nos.system("ls")\nPARAMS = """__SCENE_PARAMS__"""\n' },
      sleeps
    });
    const result = await orch.runJob(REQUEST);

    expect(sleeps).toEqual([500]);
    expect(result).toMatchObject({ success: false, outcome: "failed", best: null });
    expect(result.errors).toMatchObject([
      {
        kind: "ValidationFailure",
        stage: "validate",
        retryable: false,
        message: "Scene script failed validation: Security: forbidden operation 'os.system'"
      }
    ]);
    expect(orch.jobs.getJob(result.jobId)?.stages.validate).toMatchObject({ status: "error", attempts: 2 });
  });

  it("fails at once when a material cannot be resolved", async () => {
    const resolve = vi.fn(() => null);
    const sleeps: number[] = [];
    const orch = orchestrator({ resolver: { resolve }, sleeps });
    const result = await orch.runJob(REQUEST);

    expect(sleeps).toEqual([]);
    expect(result).toMatchObject({ success: false, outcome: "failed", best: null });
    expect(result.attempts).toEqual([{ iteration: 0, outcome: "failed", stage: "enrich", kind: "EnrichmentFailure" }]);
    expect(result.errors).toMatchObject([{ kind: "EnrichmentFailure", stage: "enrich", retryable: false }]);
    expect(result.errors[0].message).toMatch(/^Could not resolve materials for: /);
    expect(orch.jobs.getJob(result.jobId)?.stages.enrich).toMatchObject({ status: "error", attempts: 1 });
  });

  it("continues refining after a failed refinement iteration", async () => {
    const fake = new FakeGenerativeService();
    let refineCalls = 0;
    const generative: GenerativeService = {
      generate: async (request, signal) => {
        if (request.purpose === "refine") {
          refineCalls += 1;
          if (refineCalls <= 3) throw new Error("model unavailable");
        }
        return fake.generate(request, signal);
      }
    };
    const orch = orchestrator({
      generative,
      quality: scriptedQuality([0.5, 0.9]),
      config: { refinement: { enabled: true, maxIterations: 2 } }
    });
    const result = await orch.runJob(REQUEST);

    expect(refineCalls).toBe(4);
    expect(result).toMatchObject({ success: true, outcome: "accepted", refinementIterations: 2 });
    expect(result.best?.iteration).toBe(2);
    expect(result.quality?.score).toBe(0.9);
    expect(result.attempts).toEqual([
      { iteration: 0, outcome: "scored", score: 0.5, issues: ["Rigid body world not configured"] },
      { iteration: 1, outcome: "failed", stage: "plan", kind: "PlanningFailure" },
      { iteration: 2, outcome: "scored", score: 0.9, issues: ["Rigid body world not configured"] }
    ]);
    expect(result.errors).toMatchObject([{ kind: "PlanningFailure", stage: "plan", iteration: 1 }]);
  });

  it("shares one execution slot between concurrent jobs and frees it after timeouts", async () => {
    let active = 0;
    let peak = 0;
    const execution: ExecutionEnvironment = {
      execute: async () => {
        active += 1;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 5));
        active -= 1;
        throw new StageFailure("Timeout", "Blender execution timed out");
      }
    };
    const limiter = new ExecutionLimiter(1);
    const orch = orchestrator({ execution, limiter });
    const results = await Promise.all([orch.runJob(REQUEST), orch.runJob(REQUEST)]);

    for (const result of results) {
      expect(result).toMatchObject({ success: false, outcome: "failed" });
      expect(result.errors).toMatchObject([{ kind: "Timeout", stage: "execute", message: "Blender execution timed out" }]);
    }
    expect(results[0].jobId).not.toBe(results[1].jobId);
    expect(peak).toBe(1);
    expect(orch.limiter).toBe(limiter);
    expect(limiter.held).toBe(0);
    expect(limiter.waiting).toBe(0);
  });

  it("reports monotonic progress ending at completion", async () => {
    const events: ProgressEvent[] = [];
    const orch = orchestrator({});
    await orch.runJob(REQUEST, { progress: { report: (e) => events.push(e) } });

    expect(events.map((e) => [e.stage, e.fraction])).toEqual([
      ["plan", 0.1],
      ["enrich", 0.25],
      ["generate", 0.4],
      ["validate", 0.55],
      ["execute", 0.7],
      ["score", 0.9],
      ["complete", 1]
    ]);
    expect(events[0].message).toBe("Planning simulation");
  });

  it("labels refinement progress and restarts checkpoints per iteration", async () => {
    const events: ProgressEvent[] = [];
    const orch = orchestrator({ quality: scriptedQuality([0.5, 0.9]), config: { refinement: { enabled: true, maxIterations: 1 } } });
    await orch.runJob(REQUEST, { progress: { report: (e) => events.push(e) } });

    expect(events).toHaveLength(13);
    expect(events[6]).toEqual({ stage: "plan", fraction: 0.1, message: "Planning simulation (refinement 1)" });
    expect(events[12]).toEqual({ stage: "complete", fraction: 1, message: "Simulation complete" });
  });

  it("keeps running when a progress listener throws", async () => {
    const orch = orchestrator({});
    const result = await orch.runJob(REQUEST, {
      progress: {
        report: () => {
          throw new Error("listener broke");
        }
      }
    });
    expect(result.outcome).toBe("accepted");
  });

  it("stops with a cancelled outcome when the signal aborts", async () => {
    const controller = new AbortController();
    const generative: GenerativeService = {
      generate: () => {
        controller.abort();
        return new Promise(() => undefined);
      }
    };
    const orch = orchestrator({ generative });
    const result = await orch.runJob(REQUEST, { signal: controller.signal });

    expect(result).toMatchObject({ success: false, status: "failed", outcome: "cancelled", best: null });
    expect(result.errors).toMatchObject([{ kind: "Cancelled", stage: "plan" }]);
    expect(orch.limiter.held).toBe(0);
  });

  it("does not start a job whose signal is already aborted", async () => {
    const generate = vi.fn(async () => ({}));
    const controller = new AbortController();
    controller.abort();
    const orch = orchestrator({ generative: { generate } });
    const result = await orch.runJob(REQUEST, { signal: controller.signal });

    expect(result.outcome).toBe("cancelled");
    expect(result.errors).toMatchObject([{ kind: "Cancelled", stage: null }]);
    expect(generate).not.toHaveBeenCalled();
  });

  it("reuses a registered job and streams its events", async () => {
    const orch = orchestrator({});
    const job = orch.jobs.createJob(REQUEST);
    const types: string[] = [];
    orch.jobs.subscribe(job.jobId, (type) => types.push(type));

    const result = await orch.runJob(REQUEST, { jobId: job.jobId });
    expect(result.jobId).toBe(job.jobId);
    expect(types[0]).toBe("status");
    expect(types.filter((t) => t === "stage_finished")).toHaveLength(6);
    expect(types[types.length - 1]).toBe("finished");
    expect(orch.jobs.getJob(job.jobId)?.result?.outcome).toBe("accepted");
  });

  it("registers a new job when the given id already ran", async () => {
    const orch = orchestrator({ quality: scriptedQuality([0.93, 0.5]) });
    const first = await orch.runJob(REQUEST);
    const second = await orch.runJob(REQUEST, { jobId: first.jobId });

    expect(second.jobId).not.toBe(first.jobId);
    expect(second.outcome).toBe("refinement_disabled");
    expect(orch.jobs.getJob(first.jobId)?.result).toMatchObject({ jobId: first.jobId, outcome: "accepted" });
    expect(orch.jobs.getJob(first.jobId)?.result?.quality?.score).toBe(0.93);
  });
});
