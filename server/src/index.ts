import dotenv from "dotenv";
import path from "node:path";
import { configReadinessIssues, loadPipelineConfig, type PipelineConfig } from "./config.js";
import { JobExecutor } from "./executor.js";
import { JobManager } from "./job_manager.js";
import { loadSceneTemplate } from "./pipeline/artifact.js";
import { BlenderExecutionEnvironment } from "./pipeline/execution.js";
import { FakeExecutionEnvironment, FakeGenerativeService } from "./pipeline/fake_services.js";
import { OpenAIAgentsGenerativeService } from "./pipeline/generative.js";
import { ExecutionLimiter } from "./pipeline/limiter.js";
import { loadMaterialDatabase, MaterialDatabaseResolver } from "./pipeline/materials.js";
import { PipelineOrchestrator, type PipelineServices } from "./pipeline/orchestrator.js";
import { defaultQualityChecker } from "./pipeline/quality.js";
import { errorMessage, repoRoot } from "./pipeline/utils.js";

export * from "./config.js";
export * from "./executor.js";
export * from "./job_manager.js";
export * from "./pipeline/errors.js";
export * from "./pipeline/job_result.js";
export * from "./pipeline/orchestrator.js";
export * from "./pipeline/progress.js";
export * from "./pipeline/schemas.js";
export * from "./pipeline/stages.js";
export type { GenerationRequest, GenerativeService } from "./pipeline/generative.js";
export type { ExecuteOptions, ExecutionEnvironment } from "./pipeline/execution.js";
export type { MaterialResolver, MaterialResolution } from "./pipeline/materials.js";
export type { QualityChecker, ScoringInput } from "./pipeline/quality.js";
export type { RefinementSettings } from "./pipeline/refinement.js";

export type SimForge = {
  config: PipelineConfig;
  services: PipelineServices;
  jobs: JobManager;
  limiter: ExecutionLimiter;
  orchestrator: PipelineOrchestrator;
  executor: JobExecutor;
};

export type SimForgeOptions = {
  /** Skips `.env` and SIMFORGE_* lookup when given. */
  config?: PipelineConfig;
  services?: Partial<PipelineServices>;
};

export type SystemReadiness = {
  ready: boolean;
  issues: string[];
  blenderVersion: string | null;
};

function requireApiKey(config: PipelineConfig): string {
  if (!config.openaiApiKey) throw new Error("Missing required env var: OPENAI_API_KEY");
  return config.openaiApiKey;
}

export function loadEnvFile(): void {
  dotenv.config({ path: path.resolve(repoRoot(), ".env") });
}

/** Wires config, collaborators, the job registry, orchestrator and executor. */
export async function createSimForge(options: SimForgeOptions = {}): Promise<SimForge> {
  let config = options.config;
  if (!config) {
    loadEnvFile();
    config = loadPipelineConfig(process.env);
  }

  const fake = config.mode === "fake";
  if (fake) console.log("simforge pipeline mode: fake (SIMFORGE_PIPELINE_MODE=fake)");

  const jobs = new JobManager();
  const limiter = new ExecutionLimiter(config.maxConcurrentExecutions);
  const given = options.services ?? {};

  const services: PipelineServices = {
    generative:
      given.generative ??
      (fake
        ? new FakeGenerativeService(config.fakeDelayMs)
        : new OpenAIAgentsGenerativeService({
            apiKey: requireApiKey(config),
            model: config.model,
            log: (jobId, message) => jobs.log(jobId, message, "plan")
          })),
    execution:
      given.execution ??
      (fake ? new FakeExecutionEnvironment(config.fakeDelayMs) : new BlenderExecutionEnvironment(config.blenderExecutable)),
    resolver: given.resolver ?? new MaterialDatabaseResolver(await loadMaterialDatabase(config.materialsPath)),
    template: given.template ?? (await loadSceneTemplate()),
    quality: given.quality ?? defaultQualityChecker
  };

  const orchestrator = new PipelineOrchestrator({ config, services, jobs, limiter });
  const executor = new JobExecutor(orchestrator, { concurrency: config.maxConcurrentJobs });
  return { config, services, jobs, limiter, orchestrator, executor };
}

/**
 * Lists what would stop a live job from running. Fake mode needs neither an API key
 * nor a Blender install.
 */
export async function checkSystemReady(
  config: PipelineConfig,
  blender: Pick<BlenderExecutionEnvironment, "version"> = new BlenderExecutionEnvironment(config.blenderExecutable)
): Promise<SystemReadiness> {
  const issues = configReadinessIssues(config);

  try {
    await loadMaterialDatabase(config.materialsPath);
  } catch (err) {
    issues.push(`Material database unusable (${config.materialsPath}): ${errorMessage(err)}`);
  }

  let blenderVersion: string | null = null;
  if (config.mode === "live") {
    try {
      blenderVersion = await blender.version();
      if (!blenderVersion) issues.push(`Blender at "${config.blenderExecutable}" did not report a version`);
    } catch (err) {
      issues.push(`Blender not available at "${config.blenderExecutable}": ${errorMessage(err)}`);
    }
  }

  return { ready: issues.length === 0, issues, blenderVersion };
}
