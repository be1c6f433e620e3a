import path from "node:path";
import { z } from "zod";
import { defaultMaterialsPath } from "./pipeline/materials.js";
import type { RefinementSettings } from "./pipeline/refinement.js";
import { DEFAULT_BACKOFF, type BackoffPolicy } from "./pipeline/retry.js";
import { outputRootAbs } from "./pipeline/utils.js";

export const PIPELINE_MODES = ["live", "fake"] as const;
export type PipelineMode = (typeof PIPELINE_MODES)[number];

export type PipelineConfig = {
  readonly mode: PipelineMode;
  readonly qualityThreshold: number;
  readonly stageMaxAttempts: number;
  readonly backoff: Readonly<BackoffPolicy>;
  readonly generativeTimeoutMs: number;
  readonly executionTimeoutSeconds: number;
  readonly maxConcurrentExecutions: number;
  readonly maxConcurrentJobs: number;
  readonly refinement: Readonly<RefinementSettings>;
  readonly blenderExecutable: string;
  readonly outputDir: string;
  readonly materialsPath: string;
  readonly model: string;
  readonly openaiApiKey: string | null;
  readonly fakeDelayMs: number;
};

export type PipelineConfigOverrides = Partial<Omit<PipelineConfig, "backoff" | "refinement">> & {
  backoff?: Partial<BackoffPolicy>;
  refinement?: Partial<RefinementSettings>;
};

export const DEFAULT_MODEL = "gpt-4.1";

type NumberBounds = { min: number; max: number; int?: boolean };

export const CONFIG_BOUNDS = {
  qualityThreshold: { min: 0, max: 1 },
  stageMaxAttempts: { min: 1, max: 10, int: true },
  backoffBaseMs: { min: 0, max: 60_000, int: true },
  backoffMultiplier: { min: 1, max: 10 },
  backoffMaxMs: { min: 0, max: 300_000, int: true },
  backoffJitter: { min: 0, max: 1 },
  generativeTimeoutMs: { min: 1_000, max: 600_000, int: true },
  executionTimeoutSeconds: { min: 1, max: 7_200, int: true },
  maxConcurrentExecutions: { min: 1, max: 64, int: true },
  maxConcurrentJobs: { min: 1, max: 64, int: true },
  refinementMaxIterations: { min: 0, max: 10, int: true },
  fakeDelayMs: { min: 0, max: 2_000, int: true }
} satisfies Record<string, NumberBounds>;

export function defaultPipelineConfig(): PipelineConfig {
  return {
    mode: "live",
    qualityThreshold: 0.8,
    stageMaxAttempts: 3,
    backoff: { ...DEFAULT_BACKOFF },
    generativeTimeoutMs: 60_000,
    executionTimeoutSeconds: 300,
    maxConcurrentExecutions: 1,
    maxConcurrentJobs: 1,
    refinement: { enabled: false, maxIterations: 2 },
    blenderExecutable: "blender",
    outputDir: outputRootAbs(),
    materialsPath: defaultMaterialsPath(),
    model: DEFAULT_MODEL,
    openaiApiKey: null,
    fakeDelayMs: 0
  };
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const value of Object.values(obj)) {
    if (value && typeof value === "object" && !Object.isFrozen(value)) deepFreeze(value);
  }
  return Object.freeze(obj);
}

/** Merges overrides onto the defaults and freezes the result. */
export function createPipelineConfig(overrides: PipelineConfigOverrides = {}): PipelineConfig {
  const base = defaultPipelineConfig();
  const config: PipelineConfig = {
    ...base,
    ...overrides,
    backoff: { ...base.backoff, ...overrides.backoff },
    refinement: { ...base.refinement, ...overrides.refinement }
  };
  return deepFreeze(config);
}

const NumberFromEnv = z.coerce.number().finite();
const BooleanFromEnv = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(["1", "0", "true", "false", "yes", "no", "on", "off"]))
  .transform((v) => v === "1" || v === "true" || v === "yes" || v === "on");
const ModeFromEnv = z.string().trim().toLowerCase().pipe(z.enum(PIPELINE_MODES));

type EnvLike = Record<string, string | undefined>;

function readRaw(env: EnvLike, name: string): string | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim().length === 0) return undefined;
  return raw.trim();
}

function readNumber(env: EnvLike, name: string, bounds: NumberBounds, fallback: number, warn: (msg: string) => void): number {
  const raw = readRaw(env, name);
  if (raw === undefined) return fallback;
  const parsed = NumberFromEnv.safeParse(raw);
  if (!parsed.success) {
    warn(`${name}="${raw}" is not a number; using ${fallback}`);
    return fallback;
  }
  let value = bounds.int ? Math.floor(parsed.data) : parsed.data;
  if (value < bounds.min || value > bounds.max) {
    const clamped = Math.min(bounds.max, Math.max(bounds.min, value));
    warn(`${name}=${value} is outside [${bounds.min}, ${bounds.max}]; using ${clamped}`);
    value = clamped;
  }
  return value;
}

function readBoolean(env: EnvLike, name: string, fallback: boolean, warn: (msg: string) => void): boolean {
  const raw = readRaw(env, name);
  if (raw === undefined) return fallback;
  const parsed = BooleanFromEnv.safeParse(raw);
  if (parsed.success) return parsed.data;
  warn(`${name}="${raw}" is not a boolean; using ${String(fallback)}`);
  return fallback;
}

/**
 * Reads SIMFORGE_* variables. Unparseable values fall back to the default and
 * out-of-range numbers are clamped; each adjustment is reported through `warn`.
 */
export function loadPipelineConfig(env: EnvLike = process.env, warn: (msg: string) => void = console.warn): PipelineConfig {
  const d = defaultPipelineConfig();
  const b = CONFIG_BOUNDS;

  let mode = d.mode;
  const rawMode = readRaw(env, "SIMFORGE_PIPELINE_MODE");
  if (rawMode !== undefined) {
    const parsed = ModeFromEnv.safeParse(rawMode);
    if (parsed.success) mode = parsed.data;
    else warn(`SIMFORGE_PIPELINE_MODE="${rawMode}" is not one of ${PIPELINE_MODES.join(", ")}; using ${d.mode}`);
  }

  const outputDir = readRaw(env, "SIMFORGE_OUTPUT_DIR");
  const materialsPath = readRaw(env, "SIMFORGE_MATERIALS_PATH");

  return createPipelineConfig({
    mode,
    qualityThreshold: readNumber(env, "SIMFORGE_QUALITY_THRESHOLD", b.qualityThreshold, d.qualityThreshold, warn),
    stageMaxAttempts: readNumber(env, "SIMFORGE_STAGE_MAX_ATTEMPTS", b.stageMaxAttempts, d.stageMaxAttempts, warn),
    backoff: {
      baseDelayMs: readNumber(env, "SIMFORGE_BACKOFF_BASE_MS", b.backoffBaseMs, d.backoff.baseDelayMs, warn),
      multiplier: readNumber(env, "SIMFORGE_BACKOFF_MULTIPLIER", b.backoffMultiplier, d.backoff.multiplier, warn),
      maxDelayMs: readNumber(env, "SIMFORGE_BACKOFF_MAX_MS", b.backoffMaxMs, d.backoff.maxDelayMs, warn),
      jitter: readNumber(env, "SIMFORGE_BACKOFF_JITTER", b.backoffJitter, d.backoff.jitter, warn)
    },
    generativeTimeoutMs: readNumber(env, "SIMFORGE_GENERATIVE_TIMEOUT_MS", b.generativeTimeoutMs, d.generativeTimeoutMs, warn),
    executionTimeoutSeconds: readNumber(
      env,
      "SIMFORGE_EXECUTION_TIMEOUT_SECONDS",
      b.executionTimeoutSeconds,
      d.executionTimeoutSeconds,
      warn
    ),
    maxConcurrentExecutions: readNumber(
      env,
      "SIMFORGE_MAX_CONCURRENT_EXECUTIONS",
      b.maxConcurrentExecutions,
      d.maxConcurrentExecutions,
      warn
    ),
    maxConcurrentJobs: readNumber(env, "SIMFORGE_MAX_CONCURRENT_JOBS", b.maxConcurrentJobs, d.maxConcurrentJobs, warn),
    refinement: {
      enabled: readBoolean(env, "SIMFORGE_REFINEMENT_ENABLED", d.refinement.enabled, warn),
      maxIterations: readNumber(
        env,
        "SIMFORGE_REFINEMENT_MAX_ITERATIONS",
        b.refinementMaxIterations,
        d.refinement.maxIterations,
        warn
      )
    },
    blenderExecutable: readRaw(env, "SIMFORGE_BLENDER_PATH") ?? d.blenderExecutable,
    outputDir: outputDir ? path.resolve(outputDir) : d.outputDir,
    materialsPath: materialsPath ? path.resolve(materialsPath) : d.materialsPath,
    model: readRaw(env, "SIMFORGE_MODEL") ?? d.model,
    openaiApiKey: readRaw(env, "OPENAI_API_KEY") ?? null,
    fakeDelayMs: readNumber(env, "SIMFORGE_FAKE_STEP_DELAY_MS", b.fakeDelayMs, d.fakeDelayMs, warn)
  });
}

/** Problems that would stop a live job from running, in a stable order. */
export function configReadinessIssues(config: PipelineConfig): string[] {
  const issues: string[] = [];
  if (config.mode === "live" && !config.openaiApiKey) issues.push("OPENAI_API_KEY is not set");
  if (config.backoff.maxDelayMs < config.backoff.baseDelayMs) {
    issues.push("SIMFORGE_BACKOFF_MAX_MS is lower than SIMFORGE_BACKOFF_BASE_MS");
  }
  return issues;
}
