import { MaterialDatabaseResolver } from "../src/pipeline/materials.js";
import type { QualityChecker } from "../src/pipeline/quality.js";
import type {
  ExecutionRecord,
  MaterialDatabase,
  MaterialProperties,
  Plan,
  QualityMetrics,
  SceneReport
} from "../src/pipeline/schemas.js";
import type { StageContext } from "../src/pipeline/stages.js";

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

export async function waitFor(fn: () => boolean | Promise<boolean>, timeoutMs = 1500): Promise<void> {
  const start = Date.now();
  while (Date.now() - start < timeoutMs) {
    if (await fn()) return;
    await sleep(10);
  }
  throw new Error("timeout");
}

export type Deferred<T = void> = { promise: Promise<T>; resolve: (value: T) => void; reject: (err: Error) => void };

export function deferred<T = void>(): Deferred<T> {
  let resolve!: (value: T) => void;
  let reject!: (err: Error) => void;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export function makePlan(overrides: Partial<Plan> = {}): Plan {
  return {
    simulation_type: "rigid_body",
    description: "Five rubber balls dropping onto a concrete floor",
    entities: [
      { name: "Ground", shape: "plane", count: 1, material: "concrete", scale: 10, is_static: true },
      { name: "Ball", shape: "sphere", count: 5, material: "rubber", scale: 0.5, is_static: false }
    ],
    duration_frames: 250,
    frame_rate: 24,
    physics: {
      gravity: -9.81,
      substeps_per_frame: 10,
      solver_iterations: 10,
      time_scale: 1,
      resolution_max: null,
      quality_steps: null
    },
    ...overrides
  };
}

export function makeReport(overrides: Partial<SceneReport> = {}): SceneReport {
  return {
    object_count: 6,
    has_camera: true,
    light_count: 1,
    lighting_energy: 3,
    frame_start: 1,
    frame_end: 250,
    has_rigidbody_world: true,
    rigid_body_count: 6,
    has_fluid_domain: false,
    fluid_flow_count: 0,
    cloth_count: 0,
    collision_count: 0,
    ...overrides
  };
}

export function makeExecution(report: SceneReport | null = makeReport()): ExecutionRecord {
  return {
    success: true,
    outputPath: "/tmp/simforge-test/scene.blend",
    seconds: 1.5,
    exitCode: 0,
    stdoutTail: "",
    stderrTail: "",
    report
  };
}

export function makeMetrics(score: number, issues: string[] = []): QualityMetrics {
  const ok = issues.length === 0;
  return {
    score,
    checks: { object_count: true, camera: true, lighting: true, physics: ok, frame_range: true },
    issues,
    expectedObjectCount: 6,
    actualObjectCount: 6
  };
}

/** Returns the given scores in order, repeating the last one. */
export function scriptedQuality(scores: number[]): QualityChecker & { readonly calls: number } {
  let calls = 0;
  return {
    version: "test",
    get calls() {
      return calls;
    },
    score(): QualityMetrics {
      const score = scores[Math.min(calls, scores.length - 1)];
      calls += 1;
      return makeMetrics(score, score < 1 ? ["Rigid body world not configured"] : []);
    }
  };
}

function material(density: number, friction: number, restitution: number): MaterialProperties {
  return {
    density,
    friction,
    restitution,
    color: [0.5, 0.5, 0.5, 1],
    linear_damping: 0.04,
    angular_damping: 0.1,
    roughness: 0.5,
    metallic: 0
  };
}

export function testMaterialDatabase(): MaterialDatabase {
  return {
    version: "test",
    default: "default",
    materials: {
      default: material(1000, 0.5, 0.3),
      wood_pine: material(500, 0.6, 0.35),
      metal_steel: material(7850, 0.4, 0.2),
      rubber: material(1100, 0.9, 0.8),
      concrete: material(2400, 0.7, 0.1),
      fabric_cotton: material(300, 0.6, 0.05)
    }
  };
}

export function testResolver(): MaterialDatabaseResolver {
  return new MaterialDatabaseResolver(testMaterialDatabase());
}

export function stageContext(overrides: Partial<StageContext> = {}): StageContext & { warnings: string[]; logs: string[] } {
  const warnings: string[] = [];
  const logs: string[] = [];
  return {
    jobId: "test-job",
    attempt: 1,
    iteration: 0,
    signal: new AbortController().signal,
    warn: (m) => warnings.push(m),
    log: (m) => logs.push(m),
    ...overrides,
    warnings,
    logs
  };
}
