import { StageFailure } from "./errors.js";
import { QUALITY_CHECKS, type EnrichedPlan, type ExecutionRecord, type QualityCheck, type QualityMetrics, type SceneReport } from "./schemas.js";
import type { Stage } from "./stages.js";
import { roundTo } from "./utils.js";

export const OBJECT_COUNT_TOLERANCE = 2;
export const FRAME_RANGE_TOLERANCE = 5;

type CheckWeight = { weight: number; partialCredit: number };

// Physics setup dominates; a missed frame range costs little.
export const QUALITY_WEIGHTS: Record<QualityCheck, CheckWeight> = {
  object_count: { weight: 0.2, partialCredit: 0.5 },
  camera: { weight: 0.2, partialCredit: 0 },
  lighting: { weight: 0.1, partialCredit: 0.5 },
  physics: { weight: 0.4, partialCredit: 0 },
  frame_range: { weight: 0.1, partialCredit: 0.8 }
};

export type ScoringInput = {
  plan: Pick<EnrichedPlan, "simulation_type" | "entities" | "duration_frames">;
  execution: ExecutionRecord;
};

export interface QualityChecker {
  readonly version: string;
  score(input: ScoringInput): QualityMetrics;
}

function physicsCheck(plan: ScoringInput["plan"], report: SceneReport): { ok: boolean; issue?: string } {
  switch (plan.simulation_type) {
    case "rigid_body":
      if (!report.has_rigidbody_world) return { ok: false, issue: "Rigid body world not configured" };
      if (report.rigid_body_count === 0) return { ok: true, issue: "No rigid body objects found" };
      return { ok: true };
    case "fluid_smoke":
    case "fluid_fire":
    case "fluid_liquid":
      if (!report.has_fluid_domain) return { ok: false, issue: "Fluid domain not found" };
      if (report.fluid_flow_count === 0) return { ok: true, issue: "No fluid emitters found" };
      return { ok: true };
    case "cloth":
      if (report.cloth_count === 0) return { ok: false, issue: "No cloth objects found" };
      return { ok: true };
  }
}

/**
 * Scores an execution against the plan it was generated from. Pure: the same input
 * always yields the same metrics, issue order included.
 */
export function scoreQuality(input: ScoringInput): QualityMetrics {
  const { plan, execution } = input;
  const report = execution.report;
  if (!execution.success || !report) {
    throw new StageFailure("ExecutionFailure", "Cannot score an execution without a scene report", { retryable: false });
  }

  const expected = plan.entities.reduce((sum, e) => sum + e.count, 0);
  const issues: string[] = [];

  const objectCountOk = Math.abs(report.object_count - expected) <= OBJECT_COUNT_TOLERANCE;
  if (!objectCountOk) issues.push(`Object count mismatch: expected ~${expected}, got ${report.object_count}`);

  const cameraOk = report.has_camera;
  if (!cameraOk) issues.push("No camera found in scene");

  const lightingOk = report.light_count > 0;
  if (!lightingOk) issues.push("No lighting found in scene");

  const physics = physicsCheck(plan, report);
  if (physics.issue) issues.push(physics.issue);

  const frameRange = report.frame_end - report.frame_start + 1;
  const framesOk = Math.abs(frameRange - plan.duration_frames) <= FRAME_RANGE_TOLERANCE;
  if (!framesOk) issues.push(`Frame range mismatch: expected ${plan.duration_frames}, got ${frameRange}`);

  const checks: Record<QualityCheck, boolean> = {
    object_count: objectCountOk,
    camera: cameraOk,
    lighting: lightingOk,
    physics: physics.ok,
    frame_range: framesOk
  };

  let score = 0;
  for (const name of QUALITY_CHECKS) {
    const w = QUALITY_WEIGHTS[name];
    score += w.weight * (checks[name] ? 1 : w.partialCredit);
  }

  return {
    score: roundTo(Math.min(1, Math.max(0, score)), 4),
    checks,
    issues,
    expectedObjectCount: expected,
    actualObjectCount: report.object_count
  };
}

export const defaultQualityChecker: QualityChecker = {
  version: "1",
  score: scoreQuality
};

export function createScoreStage(checker: QualityChecker): Stage<ScoringInput, QualityMetrics> {
  return async (input) => checker.score(input);
}
