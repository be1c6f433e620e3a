import { StageFailure } from "./errors.js";
import { materialSanityWarnings, type MaterialResolver } from "./materials.js";
import type { EnrichedEntity, EnrichedPlan, Plan } from "./schemas.js";
import type { Stage } from "./stages.js";

export const DEFAULT_FLUID_RESOLUTION = 128;
export const MIN_FLUID_RESOLUTION = 32;
export const MIN_RIGID_BODY_FRAMES = 100;
export const EXTENDED_RIGID_BODY_FRAMES = 250;
export const MAX_SMOKE_FRAMES = 200;
export const REDUCED_SMOKE_FRAMES = 150;
export const DEFAULT_CLOTH_QUALITY_STEPS = 5;

function isFluid(plan: Pick<Plan, "simulation_type">): boolean {
  return plan.simulation_type.startsWith("fluid_");
}

/**
 * Resolves every entity's material and normalises physics settings for the simulation type.
 * Returns a new plan; the input is left untouched.
 */
export function enrichPlan(plan: Plan, resolver: MaterialResolver, warn: (message: string) => void): EnrichedPlan {
  const copy = structuredClone(plan);
  const entities: EnrichedEntity[] = [];
  const unresolved: string[] = [];

  for (const entity of copy.entities) {
    const resolved = resolver.resolve(entity.material);
    if (!resolved) {
      unresolved.push(`${entity.name} (${entity.material})`);
      continue;
    }
    if (resolved.match === "fuzzy") {
      warn(`Material "${entity.material}" for ${entity.name} matched "${resolved.key}"`);
    } else if (resolved.match === "fallback") {
      warn(`Unknown material "${entity.material}" for ${entity.name}; using default "${resolved.key}"`);
    }
    for (const w of materialSanityWarnings(resolved.key, resolved.properties)) warn(w);
    entities.push({
      ...entity,
      material_key: resolved.key,
      material_match: resolved.match,
      properties: structuredClone(resolved.properties)
    });
  }

  if (unresolved.length > 0) {
    throw new StageFailure("EnrichmentFailure", `Could not resolve materials for: ${unresolved.join(", ")}`);
  }

  const physics = { ...copy.physics };

  if (physics.gravity > 0) {
    warn(`Gravity ${physics.gravity} m/s2 points upward; using ${-physics.gravity}`);
    physics.gravity = -physics.gravity;
  }
  if (Math.abs(physics.gravity) > 50) warn(`Very high gravity (${physics.gravity} m/s2) may cause instability`);

  if (copy.simulation_type === "rigid_body") {
    if (physics.substeps_per_frame < 5) warn(`Low substeps (${physics.substeps_per_frame}) may cause instability`);
    if (physics.solver_iterations < 5) warn(`Low solver iterations (${physics.solver_iterations}) may cause instability`);
  }

  if (isFluid(copy)) {
    if (physics.resolution_max === null) {
      physics.resolution_max = DEFAULT_FLUID_RESOLUTION;
    } else if (physics.resolution_max < MIN_FLUID_RESOLUTION) {
      warn(`Fluid resolution ${physics.resolution_max} below minimum; using ${MIN_FLUID_RESOLUTION}`);
      physics.resolution_max = MIN_FLUID_RESOLUTION;
    }
  }

  let durationFrames = copy.duration_frames;
  if (copy.simulation_type === "rigid_body" && durationFrames < MIN_RIGID_BODY_FRAMES) {
    warn(`Rigid body duration ${durationFrames} frames too short; using ${EXTENDED_RIGID_BODY_FRAMES}`);
    durationFrames = EXTENDED_RIGID_BODY_FRAMES;
  } else if (
    (copy.simulation_type === "fluid_smoke" || copy.simulation_type === "fluid_fire") &&
    durationFrames > MAX_SMOKE_FRAMES
  ) {
    warn(`Smoke duration ${durationFrames} frames is longer than needed; using ${REDUCED_SMOKE_FRAMES}`);
    durationFrames = REDUCED_SMOKE_FRAMES;
  } else if (copy.simulation_type === "cloth" && physics.quality_steps === null) {
    physics.quality_steps = DEFAULT_CLOTH_QUALITY_STEPS;
  }

  return { ...copy, duration_frames: durationFrames, physics, entities };
}

export function createEnrichStage(resolver: MaterialResolver): Stage<Plan, EnrichedPlan> {
  return async (plan, ctx) => enrichPlan(plan, resolver, ctx.warn);
}
