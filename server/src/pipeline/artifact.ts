import fs from "node:fs/promises";
import path from "node:path";
import type { Artifact, EnrichedPlan, SceneParams, SimulationType } from "./schemas.js";
import type { Stage } from "./stages.js";
import { StageFailure } from "./errors.js";
import { attemptOutputDirAbs, roundTo, templatesRootAbs } from "./utils.js";

export const SCENE_TEMPLATE_NAME = "scene_script.py";
export const SCENE_PARAMS_PLACEHOLDER = "__SCENE_PARAMS__";
export const SCENE_FILE_NAME = "scene.blend";

const TYPE_COMPLEXITY: Record<SimulationType, number> = {
  rigid_body: 0.2,
  cloth: 0.4,
  fluid_smoke: 0.5,
  fluid_fire: 0.6,
  fluid_liquid: 0.7
};

export type SceneTemplate = {
  name: string;
  source: string;
};

export async function loadSceneTemplate(filePath = path.join(templatesRootAbs(), SCENE_TEMPLATE_NAME)): Promise<SceneTemplate> {
  const source = await fs.readFile(filePath, "utf8");
  if (!source.includes(SCENE_PARAMS_PLACEHOLDER)) {
    throw new Error(`Scene template ${filePath} has no ${SCENE_PARAMS_PLACEHOLDER} placeholder`);
  }
  return { name: path.basename(filePath), source };
}

export function totalObjectCount(plan: Pick<EnrichedPlan, "entities">): number {
  return plan.entities.reduce((sum, e) => sum + e.count, 0);
}

export function complexityScore(plan: EnrichedPlan): number {
  let score = TYPE_COMPLEXITY[plan.simulation_type];
  const objects = totalObjectCount(plan);
  if (objects > 100) score += 0.2;
  else if (objects > 50) score += 0.1;
  if (plan.duration_frames > 300) score += 0.1;
  if (plan.physics.resolution_max !== null && plan.physics.resolution_max > 200) score += 0.2;
  return roundTo(Math.min(score, 1), 4);
}

/** Rough Blender wall-clock estimate in whole seconds. */
export function estimateExecutionSeconds(plan: EnrichedPlan): number {
  let seconds = 10;
  const res = plan.physics.resolution_max ?? 128;
  switch (plan.simulation_type) {
    case "rigid_body":
      seconds += plan.duration_frames * 0.1;
      break;
    case "fluid_smoke":
    case "fluid_fire":
      seconds += plan.duration_frames * (res / 64) * 0.5;
      break;
    case "fluid_liquid":
      seconds += plan.duration_frames * (res / 32);
      break;
    case "cloth":
      seconds += plan.duration_frames * 0.2;
      break;
  }
  if (totalObjectCount(plan) > 100) seconds *= 1.5;
  return Math.floor(seconds);
}

export function sceneParams(plan: EnrichedPlan, outputPath: string): SceneParams {
  return {
    simulation_type: plan.simulation_type,
    duration_frames: plan.duration_frames,
    frame_rate: plan.frame_rate,
    physics: { ...plan.physics },
    entities: plan.entities.map((e) => ({
      name: e.name,
      shape: e.shape,
      count: e.count,
      scale: e.scale,
      is_static: e.is_static,
      material: e.material_key,
      properties: structuredClone(e.properties)
    })),
    output_path: outputPath
  };
}

export function renderSceneScript(template: SceneTemplate, params: SceneParams): string {
  // The template embeds the JSON in a raw triple-quoted string; JSON never produces `"""`.
  const json = JSON.stringify(params);
  return template.source.split(SCENE_PARAMS_PLACEHOLDER).join(json);
}

export function generateArtifact(
  plan: EnrichedPlan,
  template: SceneTemplate,
  location: { jobId: string; iteration: number; outputRoot: string }
): Artifact {
  if (plan.entities.length === 0) throw new StageFailure("Unknown", "Cannot generate a scene without entities");
  const outputPath = path.join(attemptOutputDirAbs(location.jobId, location.iteration, location.outputRoot), SCENE_FILE_NAME);
  const params = sceneParams(plan, outputPath);
  const script = renderSceneScript(template, params);
  return {
    template: template.name,
    script,
    outputPath,
    params,
    complexity: complexityScore(plan),
    estimatedSeconds: estimateExecutionSeconds(plan),
    lineCount: script.split("\n").length
  };
}

export function createGenerateStage(template: SceneTemplate, outputRoot: string): Stage<EnrichedPlan, Artifact> {
  return async (plan, ctx) => {
    const artifact = generateArtifact(plan, template, { jobId: ctx.jobId, iteration: ctx.iteration, outputRoot });
    if (artifact.complexity >= 0.8) {
      ctx.warn(`High complexity scene (${artifact.complexity}); estimated ${artifact.estimatedSeconds}s in Blender`);
    }
    return artifact;
  };
}
