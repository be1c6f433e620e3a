import path from "node:path";
import type { ExecuteOptions, ExecutionEnvironment } from "./execution.js";
import { SCRIPT_FILE_NAME } from "./execution.js";
import type { GenerationRequest, GenerativeService } from "./generative.js";
import { sleep } from "./retry.js";
import type { Artifact, EntityShape, ExecutionRecord, Plan, SceneReport, SimulationType } from "./schemas.js";
import { writeTextFile } from "./utils.js";

const NUMBER_WORDS: Record<string, number> = {
  one: 1,
  two: 2,
  three: 3,
  four: 4,
  five: 5,
  six: 6,
  seven: 7,
  eight: 8,
  nine: 9,
  ten: 10,
  twelve: 12,
  fifteen: 15,
  twenty: 20,
  thirty: 30,
  fifty: 50,
  hundred: 100
};

const SHAPE_WORDS: Array<[RegExp, EntityShape]> = [
  [/\b(ball|balls|sphere|spheres|marble|marbles)\b/, "sphere"],
  [/\b(cylinder|cylinders|can|cans|barrel|barrels)\b/, "cylinder"],
  [/\b(cone|cones)\b/, "cone"],
  [/\b(torus|donut|donuts|ring|rings)\b/, "torus"],
  [/\b(monkey|suzanne)\b/, "monkey"],
  [/\b(cloth|flag|sheet|blanket|curtain)\b/, "plane"]
];

const MATERIAL_WORDS: Array<[RegExp, string]> = [
  [/\b(wood|wooden)\b/, "wood"],
  [/\b(steel|metal|metallic|iron)\b/, "metal_steel"],
  [/\brubber\b/, "rubber"],
  [/\bglass\b/, "glass"],
  [/\b(stone|granite|rock)\b/, "stone_granite"],
  [/\bice\b/, "ice"],
  [/\bplastic\b/, "plastic_abs"],
  [/\b(silk)\b/, "fabric_silk"],
  [/\b(cotton|cloth|fabric)\b/, "fabric_cotton"]
];

export function detectSimulationType(request: string): SimulationType {
  const text = request.toLowerCase();
  if (/\b(smoke|steam|fog)\b/.test(text)) return "fluid_smoke";
  if (/\b(fire|flame|flames|burning)\b/.test(text)) return "fluid_fire";
  if (/\b(water|liquid|pour|pouring|splash)\b/.test(text)) return "fluid_liquid";
  if (/\b(cloth|flag|sheet|blanket|curtain|fabric)\b/.test(text)) return "cloth";
  return "rigid_body";
}

export function detectCount(request: string): number {
  const text = request.toLowerCase();
  const digits = /\b(\d{1,4})\b/.exec(text);
  if (digits) return Math.min(1000, Math.max(1, Number(digits[1])));
  for (const word of text.split(/[^a-z]+/)) {
    if (Object.hasOwn(NUMBER_WORDS, word)) return NUMBER_WORDS[word];
  }
  return 1;
}

function firstMatch<T>(text: string, table: Array<[RegExp, T]>, fallback: T): T {
  for (const [re, value] of table) if (re.test(text)) return value;
  return fallback;
}

/** Keyword planner for offline runs; it never calls a model. */
export function fakePlanFor(request: string): Plan {
  const text = request.toLowerCase();
  const simType = detectSimulationType(request);
  const fluid = simType.startsWith("fluid_");
  const shape = firstMatch(text, SHAPE_WORDS, simType === "cloth" ? "plane" : "cube");
  const material = firstMatch(text, MATERIAL_WORDS, simType === "cloth" ? "fabric_cotton" : "plastic_abs");

  return {
    simulation_type: simType,
    description: request.trim().slice(0, 200),
    entities: [
      { name: "Ground", shape: "plane", count: 1, material: "concrete", scale: 10, is_static: true },
      {
        name: simType === "cloth" ? "Cloth" : "Body",
        shape,
        count: simType === "cloth" ? 1 : detectCount(request),
        material,
        scale: simType === "cloth" ? 2 : 0.5,
        is_static: false
      }
    ],
    duration_frames: fluid ? 150 : 250,
    frame_rate: 24,
    physics: {
      gravity: -9.81,
      substeps_per_frame: 10,
      solver_iterations: 10,
      time_scale: 1,
      resolution_max: fluid ? 64 : null,
      quality_steps: simType === "cloth" ? 5 : null
    }
  };
}

export class FakeGenerativeService implements GenerativeService {
  constructor(private readonly delayMs = 0) {}

  async generate(request: GenerationRequest, signal: AbortSignal): Promise<unknown> {
    await sleep(this.delayMs, signal);
    const match = /SIMULATION REQUEST:\n([\s\S]*?)(\n\n|$)/.exec(request.prompt);
    return fakePlanFor(match ? match[1] : request.prompt);
  }
}

export function fakeSceneReport(artifact: Artifact): SceneReport {
  const params = artifact.params;
  const sim = params.simulation_type;
  const meshes = params.entities.reduce((sum, e) => sum + e.count, 0);
  const dynamic = params.entities.filter((e) => !e.is_static).reduce((sum, e) => sum + e.count, 0);
  const statics = meshes - dynamic;
  return {
    object_count: meshes,
    has_camera: true,
    light_count: 1,
    lighting_energy: 3,
    frame_start: 1,
    frame_end: params.duration_frames,
    has_rigidbody_world: sim === "rigid_body",
    rigid_body_count: sim === "rigid_body" ? meshes : 0,
    has_fluid_domain: sim.startsWith("fluid_"),
    fluid_flow_count: sim.startsWith("fluid_") ? dynamic : 0,
    cloth_count: sim === "cloth" ? dynamic : 0,
    collision_count: sim === "cloth" ? statics : 0
  };
}

/** Writes the script and a placeholder scene file, and reports what the script would build. */
export class FakeExecutionEnvironment implements ExecutionEnvironment {
  constructor(private readonly delayMs = 0) {}

  async execute(artifact: Artifact, options: ExecuteOptions): Promise<ExecutionRecord> {
    const started = Date.now();
    await sleep(this.delayMs, options.signal);
    const dir = path.dirname(artifact.outputPath);
    await writeTextFile(path.join(dir, SCRIPT_FILE_NAME), artifact.script);
    await writeTextFile(artifact.outputPath, `fake scene for ${artifact.template}`);
    const report = fakeSceneReport(artifact);
    return {
      success: true,
      outputPath: artifact.outputPath,
      seconds: (Date.now() - started) / 1000,
      exitCode: 0,
      stdoutTail: `SCENE_REPORT:${JSON.stringify(report)}`,
      stderrTail: "",
      report
    };
  }
}
