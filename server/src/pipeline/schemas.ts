import { z } from "zod";

export const SIMULATION_TYPES = ["rigid_body", "fluid_smoke", "fluid_fire", "fluid_liquid", "cloth"] as const;
export const ENTITY_SHAPES = ["cube", "sphere", "cylinder", "cone", "plane", "torus", "monkey"] as const;

export const SimulationTypeSchema = z.enum(SIMULATION_TYPES);
export type SimulationType = z.infer<typeof SimulationTypeSchema>;

export const EntityShapeSchema = z.enum(ENTITY_SHAPES);
export type EntityShape = z.infer<typeof EntityShapeSchema>;

// Structured-output schemas keep every key required; optional values are nullable.
export const EntitySchema = z
  .object({
    name: z.string().min(1).max(64),
    shape: EntityShapeSchema,
    count: z.number().int().min(1).max(1000),
    material: z.string().min(1),
    scale: z.number().min(0.1).max(100),
    is_static: z.boolean()
  })
  .strict();

export type Entity = z.infer<typeof EntitySchema>;

export const PhysicsSettingsSchema = z
  .object({
    gravity: z.number().min(-100).max(100),
    substeps_per_frame: z.number().int().min(1).max(100),
    solver_iterations: z.number().int().min(1).max(200),
    time_scale: z.number().min(0.01).max(10),
    resolution_max: z.number().int().min(16).max(512).nullable(),
    quality_steps: z.number().int().min(1).max(80).nullable()
  })
  .strict();

export type PhysicsSettings = z.infer<typeof PhysicsSettingsSchema>;

export const PlanOutputSchema = z
  .object({
    simulation_type: SimulationTypeSchema,
    description: z.string(),
    entities: z.array(EntitySchema).min(1).max(50),
    duration_frames: z.number().int().min(1).max(10_000),
    frame_rate: z.number().int().min(1).max(120),
    physics: PhysicsSettingsSchema
  })
  .strict();

export type Plan = z.infer<typeof PlanOutputSchema>;

export const MaterialPropertiesSchema = z
  .object({
    density: z.number().positive(),
    friction: z.number().min(0).max(2),
    restitution: z.number().min(0).max(1),
    color: z.tuple([z.number().min(0).max(1), z.number().min(0).max(1), z.number().min(0).max(1), z.number().min(0).max(1)]),
    linear_damping: z.number().min(0).max(1).default(0.04),
    angular_damping: z.number().min(0).max(1).default(0.1),
    roughness: z.number().min(0).max(1).default(0.5),
    metallic: z.number().min(0).max(1).default(0)
  })
  .strict();

export type MaterialProperties = z.infer<typeof MaterialPropertiesSchema>;

export const MaterialDatabaseSchema = z
  .object({
    version: z.string().min(1),
    default: z.string().min(1),
    materials: z.record(z.string().regex(/^[a-z0-9_]+$/), MaterialPropertiesSchema)
  })
  .strict()
  .refine((db) => Object.hasOwn(db.materials, db.default), { message: "default material must exist in materials", path: ["default"] });

export type MaterialDatabase = z.infer<typeof MaterialDatabaseSchema>;

export type MaterialMatch = "exact" | "fuzzy" | "fallback";

export type EnrichedEntity = Entity & {
  material_key: string;
  material_match: MaterialMatch;
  properties: MaterialProperties;
};

export type EnrichedPlan = Omit<Plan, "entities"> & {
  entities: EnrichedEntity[];
};

export type Artifact = {
  template: string;
  script: string;
  /** Absolute path the scene file is written to by the script. */
  outputPath: string;
  /** Parameters injected into the template. */
  params: SceneParams;
  complexity: number;
  estimatedSeconds: number;
  lineCount: number;
};

export type SceneParams = {
  simulation_type: SimulationType;
  duration_frames: number;
  frame_rate: number;
  physics: PhysicsSettings;
  entities: Array<{
    name: string;
    shape: EntityShape;
    count: number;
    scale: number;
    is_static: boolean;
    material: string;
    properties: MaterialProperties;
  }>;
  output_path: string;
};

export type ValidationOutcome = {
  valid: boolean;
  errors: string[];
  warnings: string[];
  autoFixApplied: boolean;
  /** The script that passed validation (after any auto-fix). */
  artifact: Artifact;
};

export const SceneReportSchema = z.object({
  object_count: z.number().int().min(0),
  has_camera: z.boolean(),
  light_count: z.number().int().min(0),
  lighting_energy: z.number().nullable().default(null),
  frame_start: z.number().int(),
  frame_end: z.number().int(),
  has_rigidbody_world: z.boolean().default(false),
  rigid_body_count: z.number().int().min(0).default(0),
  has_fluid_domain: z.boolean().default(false),
  fluid_flow_count: z.number().int().min(0).default(0),
  cloth_count: z.number().int().min(0).default(0),
  collision_count: z.number().int().min(0).default(0)
});

export type SceneReport = z.infer<typeof SceneReportSchema>;

export type ExecutionRecord = {
  success: boolean;
  outputPath: string | null;
  seconds: number;
  exitCode: number | null;
  stdoutTail: string;
  stderrTail: string;
  report: SceneReport | null;
  failure?: string;
};

export const QUALITY_CHECKS = ["object_count", "camera", "lighting", "physics", "frame_range"] as const;
export type QualityCheck = (typeof QUALITY_CHECKS)[number];

export type QualityMetrics = {
  score: number;
  checks: Record<QualityCheck, boolean>;
  issues: string[];
  expectedObjectCount: number;
  actualObjectCount: number;
};
