import path from "node:path";
import {
  MaterialDatabaseSchema,
  type MaterialDatabase,
  type MaterialMatch,
  type MaterialProperties
} from "./schemas.js";
import { dataRootAbs, readJsonFile } from "./utils.js";

export type MaterialResolution = {
  key: string;
  match: MaterialMatch;
  properties: MaterialProperties;
};

export interface MaterialResolver {
  /** Returns null when the name cannot be resolved, not even to a default. */
  resolve(name: string): MaterialResolution | null;
}

export function defaultMaterialsPath(): string {
  return path.join(dataRootAbs(), "materials.json");
}

export function normalizeMaterialName(name: string): string {
  return name
    .trim()
    .toLowerCase()
    .replace(/[\s-]+/g, "_")
    .replace(/[^a-z0-9_]/g, "")
    .replace(/_+/g, "_")
    .replace(/^_|_$/g, "");
}

export function parseMaterialDatabase(raw: unknown): MaterialDatabase {
  const parsed = MaterialDatabaseSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new Error(`Invalid materials database: ${detail}`);
  }
  return parsed.data;
}

export async function loadMaterialDatabase(filePath = defaultMaterialsPath()): Promise<MaterialDatabase> {
  return parseMaterialDatabase(await readJsonFile(filePath));
}

/**
 * Resolves material names against the database: exact key, then substring match in
 * either direction (first key in database order), then the database default.
 */
export class MaterialDatabaseResolver implements MaterialResolver {
  constructor(private readonly db: MaterialDatabase) {}

  resolve(name: string): MaterialResolution {
    const wanted = normalizeMaterialName(name);
    const materials = this.db.materials;

    if (wanted.length > 0 && Object.hasOwn(materials, wanted)) {
      return { key: wanted, match: "exact", properties: materials[wanted] };
    }

    if (wanted.length > 0) {
      for (const [key, properties] of Object.entries(materials)) {
        if (key === this.db.default) continue;
        if (wanted.includes(key) || key.includes(wanted)) return { key, match: "fuzzy", properties };
      }
    }

    if (!Object.hasOwn(materials, this.db.default)) {
      throw new Error(`Default material "${this.db.default}" missing from database`);
    }
    return { key: this.db.default, match: "fallback", properties: materials[this.db.default] };
  }
}

/** Notes on physically unusual material values. Empty when nothing stands out. */
export function materialSanityWarnings(key: string, props: MaterialProperties): string[] {
  const warnings: string[] = [];
  if (props.density < 10) warnings.push(`Material ${key}: very low density (${props.density} kg/m3), lighter than air`);
  else if (props.density > 20_000) warnings.push(`Material ${key}: very high density (${props.density} kg/m3)`);
  if (props.friction > 0.95) warnings.push(`Material ${key}: extremely high friction (${props.friction}), objects may not slide`);
  if (props.restitution > 0.9) warnings.push(`Material ${key}: very high restitution (${props.restitution}), objects will bounce excessively`);
  if (props.linear_damping > 0.5) warnings.push(`Material ${key}: high linear damping (${props.linear_damping})`);
  return warnings;
}
