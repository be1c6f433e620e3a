import { describe, expect, it } from "vitest";
import { createEnrichStage, enrichPlan } from "../src/pipeline/enrich.js";
import type { MaterialResolver } from "../src/pipeline/materials.js";
import { makePlan, stageContext, testResolver } from "./helpers.js";

function collect(): { warnings: string[]; warn: (m: string) => void } {
  const warnings: string[] = [];
  return { warnings, warn: (m) => warnings.push(m) };
}

describe("enrichPlan", () => {
  it("attaches material properties without touching the input plan", () => {
    const plan = makePlan();
    const before = structuredClone(plan);
    const { warnings, warn } = collect();

    const enriched = enrichPlan(plan, testResolver(), warn);

    expect(plan).toEqual(before);
    expect(warnings).toEqual([]);
    expect(enriched.entities.map((e) => [e.material_key, e.material_match])).toEqual([
      ["concrete", "exact"],
      ["rubber", "exact"]
    ]);
    expect(enriched.entities[1].properties.restitution).toBe(0.8);

    enriched.entities[1].properties.color[0] = 0;
    expect(testResolver().resolve("rubber").properties.color[0]).toBe(0.5);
  });

  it("warns on fuzzy and fallback matches", () => {
    const plan = makePlan({
      entities: [
        { name: "Crate", shape: "cube", count: 2, material: "wood", scale: 1, is_static: false },
        { name: "Blob", shape: "sphere", count: 1, material: "unobtainium", scale: 1, is_static: false }
      ]
    });
    const { warnings, warn } = collect();
    const enriched = enrichPlan(plan, testResolver(), warn);

    expect(enriched.entities.map((e) => e.material_key)).toEqual(["wood_pine", "default"]);
    expect(warnings).toEqual([
      'Material "wood" for Crate matched "wood_pine"',
      'Unknown material "unobtainium" for Blob; using default "default"'
    ]);
  });

  it("fails with EnrichmentFailure when a material cannot be resolved at all", () => {
    const resolver: MaterialResolver = { resolve: () => null };
    expect(() => enrichPlan(makePlan(), resolver, () => undefined)).toThrow(
      expect.objectContaining({ kind: "EnrichmentFailure", message: "Could not resolve materials for: Ground (concrete), Ball (rubber)" })
    );
  });

  it("negates upward gravity with a warning", () => {
    const plan = makePlan();
    plan.physics.gravity = 9.81;
    const { warnings, warn } = collect();
    expect(enrichPlan(plan, testResolver(), warn).physics.gravity).toBe(-9.81);
    expect(warnings).toEqual(["Gravity 9.81 m/s2 points upward; using -9.81"]);
  });

  it("extends short rigid body runs to 250 frames", () => {
    const { warnings, warn } = collect();
    const enriched = enrichPlan(makePlan({ duration_frames: 60 }), testResolver(), warn);
    expect(enriched.duration_frames).toBe(250);
    expect(warnings).toEqual(["Rigid body duration 60 frames too short; using 250"]);
  });

  it("defaults fluid resolution to 128 and raises low values to 32", () => {
    const smoke = makePlan({ simulation_type: "fluid_smoke", duration_frames: 120 });
    expect(enrichPlan(smoke, testResolver(), () => undefined).physics.resolution_max).toBe(128);

    const low = makePlan({ simulation_type: "fluid_liquid", duration_frames: 120 });
    low.physics.resolution_max = 16;
    const { warnings, warn } = collect();
    expect(enrichPlan(low, testResolver(), warn).physics.resolution_max).toBe(32);
    expect(warnings).toEqual(["Fluid resolution 16 below minimum; using 32"]);
  });

  it("shortens long smoke and fire runs to 150 frames", () => {
    const fire = makePlan({ simulation_type: "fluid_fire", duration_frames: 400 });
    expect(enrichPlan(fire, testResolver(), () => undefined).duration_frames).toBe(150);
  });

  it("gives cloth 5 quality steps when unset", () => {
    const cloth = makePlan({ simulation_type: "cloth" });
    expect(enrichPlan(cloth, testResolver(), () => undefined).physics.quality_steps).toBe(5);
  });

  it("warns about low rigid body solver settings", () => {
    const plan = makePlan();
    plan.physics.substeps_per_frame = 2;
    plan.physics.solver_iterations = 3;
    const { warnings, warn } = collect();
    enrichPlan(plan, testResolver(), warn);
    expect(warnings).toEqual([
      "Low substeps (2) may cause instability",
      "Low solver iterations (3) may cause instability"
    ]);
  });

  it("the stage reports warnings through the context", async () => {
    const ctx = stageContext();
    const stage = createEnrichStage(testResolver());
    await stage(makePlan({ duration_frames: 50 }), ctx);
    expect(ctx.warnings).toEqual(["Rigid body duration 50 frames too short; using 250"]);
  });
});
