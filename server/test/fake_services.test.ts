import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { generateArtifact, loadSceneTemplate, type SceneTemplate } from "../src/pipeline/artifact.js";
import { enrichPlan } from "../src/pipeline/enrich.js";
import {
  detectCount,
  detectSimulationType,
  fakePlanFor,
  fakeSceneReport,
  FakeExecutionEnvironment,
  FakeGenerativeService
} from "../src/pipeline/fake_services.js";
import { buildInitialPrompt, parsePlan } from "../src/pipeline/planner.js";
import { scoreQuality } from "../src/pipeline/quality.js";
import { testResolver } from "./helpers.js";

let template: SceneTemplate;
let tmpOut: string | null = null;

beforeAll(async () => {
  template = await loadSceneTemplate();
});

beforeEach(async () => {
  tmpOut = await fs.mkdtemp(path.join(os.tmpdir(), "simforge-fake-"));
});

afterEach(async () => {
  if (tmpOut) await fs.rm(tmpOut, { recursive: true, force: true }).catch(() => undefined);
  tmpOut = null;
});

describe("keyword planner", () => {
  it("detects the simulation type from keywords", () => {
    expect(detectSimulationType("Smoke rising from a chimney")).toBe("fluid_smoke");
    expect(detectSimulationType("a campfire with flames")).toBe("fluid_fire");
    expect(detectSimulationType("pour water into a glass")).toBe("fluid_liquid");
    expect(detectSimulationType("a flag waving in the wind")).toBe("cloth");
    expect(detectSimulationType("stack of boxes toppling")).toBe("rigid_body");
  });

  it("reads counts from digits or number words", () => {
    expect(detectCount("drop 12 marbles")).toBe(12);
    expect(detectCount("drop five marbles")).toBe(5);
    expect(detectCount("drop a marble on a floor")).toBe(1);
    expect(detectCount("drop 5000 marbles")).toBe(1000);
  });

  it("builds a schema-valid plan with a static ground", () => {
    const plan = parsePlan(fakePlanFor("Drop 5 wooden balls onto the floor"));
    expect(plan.simulation_type).toBe("rigid_body");
    expect(plan.entities).toEqual([
      { name: "Ground", shape: "plane", count: 1, material: "concrete", scale: 10, is_static: true },
      { name: "Body", shape: "sphere", count: 5, material: "wood", scale: 0.5, is_static: false }
    ]);
    expect(plan.duration_frames).toBe(250);
  });

  it("the fake service answers from the request in the prompt", async () => {
    const service = new FakeGenerativeService();
    const raw = await service.generate(
      { purpose: "plan", prompt: buildInitialPrompt("a silk curtain"), jobId: "j" },
      new AbortController().signal
    );
    expect(parsePlan(raw)).toMatchObject({ simulation_type: "cloth", entities: [{ name: "Ground" }, { name: "Cloth", material: "fabric_silk" }] });
  });
});

describe("FakeExecutionEnvironment", () => {
  it("writes placeholder outputs and a report that scores 1", async () => {
    if (!tmpOut) throw new Error("tmp dir missing");
    const enriched = enrichPlan(fakePlanFor("drop 3 steel cubes"), testResolver(), () => undefined);
    const artifact = generateArtifact(enriched, template, { jobId: "job-f", iteration: 0, outputRoot: tmpOut });

    const record = await new FakeExecutionEnvironment().execute(artifact, { timeoutSeconds: 5 });
    expect(record.success).toBe(true);
    expect(record.report).toEqual(fakeSceneReport(artifact));
    await expect(fs.readFile(path.join(tmpOut, "job-f", "attempt-0", "scene.py"), "utf8")).resolves.toBe(artifact.script);

    expect(scoreQuality({ plan: enriched, execution: record }).score).toBe(1);
  });
});
