import { describe, expect, it, vi } from "vitest";
import { clampFraction, fanOutProgress, type ProgressEvent } from "../src/pipeline/progress.js";
import { STAGE_CHECKPOINTS, STAGE_ORDER, timeStage, timingKey } from "../src/pipeline/stages.js";
import { stageContext } from "./helpers.js";

describe("progress", () => {
  it("clamps fractions into [0, 1]", () => {
    expect(clampFraction(-0.5)).toBe(0);
    expect(clampFraction(0.4)).toBe(0.4);
    expect(clampFraction(3)).toBe(1);
    expect(clampFraction(Number.NaN)).toBe(0);
  });

  it("fans out to every sink and isolates a throwing one", () => {
    const seen: ProgressEvent[] = [];
    const onSinkError = vi.fn();
    const reporter = fanOutProgress(
      [
        {
          report: () => {
            throw new Error("sink down");
          }
        },
        { report: (e) => seen.push(e) }
      ],
      onSinkError
    );

    reporter.report({ stage: "plan", fraction: 1.7 });
    expect(seen).toEqual([{ stage: "plan", fraction: 1 }]);
    expect(onSinkError).toHaveBeenCalledTimes(1);
  });

  it("checkpoints increase in stage order", () => {
    const fractions = STAGE_ORDER.map((s) => STAGE_CHECKPOINTS[s]);
    expect(fractions).toEqual([0.1, 0.25, 0.4, 0.55, 0.7, 0.9]);
  });
});

describe("stages", () => {
  it("timingKey prefixes refinement iterations", () => {
    expect(timingKey("plan", 0)).toBe("plan");
    expect(timingKey("execute", 2)).toBe("refine_2.execute");
  });

  it("timeStage captures value or error with elapsed seconds", async () => {
    const ticks = [1000, 3500];
    const clock = () => ticks.shift() ?? 0;
    const ok = await timeStage(async (n: number) => n * 2, 21, stageContext(), clock);
    expect(ok).toEqual({ ok: true, value: 42, seconds: 2.5 });

    const err = new Error("nope");
    const failed = await timeStage(
      async () => {
        throw err;
      },
      null,
      stageContext(),
      () => 0
    );
    expect(failed).toEqual({ ok: false, error: err, seconds: 0 });
  });
});
