import { spawn } from "node:child_process";
import path from "node:path";
import { StageFailure } from "./errors.js";
import type { ExecutionLimiter } from "./limiter.js";
import { withDeadline } from "./retry.js";
import { SceneReportSchema, type Artifact, type ExecutionRecord, type SceneReport, type ValidationOutcome } from "./schemas.js";
import type { Stage } from "./stages.js";
import { ensureDir, fileExists, tail, writeTextFile } from "./utils.js";

export const SCENE_REPORT_MARKER = "SCENE_REPORT:";
export const SCRIPT_FILE_NAME = "scene.py";
const OUTPUT_TAIL_CHARS = 4_000;
// Extra time the orchestrator grants before its own deadline overrides the environment's.
const DEADLINE_GRACE_MS = 5_000;

export type ExecuteOptions = {
  timeoutSeconds: number;
  signal?: AbortSignal;
};

export interface ExecutionEnvironment {
  execute(artifact: Artifact, options: ExecuteOptions): Promise<ExecutionRecord>;
}

export function parseSceneReport(stdout: string): SceneReport | null {
  const lines = stdout.split(/\r?\n/);
  for (let i = lines.length - 1; i >= 0; i--) {
    const idx = lines[i].indexOf(SCENE_REPORT_MARKER);
    if (idx === -1) continue;
    try {
      const parsed = SceneReportSchema.safeParse(JSON.parse(lines[i].slice(idx + SCENE_REPORT_MARKER.length)));
      return parsed.success ? parsed.data : null;
    } catch {
      return null;
    }
  }
  return null;
}

export function parseBlenderVersion(stdout: string): string | null {
  const m = /Blender\s+(\d+\.\d+(?:\.\d+)?)/.exec(stdout);
  return m ? m[1] : null;
}

type ProcessOutcome = {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  seconds: number;
};

/** Runs a process to completion, killing it on timeout or abort. */
export async function runProcess(
  command: string,
  args: string[],
  options: { timeoutMs: number; signal?: AbortSignal; cwd?: string }
): Promise<ProcessOutcome> {
  if (options.signal?.aborted) throw new StageFailure("Cancelled", "Cancelled before process start");

  const started = Date.now();
  const child = spawn(command, args, { cwd: options.cwd, stdio: ["ignore", "pipe", "pipe"], env: process.env });

  const logs = { stdout: "", stderr: "" };
  child.stdout?.on("data", (buf: Buffer | string) => {
    logs.stdout += String(buf);
  });
  child.stderr?.on("data", (buf: Buffer | string) => {
    logs.stderr += String(buf);
  });

  return await new Promise<ProcessOutcome>((resolve, reject) => {
    let settled = false;
    const settle = (fn: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeout);
      options.signal?.removeEventListener("abort", onAbort);
      fn();
    };

    const timeout = setTimeout(() => {
      settle(() => {
        child.kill("SIGKILL");
        reject(
          new StageFailure("Timeout", `${path.basename(command)} exceeded ${options.timeoutMs}ms and was killed`, {
            diagnostics: tail(logs.stderr || logs.stdout, OUTPUT_TAIL_CHARS)
          })
        );
      });
    }, Math.max(0, options.timeoutMs));

    const onAbort = () => {
      settle(() => {
        child.kill("SIGKILL");
        reject(new StageFailure("Cancelled", "Cancelled while the process was running"));
      });
    };
    options.signal?.addEventListener("abort", onAbort, { once: true });

    child.on("error", (err: NodeJS.ErrnoException) => {
      settle(() => {
        if (err.code === "ENOENT") {
          reject(new StageFailure("ExecutionFailure", `Executable not found: ${command}`, { retryable: false, cause: err }));
          return;
        }
        reject(new StageFailure("ExecutionFailure", `Failed to start ${command}: ${err.message}`, { cause: err }));
      });
    });

    child.on("close", (code) => {
      settle(() =>
        resolve({ exitCode: code, stdout: logs.stdout, stderr: logs.stderr, seconds: (Date.now() - started) / 1000 })
      );
    });
  });
}

export class BlenderExecutionEnvironment implements ExecutionEnvironment {
  constructor(private readonly executable: string) {}

  blenderArgs(scriptPath: string): string[] {
    return ["--background", "--factory-startup", "--python", scriptPath, "--"];
  }

  async execute(artifact: Artifact, options: ExecuteOptions): Promise<ExecutionRecord> {
    const dir = path.dirname(artifact.outputPath);
    await ensureDir(dir);
    const scriptPath = path.join(dir, SCRIPT_FILE_NAME);
    await writeTextFile(scriptPath, artifact.script);

    const outcome = await runProcess(this.executable, this.blenderArgs(scriptPath), {
      timeoutMs: options.timeoutSeconds * 1000,
      signal: options.signal,
      cwd: dir
    });

    const produced = await fileExists(artifact.outputPath);
    const report = parseSceneReport(outcome.stdout);
    const base = {
      seconds: outcome.seconds,
      exitCode: outcome.exitCode,
      stdoutTail: tail(outcome.stdout, OUTPUT_TAIL_CHARS),
      stderrTail: tail(outcome.stderr, OUTPUT_TAIL_CHARS),
      report
    };

    if (outcome.exitCode !== 0) {
      return { ...base, success: false, outputPath: null, failure: `Blender exited with code ${String(outcome.exitCode)}` };
    }
    if (!produced) {
      return { ...base, success: false, outputPath: null, failure: "Blender finished without writing the scene file" };
    }
    if (!report) {
      return { ...base, success: false, outputPath: artifact.outputPath, failure: "Blender output has no scene report" };
    }
    return { ...base, success: true, outputPath: artifact.outputPath };
  }

  async version(timeoutMs = 15_000): Promise<string | null> {
    const outcome = await runProcess(this.executable, ["--version"], { timeoutMs });
    return outcome.exitCode === 0 ? parseBlenderVersion(outcome.stdout) : null;
  }
}

export function createExecuteStage(
  env: ExecutionEnvironment,
  limiter: ExecutionLimiter,
  timeoutSeconds: number
): Stage<ValidationOutcome, ExecutionRecord> {
  return async (validated, ctx) => {
    const release = await limiter.acquire(ctx.signal);
    // The slot follows the environment's own promise, not the deadline: a run that
    // ignores its signal keeps holding it until it settles.
    const inflight: { run?: Promise<ExecutionRecord> } = {};
    let record: ExecutionRecord;
    try {
      record = await withDeadline(
        (signal) => {
          inflight.run = env.execute(validated.artifact, { timeoutSeconds, signal });
          return inflight.run;
        },
        timeoutSeconds * 1000 + DEADLINE_GRACE_MS,
        "Blender execution",
        ctx.signal
      );
    } finally {
      if (inflight.run) inflight.run.then(release, release);
      else release();
    }

    if (!record.success) {
      const diagnostics = [record.failure, record.stderrTail.trim(), record.stdoutTail.trim()].filter(Boolean).join("\n");
      throw new StageFailure("ExecutionFailure", record.failure ?? "Blender execution failed", { diagnostics });
    }
    ctx.log(`Blender finished in ${record.seconds.toFixed(1)}s`);
    return record;
  };
}
