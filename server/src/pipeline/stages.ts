export const STAGE_ORDER = ["plan", "enrich", "generate", "validate", "execute", "score"] as const;

export type StageName = (typeof STAGE_ORDER)[number];

/** Progress fraction reported when each stage starts. Completion reports 1. */
export const STAGE_CHECKPOINTS: Record<StageName, number> = {
  plan: 0.1,
  enrich: 0.25,
  generate: 0.4,
  validate: 0.55,
  execute: 0.7,
  score: 0.9
};

export const STAGE_LABELS: Record<StageName, string> = {
  plan: "Planning simulation",
  enrich: "Resolving materials",
  generate: "Generating scene script",
  validate: "Validating scene script",
  execute: "Running Blender",
  score: "Scoring result"
};

export type StageContext = {
  jobId: string;
  /** 1-based attempt number for this stage within the current iteration. */
  attempt: number;
  /** 0 for the initial attempt, n for the n-th refinement. */
  iteration: number;
  signal: AbortSignal;
  warn: (message: string) => void;
  log: (message: string) => void;
};

/**
 * A stage turns one typed input into one typed output. It must not mutate its input
 * and must not retry on its own; failures are thrown and classified by the orchestrator.
 */
export type Stage<I, O> = (input: I, ctx: StageContext) => Promise<O>;

export type TimedOutcome<O> =
  | { ok: true; value: O; seconds: number }
  | { ok: false; error: unknown; seconds: number };

export async function timeStage<I, O>(
  stage: Stage<I, O>,
  input: I,
  ctx: StageContext,
  clock: () => number = () => performance.now()
): Promise<TimedOutcome<O>> {
  const started = clock();
  try {
    const value = await stage(input, ctx);
    return { ok: true, value, seconds: (clock() - started) / 1000 };
  } catch (error) {
    return { ok: false, error, seconds: (clock() - started) / 1000 };
  }
}

export function timingKey(stage: StageName, iteration: number): string {
  return iteration === 0 ? stage : `refine_${iteration}.${stage}`;
}
