import { QUALITY_CHECKS, type QualityMetrics } from "./schemas.js";

export type RefinementState = "attempting" | "scoring" | "accepted" | "refining" | "exhausted_fallback";

export type RefinementSettings = {
  enabled: boolean;
  maxIterations: number;
};

export type ScoredAttempt = {
  iteration: number;
  quality: QualityMetrics;
};

/**
 * Higher score first; on equal scores the earlier iteration wins.
 * Negative when `a` ranks ahead of `b`.
 */
export function compareAttempts(a: ScoredAttempt, b: ScoredAttempt): number {
  if (a.quality.score !== b.quality.score) return b.quality.score - a.quality.score;
  return a.iteration - b.iteration;
}

/** True when `candidate` ranks ahead of `best`; an equal later score never replaces the earlier one. */
export function isBetterAttempt(candidate: ScoredAttempt, best: ScoredAttempt | null): boolean {
  return !best || compareAttempts(candidate, best) < 0;
}

export type RefineDecision = { refine: false; reason: "accepted" | "disabled" | "exhausted" } | { refine: true; reason: string };

export function meetsThreshold(quality: QualityMetrics, threshold: number): boolean {
  return quality.score >= threshold;
}

/** First unmet concern, in the order a refinement should address them. */
export function refinementReason(quality: QualityMetrics): string {
  if (!quality.checks.physics) return "physics setup incomplete";
  if (!quality.checks.camera) return "camera missing";
  if (!quality.checks.lighting) return "lighting missing";
  if (!quality.checks.object_count) return "object count mismatch";
  if (quality.issues.length > 0) return quality.issues[0];
  return "score below threshold";
}

export function shouldRefine(
  quality: QualityMetrics,
  threshold: number,
  settings: RefinementSettings,
  iterationsUsed: number
): RefineDecision {
  if (meetsThreshold(quality, threshold)) return { refine: false, reason: "accepted" };
  if (!settings.enabled || settings.maxIterations <= 0) return { refine: false, reason: "disabled" };
  if (iterationsUsed >= settings.maxIterations) return { refine: false, reason: "exhausted" };
  return { refine: true, reason: refinementReason(quality) };
}

export function nextRefinementState(
  state: RefinementState,
  event: { quality?: QualityMetrics; threshold: number; settings: RefinementSettings; iterationsUsed: number }
): RefinementState {
  switch (state) {
    case "attempting":
      return "scoring";
    case "scoring": {
      if (!event.quality) return "scoring";
      const decision = shouldRefine(event.quality, event.threshold, event.settings, event.iterationsUsed);
      if (decision.refine) return "refining";
      if (decision.reason === "exhausted") return "exhausted_fallback";
      return "accepted";
    }
    case "refining":
      return "attempting";
    case "accepted":
    case "exhausted_fallback":
      return state;
  }
}

/** Deterministic feedback text for the planner, derived only from the metrics. */
export function buildFeedback(quality: QualityMetrics, threshold: number): string {
  const lines = [`Quality score ${quality.score.toFixed(2)} is below the required ${threshold.toFixed(2)}.`];
  const failed = QUALITY_CHECKS.filter((name) => !quality.checks[name]);
  if (failed.length > 0) lines.push(`Failed checks: ${failed.join(", ")}.`);
  if (quality.issues.length > 0) {
    lines.push("Issues:");
    for (const issue of quality.issues) lines.push(`- ${issue}`);
  }
  if (!quality.checks.object_count) {
    lines.push(`Make the entity counts add up to ${quality.expectedObjectCount} objects, excluding camera and lights.`);
  }
  if (!quality.checks.physics) lines.push("Make sure every dynamic entity takes part in the simulation.");
  return lines.join("\n");
}
