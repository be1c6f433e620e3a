import { StageFailure } from "./errors.js";
import type { GenerativeService } from "./generative.js";
import { withDeadline } from "./retry.js";
import { PlanOutputSchema, type Plan } from "./schemas.js";
import type { Stage } from "./stages.js";

export type PlanningInput =
  | { purpose: "plan"; request: string }
  | { purpose: "refine"; request: string; currentPlan: Plan; feedback: string };

export const MAX_REQUEST_CHARS = 4_000;

export function buildInitialPrompt(request: string): string {
  return [`SIMULATION REQUEST:`, request.trim(), "", "Return the simulation plan as JSON matching the output schema."].join("\n");
}

export function buildRefinementPrompt(request: string, currentPlan: Plan, feedback: string): string {
  return [
    "SIMULATION REQUEST:",
    request.trim(),
    "",
    "CURRENT PLAN:",
    JSON.stringify(currentPlan, null, 2),
    "",
    "QUALITY FEEDBACK FROM THE LAST RUN:",
    feedback,
    "",
    "Revise the plan so the next run fixes these problems. Keep everything that already works.",
    "Return the complete revised plan as JSON matching the output schema."
  ].join("\n");
}

export function parsePlan(raw: unknown): Plan {
  const parsed = PlanOutputSchema.safeParse(raw);
  if (parsed.success) return parsed.data;
  const detail = parsed.error.issues
    .slice(0, 8)
    .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    .join("; ");
  throw new StageFailure("PlanningFailure", `Generative service returned an invalid plan: ${detail}`, {
    diagnostics: detail
  });
}

export function planWarnings(plan: Plan): string[] {
  const warnings: string[] = [];
  const total = plan.entities.reduce((sum, e) => sum + e.count, 0);
  if (plan.simulation_type === "rigid_body" && !plan.entities.some((e) => e.is_static)) {
    warnings.push("Rigid body plan has no static entity; objects will fall indefinitely");
  }
  if (plan.entities.every((e) => e.is_static)) warnings.push("Plan has no dynamic entities");
  if (total > 500) warnings.push(`High object count (${total}) will slow the simulation`);
  if (plan.duration_frames > 1000) warnings.push(`Long simulation (${plan.duration_frames} frames)`);
  if (plan.physics.resolution_max !== null && plan.physics.resolution_max > 256) {
    warnings.push(`High fluid resolution (${plan.physics.resolution_max}) will be slow`);
  }
  return warnings;
}

export function validateRequestText(request: string): void {
  const trimmed = request.trim();
  if (trimmed.length === 0) {
    throw new StageFailure("PlanningFailure", "Simulation request is empty", { retryable: false });
  }
  if (trimmed.length > MAX_REQUEST_CHARS) {
    throw new StageFailure("PlanningFailure", `Simulation request exceeds ${MAX_REQUEST_CHARS} characters`, {
      retryable: false
    });
  }
}

export function createPlanStage(service: GenerativeService, timeoutMs: number): Stage<PlanningInput, Plan> {
  return async (input, ctx) => {
    validateRequestText(input.request);
    const prompt =
      input.purpose === "plan"
        ? buildInitialPrompt(input.request)
        : buildRefinementPrompt(input.request, input.currentPlan, input.feedback);

    const raw = await withDeadline(
      (signal) => service.generate({ purpose: input.purpose, prompt, jobId: ctx.jobId }, signal),
      timeoutMs,
      "Generative service",
      ctx.signal
    );

    const plan = parsePlan(raw);
    for (const w of planWarnings(plan)) ctx.warn(w);
    return plan;
  };
}
