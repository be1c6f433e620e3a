import { Agent, setDefaultOpenAIKey, withTrace } from "@openai/agents";
import { createStructuredRunners, runStructuredAgentOutput, type PlannerAgent, type RunnerBundle } from "./agent_runner.js";
import { PlanOutputSchema, SIMULATION_TYPES, ENTITY_SHAPES } from "./schemas.js";

export type GenerationPurpose = "plan" | "refine";

export type GenerationRequest = {
  purpose: GenerationPurpose;
  prompt: string;
  jobId: string;
};

/**
 * Produces raw structured output for a prompt. Callers validate the result against
 * the plan schema before use; nothing returned here is trusted.
 */
export interface GenerativeService {
  generate(request: GenerationRequest, signal: AbortSignal): Promise<unknown>;
}

const PLANNER_INSTRUCTIONS = [
  "You turn natural-language physics simulation requests into a structured Blender simulation plan.",
  `simulation_type is one of: ${SIMULATION_TYPES.join(", ")}.`,
  `Entity shapes are one of: ${ENTITY_SHAPES.join(", ")}.`,
  "List ground planes, floors and walls as static entities; everything that moves is dynamic.",
  "Materials are short lowercase names such as wood_pine, metal_steel, rubber, concrete, glass or fabric_cotton.",
  "Gravity is negative (pulls down); use -9.81 unless the request says otherwise.",
  "Use null for resolution_max unless the simulation is a fluid, and null for quality_steps unless it is cloth.",
  "Keep duration_frames between 100 and 300 unless the request asks for something else; frame_rate is usually 24."
].join("\n");

export function makePlannerAgent(model: string): PlannerAgent {
  return new Agent({
    name: "Simulation Planner",
    model,
    modelSettings: { temperature: 0.2 },
    tools: [],
    outputType: PlanOutputSchema,
    instructions: PLANNER_INSTRUCTIONS
  });
}

export class OpenAIAgentsGenerativeService implements GenerativeService {
  private readonly agent: PlannerAgent;
  private readonly runners: RunnerBundle;

  constructor(
    private readonly options: {
      apiKey: string;
      model: string;
      maxTurns?: number;
      log?: (jobId: string, message: string) => void;
      runners?: RunnerBundle;
    }
  ) {
    setDefaultOpenAIKey(options.apiKey);
    this.agent = makePlannerAgent(options.model);
    this.runners = options.runners ?? createStructuredRunners();
  }

  async generate(request: GenerationRequest, signal: AbortSignal): Promise<unknown> {
    return await withTrace(`SimForge:${request.jobId}:${request.purpose}`, async () =>
      runStructuredAgentOutput({
        runnerBundle: this.runners,
        agent: this.agent,
        prompt: request.prompt,
        signal,
        maxTurns: this.options.maxTurns ?? 3,
        log: (message) => this.options.log?.(request.jobId, message)
      })
    );
  }
}
