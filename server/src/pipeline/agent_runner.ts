import { Agent, MaxTurnsExceededError, ModelBehaviorError, Runner } from "@openai/agents";
import { PlanOutputSchema } from "./schemas.js";

export type PlannerAgent = Agent<unknown, typeof PlanOutputSchema>;

export type RunnerBundle = {
  runner: Runner;
  deterministicRunner: Runner;
  repairRunner: Runner;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function assistantTextFromItem(item: unknown): string | null {
  if (!isRecord(item) || item.role !== "assistant") return null;
  const content = item.content;
  if (!Array.isArray(content)) return null;

  const parts: string[] = [];
  for (const c of content) {
    if (!isRecord(c)) continue;
    if (c.type === "output_text" && typeof c.text === "string") parts.push(c.text);
    if (c.type === "refusal" && typeof c.refusal === "string") parts.push(c.refusal);
  }

  const text = parts.join("").trim();
  return text.length > 0 ? text : null;
}

function lastAssistantTextFromModelResponses(modelResponses: unknown[]): string | null {
  for (let i = modelResponses.length - 1; i >= 0; i--) {
    const response = modelResponses[i];
    const out = isRecord(response) ? response.output : undefined;
    if (!Array.isArray(out)) continue;
    for (let j = out.length - 1; j >= 0; j--) {
      const text = assistantTextFromItem(out[j]);
      if (text) return text;
    }
  }
  return null;
}

/** Recovers the raw text of a response that failed output validation, when the SDK kept it. */
export function lastAssistantTextFromAgentsError(err: unknown): string | null {
  if (!isRecord(err)) return null;
  const state = err.state;
  if (!isRecord(state)) return null;
  const responses = state._modelResponses;
  if (!Array.isArray(responses)) return null;
  return lastAssistantTextFromModelResponses(responses);
}

export function createStructuredRunners(): RunnerBundle {
  return {
    runner: new Runner(),
    deterministicRunner: new Runner({ modelSettings: { temperature: 0 } }),
    repairRunner: new Runner({ modelSettings: { temperature: 0, toolChoice: "none" } })
  };
}

/**
 * Runs the agent; on a schema failure asks it to repair its previous output, and if that
 * fails too, retries once from scratch at temperature 0.
 */
export async function runStructuredAgentOutput(args: {
  runnerBundle: RunnerBundle;
  agent: PlannerAgent;
  prompt: string;
  signal: AbortSignal;
  maxTurns: number;
  log: (message: string) => void;
}): Promise<unknown> {
  const { runnerBundle, agent, prompt, signal, maxTurns, log } = args;

  const execute = async (runner: Runner, input: string, turns: number, label: string): Promise<unknown> => {
    const result = await runner.run(agent, input, { maxTurns: turns, signal });
    if (result.finalOutput === undefined || result.finalOutput === null) {
      throw new ModelBehaviorError(`${agent.name} produced no final output${label}`);
    }
    return result.finalOutput;
  };

  try {
    return await execute(runnerBundle.runner, prompt, maxTurns, "");
  } catch (err) {
    const isSchemaFailure = err instanceof ModelBehaviorError || err instanceof MaxTurnsExceededError;
    if (!isSchemaFailure) throw err;

    log(`Schema validation failed for "${agent.name}". Attempting repair...`);
    const badOutput = lastAssistantTextFromAgentsError(err);

    if (badOutput) {
      const repairPrompt =
        `Your previous response failed JSON/schema validation for the required output schema.\n` +
        `Repair it so it conforms exactly.\n\n` +
        `Rules:\n` +
        `- Return ONLY JSON (no markdown fences)\n` +
        `- Do not add extra top-level keys\n` +
        `- Prefer minimal edits to preserve meaning\n\n` +
        `PREVIOUS OUTPUT:\n` +
        badOutput;

      try {
        const repaired = await execute(runnerBundle.repairRunner, repairPrompt, 4, " (repair)");
        log(`Schema repair succeeded for "${agent.name}".`);
        return repaired;
      } catch (repairErr) {
        const msg = repairErr instanceof Error ? repairErr.message : String(repairErr);
        log(`Schema repair failed (${msg}). Retrying once from scratch...`);
      }
    } else {
      log("Schema validation failed, but raw output could not be extracted. Retrying once from scratch...");
    }

    const retried = await execute(runnerBundle.deterministicRunner, prompt, maxTurns, " (retry)");
    log(`Schema retry succeeded for "${agent.name}".`);
    return retried;
  }
}
