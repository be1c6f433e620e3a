import { StageFailure } from "./errors.js";
import type { Artifact, ValidationOutcome } from "./schemas.js";
import type { Stage } from "./stages.js";

export const FORBIDDEN_OPERATIONS = [
  "os.system",
  "subprocess",
  "eval(",
  "exec(",
  "__import__",
  "open(",
  "compile(",
  "globals()",
  "locals()"
] as const;

const DEPRECATED_API: Record<string, string> = {
  "bpy.context.scene.objects.link": "use bpy.context.collection.objects.link",
  "bpy.context.scene.objects.unlink": "use bpy.context.collection.objects.unlink"
};

export type ScriptCheck = {
  errors: string[];
  warnings: string[];
};

const OPENERS: Record<string, string> = { "(": ")", "[": "]", "{": "}" };
const CLOSERS: Record<string, string> = { ")": "(", "]": "[", "}": "{" };

/**
 * Scans Python source for unbalanced brackets and unterminated strings.
 * Comments and string bodies (single, double and triple quoted) are skipped.
 */
export function checkStructure(source: string): string[] {
  const errors: string[] = [];
  const stack: Array<{ ch: string; line: number }> = [];
  let line = 1;
  let i = 0;

  while (i < source.length && errors.length < 10) {
    const ch = source[i];

    if (ch === "\n") {
      line += 1;
      i += 1;
      continue;
    }

    if (ch === "#") {
      while (i < source.length && source[i] !== "\n") i += 1;
      continue;
    }

    if (ch === '"' || ch === "'") {
      const triple = source.startsWith(ch.repeat(3), i);
      const quote = triple ? ch.repeat(3) : ch;
      const startLine = line;
      i += quote.length;
      let closed = false;
      while (i < source.length) {
        const c = source[i];
        if (c === "\\") {
          if (source[i + 1] === "\n") line += 1;
          i += 2;
          continue;
        }
        if (c === "\n") {
          if (!triple) break;
          line += 1;
          i += 1;
          continue;
        }
        if (source.startsWith(quote, i)) {
          i += quote.length;
          closed = true;
          break;
        }
        i += 1;
      }
      if (!closed) errors.push(`Unterminated string starting at line ${startLine}`);
      continue;
    }

    if (OPENERS[ch]) {
      stack.push({ ch, line });
    } else if (CLOSERS[ch]) {
      const top = stack.pop();
      if (!top) errors.push(`Unmatched '${ch}' at line ${line}`);
      else if (top.ch !== CLOSERS[ch]) errors.push(`Mismatched '${ch}' at line ${line} (opened '${top.ch}' at line ${top.line})`);
    }
    i += 1;
  }

  for (const open of stack.slice(0, Math.max(0, 10 - errors.length))) {
    errors.push(`Unclosed '${open.ch}' opened at line ${open.line}`);
  }
  return errors;
}

export function findForbiddenOperations(source: string): string[] {
  const lines = source.split("\n").filter((l) => !l.trim().startsWith("#"));
  return FORBIDDEN_OPERATIONS.filter((op) => lines.some((l) => l.includes(op)));
}

export function hasBpyImport(source: string): boolean {
  return /^\s*(import\s+bpy\b|from\s+bpy(\.\w+)*\s+import\b)/m.test(source);
}

export function checkScript(source: string): ScriptCheck {
  const errors: string[] = [];
  const warnings: string[] = [];

  errors.push(...checkStructure(source));

  for (const op of findForbiddenOperations(source)) {
    errors.push(`Security: forbidden operation '${op}'`);
  }

  if (!hasBpyImport(source)) errors.push("Missing required import: 'bpy'");

  if (source.includes("bpy.context.active_object") && !source.includes("if bpy.context.active_object")) {
    warnings.push("Check that bpy.context.active_object exists before using it");
  }
  for (const [deprecated, suggestion] of Object.entries(DEPRECATED_API)) {
    if (source.includes(deprecated)) warnings.push(`Deprecated API '${deprecated}': ${suggestion}`);
  }

  const lower = source.toLowerCase();
  if (source.split("\n").length < 20) warnings.push("Script is very short; it may be incomplete");
  if (!/if __name__ == ["']__main__["']/.test(source)) warnings.push("No main execution block found");
  if (lower.includes("blend") && !lower.includes("save")) warnings.push("No save operation detected");
  if (!lower.includes("bake") && /rigid|fluid|cloth/.test(lower)) warnings.push("No bake operation detected");

  return { errors, warnings };
}

/**
 * The single automatic repair: adds a missing `import bpy`, and `import math` when math
 * helpers are used without it. Applying it twice yields the same script.
 */
export function autoFixScript(source: string): { script: string; fixes: string[] } {
  const fixes: string[] = [];
  let lines = source.split("\n");

  if (!hasBpyImport(source)) {
    lines = ["import bpy", ...lines];
    fixes.push("Added 'import bpy'");
  }

  const joined = lines.join("\n");
  const usesMath = joined.includes("math.") || joined.includes("radians");
  if (usesMath && !/^\s*import\s+math\b/m.test(joined)) {
    const bpyLine = lines.findIndex((l) => /^\s*import\s+bpy\b/.test(l));
    lines.splice(bpyLine === -1 ? 0 : bpyLine + 1, 0, "import math");
    fixes.push("Added 'import math'");
  }

  return { script: lines.join("\n"), fixes };
}

export function validateArtifact(artifact: Artifact, options: { applyAutoFix: boolean }): ValidationOutcome {
  let candidate = artifact;
  let autoFixApplied = false;

  if (options.applyAutoFix) {
    const fixed = autoFixScript(artifact.script);
    if (fixed.fixes.length > 0) {
      autoFixApplied = true;
      candidate = { ...artifact, script: fixed.script, lineCount: fixed.script.split("\n").length };
    }
  }

  const check = checkScript(candidate.script);
  return {
    valid: check.errors.length === 0,
    errors: check.errors,
    warnings: check.warnings,
    autoFixApplied,
    artifact: candidate
  };
}

/**
 * First attempt validates as generated. Later attempts run the auto-fix first; if that
 * still fails the failure is final.
 */
export function createValidateStage(): Stage<Artifact, ValidationOutcome> {
  return async (artifact, ctx) => {
    const applyAutoFix = ctx.attempt > 1;
    const outcome = validateArtifact(artifact, { applyAutoFix });
    if (outcome.autoFixApplied) ctx.log("Applied scene script auto-fix");
    if (!outcome.valid) {
      throw new StageFailure("ValidationFailure", `Scene script failed validation: ${outcome.errors[0]}`, {
        diagnostics: outcome.errors.join("\n"),
        autoFixAttempted: applyAutoFix
      });
    }
    for (const w of outcome.warnings) ctx.warn(w);
    return outcome;
  };
}
