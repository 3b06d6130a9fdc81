import YAML from "yaml";
import { WorkflowSchema, workflowHash } from "@stepwise/shared";
import type { Diagnostic, Plan, PlanStep } from "@stepwise/shared";

export type CompileInput = {
  sourceText: string;
};

export type CompileOutput = {
  ok: boolean;
  diagnostics: Diagnostic[];
  plan?: Plan;
};

const ENV_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

function diag(code: string, message: string, hint?: string, path?: string): Diagnostic {
  return { code, severity: "error", message, hint, path };
}

function warn(code: string, message: string, hint?: string, path?: string): Diagnostic {
  return { code, severity: "warn", message, hint, path };
}

/**
 * Compile a YAML workflow definition into a run plan.
 * Every step becomes one argv invocation; `run` lines are split on whitespace.
 */
export function compileWorkflow(input: CompileInput): CompileOutput {
  const diagnostics: Diagnostic[] = [];

  let parsed: unknown;
  try {
    parsed = YAML.parse(input.sourceText);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return { ok: false, diagnostics: [diag("E001_PARSE", `Workflow parse failed: ${message}`)] };
  }

  const result = WorkflowSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
    return { ok: false, diagnostics: [diag("E001_PARSE", `Workflow validate failed: ${issues}`)] };
  }
  const workflow = result.data;

  for (const [name, value] of Object.entries(workflow.env)) {
    if (!ENV_NAME.test(name)) {
      diagnostics.push(
        diag("E230_BAD_ENV_NAME", `Invalid environment variable name: "${name}"`, "Use letters, digits and underscores.", `env.${name}`)
      );
    } else if (value === "") {
      diagnostics.push(warn("W300_EMPTY_ENV_VALUE", `Environment variable "${name}" is set to an empty string`, undefined, `env.${name}`));
    }
  }

  if (workflow.steps.length === 0) {
    diagnostics.push(diag("E200_NO_STEPS", `Workflow "${workflow.id}" has no steps.`, "Add at least one entry under steps."));
  }

  const seen = new Set<string>();
  const steps: PlanStep[] = [];
  workflow.steps.forEach((step, i) => {
    const at = `steps.${i}`;
    if (seen.has(step.id)) {
      diagnostics.push(diag("E210_DUPLICATE_STEP", `Duplicate step id: ${step.id}`, "Step ids must be unique.", at));
    }
    seen.add(step.id);

    if ("run" in step) {
      const [program, ...args] = step.run.trim().split(/\s+/);
      if (!program) {
        diagnostics.push(diag("E220_EMPTY_COMMAND", `Step "${step.id}" has an empty run line.`, undefined, `${at}.run`));
        return;
      }
      steps.push({ index: i + 1, id: step.id, program, args });
    } else {
      steps.push({ index: i + 1, id: step.id, program: step.program, args: step.args });
    }
  });

  const ok = diagnostics.filter((d) => d.severity === "error").length === 0;
  if (!ok) return { ok: false, diagnostics };

  const env = Object.freeze({ ...workflow.env });
  const plan: Plan = {
    lang: "stepwise/plan-v0.1",
    workflow: workflow.id,
    workflowHash: workflowHash(env, steps),
    env,
    steps
  };

  return { ok: true, diagnostics, plan };
}
