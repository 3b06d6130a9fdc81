import { promises as fs } from "node:fs";
import path from "node:path";
import { compileWorkflow } from "@stepwise/compiler";
import { loadRegistryFromDir, loadWorkflowSource } from "@stepwise/registry";
import { assertRunSucceeded, runPlan } from "@stepwise/runtime";
import type { StepExecutor } from "@stepwise/runtime";
import { StepFailedError, UnknownWorkflowError } from "@stepwise/shared";
import type { Diagnostic, Plan } from "@stepwise/shared";

export type SourceOpts = {
  workflow: string;
  workflows: string;
  file?: string;
};

export type RunCommandOpts = SourceOpts & {
  cwd: string;
  quiet?: boolean;
  executor?: StepExecutor;
};

// Exit status for problems found before any step runs.
const EXIT_CONFIG = 1;

function printDiagnostics(diagnostics: Diagnostic[]) {
  for (const d of diagnostics) {
    const where = d.path ? ` (${d.path})` : "";
    const line = `${d.code}: ${d.message}${where}`;
    if (d.severity === "error") console.error(line);
    else console.warn(line);
  }
}

async function readSource(opts: SourceOpts): Promise<string> {
  if (opts.file) return fs.readFile(path.resolve(opts.file), "utf8");
  const registry = await loadRegistryFromDir(opts.workflows);
  for (const s of registry.skipped) console.warn(`[stepwise] WARN skipped ${s.file}: ${s.reason}`);
  return loadWorkflowSource(registry, opts.workflow);
}

async function compileFrom(opts: SourceOpts): Promise<Plan | undefined> {
  let sourceText: string;
  try {
    sourceText = await readSource(opts);
  } catch (e) {
    if (!(e instanceof UnknownWorkflowError)) throw e;
    console.error(`E100_UNKNOWN_WORKFLOW: ${e.message}`);
    return undefined;
  }

  const res = compileWorkflow({ sourceText });
  if (!res.ok || !res.plan) {
    console.error("Compile failed:");
    printDiagnostics(res.diagnostics);
    return undefined;
  }
  printDiagnostics(res.diagnostics);
  return res.plan;
}

/** Returns the process exit status: the first failing step's exit code, or 0. */
export async function runCommand(opts: RunCommandOpts): Promise<number> {
  const plan = await compileFrom(opts);
  if (!plan) return EXIT_CONFIG;

  const cwd = path.resolve(opts.cwd);
  if (!opts.quiet) console.log(`[stepwise] ${plan.workflow}: ${plan.steps.length} steps in ${cwd}`);
  const result = await runPlan(plan, { cwd, executor: opts.executor, quiet: opts.quiet });

  try {
    assertRunSucceeded(result);
  } catch (e) {
    if (!(e instanceof StepFailedError)) throw e;
    if (!opts.quiet) console.error(`[stepwise] ${e.message}`);
    return e.exitCode;
  }

  if (!opts.quiet) console.log("[stepwise] Run complete.");
  return 0;
}

export async function planCommand(opts: SourceOpts): Promise<number> {
  const plan = await compileFrom(opts);
  if (!plan) return EXIT_CONFIG;
  console.log(JSON.stringify(plan, null, 2));
  return 0;
}

export async function listCommand(opts: Pick<SourceOpts, "workflows">): Promise<number> {
  const registry = await loadRegistryFromDir(opts.workflows);
  for (const s of registry.skipped) console.warn(`[stepwise] WARN skipped ${s.file}: ${s.reason}`);

  for (const entry of Object.values(registry.workflows)) {
    const res = compileWorkflow({ sourceText: entry.sourceText });
    const steps = res.plan ? `${res.plan.steps.length} steps` : "invalid";
    console.log(`${entry.id}\t${steps}\t${entry.description ?? ""}`);
  }
  return 0;
}
