import { constants } from "node:os";
import { execa } from "execa";
import { PlanSchema, StepFailedError } from "@stepwise/shared";
import type { EnvOverlay, RunResult, StepOutcome } from "@stepwise/shared";

export type StepInvocation = {
  program: string;
  args: string[];
  cwd: string;
  env: EnvOverlay;
};

export type StepExit = {
  exitCode: number;
  signal?: string;
};

export type StepExecutor = (invocation: StepInvocation) => Promise<StepExit>;

type RunOpts = {
  cwd: string;
  executor?: StepExecutor;
  quiet?: boolean;
};

// Shell conventions for children that never exited on their own.
const EXIT_NOT_STARTED = 127;
const EXIT_SIGNAL_BASE = 128;

function signalNumber(signal: string): number {
  return Object.entries(constants.signals).find(([name]) => name === signal)?.[1] ?? 0;
}

/**
 * Runs the program with the parent's stdio, on top of the parent's environment.
 */
export const execaExecutor: StepExecutor = async ({ program, args, cwd, env }) => {
  const res = await execa(program, args, { cwd, env: { ...env }, stdio: "inherit", reject: false });
  if (typeof res.exitCode === "number") return { exitCode: res.exitCode };
  if (res.signal) return { exitCode: EXIT_SIGNAL_BASE + signalNumber(res.signal), signal: res.signal };
  return { exitCode: EXIT_NOT_STARTED };
};

/**
 * Execute a plan's steps in order. The first step that exits non-zero ends the
 * run; nothing after it is launched.
 */
export async function runPlan(planJson: unknown, opts: RunOpts): Promise<RunResult> {
  const plan = PlanSchema.parse(planJson);
  const exec = opts.executor ?? execaExecutor;
  const env: EnvOverlay = Object.freeze({ ...plan.env });
  const steps: StepOutcome[] = [];

  for (const step of plan.steps) {
    if (!opts.quiet) process.stdout.write(`\n==> STEP ${step.index}/${plan.steps.length} ${step.id}\n`);
    const start = Date.now();
    const exit = await exec({ program: step.program, args: [...step.args], cwd: opts.cwd, env });
    const outcome: StepOutcome = {
      index: step.index,
      id: step.id,
      exitCode: exit.exitCode,
      signal: exit.signal,
      durationMs: Date.now() - start
    };
    steps.push(outcome);
    if (exit.exitCode !== 0) {
      return { status: "failed", exitCode: exit.exitCode, workflowHash: plan.workflowHash, steps, failed: outcome };
    }
  }

  return { status: "succeeded", exitCode: 0, workflowHash: plan.workflowHash, steps };
}

export function assertRunSucceeded(result: RunResult): void {
  if (result.status === "failed") throw new StepFailedError(result.failed);
}
