import type { StepOutcome } from "./types";

/** A step exited non-zero. The run stops here and exits with `exitCode`. */
export class StepFailedError extends Error {
  readonly stepIndex: number;
  readonly stepId: string;
  readonly exitCode: number;
  readonly signal?: string;

  constructor(step: StepOutcome) {
    const how = step.signal ? `was killed by ${step.signal} (exit code ${step.exitCode})` : `failed with exit code ${step.exitCode}`;
    super(`Step ${step.index} (${step.id}) ${how}`);
    this.name = "StepFailedError";
    this.stepIndex = step.index;
    this.stepId = step.id;
    this.exitCode = step.exitCode;
    this.signal = step.signal;
  }
}

export class UnknownWorkflowError extends Error {
  readonly workflowId: string;

  constructor(workflowId: string, known: string[]) {
    super(`Unknown workflow: ${workflowId}${known.length ? ` (available: ${known.join(", ")})` : ""}`);
    this.name = "UnknownWorkflowError";
    this.workflowId = workflowId;
  }
}
