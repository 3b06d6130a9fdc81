export type Severity = "error" | "warn" | "info";

export type Diagnostic = {
  code: string;
  severity: Severity;
  message: string;
  path?: string;
  hint?: string;
};

export type WorkflowId = string;

/** Variables injected into every child process of a run. */
export type EnvOverlay = Readonly<Record<string, string>>;

export type WorkflowStep =
  | { id: string; run: string }
  | { id: string; program: string; args?: string[] };

export type Workflow = {
  lang: "stepwise/v0.1";
  id: WorkflowId;
  description?: string;
  env?: Record<string, string>;
  steps: WorkflowStep[];
};

export type PlanStep = {
  index: number; // 1-based
  id: string;
  program: string;
  args: string[];
};

export type Plan = {
  lang: "stepwise/plan-v0.1";
  workflow: WorkflowId;
  workflowHash: string;
  env: EnvOverlay;
  steps: PlanStep[];
};

export type StepOutcome = {
  index: number;
  id: string;
  exitCode: number;
  signal?: string;
  durationMs: number;
};

export type RunResult =
  | { status: "succeeded"; exitCode: 0; workflowHash: string; steps: StepOutcome[] }
  | { status: "failed"; exitCode: number; workflowHash: string; steps: StepOutcome[]; failed: StepOutcome };
