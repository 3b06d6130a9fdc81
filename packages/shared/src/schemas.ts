import { z } from "zod";

const RunStepSchema = z.object({
  id: z.string().min(1),
  run: z.string()
});

const ArgvStepSchema = z.object({
  id: z.string().min(1),
  program: z.string().min(1),
  args: z.array(z.string()).default([])
});

export const WorkflowStepSchema = z.union([RunStepSchema, ArgvStepSchema]);

export const WorkflowHeaderSchema = z.object({
  id: z.string().min(1),
  description: z.string().optional()
});

export const WorkflowSchema = z.object({
  lang: z.literal("stepwise/v0.1").default("stepwise/v0.1"),
  id: z.string().min(1),
  description: z.string().optional(),
  env: z.record(z.union([z.string(), z.number(), z.boolean()]).transform(String)).default({}),
  steps: z.array(WorkflowStepSchema).default([])
});

export const PlanSchema = z.object({
  lang: z.literal("stepwise/plan-v0.1"),
  workflow: z.string().min(1),
  workflowHash: z.string().min(1),
  env: z.record(z.string()),
  steps: z.array(
    z.object({
      index: z.number().int().positive(),
      id: z.string().min(1),
      program: z.string().min(1),
      args: z.array(z.string())
    })
  )
});
