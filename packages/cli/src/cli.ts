#!/usr/bin/env tsx
import { Command } from "commander";
import { BUILTIN_WORKFLOWS_DIR, DEFAULT_WORKFLOW } from "@stepwise/registry";
import { listCommand, planCommand, runCommand } from "./commands";

type SourceFlags = { workflow: string; workflows: string; file?: string };

const program = new Command();
program.name("stepwise").description("Run a fixed sequence of build and check commands, stopping at the first failure").version("0.1.0");

program
  .command("run", { isDefault: true })
  .description("Run every step of a workflow in order")
  .option("--workflow <id>", "Workflow id from the registry", DEFAULT_WORKFLOW)
  .option("--file <path>", "Path to a workflow .yaml file (overrides --workflow)")
  .option("--workflows <dir>", "Workflow registry directory", BUILTIN_WORKFLOWS_DIR)
  .option("--cwd <dir>", "Directory the steps run in", process.cwd())
  .option("--quiet", "Only print the steps' own output", false)
  .action(async (opts: SourceFlags & { cwd: string; quiet: boolean }) => {
    process.exitCode = await runCommand(opts);
  });

program
  .command("plan")
  .description("Print the compiled run plan as JSON")
  .option("--workflow <id>", "Workflow id from the registry", DEFAULT_WORKFLOW)
  .option("--file <path>", "Path to a workflow .yaml file (overrides --workflow)")
  .option("--workflows <dir>", "Workflow registry directory", BUILTIN_WORKFLOWS_DIR)
  .action(async (opts: SourceFlags) => {
    process.exitCode = await planCommand(opts);
  });

program
  .command("list")
  .description("List the workflows in the registry")
  .option("--workflows <dir>", "Workflow registry directory", BUILTIN_WORKFLOWS_DIR)
  .action(async (opts: Pick<SourceFlags, "workflows">) => {
    process.exitCode = await listCommand(opts);
  });

await program.parseAsync();
