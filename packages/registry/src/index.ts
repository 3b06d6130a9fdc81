import { promises as fs } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import { UnknownWorkflowError, WorkflowHeaderSchema } from "@stepwise/shared";

export const BUILTIN_WORKFLOWS_DIR = fileURLToPath(new URL("../workflows/", import.meta.url));

export const DEFAULT_WORKFLOW = "rust-ci";

export type WorkflowEntry = {
  id: string;
  description?: string;
  sourcePath: string;
  sourceText: string;
};

export type Registry = {
  workflows: Record<string, WorkflowEntry>;
  skipped: Array<{ file: string; reason: string }>;
};

function isWorkflowFile(name: string) {
  return name.endsWith(".yaml") || name.endsWith(".yml");
}

export async function loadRegistryFromDir(workflowsDir: string): Promise<Registry> {
  const entries = await fs.readdir(workflowsDir, { withFileTypes: true });
  const registry: Registry = { workflows: {}, skipped: [] };

  for (const e of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    if (!e.isFile() || !isWorkflowFile(e.name)) continue;
    const sourcePath = path.join(workflowsDir, e.name);
    const sourceText = await fs.readFile(sourcePath, "utf8");

    let raw: unknown;
    try {
      raw = YAML.parse(sourceText);
    } catch (err) {
      registry.skipped.push({ file: e.name, reason: err instanceof Error ? err.message : String(err) });
      continue;
    }
    const header = WorkflowHeaderSchema.safeParse(raw);
    if (!header.success) {
      registry.skipped.push({ file: e.name, reason: header.error.issues.map((i) => i.message).join("; ") });
      continue;
    }

    const { id, description } = header.data;
    const existing = registry.workflows[id];
    if (existing) {
      registry.skipped.push({ file: e.name, reason: `duplicate workflow id "${id}" (already defined in ${path.basename(existing.sourcePath)})` });
      continue;
    }
    registry.workflows[id] = { id, description, sourcePath, sourceText };
  }

  return registry;
}

export function loadWorkflowSource(registry: Registry, id: string): string {
  const entry = registry.workflows[id];
  if (!entry) throw new UnknownWorkflowError(id, Object.keys(registry.workflows));
  return entry.sourceText;
}
