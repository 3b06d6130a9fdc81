import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex } from "@noble/hashes/utils";
import type { EnvOverlay, PlanStep } from "./types";

export function sha256Hex(text: string): string {
  const bytes = new TextEncoder().encode(text);
  return bytesToHex(sha256(bytes));
}

/** JSON with object keys sorted at every level. */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map(canonicalJson).join(",")}]`;
  if (value !== null && typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(",")}}`;
  }
  return JSON.stringify(value);
}

/**
 * Fingerprint of what a run executes. Comments, key order and quoting in the
 * workflow file do not change it; any change to the overlay or to a step does.
 */
export function workflowHash(env: EnvOverlay, steps: PlanStep[]): string {
  return sha256Hex(canonicalJson({ env, steps }));
}
