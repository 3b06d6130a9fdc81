import { describe, it, expect } from "vitest";
import { StepFailedError, UnknownWorkflowError } from "../src";

describe("errors", () => {
  it("names the step and how it ended", () => {
    const e = new StepFailedError({ index: 2, id: "lint", exitCode: 143, signal: "SIGTERM", durationMs: 5 });
    expect(e).toBeInstanceOf(Error);
    expect(e.message).toBe("Step 2 (lint) was killed by SIGTERM (exit code 143)");
    expect([e.stepIndex, e.stepId, e.exitCode]).toEqual([2, "lint", 143]);
  });

  it("lists known workflows when one is missing", () => {
    expect(new UnknownWorkflowError("x", []).message).toBe("Unknown workflow: x");
    expect(new UnknownWorkflowError("x", ["a", "b"]).message).toBe("Unknown workflow: x (available: a, b)");
  });
});
