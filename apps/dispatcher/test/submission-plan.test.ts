import { describe, expect, it } from "vitest";
import { GIB } from "@pipeline-dispatch/core";
import { buildSubmissionPlan } from "../src/scheduler/submission-plan";
import { createTestEngine } from "./helpers";

describe("buildSubmissionPlan", () => {
  const engine = createTestEngine();

  it("lists one submission per allowed attempt", () => {
    const [plan] = buildSubmissionPlan(engine, ["consensus_build"]);
    expect(plan?.maxAttempts).toBe(3);
    expect(plan?.attempts.map(({ attempt }) => attempt)).toEqual([1, 2, 3]);
    expect(plan?.attempts.map(({ submission }) => submission.resources.memory)).toEqual([
      4 * GIB,
      8 * GIB,
      12 * GIB,
    ]);
  });

  it("respects a task's own attempt limit", () => {
    const [plan] = buildSubmissionPlan(engine, ["output_documentation"]);
    expect(plan?.maxAttempts).toBe(1);
    expect(plan?.attempts).toHaveLength(1);
  });

  it("stops after the first run when the exit code is not retried", () => {
    const [plan] = buildSubmissionPlan(engine, ["draft_selection"], 1);
    expect(plan?.attempts).toHaveLength(1);
  });

  it("reports every decision including the final one", () => {
    const actions: string[] = [];
    buildSubmissionPlan(engine, ["consensus_build"], 137, (decision) => actions.push(decision.action));
    expect(actions).toEqual(["retry", "retry", "retry", "fatal"]);
  });
});
