import { describe, it, expect } from "vitest";
import { PolicyConfigSchema } from "../../src/domain/policy-config";

describe("PolicyConfigSchema", () => {
  it("applies deployment defaults", () => {
    const result = PolicyConfigSchema.safeParse({ tasks: { qc: {} } });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.ceilings).toEqual({});
      expect(result.data.maxAttempts).toBe(3);
      expect(result.data.executor).toBe("local");
      expect(result.data.executors).toEqual({ local: { type: "local", extraOptions: "" } });
    }
  });

  it("keeps ceilings raw", () => {
    const result = PolicyConfigSchema.safeParse({ ceilings: { memory: "not-a-size" }, tasks: {} });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.ceilings.memory).toBe("not-a-size");
    }
  });

  it("requires the selected executor profile to exist", () => {
    const result = PolicyConfigSchema.safeParse({ tasks: {}, executor: "slurm" });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues).toHaveLength(1);
      expect(result.error.issues[0]?.path).toEqual(["executor"]);
      expect(result.error.issues[0]?.message).toBe('Executor profile "slurm" is not defined');
    }
  });

  it("requires task labels to name a resource group", () => {
    const result = PolicyConfigSchema.safeParse({ tasks: { qc: { label: "huge" } } });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(["tasks", "qc", "label"]);
      expect(result.error.issues[0]?.message).toBe('Resource group "huge" is not defined');
    }
  });

  it("rejects a batch executor without a queue", () => {
    const result = PolicyConfigSchema.safeParse({
      tasks: {},
      executors: { batch: { type: "batch" } },
      executor: "batch",
    });
    expect(result.success).toBe(false);
  });
});
