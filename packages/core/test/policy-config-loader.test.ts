import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { PolicyConfigError } from "../src/errors";
import { loadPolicyConfig, parsePolicyConfig } from "../src/policy-config-loader";
import { GIB, HOUR_MS } from "../src/units";

const fixturePath = (name: string) => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

function captureConfigError(raw: unknown): PolicyConfigError {
  try {
    parsePolicyConfig(raw);
  } catch (error) {
    if (error instanceof PolicyConfigError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected PolicyConfigError");
}

describe("parsePolicyConfig", () => {
  it("fills deployment defaults", () => {
    const config = parsePolicyConfig({ tasks: {} });
    expect(config.maxAttempts).toBe(3);
    expect(config.exitCodes).toEqual({
      resourceExhaustion: [137, 138, 139, 140],
      unclassified: "ignore",
    });
    expect(config.executor).toBe("local");
    expect(config.executors).toEqual({ local: { type: "local", extraOptions: "" } });
    expect(config.ceilings).toEqual({});
  });

  it("converts task resources to bytes and milliseconds", () => {
    const config = parsePolicyConfig({
      tasks: { qc: { resources: { memory: "2 GB", time: "90m" } } },
    });
    expect(config.tasks.qc?.resources).toEqual({ memory: 2 * GIB, time: 1.5 * HOUR_MS });
    expect(config.tasks.qc?.escalation).toEqual({
      cpus: "constant",
      memory: "linear",
      time: "linear",
    });
  });

  it("keeps ceilings raw", () => {
    const config = parsePolicyConfig({ ceilings: { memory: "not a size" }, tasks: {} });
    expect(config.ceilings.memory).toBe("not a size");
  });

  it("reports invalid task resources with their path", () => {
    const error = captureConfigError({ tasks: { qc: { resources: { memory: "lots" } } } });
    expect(error.code).toBe("invalid_policy_config");
    expect(error.issues).toEqual(["tasks.qc.resources.memory: Invalid memory value: lots"]);
  });

  it("rejects undefined labels and executors", () => {
    const error = captureConfigError({
      tasks: { qc: { label: "missing" } },
      executor: "grid",
    });
    expect(error.issues).toEqual([
      'executor: Executor profile "grid" is not defined',
      'tasks.qc.label: Resource group "missing" is not defined',
    ]);
  });
});

describe("loadPolicyConfig", () => {
  it("loads and validates a policy file", async () => {
    const config = await loadPolicyConfig(fixturePath("policy.json"));
    expect(Object.keys(config.tasks)).toEqual(["qc", "read_clustering"]);
    expect(config.executor).toBe("grid");
    expect(config.resourceGroups.low_resource).toEqual({ cpus: 1, memory: 10 * GIB });
  });

  it("fails with a config error for a missing file", async () => {
    await expect(loadPolicyConfig(fixturePath("missing.json"))).rejects.toBeInstanceOf(
      PolicyConfigError,
    );
  });
});
