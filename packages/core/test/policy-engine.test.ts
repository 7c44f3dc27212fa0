import { afterEach, describe, expect, it, vi } from "vitest";
import { PolicyConfigError, UnknownTaskKindError } from "../src/errors";
import { Logger } from "../src/logger";
import { parsePolicyConfig } from "../src/policy-config-loader";
import { PolicyEngine } from "../src/policy-engine";
import { GIB, HOUR_MS } from "../src/units";

const logger = new Logger({ component: "test", minLevel: "info", jsonOutput: false });

const config = parsePolicyConfig({
  ceilings: { cpus: 8, memory: "36.GB", time: "48.h" },
  maxAttempts: 3,
  resourceGroups: {
    standard: { cpus: 1, memory: "36 GB" },
    high_sensitivity: { cpus: 1, memory: "40 GB" },
    low_resource: { cpus: 1, memory: "10 GB" },
  },
  tasks: {
    consensus_build: { resources: { memory: "4 GB" } },
    draft_selection: { exitCodes: { fatal: [73] } },
    read_clustering: { resources: { cpus: 4 }, label: "low_resource" },
  },
  executors: {
    local: { type: "local" },
    cluster: { type: "slurm", partition: "long", extraOptions: "--qos=normal" },
  },
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("PolicyEngine", () => {
  const engine = PolicyEngine.fromConfig(config, { logger });

  it("validates the pipeline task kinds at startup", () => {
    expect(() => engine.validateTaskKinds(["consensus_build", "draft_selection"])).not.toThrow();
    try {
      engine.validateTaskKinds(["consensus_build", "kmer_freqs", "qc", "qc"]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(UnknownTaskKindError);
      if (error instanceof UnknownTaskKindError) {
        expect(error.taskKinds).toEqual(["kmer_freqs", "qc"]);
      }
    }
  });

  it("escalates consensus_build on resource kills until attempts run out", () => {
    let state = engine.begin("consensus_build", { instanceId: "barcode01" });
    const memories: number[] = [];
    for (let attempt = 1; attempt <= 3; attempt += 1) {
      const decision = engine.resolve(state);
      expect(decision.action).toBe("retry");
      memories.push(decision.submission?.resources.memory ?? -1);
      state = engine.recordExit(state, 137);
    }
    expect(memories).toEqual([4 * GIB, 8 * GIB, 12 * GIB]);

    expect(engine.resolve(state)).toEqual({
      instanceId: "barcode01",
      taskKind: "consensus_build",
      action: "fatal",
      reason: "attempts_exhausted",
      attempt: 4,
      exitCode: 137,
      submission: null,
    });
  });

  it("stops draft_selection on its fatal exit code", () => {
    const state = engine.recordExit(engine.begin("draft_selection"), 73);
    expect(engine.resolve(state)).toMatchObject({ action: "fatal", reason: "task_fatal_code" });
  });

  it("applies the task's resource group", () => {
    const decision = engine.resolve(engine.begin("read_clustering"));
    expect(decision.submission?.groupLabel).toBe("low_resource");
    expect(decision.submission?.resources).toEqual({ cpus: 1, memory: 10 * GIB, time: 4 * HOUR_MS });
  });

  it("reports done after success", () => {
    const state = engine.recordExit(engine.begin("consensus_build"), 0);
    expect(engine.resolve(state)).toMatchObject({ action: "done", submission: null });
  });

  it("renders submissions for the selected executor", () => {
    const slurm = PolicyEngine.fromConfig(config, { executor: "cluster", logger });
    const decision = slurm.resolve(slurm.begin("consensus_build", { instanceId: "barcode02" }));
    expect(decision.submission).toEqual({
      instanceId: "barcode02",
      taskKind: "consensus_build",
      attempt: 1,
      executor: "slurm",
      profileName: "cluster",
      groupLabel: null,
      resources: { cpus: 1, memory: 4 * GIB, time: 4 * HOUR_MS },
      submissionOptions: [
        "--cpus-per-task=1",
        "--mem=4096M",
        "--time=04:00:00",
        "--partition=long",
      ],
      extraSubmissionOptions: "--qos=normal",
    });
  });

  it("rejects an executor profile missing from the config", () => {
    expect(() => PolicyEngine.fromConfig(config, { executor: "nope", logger })).toThrow(
      PolicyConfigError,
    );
  });

  it("keeps resolving with a malformed ceiling", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const loose = PolicyEngine.fromConfig(
      { ...config, ceilings: { memory: "thirty-six gigs" } },
      { logger },
    );
    let state = loose.begin("consensus_build");
    state = loose.recordExit(state, 137);
    state = loose.recordExit(state, 137);

    expect(loose.resolve(state).submission?.resources.memory).toBe(12 * GIB);
    expect(loose.resolve(state).submission?.resources.memory).toBe(12 * GIB);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
