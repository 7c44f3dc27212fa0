import { describe, expect, it } from "vitest";
import { ExitCodePolicy, TaskExitCodes } from "../src/domain/task-policy";
import { DEFAULT_EXIT_CODE_POLICY, createExitClassifier } from "../src/exit-classifier";

describe("createExitClassifier", () => {
  const classify = createExitClassifier(TaskExitCodes.parse({}));

  it("retries the resource exhaustion band", () => {
    expect(classify(137)).toEqual({ classification: "retry", reason: "resource_exhaustion" });
    expect(classify(140)).toEqual({ classification: "retry", reason: "resource_exhaustion" });
  });

  it("ignores other non-zero codes by default", () => {
    expect(classify(1)).toEqual({ classification: "ignore", reason: "unclassified_exit_code" });
    expect(classify(141)).toEqual({ classification: "ignore", reason: "unclassified_exit_code" });
  });

  it("lets task overrides win over the band", () => {
    const taskClassify = createExitClassifier(
      TaskExitCodes.parse({ fatal: [73, 137], retry: [2], ignore: [139] }),
    );
    expect(taskClassify(73)).toEqual({ classification: "fatal", reason: "task_fatal_code" });
    expect(taskClassify(137)).toEqual({ classification: "fatal", reason: "task_fatal_code" });
    expect(taskClassify(2)).toEqual({ classification: "retry", reason: "task_retry_code" });
    expect(taskClassify(139)).toEqual({ classification: "ignore", reason: "task_ignore_code" });
    expect(taskClassify(138)).toEqual({ classification: "retry", reason: "resource_exhaustion" });
  });

  it("follows the deployment band and default", () => {
    const strict = createExitClassifier(
      TaskExitCodes.parse({}),
      ExitCodePolicy.parse({ resourceExhaustion: [143], unclassified: "fatal" }),
    );
    expect(strict(143)).toEqual({ classification: "retry", reason: "resource_exhaustion" });
    expect(strict(137)).toEqual({ classification: "fatal", reason: "unclassified_fatal" });
  });
});

describe("DEFAULT_EXIT_CODE_POLICY", () => {
  it("matches the schema defaults", () => {
    expect(DEFAULT_EXIT_CODE_POLICY).toEqual({
      resourceExhaustion: [137, 138, 139, 140],
      unclassified: "ignore",
    });
  });
});
