import { ExitCodePolicy, type ExitClassification, type TaskExitCodes } from "./domain/task-policy";
import { RESOLUTION_REASON, type ExitCodeReason } from "./resolution-codes";

export type ExitCodeClassification = {
  classification: ExitClassification;
  reason: ExitCodeReason;
};

export type ExitClassifier = (exitCode: number) => ExitCodeClassification;

export const DEFAULT_EXIT_CODE_POLICY: ExitCodePolicy = ExitCodePolicy.parse({});

/**
 * Task overrides win over the deployment band: fatal, then retry, then ignore.
 * Codes matched by nothing fall back to the deployment default, which is never "retry".
 */
export function createExitClassifier(
  taskExitCodes: TaskExitCodes,
  policy: ExitCodePolicy = DEFAULT_EXIT_CODE_POLICY,
): ExitClassifier {
  const fatal = new Set(taskExitCodes.fatal);
  const retry = new Set(taskExitCodes.retry);
  const ignore = new Set(taskExitCodes.ignore);
  const resourceBand = new Set(policy.resourceExhaustion);

  return (exitCode: number): ExitCodeClassification => {
    if (fatal.has(exitCode)) {
      return { classification: "fatal", reason: RESOLUTION_REASON.TASK_FATAL_CODE };
    }
    if (retry.has(exitCode)) {
      return { classification: "retry", reason: RESOLUTION_REASON.TASK_RETRY_CODE };
    }
    if (ignore.has(exitCode)) {
      return { classification: "ignore", reason: RESOLUTION_REASON.TASK_IGNORE_CODE };
    }
    if (resourceBand.has(exitCode)) {
      return { classification: "retry", reason: RESOLUTION_REASON.RESOURCE_EXHAUSTION };
    }
    if (policy.unclassified === "fatal") {
      return { classification: "fatal", reason: RESOLUTION_REASON.UNCLASSIFIED_FATAL };
    }
    return { classification: "ignore", reason: RESOLUTION_REASON.UNCLASSIFIED_EXIT_CODE };
  };
}
