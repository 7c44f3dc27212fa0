import { isExhausted } from "./attempt-tracker";
import type { AttemptState } from "./domain/attempt";
import type { ResourceBundle } from "./domain/resources";
import type { ResourceCeilingTable } from "./resource-ceiling";
import {
  RESOLUTION_REASON,
  type ResolutionAction,
  type ResolutionReason,
} from "./resolution-codes";
import type { TaskPolicy } from "./task-policy-registry";

type ResolutionBase = {
  reason: ResolutionReason;
  attempt: number;
  exitCode: number | null;
};

export type Resolution =
  | (ResolutionBase & { action: "retry"; resources: ResourceBundle })
  | (ResolutionBase & { action: Exclude<ResolutionAction, "retry">; resources: null });

/**
 * Decides what happens to a task instance next. Pure apart from the one-time
 * warning the ceiling table may log for a malformed ceiling.
 *
 * - first attempt: run, the exit classifier is not consulted
 * - attempts exhausted: fatal regardless of exit code
 * - retry: escalate for the current attempt, then clamp to the ceilings
 */
export function resolveAttempt(
  state: AttemptState,
  policy: TaskPolicy,
  ceilings: ResourceCeilingTable,
): Resolution {
  const base = {
    attempt: state.attemptNumber,
    exitCode: state.lastExitCode,
  };

  if (state.status === "succeeded") {
    return { ...base, action: "done", reason: RESOLUTION_REASON.SUCCEEDED, resources: null };
  }

  if (state.lastExitCode === null) {
    return {
      ...base,
      action: "retry",
      reason: RESOLUTION_REASON.FIRST_ATTEMPT,
      resources: ceilings.clampBundle(policy.escalation(state.attemptNumber)),
    };
  }

  const { classification, reason } = policy.exitClassifier(state.lastExitCode);

  if (classification === "fatal") {
    return { ...base, action: "fatal", reason, resources: null };
  }
  if (isExhausted(state)) {
    return {
      ...base,
      action: "fatal",
      reason: RESOLUTION_REASON.ATTEMPTS_EXHAUSTED,
      resources: null,
    };
  }
  if (classification === "ignore") {
    return { ...base, action: "ignore", reason, resources: null };
  }

  return {
    ...base,
    action: "retry",
    reason,
    resources: ceilings.clampBundle(policy.escalation(state.attemptNumber)),
  };
}
