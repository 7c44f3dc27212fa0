import type { DispatchDecision, PolicyEngine, SubmissionRequest } from "@pipeline-dispatch/core";

export interface PlannedAttempt {
  attempt: number;
  submission: SubmissionRequest;
}

export interface TaskPlan {
  taskKind: string;
  maxAttempts: number;
  attempts: PlannedAttempt[];
}

/**
 * What the engine would submit for each attempt of a task if every attempt
 * were killed with `resourceExitCode`. Used to review a policy before a run.
 */
export function buildSubmissionPlan(
  engine: PolicyEngine,
  taskKinds: readonly string[],
  resourceExitCode = 137,
  onDecision?: (decision: DispatchDecision) => void,
): TaskPlan[] {
  return taskKinds.map((taskKind) => {
    let state = engine.begin(taskKind, { instanceId: `plan:${taskKind}` });
    const attempts: PlannedAttempt[] = [];
    for (;;) {
      const decision = engine.resolve(state);
      onDecision?.(decision);
      if (decision.action !== "retry") {
        break;
      }
      attempts.push({ attempt: decision.attempt, submission: decision.submission });
      state = engine.recordExit(state, resourceExitCode);
    }
    return { taskKind, maxAttempts: state.maxAttempts, attempts };
  });
}
