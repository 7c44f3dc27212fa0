import { randomUUID } from "node:crypto";
import type { AttemptState } from "./domain/attempt";
import { InvalidAttemptTransitionError } from "./errors";
import type { TaskPolicyRegistry } from "./task-policy-registry";

export interface BeginAttemptOptions {
  instanceId?: string;
  // overrides the task policy's own resource group
  groupLabel?: string;
}

export class AttemptTracker {
  constructor(private readonly registry: TaskPolicyRegistry) {}

  begin(taskKind: string, options: BeginAttemptOptions = {}): AttemptState {
    const policy = this.registry.lookup(taskKind);
    const state: AttemptState = {
      instanceId: options.instanceId ?? randomUUID(),
      taskKind,
      attemptNumber: 1,
      maxAttempts: policy.maxAttempts,
      lastExitCode: null,
      exitHistory: [],
      groupLabel: options.groupLabel ?? policy.label,
      status: "pending",
    };
    return Object.freeze(state);
  }

  recordFailure(state: AttemptState, exitCode: number): AttemptState {
    assertPending(state);
    if (!Number.isInteger(exitCode) || exitCode === 0) {
      throw new InvalidAttemptTransitionError(
        `Failure of ${state.taskKind} (${state.instanceId}) needs a non-zero exit code, got ${exitCode}`,
      );
    }
    const next: AttemptState = {
      ...state,
      attemptNumber: state.attemptNumber + 1,
      lastExitCode: exitCode,
      exitHistory: [...state.exitHistory, exitCode],
    };
    return Object.freeze(next);
  }

  recordSuccess(state: AttemptState): AttemptState {
    assertPending(state);
    const next: AttemptState = {
      ...state,
      lastExitCode: 0,
      exitHistory: [...state.exitHistory, 0],
      status: "succeeded",
    };
    return Object.freeze(next);
  }

  recordExit(state: AttemptState, exitCode: number): AttemptState {
    return exitCode === 0 ? this.recordSuccess(state) : this.recordFailure(state, exitCode);
  }
}

export function isExhausted(state: AttemptState): boolean {
  return state.attemptNumber > state.maxAttempts;
}

function assertPending(state: AttemptState): void {
  if (state.status !== "pending") {
    throw new InvalidAttemptTransitionError(
      `${state.taskKind} (${state.instanceId}) already ${state.status}; no further exits can be recorded`,
    );
  }
}
