export const RESOLUTION_REASON = {
  FIRST_ATTEMPT: "first_attempt",
  SUCCEEDED: "succeeded",
  RESOURCE_EXHAUSTION: "resource_exhaustion",
  TASK_RETRY_CODE: "task_retry_code",
  TASK_IGNORE_CODE: "task_ignore_code",
  TASK_FATAL_CODE: "task_fatal_code",
  UNCLASSIFIED_EXIT_CODE: "unclassified_exit_code",
  UNCLASSIFIED_FATAL: "unclassified_fatal",
  ATTEMPTS_EXHAUSTED: "attempts_exhausted",
} as const;

export type ResolutionReason = (typeof RESOLUTION_REASON)[keyof typeof RESOLUTION_REASON];

// Reasons an exit classifier may produce
export type ExitCodeReason =
  | typeof RESOLUTION_REASON.RESOURCE_EXHAUSTION
  | typeof RESOLUTION_REASON.TASK_RETRY_CODE
  | typeof RESOLUTION_REASON.TASK_IGNORE_CODE
  | typeof RESOLUTION_REASON.TASK_FATAL_CODE
  | typeof RESOLUTION_REASON.UNCLASSIFIED_EXIT_CODE
  | typeof RESOLUTION_REASON.UNCLASSIFIED_FATAL;

// What the scheduler does next. "retry" also covers the first run.
export type ResolutionAction = "retry" | "ignore" | "fatal" | "done";
