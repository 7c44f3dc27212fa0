import type { SubmissionRequest } from "@pipeline-dispatch/core";

export interface TaskExitStatus {
  exitCode: number;
}

// Back-end that runs one attempt and reports its terminal exit code
export interface TaskExecutor {
  submit(request: SubmissionRequest, signal: AbortSignal): Promise<TaskExitStatus>;
}
